/**
 * Routing rules for the load balancer: `/api` traffic to the API upstream,
 * everything else from the static root with an SPA fallback. Built fresh on
 * every start and never persisted.
 */

import { z } from 'zod';
import { DomainError, isListenAddress, toDialAddress } from '@bloxstack/platform-core';

export const API_PATH_PREFIX = '/api';
export const UPSTREAM_IDLE_TIMEOUT_MS = 10 * 60 * 1000;
export const SPA_FALLBACK_PATH = '/';

export interface ApiRoute {
  readonly pathPrefix: string;
  /** host:port, dialable */
  readonly upstream: string;
  /** Keep Host; add X-Forwarded-* and X-Real-IP. */
  readonly transparent: boolean;
  readonly websocket: boolean;
  readonly idleTimeoutMs: number;
}

export interface StaticRoute {
  readonly root: string;
  readonly spaFallback: string;
}

export interface RoutingRuleSet {
  readonly listenAddress: string;
  readonly tls: false;
  readonly api: ApiRoute;
  readonly static: StaticRoute;
}

const addressSchema = z.string().trim().min(1, 'must not be empty').refine(isListenAddress, 'must be [host]:port');

export const routingRuleInputSchema = z.object({
  listenAddress: addressSchema,
  upstreamAddress: addressSchema,
  staticRoot: z.string().trim().min(1, 'must not be empty'),
});

export type RoutingRuleInput = z.input<typeof routingRuleInputSchema>;

export function buildRoutingRules(input: RoutingRuleInput): RoutingRuleSet {
  const parsed = routingRuleInputSchema.safeParse(input);
  if (!parsed.success) {
    const reason = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ');
    throw DomainError.configurationError('routing rules', reason);
  }

  const { listenAddress, upstreamAddress, staticRoot } = parsed.data;
  const api: ApiRoute = Object.freeze({
    pathPrefix: API_PATH_PREFIX,
    upstream: toDialAddress(upstreamAddress),
    transparent: true,
    websocket: true,
    idleTimeoutMs: UPSTREAM_IDLE_TIMEOUT_MS,
  });
  const staticRoute: StaticRoute = Object.freeze({
    root: staticRoot,
    spaFallback: SPA_FALLBACK_PATH,
  });
  const rules: RoutingRuleSet = { listenAddress, tls: false, api, static: staticRoute };
  return Object.freeze(rules);
}

/**
 * `/api` itself and anything under `/api/`; `/apix` is static.
 */
export function isApiPath(pathname: string, prefix: string = API_PATH_PREFIX): boolean {
  return pathname === prefix || pathname.startsWith(`${prefix}/`);
}
