/**
 * Stack configuration, read from the environment and validated once at start.
 */

import { z } from 'zod';
import { DEFAULT_SHUTDOWN_GRACE_MS, DomainError, isListenAddress } from '@bloxstack/platform-core';

export interface StackConfig {
  serverAddress: string;
  loadBalancerAddress: string;
  rootPath: string;
  /** Unset means the in-memory blob store. */
  databaseUrl?: string;
  sessionSecret: string;
  requireAuth: boolean;
  shutdownGraceMs: number;
}

export interface ConfigVariable {
  name: string;
  description: string;
  defaultValue?: string;
  sensitive?: boolean;
}

const DEFAULTS = {
  serverAddress: ':8081',
  loadBalancerAddress: ':8080',
  rootPath: './web/dist',
  sessionSecret: 'dev-session-secret',
} as const;

export const CONFIG_VARIABLES: readonly ConfigVariable[] = [
  { name: 'BLOXSTACK_SERVER_ADDR', description: 'API server listen address', defaultValue: DEFAULTS.serverAddress },
  {
    name: 'BLOXSTACK_LOAD_BALANCER_ADDR',
    description: 'load balancer listen address',
    defaultValue: DEFAULTS.loadBalancerAddress,
  },
  { name: 'BLOXSTACK_ROOT_PATH', description: 'static web root', defaultValue: DEFAULTS.rootPath },
  { name: 'BLOXSTACK_DATABASE_URL', description: 'Postgres connection string', sensitive: true },
  {
    name: 'BLOXSTACK_SESSION_SECRET',
    description: 'session cookie signing secret',
    defaultValue: DEFAULTS.sessionSecret,
    sensitive: true,
  },
  { name: 'BLOXSTACK_REQUIRE_AUTH', description: 'reject blob requests without a session', defaultValue: 'false' },
  {
    name: 'BLOXSTACK_SHUTDOWN_GRACE_MS',
    description: 'in-flight request grace period on shutdown',
    defaultValue: String(DEFAULT_SHUTDOWN_GRACE_MS),
  },
  { name: 'LOG_LEVEL', description: 'winston log level, derived from NODE_ENV when unset' },
];

const blankToUndefined = (value: unknown): unknown =>
  typeof value === 'string' && value.trim().length === 0 ? undefined : value;

function env<T extends z.ZodTypeAny>(schema: T) {
  return z.preprocess(blankToUndefined, schema);
}

const address = (fallback: string) =>
  env(z.string().trim().refine(isListenAddress, 'must be [host]:port').default(fallback));

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform(value => value === 'true' || value === '1');

const environmentSchema = z.object({
  BLOXSTACK_SERVER_ADDR: address(DEFAULTS.serverAddress),
  BLOXSTACK_LOAD_BALANCER_ADDR: address(DEFAULTS.loadBalancerAddress),
  BLOXSTACK_ROOT_PATH: env(z.string().trim().default(DEFAULTS.rootPath)),
  BLOXSTACK_DATABASE_URL: env(z.string().trim().url('must be a connection URL').optional()),
  BLOXSTACK_SESSION_SECRET: env(z.string().default(DEFAULTS.sessionSecret)),
  BLOXSTACK_REQUIRE_AUTH: env(booleanFlag.default('false')),
  BLOXSTACK_SHUTDOWN_GRACE_MS: env(z.coerce.number().int().nonnegative().default(DEFAULT_SHUTDOWN_GRACE_MS)),
});

export function parseStackConfig(source: NodeJS.ProcessEnv = process.env): StackConfig {
  const parsed = environmentSchema.safeParse(source);
  if (!parsed.success) {
    const reason = parsed.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`).join('; ');
    throw DomainError.configurationError('environment', reason);
  }

  const values = parsed.data;
  return {
    serverAddress: values.BLOXSTACK_SERVER_ADDR,
    loadBalancerAddress: values.BLOXSTACK_LOAD_BALANCER_ADDR,
    rootPath: values.BLOXSTACK_ROOT_PATH,
    databaseUrl: values.BLOXSTACK_DATABASE_URL,
    sessionSecret: values.BLOXSTACK_SESSION_SECRET,
    requireAuth: values.BLOXSTACK_REQUIRE_AUTH,
    shutdownGraceMs: values.BLOXSTACK_SHUTDOWN_GRACE_MS,
  };
}

const MASK = '********';

/**
 * One line per variable: name, current value (secrets masked), default and
 * description.
 */
export function describeConfig(source: NodeJS.ProcessEnv = process.env): string[] {
  return CONFIG_VARIABLES.map(variable => {
    const raw = source[variable.name];
    const isSet = raw !== undefined && raw.trim().length > 0;
    const current = !isSet ? '(unset)' : variable.sensitive ? MASK : raw;
    const fallback = variable.defaultValue === undefined ? '(none)' : variable.sensitive ? MASK : variable.defaultValue;
    return `${variable.name}=${current} (default: ${fallback}) ${variable.description}`;
  });
}
