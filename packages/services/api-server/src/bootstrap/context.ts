import session from 'express-session';
import type { RequestHandler } from 'express';
import { createMetrics, getLogger, type Logger, type PrometheusMetrics } from '@bloxstack/platform-core';
import type { BlobStore } from '../domains/blob';

export const SESSION_COOKIE_NAME = 'session';
const SESSION_LIFETIME_MS = 24 * 60 * 60 * 1000;

export interface ApiServerContext {
  logger: Logger;
  blobStore: BlobStore;
  sessions: RequestHandler;
  metrics: PrometheusMetrics;
  requireAuth: boolean;
}

export interface ApiServerContextOptions {
  blobStore: BlobStore;
  sessionSecret: string;
  /** Defaults to the express-session memory store. */
  sessionStore?: session.Store;
  requireAuth?: boolean;
  metrics?: PrometheusMetrics;
}

export function createSessionManager(secret: string, store?: session.Store): RequestHandler {
  return session({
    name: SESSION_COOKIE_NAME,
    secret,
    store,
    resave: false,
    saveUninitialized: false,
    cookie: {
      httpOnly: true,
      sameSite: 'lax',
      path: '/',
      maxAge: SESSION_LIFETIME_MS,
    },
  });
}

export function buildApiServerContext(options: ApiServerContextOptions): ApiServerContext {
  return {
    logger: getLogger('api-server-app'),
    blobStore: options.blobStore,
    sessions: createSessionManager(options.sessionSecret, options.sessionStore),
    metrics: options.metrics ?? createMetrics('api-server'),
    requireAuth: options.requireAuth ?? false,
  };
}
