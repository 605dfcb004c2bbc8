/**
 * API Server - listener lifecycle
 */

import http from 'http';
import type { AddressInfo } from 'net';
import { createLogger, serveUntilAborted } from '@bloxstack/platform-core';
import { createApp } from './app';
import type { ApiServerContext } from './bootstrap';

const logger = createLogger('api-server');

export interface RunApiServerOptions {
  address: string;
  context: ApiServerContext;
  signal: AbortSignal;
  graceMs?: number;
  onListening?: (address: AddressInfo) => void;
}

/**
 * Serves the API until the signal aborts or the listener fails. Bind errors
 * reject.
 */
export async function runApiServer(options: RunApiServerOptions): Promise<void> {
  logger.info('start api', { address: options.address, requireAuth: options.context.requireAuth });
  const server = http.createServer(createApp(options.context));

  await serveUntilAborted(server, options.address, {
    signal: options.signal,
    logger,
    graceMs: options.graceMs,
    onListening: options.onListening,
  });
  logger.info('api stopped', { address: options.address });
}
