/**
 * HTTP serve loop shared by the API server and the load balancer.
 *
 * `serveUntilAborted` binds, reports bind failures as a rejection, and blocks
 * until the abort signal fires or the server errors. On abort it stops
 * accepting, lets in-flight requests finish, and destroys whatever is still
 * open once the grace period runs out.
 */

import type { Server } from 'http';
import type { AddressInfo, Socket } from 'net';
import type { Logger } from 'winston';
import { DomainError } from '../error-handling/errors.js';

export interface ListenAddress {
  /** Undefined means every interface. */
  host?: string;
  port: number;
}

export const DEFAULT_SHUTDOWN_GRACE_MS = 10_000;

const WILDCARD_HOSTS = new Set(['', '0.0.0.0', '::', '[::]']);

/**
 * Parses `host:port`, `:port` and `[v6]:port`.
 */
export function parseListenAddress(address: string): ListenAddress {
  const separator = address.lastIndexOf(':');
  if (separator < 0) {
    throw DomainError.configurationError('listen address', `missing port in "${address}"`);
  }

  const rawHost = address.slice(0, separator);
  const rawPort = address.slice(separator + 1);
  const port = Number(rawPort);
  if (rawPort.length === 0 || !Number.isInteger(port) || port < 0 || port > 65535) {
    throw DomainError.configurationError('listen address', `invalid port in "${address}"`);
  }

  const host = rawHost.startsWith('[') && rawHost.endsWith(']') ? rawHost.slice(1, -1) : rawHost;
  return host.length === 0 ? { port } : { host, port };
}

export function isListenAddress(address: string): boolean {
  try {
    parseListenAddress(address);
    return true;
  } catch {
    return false;
  }
}

/**
 * `:8081` and wildcard binds are reached through localhost.
 */
export function toDialAddress(address: string): string {
  const { host, port } = parseListenAddress(address);
  if (host === undefined || WILDCARD_HOSTS.has(host)) {
    return `localhost:${port}`;
  }
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}

export interface ServeOptions {
  signal: AbortSignal;
  logger: Logger;
  graceMs?: number;
  onListening?: (address: AddressInfo) => void;
}

function listen(server: Server, address: ListenAddress): Promise<AddressInfo> {
  return new Promise((resolve, reject) => {
    const onError = (error: Error): void => {
      server.off('listening', onListening);
      reject(error);
    };
    const onListening = (): void => {
      server.off('error', onError);
      const bound = server.address();
      if (bound === null || typeof bound === 'string') {
        reject(new Error('server is not bound to a TCP address'));
        return;
      }
      resolve(bound);
    };
    server.once('error', onError);
    server.once('listening', onListening);
    server.listen(address.port, address.host);
  });
}

function trackSockets(server: Server): Set<Socket> {
  const sockets = new Set<Socket>();
  server.on('connection', socket => {
    sockets.add(socket);
    socket.once('close', () => sockets.delete(socket));
  });
  return sockets;
}

function close(server: Server, sockets: Set<Socket>, graceMs: number): Promise<void> {
  return new Promise((resolve, reject) => {
    const timer = setTimeout(() => {
      for (const socket of sockets) {
        socket.destroy();
      }
    }, graceMs);
    timer.unref();

    server.close(error => {
      clearTimeout(timer);
      if (error) {
        reject(error);
        return;
      }
      resolve();
    });
    server.closeIdleConnections();
  });
}

export async function serveUntilAborted(server: Server, address: string, options: ServeOptions): Promise<void> {
  const { signal, logger } = options;
  const graceMs = options.graceMs ?? DEFAULT_SHUTDOWN_GRACE_MS;
  if (signal.aborted) return;

  const sockets = trackSockets(server);
  const bound = await listen(server, parseListenAddress(address));
  logger.info('Listening', { address, port: bound.port });
  options.onListening?.(bound);

  await new Promise<void>((resolve, reject) => {
    const shutdown = (): void => {
      server.off('error', onError);
      logger.info('Shutting down listener', { address, graceMs });
      close(server, sockets, graceMs).then(resolve, reject);
    };
    const onError = (error: Error): void => {
      signal.removeEventListener('abort', shutdown);
      logger.error('Listener failed', { address, error: error.message });
      close(server, sockets, 0).then(
        () => reject(error),
        () => reject(error)
      );
    };

    if (signal.aborted) {
      shutdown();
      return;
    }
    signal.addEventListener('abort', shutdown, { once: true });
    server.once('error', onError);
  });
}
