/**
 * Assembles the stack: API server, load balancer and (optionally) the signal
 * handler run as actors of one group. Both listeners share one abort signal,
 * so whichever actor stops first takes the others down with it.
 */

import type { EventEmitter } from 'events';
import type { AddressInfo } from 'net';
import { ActorGroup, createSignalActor, getLogger } from '@bloxstack/platform-core';
import {
  InMemoryBlobRepository,
  DrizzleBlobRepository,
  buildApiServerContext,
  createDatabaseConnection,
  ensureBlobSchema,
  runApiServer,
  type BlobStore,
} from '@bloxstack/api-server';
import { buildRoutingRules, runLoadBalancer } from '@bloxstack/load-balancer';
import type { StackConfig } from './config/environment';

const logger = getLogger('stack-runner');

export type StackActorName = 'api' | 'load-balancer' | 'signals';

export interface StackOptions {
  /** Adds the SIGINT/SIGTERM actor. */
  handleSignals?: boolean;
  signalSource?: EventEmitter;
  onListening?: (actor: StackActorName, address: AddressInfo) => void;
}

export interface Stack {
  group: ActorGroup;
  /** Stops every actor; `group.run()` then settles with the given cause. */
  stop(cause?: Error): void;
}

export interface BlobStoreHandle {
  store: BlobStore;
  persistent: boolean;
  close(): Promise<void>;
}

/**
 * Postgres when a database URL is configured, otherwise a process-local store.
 */
export async function openBlobStore(config: StackConfig): Promise<BlobStoreHandle> {
  if (!config.databaseUrl) {
    logger.warn('No database configured, using the in-memory blob store');
    return { store: new InMemoryBlobRepository(), persistent: false, close: async () => undefined };
  }

  const connection = createDatabaseConnection(config.databaseUrl);
  try {
    await ensureBlobSchema(connection.pool);
  } catch (error) {
    await connection.close();
    throw error;
  }
  return { store: new DrizzleBlobRepository(connection.db), persistent: true, close: connection.close };
}

export function buildStack(config: StackConfig, blobStore: BlobStore, options: StackOptions = {}): Stack {
  const rules = buildRoutingRules({
    listenAddress: config.loadBalancerAddress,
    upstreamAddress: config.serverAddress,
    staticRoot: config.rootPath,
  });
  const context = buildApiServerContext({
    blobStore,
    sessionSecret: config.sessionSecret,
    requireAuth: config.requireAuth,
  });

  const controller = new AbortController();
  const stop = (cause?: Error): void => {
    if (!controller.signal.aborted) controller.abort(cause);
  };
  const group = new ActorGroup(logger);

  group.add(
    'api',
    () =>
      runApiServer({
        address: config.serverAddress,
        context,
        signal: controller.signal,
        graceMs: config.shutdownGraceMs,
        onListening: address => options.onListening?.('api', address),
      }),
    stop
  );

  group.add(
    'load-balancer',
    () =>
      runLoadBalancer(rules, {
        signal: controller.signal,
        graceMs: config.shutdownGraceMs,
        onListening: address => options.onListening?.('load-balancer', address),
      }),
    stop
  );

  if (options.handleSignals) {
    const signals = createSignalActor(options.signalSource);
    group.add('signals', signals.run, signals.interrupt);
  }

  return { group, stop };
}
