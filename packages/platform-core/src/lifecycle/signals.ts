import type { EventEmitter } from 'events';
import type { ActorInterrupt, ActorRun } from './actor-group.js';

export type ShutdownSignal = 'SIGINT' | 'SIGTERM';

const SHUTDOWN_SIGNALS: readonly ShutdownSignal[] = ['SIGINT', 'SIGTERM'];

export class ShutdownSignalError extends Error {
  constructor(public readonly signal: ShutdownSignal) {
    super(`received signal ${signal}`);
    this.name = 'ShutdownSignalError';
  }
}

export interface SignalActor {
  run: ActorRun;
  interrupt: ActorInterrupt;
}

/**
 * Rejects with a ShutdownSignalError on SIGINT or SIGTERM; an interrupt from
 * a sibling resolves it and detaches the listeners.
 */
export function createSignalActor(source: EventEmitter = process): SignalActor {
  let detach: (() => void) | undefined;
  let stop: (() => void) | undefined;
  let stopped = false;

  const run: ActorRun = () =>
    new Promise<void>((resolve, reject) => {
      if (stopped) {
        resolve();
        return;
      }
      const handlers = SHUTDOWN_SIGNALS.map(signal => {
        const handler = (): void => {
          detach?.();
          reject(new ShutdownSignalError(signal));
        };
        source.once(signal, handler);
        return { signal, handler };
      });
      detach = () => {
        for (const { signal, handler } of handlers) {
          source.off(signal, handler);
        }
        detach = undefined;
      };
      stop = resolve;
    });

  const interrupt: ActorInterrupt = () => {
    stopped = true;
    detach?.();
    stop?.();
  };

  return { run, interrupt };
}
