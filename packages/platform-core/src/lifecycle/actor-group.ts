/**
 * Actor Group
 *
 * Runs long-lived actors under one cancellation domain. The first actor to
 * settle interrupts every other actor exactly once; `run()` settles only after
 * all actors have settled.
 */

import type { Logger } from 'winston';
import { toError } from '../error-handling/errors.js';
import { errorMessage } from '../logging/error-serializer.js';
import { getLogger } from '../logging/logger.js';

export type ActorRun = () => Promise<void>;
export type ActorInterrupt = (cause: Error) => void;

export interface Actor {
  readonly name: string;
  readonly run: ActorRun;
  readonly interrupt: ActorInterrupt;
}

export interface ActorOutcome {
  readonly name: string;
  readonly error?: Error;
}

/**
 * Handed to siblings when the first actor to finish returned without error.
 */
export class ActorStoppedError extends Error {
  constructor(public readonly actorName: string) {
    super(`actor ${actorName} stopped`);
    this.name = 'ActorStoppedError';
  }
}

export class ActorGroup {
  private readonly actors: Actor[] = [];
  private running = false;

  constructor(private readonly logger: Logger = getLogger('actor-group')) {}

  add(name: string, run: ActorRun, interrupt: ActorInterrupt): this {
    if (this.running) {
      throw new Error(`cannot add actor ${name} to a running group`);
    }
    this.actors.push({ name, run, interrupt });
    return this;
  }

  get size(): number {
    return this.actors.length;
  }

  /**
   * Resolves when every actor returned cleanly; otherwise rejects with the
   * error of the first actor to terminate, or with the first later error when
   * the first actor stopped cleanly.
   */
  async run(): Promise<void> {
    if (this.actors.length === 0) return;
    if (this.running) {
      throw new Error('actor group is already running');
    }
    this.running = true;

    const outcomes: ActorOutcome[] = [];
    let interrupted = false;

    const settle = (actor: Actor, error?: Error): void => {
      outcomes.push({ name: actor.name, error });
      if (interrupted) return;
      interrupted = true;

      this.logger.debug('Actor terminated, interrupting siblings', {
        actor: actor.name,
        error: error?.message,
      });

      const cause = error ?? new ActorStoppedError(actor.name);
      for (const sibling of this.actors) {
        if (sibling === actor) continue;
        this.interruptActor(sibling, cause);
      }
    };

    try {
      await Promise.all(
        this.actors.map(actor =>
          Promise.resolve()
            .then(() => actor.run())
            .then(
              () => settle(actor),
              (reason: unknown) => settle(actor, toError(reason))
            )
        )
      );
    } finally {
      this.running = false;
    }

    const [first] = outcomes;
    if (first?.error) throw first.error;
    const later = outcomes.find(outcome => outcome.error !== undefined);
    if (later?.error) throw later.error;
  }

  private interruptActor(actor: Actor, cause: Error): void {
    try {
      actor.interrupt(cause);
    } catch (error) {
      this.logger.error('Actor interrupt failed', {
        actor: actor.name,
        error: errorMessage(error),
      });
    }
  }
}
