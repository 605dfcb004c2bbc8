/**
 * Error Envelope
 *
 * The only error shape that crosses the HTTP boundary: `{ err, message }`.
 * The wrapped error stays reachable through `unwrap()` for server-side logs.
 */

import type { Response } from 'express';
import { toError } from './errors.js';

export interface ErrorEnvelopeBody {
  err: string;
  message: string;
}

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' && code.length > 0 ? code : undefined;
}

export class ErrorEnvelope extends Error {
  public readonly err: string;
  public readonly cause: Error;

  private constructor(inner: Error, message?: string) {
    super(message ?? inner.message);
    this.name = 'ErrorEnvelope';
    this.err = errorCode(inner) ?? inner.message;
    this.cause = inner;
  }

  /**
   * Wrap any thrown value. `message` overrides the wire message; it defaults
   * to the wrapped error's own text.
   */
  static wrap(error: unknown, message?: string): ErrorEnvelope {
    if (error instanceof ErrorEnvelope && message === undefined) {
      return error;
    }
    return new ErrorEnvelope(toError(error), message);
  }

  unwrap(): Error {
    return this.cause;
  }

  toJSON(): ErrorEnvelopeBody {
    return { err: this.err, message: this.message };
  }
}

export function sendEnvelope(res: Response, statusCode: number, error: unknown, message?: string): void {
  res.status(statusCode).json(ErrorEnvelope.wrap(error, message).toJSON());
}
