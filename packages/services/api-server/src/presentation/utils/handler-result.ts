/**
 * Handler results and the envelope adapter.
 *
 * Handlers return a HandlerResult instead of writing the response; the
 * adapter writes the JSON body or the error envelope.
 */

import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { getLogger, sendEnvelope } from '@bloxstack/platform-core';
import { noResponseError } from '../../errors/errors';

const logger = getLogger('api-server:handlers');

export type HandlerResult<T> =
  | { ok: true; status: number; body: T | null | undefined }
  | { ok: false; status: number; error: unknown; message?: string };

export type EnvelopeHandler<T> = (req: Request, res: Response) => HandlerResult<T> | Promise<HandlerResult<T>>;

export function ok<T>(body: T, status: number = 200): HandlerResult<T> {
  return { ok: true, status, body };
}

export function fail(status: number, error: unknown, message?: string): HandlerResult<never> {
  return { ok: false, status, error, message };
}

export function withEnvelope<T>(handler: EnvelopeHandler<T>): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve()
      .then(() => handler(req, res))
      .then(result => {
        if (!result.ok) {
          logger.warn('Handler failed', {
            requestId: req.requestId,
            path: req.originalUrl,
            status: result.status,
            error: result.error instanceof Error ? result.error.message : String(result.error),
          });
          sendEnvelope(res, result.status, result.error, result.message);
          return;
        }
        if (result.body === null || result.body === undefined) {
          sendEnvelope(res, 500, noResponseError());
          return;
        }
        res.status(result.status).json(result.body);
      })
      .catch(next);
  };
}
