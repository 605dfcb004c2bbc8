import type { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { getLogger, sendEnvelope, serializeError, toError } from '@bloxstack/platform-core';
import { internalError } from '../../errors/errors';

const logger = getLogger('api-server:recovery');

/**
 * Last middleware in the chain: turns anything thrown or passed to `next`
 * into a 500 envelope. The stack stays in the logs.
 */
export function recoveryMiddleware(): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    const cause = toError(error);
    logger.error('Recovered from request failure', {
      requestId: req.requestId,
      method: req.method,
      path: req.originalUrl,
      error: serializeError(cause),
    });

    if (res.headersSent) {
      next(cause);
      return;
    }
    sendEnvelope(res, 500, internalError(cause));
  };
}
