import type { Request, Response, NextFunction, RequestHandler } from 'express';
import { sendEnvelope } from '@bloxstack/platform-core';
import { unauthorizedError } from '../../errors/errors';

/**
 * Guards the authenticated route group. With `required` off the group is
 * only session-bound.
 */
export function sessionAuthMiddleware(required: boolean): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!required || req.session?.userId) {
      next();
      return;
    }
    sendEnvelope(res, 401, unauthorizedError());
  };
}
