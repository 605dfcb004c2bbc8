import type { Request, Response, NextFunction } from 'express';
import { generateRequestId, runWithContext } from '@bloxstack/platform-core';

export const REQUEST_ID_HEADER = 'X-Request-Id';

const MAX_REQUEST_ID_LENGTH = 200;

function incomingRequestId(req: Request): string | undefined {
  const header = req.get(REQUEST_ID_HEADER);
  if (!header) return undefined;
  const trimmed = header.trim();
  return trimmed.length > 0 && trimmed.length <= MAX_REQUEST_ID_LENGTH ? trimmed : undefined;
}

/**
 * Accepts the caller's request id or mints one, echoes it back, and runs the
 * rest of the chain with it in the log context.
 */
export function requestIdMiddleware(req: Request, res: Response, next: NextFunction): void {
  const requestId = incomingRequestId(req) ?? generateRequestId();
  req.requestId = requestId;
  res.setHeader(REQUEST_ID_HEADER, requestId);
  runWithContext({ requestId, service: 'api-server' }, next);
}
