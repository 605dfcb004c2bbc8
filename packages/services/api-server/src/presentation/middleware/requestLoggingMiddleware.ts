import type { Request, Response, NextFunction } from 'express';
import { getLogger } from '@bloxstack/platform-core';

const logger = getLogger('api-server:requests');

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction): void {
  const startTime = Date.now();

  res.on('finish', () => {
    const logLevel = res.statusCode >= 500 ? 'error' : res.statusCode >= 400 ? 'warn' : 'info';
    logger[logLevel]('request-completion', {
      requestId: req.requestId,
      method: req.method,
      path: req.originalUrl,
      statusCode: res.statusCode,
      duration: Date.now() - startTime,
      responseSize: res.get('content-length'),
      clientIp: req.clientIp,
      userAgent: req.get('user-agent'),
    });
  });

  next();
}
