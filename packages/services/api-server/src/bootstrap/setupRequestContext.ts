import type express from 'express';
import { realIpMiddleware, requestIdMiddleware, requestLoggingMiddleware } from '../presentation/middleware';
import type { ApiServerContext } from './context';

export function setupRequestContext(app: express.Application, _ctx: ApiServerContext): void {
  app.use(requestIdMiddleware);
  app.use(realIpMiddleware);
  app.use(requestLoggingMiddleware);
}
