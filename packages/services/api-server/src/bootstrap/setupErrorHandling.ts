import type express from 'express';
import { recoveryMiddleware } from '../presentation/middleware';
import type { ApiServerContext } from './context';

export function setupErrorHandling(app: express.Application, _ctx: ApiServerContext): void {
  app.use(recoveryMiddleware());
}
