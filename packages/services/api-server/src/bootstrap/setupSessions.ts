import type express from 'express';
import type { ApiServerContext } from './context';

export function setupSessions(app: express.Application, ctx: ApiServerContext): void {
  app.use(ctx.sessions);
}
