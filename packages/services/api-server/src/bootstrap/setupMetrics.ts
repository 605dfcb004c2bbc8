import type express from 'express';
import type { ApiServerContext } from './context';

export function setupMetrics(app: express.Application, ctx: ApiServerContext): void {
  app.use(ctx.metrics.createMetricsMiddleware());
}
