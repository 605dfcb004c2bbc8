/**
 * API Server - Application Bootstrap
 *
 * Creates the Express application. Each setup function handles a single
 * concern and the order is fixed:
 * 0. Session load-and-save around everything else
 * 1. CORS
 * 2. Request id, real client IP, request logging
 * 3. Request metrics
 * 4. Routes under /api, then the 404 envelope
 * 5. Recovery (must be last)
 */

import express from 'express';
import {
  setupSessions,
  setupSecurity,
  setupRequestContext,
  setupMetrics,
  setupRouting,
  setupErrorHandling,
  type ApiServerContext,
} from './bootstrap';

export function createApp(ctx: ApiServerContext): express.Application {
  const app = express();
  app.disable('x-powered-by');

  setupSessions(app, ctx);
  setupSecurity(app, ctx);
  setupRequestContext(app, ctx);
  setupMetrics(app, ctx);
  setupRouting(app, ctx);
  setupErrorHandling(app, ctx); // MUST be last

  return app;
}
