import { Router, type Request, type Response } from 'express';
import { sendEnvelope } from '@bloxstack/platform-core';
import type { ApiServerContext } from '../../bootstrap/context';
import { BlobController } from '../controllers/BlobController';
import { HealthController } from '../controllers/HealthController';
import { sessionAuthMiddleware } from '../middleware/sessionAuthMiddleware';
import { withEnvelope } from '../utils/handler-result';
import { routeNotFoundError } from '../../errors/errors';

/**
 * Routes mounted under /api.
 */
export function createApiRouter(ctx: ApiServerContext): Router {
  const router = Router();
  const blobs = new BlobController(ctx.blobStore);
  const health = new HealthController();

  // Authenticated group
  const requireSession = sessionAuthMiddleware(ctx.requireAuth);
  router.get('/blobs/:blob_id', requireSession, blobs.getBlob());

  // Public group
  router.get('/metrics', ctx.metrics.createMetricsEndpoint());
  router.get('/check', withEnvelope(() => health.check()));

  router.use((req: Request, res: Response) => {
    sendEnvelope(res, 404, routeNotFoundError(req.method, req.originalUrl));
  });

  return router;
}
