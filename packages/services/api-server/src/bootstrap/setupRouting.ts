import type { Request, Response } from 'express';
import type express from 'express';
import { sendEnvelope } from '@bloxstack/platform-core';
import { createApiRouter } from '../presentation/routes';
import { routeNotFoundError } from '../errors/errors';
import type { ApiServerContext } from './context';

export const API_PREFIX = '/api';

export function setupRouting(app: express.Application, ctx: ApiServerContext): void {
  app.use(API_PREFIX, createApiRouter(ctx));

  app.use((req: Request, res: Response) => {
    sendEnvelope(res, 404, routeNotFoundError(req.method, req.originalUrl));
  });
}
