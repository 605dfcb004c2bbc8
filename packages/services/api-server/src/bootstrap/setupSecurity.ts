import type express from 'express';
import cors from 'cors';
import type { ApiServerContext } from './context';

export const CORS_MAX_AGE_SECONDS = 300;

export function setupSecurity(app: express.Application, _ctx: ApiServerContext): void {
  app.use(
    cors({
      // Any origin, reflected so that credentials stay allowed.
      origin: true,
      credentials: true,
      methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Accept', 'Authorization', 'Content-Type', 'X-CSRF-Token'],
      exposedHeaders: ['Link'],
      maxAge: CORS_MAX_AGE_SECONDS,
      optionsSuccessStatus: 200,
    })
  );
}
