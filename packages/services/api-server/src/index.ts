export { createApp } from './app';
export { runApiServer, type RunApiServerOptions } from './server';
export {
  buildApiServerContext,
  createSessionManager,
  type ApiServerContext,
  type ApiServerContextOptions,
} from './bootstrap';
export { effectiveMimeType, type Blob, type BlobStore, type SaveOutcome } from './domains/blob';
export { BlobNotFoundError, BlobStoreError, ApiErrorCode } from './errors/errors';
export { withEnvelope, ok, fail, type HandlerResult } from './presentation/utils/handler-result';
export { InMemoryBlobRepository } from './infrastructure/repositories/InMemoryBlobRepository';
export { DrizzleBlobRepository } from './infrastructure/repositories/DrizzleBlobRepository';
export {
  createDatabaseConnection,
  ensureBlobSchema,
  type DatabaseHandle,
} from './infrastructure/database/DatabaseConnectionFactory';
export { seedBlobs, buildSampleBlobs } from './infrastructure/seeds/seedBlobs';
export type { SeedResult } from './infrastructure/seeds/types';
