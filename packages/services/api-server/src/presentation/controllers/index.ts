export { BlobController } from './BlobController';
export { HealthController, type CheckResponse } from './HealthController';
