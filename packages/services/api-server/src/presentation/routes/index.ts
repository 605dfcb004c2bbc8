export { createApiRouter } from './api.routes';
