export {
  buildApiServerContext,
  createSessionManager,
  SESSION_COOKIE_NAME,
  type ApiServerContext,
  type ApiServerContextOptions,
} from './context';
export { setupSessions } from './setupSessions';
export { setupSecurity } from './setupSecurity';
export { setupRequestContext } from './setupRequestContext';
export { setupMetrics } from './setupMetrics';
export { setupRouting, API_PREFIX } from './setupRouting';
export { setupErrorHandling } from './setupErrorHandling';
