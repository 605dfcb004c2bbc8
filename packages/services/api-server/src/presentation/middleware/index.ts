export { requestIdMiddleware, REQUEST_ID_HEADER } from './requestIdMiddleware';
export { realIpMiddleware, resolveClientIp } from './realIpMiddleware';
export { requestLoggingMiddleware } from './requestLoggingMiddleware';
export { sessionAuthMiddleware } from './sessionAuthMiddleware';
export { recoveryMiddleware } from './recoveryMiddleware';
