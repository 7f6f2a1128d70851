/**
 * Middleware barrel export
 */
export { requireAdmin } from './auth';
export {
  errorHandler,
  notFoundHandler,
  asyncHandler,
  requestIdMiddleware,
  getRequestId,
  REQUEST_ID_HEADER,
} from './errorHandler';
export { httpMetricsMiddleware } from './httpMetrics';
export { validateBody, validateParams, parseBody, parseParams } from './validateRequest';
