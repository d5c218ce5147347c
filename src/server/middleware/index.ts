/**
 * Querywise - Middleware Module
 */

export { errorHandler, notFoundHandler, asyncHandler, toErrorResponse } from './errorHandler.js';
export type { ErrorResponse } from './errorHandler.js';
export { requestIdMiddleware } from './requestId.js';
export { requestLogger } from './requestLogger.js';
export type { RequestLoggerOptions } from './requestLogger.js';
