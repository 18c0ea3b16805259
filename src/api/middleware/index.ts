/**
 * Middleware Module
 * Re-exports all middleware
 */

export {
  errorHandler,
  notFoundHandler,
  getErrorStatusCode,
  createErrorResponse,
} from './errorHandler.js';

export type { ErrorResponse } from './errorHandler.js';

export {
  onRequest,
  onResponse,
  generateRequestId,
} from './requestLogger.js';
