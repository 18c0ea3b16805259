/**
 * Survey Index API Module
 * Re-exports server functionality and all modules
 */

// Server
export { createServer, startServer } from './server.js';
export type { ServerOptions } from './server.js';

// Config
export { API_CONFIG } from './config/index.js';
export type { ApiConfig, ServerConfig, MonitoringConfig, LoggerConfig } from './config/index.js';

// Constants
export {
  VALIDATION_ERRORS,
  API_ERRORS,
  SUCCESS_MESSAGES,
  LOG_MESSAGES,
} from './constants/index.js';

// Types
export * from './types/index.js';
export * from './types/fastify.js';

// Validators
export {
  validateCalculateBody,
  validateBatchBody,
  validateUserIdFilter,
} from './validators/index.js';

// Middleware
export {
  errorHandler,
  notFoundHandler,
  getErrorStatusCode,
  createErrorResponse,
} from './middleware/index.js';
export type { ErrorResponse } from './middleware/index.js';

// Routes
export * from './routes/index.js';
