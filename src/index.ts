/**
 * Survey Index Engine - Main Module Index
 */

// ============================================================
// Engine
// ============================================================

export { IndexEngine } from './core/IndexEngine.js';
export type { IndexEngineOptions } from './core/IndexEngine.js';
export { HistoryStore } from './core/HistoryStore.js';
export { Mutex } from './core/Mutex.js';

// ============================================================
// Scoring
// ============================================================

export * from './core/scoring/index.js';
export { validateRecord, peekMetadata } from './core/validation/index.js';

// ============================================================
// Errors
// ============================================================

export {
  EngineError,
  ValidationError,
  MalformedRecordError,
  normalizeError,
  getErrorCode,
  getErrorMessage,
  type EngineErrorOptions,
  type SerializedError,
} from './core/errors.js';

// ============================================================
// Configuration & logging
// ============================================================

export * from './config/constants.js';
export { Logger, logger, type LoggerOptions } from './services/Logger.js';

// ============================================================
// Transport
// ============================================================

export { createServer, startServer, type ServerOptions } from './api/index.js';
export { registerScoreCommand, scoreFiles, loadRecords } from './cli/ScoreCommand.js';

// ============================================================
// Types
// ============================================================

export type * from './types/index.js';
