/**
 * Survey Index Engine - Error Hierarchy
 */

/**
 * Error options for EngineError
 */
export interface EngineErrorOptions {
  code?: string;
  context?: Record<string, unknown>;
  cause?: Error;
}

/**
 * Serialized error format
 */
export interface SerializedError {
  name: string;
  message: string;
  code: string;
  context: Record<string, unknown>;
  timestamp: string;
  stack?: string;
}

/**
 * Base error class for all engine errors
 */
export class EngineError extends Error {
  code: string;
  context: Record<string, unknown>;
  timestamp: Date;

  constructor(message: string, options: EngineErrorOptions = {}) {
    super(message);
    this.name = 'EngineError';
    this.code = options.code ?? 'ENGINE_ERROR';
    this.context = options.context ?? {};
    this.timestamp = new Date();

    if (options.cause) {
      this.cause = options.cause;
    }

    // Maintain proper stack trace
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error for logging/transport
   */
  toJSON(): SerializedError {
    return {
      name: this.name,
      message: this.message,
      code: this.code,
      context: this.context,
      timestamp: this.timestamp.toISOString(),
      stack: this.stack
    };
  }

  /**
   * Create error with additional context
   */
  withContext(context: Record<string, unknown>): this {
    this.context = { ...this.context, ...context };
    return this;
  }
}

/**
 * A record that is not an object or lacks a required top-level section
 */
export class ValidationError extends EngineError {
  missing: string[];

  constructor(message: string, missing: string[] = [], options: EngineErrorOptions = {}) {
    super(message, {
      code: options.code ?? 'VALIDATION_ERROR',
      ...options
    });
    this.name = 'ValidationError';
    this.missing = missing;
    if (missing.length > 0) {
      this.context.missing = missing;
    }
  }
}

/**
 * A field that is present but has the wrong shape
 */
export class MalformedRecordError extends EngineError {
  field: string;

  constructor(field: string, expected: string, options: EngineErrorOptions = {}) {
    super(`${field} must be ${expected}`, {
      code: options.code ?? 'MALFORMED_RECORD',
      ...options
    });
    this.name = 'MalformedRecordError';
    this.field = field;
    this.context.field = field;
    this.context.expected = expected;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Normalize any error source to EngineError
 */
export function normalizeError(source: unknown, defaultCode = 'UNKNOWN_ERROR'): EngineError {
  if (source instanceof EngineError) {
    return source;
  }

  if (source instanceof Error) {
    return new EngineError(source.message, {
      code: defaultCode,
      cause: source
    });
  }

  if (typeof source === 'string') {
    return new EngineError(source, { code: defaultCode });
  }

  return new EngineError('Unknown error', {
    code: defaultCode,
    context: { originalError: source }
  });
}

/**
 * Get error code
 */
export function getErrorCode(error: unknown): string {
  if (error instanceof EngineError) {
    return error.code;
  }
  if (error instanceof Error) {
    return error.name;
  }
  return 'UNKNOWN_ERROR';
}

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
