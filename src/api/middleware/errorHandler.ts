/**
 * Error Handler Middleware
 * Centralized error handling for Fastify
 */

import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { EngineError } from '../../core/errors.js';
import { API_ERRORS } from '../constants/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// Status mapping
// ═══════════════════════════════════════════════════════════════════════════

const STATUS_BY_CODE: Record<string, number> = {
  VALIDATION_ERROR: 400,
  MALFORMED_RECORD: 422,
};

/**
 * Get HTTP status code from error
 */
export function getErrorStatusCode(error: Error | FastifyError): number {
  if (error instanceof EngineError) {
    return STATUS_BY_CODE[error.code] ?? 500;
  }
  if ('validation' in error && error.validation) {
    return 400;
  }
  if ('statusCode' in error && typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return 500;
}

// ═══════════════════════════════════════════════════════════════════════════
// Error Response
// ═══════════════════════════════════════════════════════════════════════════

export interface ErrorResponse {
  error: string;
  code?: string;
  statusCode: number;
  timestamp: string;
}

export function createErrorResponse(
  error: Error | FastifyError,
  statusCode: number
): ErrorResponse {
  const response: ErrorResponse = {
    error: error.message || API_ERRORS.INTERNAL_ERROR,
    statusCode,
    timestamp: new Date().toISOString(),
  };

  if (error instanceof EngineError) {
    response.code = error.code;
  } else if ('code' in error && typeof error.code === 'string') {
    response.code = error.code;
  }

  return response;
}

// ═══════════════════════════════════════════════════════════════════════════
// Error Handler
// ═══════════════════════════════════════════════════════════════════════════

export function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const statusCode = getErrorStatusCode(error);

  if (statusCode >= 500) {
    request.log.error(error);
  } else {
    request.log.warn({ err: error.message, code: error.code }, 'Request rejected');
  }

  reply.status(statusCode).send(createErrorResponse(error, statusCode));
}

// ═══════════════════════════════════════════════════════════════════════════
// Not Found Handler
// ═══════════════════════════════════════════════════════════════════════════

export function notFoundHandler(
  request: FastifyRequest,
  reply: FastifyReply
): void {
  const response: ErrorResponse = {
    error: API_ERRORS.ROUTE_NOT_FOUND(request.method, request.url),
    code: 'NOT_FOUND',
    statusCode: 404,
    timestamp: new Date().toISOString(),
  };

  reply.status(404).send(response);
}
