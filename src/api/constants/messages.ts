/**
 * API Messages
 * Centralized messages for consistent API responses
 */

// ═══════════════════════════════════════════════════════════════════════════
// Validation Errors
// ═══════════════════════════════════════════════════════════════════════════

export const VALIDATION_ERRORS = {
  NO_JSON: 'No JSON data provided',
  NO_QUESTIONS: 'No questions array provided',
  QUESTIONS_NOT_ARRAY: 'questions must be an array',
  INVALID_TYPE: (field: string, expected: string) => `${field} must be a ${expected}`,
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// API Errors
// ═══════════════════════════════════════════════════════════════════════════

export const API_ERRORS = {
  ROUTE_NOT_FOUND: (method: string, url: string) => `Route ${method} ${url} not found`,
  INTERNAL_ERROR: 'Internal server error',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Success Messages
// ═══════════════════════════════════════════════════════════════════════════

export const SUCCESS_MESSAGES = {
  HEALTHY: 'Index Calculator API is running',
  HISTORY_RESET: 'History reset successfully',
} as const;

// ═══════════════════════════════════════════════════════════════════════════
// Log Messages
// ═══════════════════════════════════════════════════════════════════════════

export const LOG_MESSAGES = {
  SLOW_REQUEST: 'Slow request detected',
  CALCULATED: (userId: string, questionId: string, sci: number, uei: number, sei: number) =>
    `Calculated indices for user ${userId}, question ${questionId}: SCI=${sci}, UEI=${uei}, SEI=${sei}`,
  BATCH_COMPLETED: (count: number) => `Batch calculation completed for ${count} questions`,
  HISTORY_RESET: (count: number) => `Calculator history reset (${count} entries)`,
  SERVER_STARTED: (host: string, port: number) => `Server listening at http://${host}:${port}`,
} as const;
