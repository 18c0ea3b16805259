/**
 * Calculation Validation
 * Validators for calculate endpoint bodies
 */

import { ValidationError } from '../../core/errors.js';
import { isPlainObject } from '../../core/validation/index.js';
import { VALIDATION_ERRORS } from '../constants/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// Calculate Validators
// ═══════════════════════════════════════════════════════════════════════════

/**
 * Reject an empty or non-object body before it reaches the engine
 * @throws ValidationError if invalid
 */
export function validateCalculateBody(body: unknown): Record<string, unknown> {
  if (!isPlainObject(body) || Object.keys(body).length === 0) {
    throw new ValidationError(VALIDATION_ERRORS.NO_JSON);
  }
  return body;
}

/**
 * Extract the questions array of a batch body
 * @throws ValidationError if invalid
 */
export function validateBatchBody(body: unknown): unknown[] {
  if (!isPlainObject(body) || body.questions === undefined) {
    throw new ValidationError(VALIDATION_ERRORS.NO_QUESTIONS);
  }
  if (!Array.isArray(body.questions)) {
    throw new ValidationError(VALIDATION_ERRORS.QUESTIONS_NOT_ARRAY);
  }
  return body.questions;
}
