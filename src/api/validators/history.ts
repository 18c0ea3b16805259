/**
 * History Validation
 * Validators for history endpoint requests
 */

import { ValidationError } from '../../core/errors.js';
import { VALIDATION_ERRORS } from '../constants/index.js';

/**
 * Validate an optional userId filter. Blank means no filter.
 */
export function validateUserIdFilter(userId: unknown): string | undefined {
  if (userId === undefined || userId === null) {
    return undefined;
  }
  if (typeof userId !== 'string') {
    throw new ValidationError(VALIDATION_ERRORS.INVALID_TYPE('userId', 'string'));
  }
  const trimmed = userId.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}
