/**
 * Validators Module
 * Centralized validation for API requests
 */

export { validateCalculateBody, validateBatchBody } from './calculate.js';
export { validateUserIdFilter } from './history.js';
