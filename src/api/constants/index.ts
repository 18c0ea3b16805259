/**
 * Constants Module
 */

export {
  VALIDATION_ERRORS,
  API_ERRORS,
  SUCCESS_MESSAGES,
  LOG_MESSAGES,
} from './messages.js';
