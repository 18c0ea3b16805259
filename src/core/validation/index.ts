/**
 * Record Validation Module
 */

export {
  validateRecord,
  parseMetadata,
  parseTrajectory,
  parseMetrics,
  findMissingSections,
  peekMetadata,
  isPlainObject,
  optionalFiniteNumber,
} from './RecordValidator.js';
