/**
 * Survey Index Engine - Constants
 * Reference ceilings, weights and defaults for the scoring formulas
 */

// Score scale
export const SCORE_MIN = 0;
export const SCORE_MAX = 100;
export const SCORE_DECIMALS = 2;

// Reference ceilings: a raw value at or above its ceiling normalizes to 1.0
export const CEILINGS = {
  FLIPS: 20,
  MAX_DEVIATION: 100,   // px
  AUC: 500,
  AVERAGE_DEVIATION: 50,
  CONFLICT_VELOCITY: 2000, // px/s
  ENGAGEMENT_VELOCITY: 1000, // px/s
  DECISIVE_VELOCITY: 2000, // px/s
  ANGLE_ENTROPY: 3.0,
  TRAJECTORY_LENGTH: 5.0,
} as const;

// SCI weights (sum to 1.0)
export const CONFLICT_WEIGHTS = {
  flips: 0.25,
  maxDeviation: 0.20,
  auc: 0.20,
  averageDeviation: 0.15,
  velocity: 0.10,
  hover: 0.10,
} as const;

// UEI model
export const ENGAGEMENT_MODEL = {
  EXPLORATION_WEIGHT: 0.7,
  DELIBERATION_WEIGHT: 0.3,
  /** Initiation faster than this is treated as an automatic response */
  MIN_INITIATION_MS: 100,
  FAST_INITIATION_PENALTY: 0.7,
} as const;

// SEI weights (sum to 1.0)
export const SESSION_WEIGHTS = {
  meanEngagement: 0.40,
  meanConflict: 0.20,
  consistency: 0.15,
  highEngagement: 0.10,
  balance: 0.10,
  lowEngagementPenalty: 0.05,
} as const;

export const SESSION_THRESHOLDS = {
  HIGH_ENGAGEMENT: 60,
  LOW_ENGAGEMENT: 30,
  HIGH_CONFLICT: 50,
} as const;

/** SEI with no history to judge */
export const NEUTRAL_SEI = 50.0;

// Defaults for leaf metrics missing from a record, per formula
export const CONFLICT_DEFAULTS = {
  maxDeviationPositive: 0,
  maxDeviationNegative: 0,
  aucPositive: 0,
  aucNegative: 0,
  averageVelocityPxPerSec: 0,
} as const;

export const ENGAGEMENT_DEFAULTS = {
  maxDeviationPositive: 0,
  maxDeviationNegative: 0,
  aucPositive: 0,
  aucNegative: 0,
  averageVelocityPxPerSec: 500,
  maximalVelocityPxPerSec: 1000,
  angleEntropy: 1.0,
  initiationTimeMs: 200,
} as const;

// Required top-level record sections
export const RECORD_SECTIONS = ['metadata', 'trajectory', 'metrics'] as const;
export type RecordSection = (typeof RECORD_SECTIONS)[number];
