/**
 * Scoring Module
 * Re-exports the trajectory analyzer and the three index scorers
 */

export {
  analyzeTrajectory,
  countFlips,
  averageDeviationFromIdeal,
  pathLength,
  smoothness,
} from './GeometryAnalyzer.js';

export {
  calculateSci,
  conflictComponents,
  deviationTotals,
  hoverRatio,
} from './ConflictScorer.js';
export type { ConflictComponents, DeviationTotals } from './ConflictScorer.js';

export { calculateUei, engagementBreakdown } from './EngagementScorer.js';
export type { EngagementBreakdown } from './EngagementScorer.js';

export { calculateSei, sessionComponents, engagementConsistency } from './SessionQualityScorer.js';
export type { SessionComponents } from './SessionQualityScorer.js';
