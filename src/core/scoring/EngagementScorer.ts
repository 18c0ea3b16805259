/**
 * Engagement Scorer (UEI)
 *
 * Dual engagement model: a respondent is credited for either confident
 * engagement (direct, smooth, brisk, decisive) or exploratory engagement
 * (complex, deliberate path), whichever reads stronger. Responses initiated
 * faster than MIN_INITIATION_MS are discounted as likely automatic.
 */

import { analyzeTrajectory } from './GeometryAnalyzer.js';
import { deviationTotals } from './ConflictScorer.js';
import { clamp, mean, normalizeTo } from '../stats.js';
import {
  CEILINGS,
  ENGAGEMENT_DEFAULTS,
  ENGAGEMENT_MODEL,
  SCORE_MAX,
  SCORE_MIN,
} from '../../config/constants.js';
import type { TelemetryRecord, TrajectoryShape } from '../../types/index.js';

export interface EngagementBreakdown {
  confident: number;
  exploratory: number;
  penalty: number;
}

export function engagementBreakdown(record: TelemetryRecord, shape: TrajectoryShape): EngagementBreakdown {
  const { deviation, velocity, complexity } = record.metrics;
  const { totalMaxDeviation, totalAUC } = deviationTotals(deviation, ENGAGEMENT_DEFAULTS);

  const averageVelocity = velocity.averageVelocityPxPerSec ?? ENGAGEMENT_DEFAULTS.averageVelocityPxPerSec;
  const maximalVelocity = velocity.maximalVelocityPxPerSec ?? ENGAGEMENT_DEFAULTS.maximalVelocityPxPerSec;
  const angleEntropy = complexity.angleEntropy ?? ENGAGEMENT_DEFAULTS.angleEntropy;
  const initiationTimeMs = complexity.initiationTimeMs ?? ENGAGEMENT_DEFAULTS.initiationTimeMs;

  const confident = mean([
    1 - normalizeTo(totalMaxDeviation, CEILINGS.MAX_DEVIATION), // directness
    clamp(shape.trajectorySmoothness, 0, 1),
    normalizeTo(averageVelocity, CEILINGS.ENGAGEMENT_VELOCITY), // not too slow
    normalizeTo(maximalVelocity, CEILINGS.DECISIVE_VELOCITY),
  ]);

  const exploration = mean([
    normalizeTo(angleEntropy, CEILINGS.ANGLE_ENTROPY),
    normalizeTo(totalAUC, CEILINGS.AUC),
    normalizeTo(shape.trajectoryLength, CEILINGS.TRAJECTORY_LENGTH),
  ]);
  const deliberation = 1 - normalizeTo(averageVelocity, CEILINGS.ENGAGEMENT_VELOCITY);
  const exploratory =
    ENGAGEMENT_MODEL.EXPLORATION_WEIGHT * exploration +
    ENGAGEMENT_MODEL.DELIBERATION_WEIGHT * deliberation;

  const penalty = initiationTimeMs < ENGAGEMENT_MODEL.MIN_INITIATION_MS
    ? ENGAGEMENT_MODEL.FAST_INITIATION_PENALTY
    : 1.0;

  return { confident, exploratory, penalty };
}

export function calculateUei(
  record: TelemetryRecord,
  shape: TrajectoryShape = analyzeTrajectory(record.trajectory)
): number {
  const { confident, exploratory, penalty } = engagementBreakdown(record, shape);
  const raw = Math.max(confident, exploratory);
  return clamp(raw * penalty * SCORE_MAX, SCORE_MIN, SCORE_MAX);
}
