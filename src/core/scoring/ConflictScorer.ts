/**
 * Conflict Scorer (SCI)
 * Hesitation and indecision read from path shape, speed and hovering
 */

import { analyzeTrajectory } from './GeometryAnalyzer.js';
import { clamp, normalizeTo } from '../stats.js';
import { CEILINGS, CONFLICT_DEFAULTS, CONFLICT_WEIGHTS, SCORE_MAX } from '../../config/constants.js';
import type { DeviationMetrics, HoverMetrics, TelemetryRecord, TrajectoryShape } from '../../types/index.js';

export interface ConflictComponents {
  flips: number;
  maxDeviation: number;
  auc: number;
  averageDeviation: number;
  velocity: number;
  hover: number;
}

export interface DeviationTotals {
  totalMaxDeviation: number;
  totalAUC: number;
}

/**
 * Unsigned deviation totals: each side of the ideal path contributes its magnitude
 */
export function deviationTotals(
  deviation: DeviationMetrics,
  defaults: Required<DeviationMetrics> = CONFLICT_DEFAULTS
): DeviationTotals {
  return {
    totalMaxDeviation:
      (deviation.maxDeviationPositive ?? defaults.maxDeviationPositive) +
      Math.abs(deviation.maxDeviationNegative ?? defaults.maxDeviationNegative),
    totalAUC:
      (deviation.aucPositive ?? defaults.aucPositive) +
      Math.abs(deviation.aucNegative ?? defaults.aucNegative),
  };
}

/**
 * Share of hovers that landed on options other than the one selected
 */
export function hoverRatio(hover: HoverMetrics, selectedResponse: string): number {
  const counts = hover.hoverCounts;
  if (!counts) return 0;

  const total = Object.values(counts).reduce((a, b) => a + b, 0);
  if (!Number.isFinite(total) || total <= 0) return 0;

  const selected = Object.prototype.hasOwnProperty.call(counts, selectedResponse)
    ? counts[selectedResponse]
    : 0;
  return clamp((total - selected) / total, 0, 1);
}

export function conflictComponents(record: TelemetryRecord, shape: TrajectoryShape): ConflictComponents {
  const { deviation, velocity, hover } = record.metrics;
  const { totalMaxDeviation, totalAUC } = deviationTotals(deviation);
  const averageVelocity = velocity.averageVelocityPxPerSec ?? CONFLICT_DEFAULTS.averageVelocityPxPerSec;

  return {
    flips: normalizeTo(shape.xFlips + shape.yFlips, CEILINGS.FLIPS),
    maxDeviation: normalizeTo(totalMaxDeviation, CEILINGS.MAX_DEVIATION),
    auc: normalizeTo(totalAUC, CEILINGS.AUC),
    averageDeviation: normalizeTo(shape.averageDeviation, CEILINGS.AVERAGE_DEVIATION),
    // Slower traversal reads as more conflict
    velocity: 1 - normalizeTo(averageVelocity, CEILINGS.CONFLICT_VELOCITY),
    hover: hoverRatio(hover, record.metadata.selectedResponse),
  };
}

/**
 * Weighted sum of the conflict components, on a 0-100 scale
 */
export function calculateSci(
  record: TelemetryRecord,
  shape: TrajectoryShape = analyzeTrajectory(record.trajectory)
): number {
  const c = conflictComponents(record, shape);
  const raw =
    CONFLICT_WEIGHTS.flips * c.flips +
    CONFLICT_WEIGHTS.maxDeviation * c.maxDeviation +
    CONFLICT_WEIGHTS.auc * c.auc +
    CONFLICT_WEIGHTS.averageDeviation * c.averageDeviation +
    CONFLICT_WEIGHTS.velocity * c.velocity +
    CONFLICT_WEIGHTS.hover * c.hover;

  return raw * SCORE_MAX;
}
