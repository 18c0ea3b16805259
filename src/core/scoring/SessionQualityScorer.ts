/**
 * Session Quality Scorer (SEI)
 * Cumulative quality over one respondent's scored questions. Recomputed from
 * the full history on every call.
 */

import { mean, ratio, sampleStdDev } from '../stats.js';
import {
  NEUTRAL_SEI,
  SCORE_MAX,
  SESSION_THRESHOLDS,
  SESSION_WEIGHTS,
} from '../../config/constants.js';
import type { HistoryEntry } from '../../types/index.js';

export interface SessionComponents {
  meanUei: number;
  meanSci: number;
  consistency: number;
  highEngagementRatio: number;
  lowEngagementRatio: number;
  balanceRatio: number;
}

/**
 * 1 / (1 + CV) of the engagement scores, where CV is sample σ over the mean
 */
export function engagementConsistency(ueiValues: readonly number[]): number {
  const avg = mean(ueiValues);
  const cv = ueiValues.length > 1 && avg > 0 ? sampleStdDev(ueiValues) / avg : 0;
  return 1 / (1 + cv);
}

export function sessionComponents(entries: readonly HistoryEntry[]): SessionComponents {
  const ueiValues = entries.map((e) => e.uei);
  const sciValues = entries.map((e) => e.sci);

  return {
    meanUei: mean(ueiValues),
    meanSci: mean(sciValues),
    consistency: engagementConsistency(ueiValues),
    highEngagementRatio: ratio(ueiValues, (u) => u > SESSION_THRESHOLDS.HIGH_ENGAGEMENT),
    lowEngagementRatio: ratio(ueiValues, (u) => u < SESSION_THRESHOLDS.LOW_ENGAGEMENT),
    // Engaged despite conflict
    balanceRatio: ratio(
      entries,
      (e) => e.sci > SESSION_THRESHOLDS.HIGH_CONFLICT && e.uei > SESSION_THRESHOLDS.HIGH_ENGAGEMENT
    ),
  };
}

export function calculateSei(entries: readonly HistoryEntry[]): number {
  if (entries.length === 0) {
    return NEUTRAL_SEI;
  }

  const c = sessionComponents(entries);
  const raw =
    SESSION_WEIGHTS.meanEngagement * (c.meanUei / SCORE_MAX) +
    SESSION_WEIGHTS.meanConflict * (c.meanSci / SCORE_MAX) +
    SESSION_WEIGHTS.consistency * c.consistency +
    SESSION_WEIGHTS.highEngagement * c.highEngagementRatio +
    SESSION_WEIGHTS.balance * c.balanceRatio +
    SESSION_WEIGHTS.lowEngagementPenalty * (1 - c.lowEngagementRatio);

  return raw * SCORE_MAX;
}
