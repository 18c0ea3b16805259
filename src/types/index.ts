/**
 * Survey Index Engine - Shared domain types
 */

// === Logging ===

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

// === Telemetry record ===

export interface TrajectoryPoint {
  x: number;
  y: number;
  step: number;
  /** Position in the response timeline, 0 at the first sample and 1 at the last */
  normalizedTime: number;
}

/** Pixel-scale deviation from the ideal path. Negative components are signed (≤ 0). */
export interface DeviationMetrics {
  maxDeviationPositive?: number;
  maxDeviationNegative?: number;
  aucPositive?: number;
  aucNegative?: number;
}

export interface VelocityMetrics {
  averageVelocityPxPerSec?: number;
  maximalVelocityPxPerSec?: number;
  averageVelocity?: number;
  maximalVelocity?: number;
}

export interface ComplexityMetrics {
  angleEntropy?: number;
  initiationTimeMs?: number;
}

export interface HoverMetrics {
  /** Hover count per response label */
  hoverCounts?: Record<string, number>;
  totalHovers?: number;
}

export interface MetricsBundle {
  deviation: DeviationMetrics;
  velocity: VelocityMetrics;
  complexity: ComplexityMetrics;
  hover: HoverMetrics;
}

export interface RecordMetadata {
  userId: string;
  surveyId: string;
  questionId: string;
  timestamp: string;
  /** Label of the chosen option, keyed the same way as hoverCounts */
  selectedResponse: string;
}

/** A validated telemetry record for one answered question */
export interface TelemetryRecord {
  metadata: RecordMetadata;
  trajectory: TrajectoryPoint[];
  metrics: MetricsBundle;
}

// === Scoring ===

export interface TrajectoryShape {
  xFlips: number;
  yFlips: number;
  averageDeviation: number;
  trajectoryLength: number;
  /** 1 for a perfectly regular heading sequence, towards 0 for erratic ones */
  trajectorySmoothness: number;
}

export interface IndexScores {
  SCI: number;
  UEI: number;
  SEI: number;
}

export interface HistoryEntry {
  sci: number;
  uei: number;
  userId: string;
  questionId: string;
  timestamp: string;
}

// === Engine surface ===

export interface BatchSuccess extends IndexScores {
  metadata: Partial<RecordMetadata>;
}

export interface BatchFailure {
  error: string;
  code: string;
  metadata: Partial<RecordMetadata>;
}

export type BatchItemResult = BatchSuccess | BatchFailure;

export interface EngineStats {
  totalCalculations: number;
  uniqueUsers: number;
}
