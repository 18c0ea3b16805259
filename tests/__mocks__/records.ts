/**
 * Telemetry record builders for testing
 */

import type {
  ComplexityMetrics,
  DeviationMetrics,
  HoverMetrics,
  RecordMetadata,
  TelemetryRecord,
  TrajectoryPoint,
  VelocityMetrics,
} from '../../src/types/index.js';

export interface RecordParts {
  metadata?: Partial<RecordMetadata>;
  trajectory?: TrajectoryPoint[];
  deviation?: DeviationMetrics;
  velocity?: VelocityMetrics;
  complexity?: ComplexityMetrics;
  hover?: HoverMetrics;
}

/**
 * Build trajectory points from [x, y] pairs, evenly spread over time
 */
export function toPoints(coordinates: Array<[number, number]>): TrajectoryPoint[] {
  const last = Math.max(coordinates.length - 1, 1);
  return coordinates.map(([x, y], step) => ({ x, y, step, normalizedTime: step / last }));
}

/**
 * A record with no trajectory and empty metric sections unless overridden.
 * With nothing overridden every leaf resolves to its default:
 * SCI = 10, UEI = 75.
 */
export function makeRecord(parts: RecordParts = {}): TelemetryRecord {
  return {
    metadata: {
      userId: 'user-1',
      surveyId: 'survey-1',
      questionId: 'q1',
      timestamp: '2026-01-01T10:00:00.000Z',
      selectedResponse: 'A',
      ...parts.metadata,
    },
    trajectory: parts.trajectory ?? [],
    metrics: {
      deviation: parts.deviation ?? {},
      velocity: parts.velocity ?? {},
      complexity: parts.complexity ?? {},
      hover: parts.hover ?? {},
    },
  };
}
