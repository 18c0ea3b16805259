/**
 * Record Validator
 * Turns a wire-format telemetry record into a typed TelemetryRecord.
 *
 * Strict at the section level (missing metadata/trajectory/metrics is a
 * ValidationError), permissive at the leaf level: absent or null leaves stay
 * undefined and resolve through the defaults table at scoring time, while a
 * leaf of the wrong type is a MalformedRecordError.
 */

import { MalformedRecordError, ValidationError } from '../errors.js';
import { RECORD_SECTIONS } from '../../config/constants.js';
import type {
  ComplexityMetrics,
  DeviationMetrics,
  HoverMetrics,
  MetricsBundle,
  RecordMetadata,
  TelemetryRecord,
  TrajectoryPoint,
  VelocityMetrics,
} from '../../types/index.js';

type PlainObject = Record<string, unknown>;

// ═══════════════════════════════════════════════════════════════════════════
// Primitive checks
// ═══════════════════════════════════════════════════════════════════════════

export function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isAbsent(value: unknown): value is undefined | null {
  return value === undefined || value === null;
}

function optionalSection(value: unknown, field: string): PlainObject {
  if (isAbsent(value)) return {};
  if (!isPlainObject(value)) {
    throw new MalformedRecordError(field, 'an object');
  }
  return value;
}

export function optionalFiniteNumber(value: unknown, field: string): number | undefined {
  if (isAbsent(value)) return undefined;
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new MalformedRecordError(field, 'a finite number');
  }
  return value;
}

function requireFiniteNumber(value: unknown, field: string): number {
  const num = optionalFiniteNumber(value, field);
  if (num === undefined) {
    throw new MalformedRecordError(field, 'a finite number');
  }
  return num;
}

function optionalIdentifier(value: unknown, field: string): string {
  if (isAbsent(value)) return '';
  if (typeof value === 'string') return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw new MalformedRecordError(field, 'a string');
}

// ═══════════════════════════════════════════════════════════════════════════
// Section parsers
// ═══════════════════════════════════════════════════════════════════════════

export function parseMetadata(value: unknown): RecordMetadata {
  const section = optionalSection(value, 'metadata');
  return {
    userId: optionalIdentifier(section.userId, 'metadata.userId'),
    surveyId: optionalIdentifier(section.surveyId, 'metadata.surveyId'),
    questionId: optionalIdentifier(section.questionId, 'metadata.questionId'),
    timestamp: optionalIdentifier(section.timestamp, 'metadata.timestamp'),
    selectedResponse: optionalIdentifier(section.selectedResponse, 'metadata.selectedResponse'),
  };
}

export function parseTrajectory(value: unknown): TrajectoryPoint[] {
  if (!Array.isArray(value)) {
    throw new MalformedRecordError('trajectory', 'an array');
  }

  return value.map((raw: unknown, index): TrajectoryPoint => {
    const field = `trajectory[${index}]`;
    if (!isPlainObject(raw)) {
      throw new MalformedRecordError(field, 'an object');
    }
    return {
      x: requireFiniteNumber(raw.x, `${field}.x`),
      y: requireFiniteNumber(raw.y, `${field}.y`),
      step: optionalFiniteNumber(raw.step, `${field}.step`) ?? index,
      normalizedTime: optionalFiniteNumber(raw.normalizedTime, `${field}.normalizedTime`) ?? 0,
    };
  });
}

function parseDeviation(value: unknown): DeviationMetrics {
  const section = optionalSection(value, 'metrics.deviation');
  return {
    maxDeviationPositive: optionalFiniteNumber(section.maxDeviationPositive, 'metrics.deviation.maxDeviationPositive'),
    maxDeviationNegative: optionalFiniteNumber(section.maxDeviationNegative, 'metrics.deviation.maxDeviationNegative'),
    aucPositive: optionalFiniteNumber(section.aucPositive, 'metrics.deviation.aucPositive'),
    aucNegative: optionalFiniteNumber(section.aucNegative, 'metrics.deviation.aucNegative'),
  };
}

function parseVelocity(value: unknown): VelocityMetrics {
  const section = optionalSection(value, 'metrics.velocity');
  return {
    averageVelocityPxPerSec: optionalFiniteNumber(section.averageVelocityPxPerSec, 'metrics.velocity.averageVelocityPxPerSec'),
    maximalVelocityPxPerSec: optionalFiniteNumber(section.maximalVelocityPxPerSec, 'metrics.velocity.maximalVelocityPxPerSec'),
    averageVelocity: optionalFiniteNumber(section.averageVelocity, 'metrics.velocity.averageVelocity'),
    maximalVelocity: optionalFiniteNumber(section.maximalVelocity, 'metrics.velocity.maximalVelocity'),
  };
}

function parseComplexity(value: unknown): ComplexityMetrics {
  const section = optionalSection(value, 'metrics.complexity');
  return {
    angleEntropy: optionalFiniteNumber(section.angleEntropy, 'metrics.complexity.angleEntropy'),
    initiationTimeMs: optionalFiniteNumber(section.initiationTimeMs, 'metrics.complexity.initiationTimeMs'),
  };
}

function parseHover(value: unknown): HoverMetrics {
  const section = optionalSection(value, 'metrics.hover');
  const hover: HoverMetrics = {
    totalHovers: optionalFiniteNumber(section.totalHovers, 'metrics.hover.totalHovers'),
  };

  if (!isAbsent(section.hoverCounts)) {
    if (!isPlainObject(section.hoverCounts)) {
      throw new MalformedRecordError('metrics.hover.hoverCounts', 'a mapping of label to count');
    }
    // fromEntries defines own keys, so a label such as "__proto__" is kept
    hover.hoverCounts = Object.fromEntries(
      Object.entries(section.hoverCounts).map(([label, count]): [string, number] => [
        label,
        requireFiniteNumber(count, `metrics.hover.hoverCounts.${label}`),
      ])
    );
  }

  return hover;
}

export function parseMetrics(value: unknown): MetricsBundle {
  const section = optionalSection(value, 'metrics');
  return {
    deviation: parseDeviation(section.deviation),
    velocity: parseVelocity(section.velocity),
    complexity: parseComplexity(section.complexity),
    hover: parseHover(section.hover),
  };
}

// ═══════════════════════════════════════════════════════════════════════════
// Record
// ═══════════════════════════════════════════════════════════════════════════

/**
 * List the required top-level sections the input lacks
 */
export function findMissingSections(input: PlainObject): string[] {
  return RECORD_SECTIONS.filter((section) => isAbsent(input[section]));
}

/**
 * Validate and type a raw telemetry record
 */
export function validateRecord(input: unknown): TelemetryRecord {
  if (!isPlainObject(input)) {
    throw new ValidationError('Telemetry record must be a JSON object');
  }

  const missing = findMissingSections(input);
  if (missing.length > 0) {
    throw new ValidationError(`Missing required fields: ${missing.join(', ')}`, missing);
  }

  return {
    metadata: parseMetadata(input.metadata),
    trajectory: parseTrajectory(input.trajectory),
    metrics: parseMetrics(input.metrics),
  };
}

/**
 * Best-effort metadata for error reports; never throws
 */
export function peekMetadata(input: unknown): Partial<RecordMetadata> {
  if (!isPlainObject(input) || !isPlainObject(input.metadata)) {
    return {};
  }
  const metadata: Partial<RecordMetadata> = {};
  for (const key of ['userId', 'surveyId', 'questionId', 'timestamp', 'selectedResponse'] as const) {
    const value = input.metadata[key];
    if (typeof value === 'string' || typeof value === 'number') {
      metadata[key] = String(value);
    }
  }
  return metadata;
}
