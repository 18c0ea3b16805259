/**
 * Survey Index Engine - Statistics helpers
 * Summary statistics shared by the scorers
 */

/**
 * Arithmetic mean, 0 for an empty sample
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((a, b) => a + b, 0) / values.length;
}

/**
 * Population standard deviation (divides by n)
 */
export function populationStdDev(values: readonly number[]): number {
  if (values.length === 0) return 0;
  const avg = mean(values);
  const squareDiffs = values.map(v => Math.pow(v - avg, 2));
  return Math.sqrt(squareDiffs.reduce((a, b) => a + b, 0) / values.length);
}

/**
 * Sample standard deviation (divides by n - 1), 0 below two samples
 */
export function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const avg = mean(values);
  const squareDiffs = values.map(v => Math.pow(v - avg, 2));
  return Math.sqrt(squareDiffs.reduce((a, b) => a + b, 0) / (values.length - 1));
}

/**
 * Fraction of values matching the predicate, 0 for an empty sample
 */
export function ratio<T>(values: readonly T[], predicate: (value: T) => boolean): number {
  if (values.length === 0) return 0;
  return values.filter(predicate).length / values.length;
}

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * Scale a raw value against its reference ceiling into [0, 1].
 * An infinite ratio saturates; NaN maps to 0.
 */
export function normalizeTo(value: number, ceiling: number): number {
  const scaled = value / ceiling;
  if (Number.isNaN(scaled)) return 0;
  return clamp(scaled, 0, 1.0);
}

/**
 * Round to a fixed number of decimals (halves round up)
 */
export function roundTo(value: number, decimals: number): number {
  const factor = Math.pow(10, decimals);
  return Math.round(value * factor) / factor;
}
