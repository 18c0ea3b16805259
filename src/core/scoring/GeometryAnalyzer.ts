/**
 * Geometry Analyzer
 * Shape metrics derived from a raw pointer trajectory
 */

import { mean, populationStdDev } from '../stats.js';
import type { TrajectoryPoint, TrajectoryShape } from '../../types/index.js';

type Coordinate = Pick<TrajectoryPoint, 'x' | 'y'>;

const DEGENERATE_SHAPE: TrajectoryShape = {
  xFlips: 0,
  yFlips: 0,
  averageDeviation: 0.0,
  trajectoryLength: 0.0,
  trajectorySmoothness: 1.0,
};

/**
 * Count interior samples where travel along one axis reverses direction.
 * A zero displacement on either side is not a reversal.
 */
export function countFlips(values: readonly number[]): number {
  let flips = 0;
  for (let i = 1; i < values.length - 1; i++) {
    const before = values[i] - values[i - 1];
    const after = values[i + 1] - values[i];
    if (before * after < 0) flips++;
  }
  return flips;
}

/**
 * Power of two bringing every coordinate into [-2, 2], or 1 when they already
 * fit. Division by a power of two is exact.
 */
function coordinateScale(points: readonly Coordinate[]): number {
  const largest = Math.max(...points.map(({ x, y }) => Math.max(Math.abs(x), Math.abs(y))));
  if (largest <= 1) return 1;
  return Math.pow(2, Math.min(Math.ceil(Math.log2(largest)), 1023));
}

/**
 * Mean perpendicular distance of the interior points to the straight line
 * joining the first and last point. 0 when the endpoints coincide.
 */
export function averageDeviationFromIdeal(points: readonly Coordinate[]): number {
  if (points.length < 3) return 0.0;

  const scale = coordinateScale(points);
  const scaled = points.map(({ x, y }) => ({ x: x / scale, y: y / scale }));
  const start = scaled[0];
  const end = scaled[scaled.length - 1];
  const lineLength = Math.hypot(end.x - start.x, end.y - start.y);
  if (lineLength === 0) return 0.0;

  const deviations = scaled.slice(1, -1).map(({ x, y }) =>
    Math.abs(
      (end.y - start.y) * x - (end.x - start.x) * y + end.x * start.y - end.y * start.x
    ) / lineLength
  );
  return mean(deviations) * scale;
}

export function pathLength(points: readonly Coordinate[]): number {
  let length = 0.0;
  for (let i = 1; i < points.length; i++) {
    length += Math.hypot(points[i].x - points[i - 1].x, points[i].y - points[i - 1].y);
  }
  return length;
}

/**
 * 1 − σ/π over the absolute changes between consecutive segment headings,
 * floored at 0. Needs at least two heading changes to say anything.
 */
export function smoothness(points: readonly Coordinate[]): number {
  const headings: number[] = [];
  for (let i = 1; i < points.length; i++) {
    headings.push(Math.atan2(points[i].y - points[i - 1].y, points[i].x - points[i - 1].x));
  }

  const changes: number[] = [];
  for (let i = 1; i < headings.length; i++) {
    changes.push(Math.abs(headings[i] - headings[i - 1]));
  }
  if (changes.length < 2) return 1.0;

  return Math.max(0, 1 - populationStdDev(changes) / Math.PI);
}

export function analyzeTrajectory(points: readonly TrajectoryPoint[]): TrajectoryShape {
  if (points.length < 2) {
    return { ...DEGENERATE_SHAPE };
  }

  return {
    xFlips: countFlips(points.map((p) => p.x)),
    yFlips: countFlips(points.map((p) => p.y)),
    averageDeviation: averageDeviationFromIdeal(points),
    trajectoryLength: pathLength(points),
    trajectorySmoothness: smoothness(points),
  };
}
