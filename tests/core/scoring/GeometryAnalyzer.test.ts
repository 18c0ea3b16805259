/**
 * Tests for Geometry Analyzer
 */

import { describe, it, expect } from 'vitest';
import {
  analyzeTrajectory,
  averageDeviationFromIdeal,
  countFlips,
  pathLength,
  smoothness,
} from '../../../src/core/scoring/GeometryAnalyzer.js';
import { toPoints } from '../../__mocks__/records.js';

describe('analyzeTrajectory', () => {
  describe('degenerate trajectories', () => {
    it('should return zeros and full smoothness for an empty trajectory', () => {
      expect(analyzeTrajectory([])).toEqual({
        xFlips: 0,
        yFlips: 0,
        averageDeviation: 0,
        trajectoryLength: 0,
        trajectorySmoothness: 1,
      });
    });

    it('should return zeros and full smoothness for a single point', () => {
      expect(analyzeTrajectory(toPoints([[0.5, 0.5]]))).toEqual({
        xFlips: 0,
        yFlips: 0,
        averageDeviation: 0,
        trajectoryLength: 0,
        trajectorySmoothness: 1,
      });
    });

    it('should hand out independent result objects', () => {
      const first = analyzeTrajectory([]);
      first.xFlips = 99;
      expect(analyzeTrajectory([]).xFlips).toBe(0);
    });
  });

  it('should measure a straight path', () => {
    const shape = analyzeTrajectory(toPoints([[0, 0], [1, 0], [2, 0]]));

    expect(shape.xFlips).toBe(0);
    expect(shape.yFlips).toBe(0);
    expect(shape.averageDeviation).toBe(0);
    expect(shape.trajectoryLength).toBe(2);
    expect(shape.trajectorySmoothness).toBe(1);
  });

  it('should count a reversal at each interior point of a wobbling path', () => {
    // y travels +0.06, -0.02, +0.06: reverses at both interior points
    const shape = analyzeTrajectory(toPoints([[0, 0], [0.06, 0.06], [0.12, 0.04], [0.18, 0.10]]));

    expect(shape.xFlips).toBe(0);
    expect(shape.yFlips).toBe(2);
    expect(shape.trajectoryLength).toBeCloseTo(0.232951, 5);
  });

  it('should measure an L-shaped path', () => {
    const shape = analyzeTrajectory(toPoints([[0, 0], [1, 0], [1, 1], [1, 2]]));

    expect(shape.xFlips).toBe(0);
    expect(shape.yFlips).toBe(0);
    expect(shape.averageDeviation).toBeCloseTo(1.5 / Math.sqrt(5), 10);
    expect(shape.trajectoryLength).toBe(3);
    // heading changes π/2 then 0: σ = π/4
    expect(shape.trajectorySmoothness).toBeCloseTo(0.75, 10);
  });

  it('should report zero deviation when start and end coincide', () => {
    const shape = analyzeTrajectory(toPoints([[0, 0], [1, 1], [0, 0]]));

    expect(shape.averageDeviation).toBe(0);
    expect(shape.xFlips).toBe(1);
    expect(shape.yFlips).toBe(1);
    expect(shape.trajectoryLength).toBeCloseTo(2 * Math.SQRT2, 10);
  });
});

describe('countFlips', () => {
  it('should not count a zero displacement as a flip', () => {
    expect(countFlips([0, 1, 1, 0])).toBe(0);
  });

  it('should count every sign change', () => {
    expect(countFlips([0, 1, 0, 1, 0])).toBe(3);
  });

  it('should need at least three samples', () => {
    expect(countFlips([0, 1])).toBe(0);
  });
});

describe('averageDeviationFromIdeal', () => {
  it('should be zero without interior points', () => {
    expect(averageDeviationFromIdeal([{ x: 0, y: 0 }, { x: 3, y: 4 }])).toBe(0);
  });

  it('should average perpendicular distances to the start-end line', () => {
    const points = [{ x: 0, y: 0 }, { x: 1, y: 1 }, { x: 2, y: 3 }, { x: 4, y: 0 }];
    // line y = 0: distances 1 and 3
    expect(averageDeviationFromIdeal(points)).toBe(2);
  });

  it('should stay finite when the endpoints are near the float limit', () => {
    const points = [{ x: -1e308, y: 0 }, { x: 0, y: 1e308 }, { x: 1e308, y: 0 }];
    const deviation = averageDeviationFromIdeal(points);

    expect(Number.isFinite(deviation)).toBe(true);
    expect(deviation / 1e308).toBeCloseTo(1, 10);
  });

  it('should keep a small offset from a huge baseline', () => {
    const deviation = averageDeviationFromIdeal([{ x: -1e308, y: 0 }, { x: 0, y: 1 }, { x: 1e308, y: 0 }]);
    expect(deviation).toBeCloseTo(1, 6);
  });
});

describe('pathLength', () => {
  it('should sum segment lengths', () => {
    expect(pathLength([{ x: 0, y: 0 }, { x: 3, y: 4 }, { x: 3, y: 0 }])).toBe(9);
  });
});

describe('smoothness', () => {
  it('should be 1 with a single heading change', () => {
    expect(smoothness([{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }])).toBe(1);
  });

  it('should be 1 when heading changes are identical', () => {
    const square = [{ x: 0, y: 0 }, { x: 1, y: 0 }, { x: 1, y: 1 }, { x: 0, y: 1 }];
    expect(smoothness(square)).toBe(1);
  });

  it('should stay within [0, 1] for an erratic path', () => {
    const erratic = [
      { x: 0, y: 0 }, { x: 1, y: 0 }, { x: 0, y: 0.01 }, { x: 1, y: 0.02 },
      { x: 1, y: 1 }, { x: -1, y: 1 }, { x: -1, y: -1 },
    ];
    const value = smoothness(erratic);
    expect(value).toBeGreaterThanOrEqual(0);
    expect(value).toBeLessThan(1);
  });
});
