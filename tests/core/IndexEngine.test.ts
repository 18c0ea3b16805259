/**
 * Tests for Index Engine
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { IndexEngine } from '../../src/core/IndexEngine.js';
import { HistoryStore } from '../../src/core/HistoryStore.js';
import { MalformedRecordError, ValidationError } from '../../src/core/errors.js';
import { Logger } from '../../src/services/Logger.js';
import { makeRecord, toPoints } from '../__mocks__/records.js';

function quietLogger(): Logger {
  const quiet = new Logger();
  quiet.configure({ level: 'silent' });
  return quiet;
}

describe('IndexEngine', () => {
  let engine: IndexEngine;

  beforeEach(() => {
    engine = new IndexEngine({ logger: quietLogger() });
  });

  describe('score', () => {
    it('should score a record with every leaf defaulted', async () => {
      const scores = await engine.score(makeRecord());
      expect(scores).toEqual({ SCI: 10, UEI: 75, SEI: 62 });
    });

    it('should fold earlier questions into SEI', async () => {
      await engine.score(makeRecord());
      const scores = await engine.score(
        makeRecord({ metadata: { questionId: 'q2' }, complexity: { initiationTimeMs: 50 } })
      );

      expect(scores).toEqual({ SCI: 10, UEI: 52.5, SEI: 49.5 });
      expect(await engine.history('user-1')).toHaveLength(2);
    });

    it('should give neutral SEI without history when not recording', async () => {
      const scores = await engine.score(makeRecord(), false);

      expect(scores.SEI).toBe(50);
      expect(await engine.history()).toEqual([]);
    });

    it('should keep respondents apart', async () => {
      await engine.score(makeRecord({ complexity: { initiationTimeMs: 50 } }));
      const other = await engine.score(makeRecord({ metadata: { userId: 'user-2' } }));

      expect(other.SEI).toBe(62);
      expect(await engine.history('user-2')).toHaveLength(1);
    });

    it('should record unrounded scores with the metadata', async () => {
      await engine.score(makeRecord({ complexity: { initiationTimeMs: 50 } }));
      const [entry] = await engine.history();

      expect(entry).toEqual({
        sci: expect.closeTo(10, 10),
        uei: expect.closeTo(52.5, 10),
        userId: 'user-1',
        questionId: 'q1',
        timestamp: '2026-01-01T10:00:00.000Z',
      });
    });

    it('should return scores with at most two decimals', async () => {
      const scores = await engine.score(
        makeRecord({ velocity: { averageVelocityPxPerSec: 333 }, complexity: { angleEntropy: 1.1 } })
      );

      for (const value of Object.values(scores)) {
        expect(Math.round(value * 100) / 100).toBe(value);
      }
    });

    it('should leave history untouched on a validation error', async () => {
      await engine.score(makeRecord());

      await expect(engine.score({ metadata: {} })).rejects.toThrow(ValidationError);
      await expect(engine.score({ ...makeRecord(), trajectory: 'nope' })).rejects.toThrow(MalformedRecordError);
      expect(await engine.history()).toHaveLength(1);
    });

    it('should keep every score finite for coordinates near the float limit', async () => {
      const extreme = await engine.score(
        makeRecord({ trajectory: toPoints([[-1e308, 0], [0, 1], [1e308, 0]]) })
      );
      const next = await engine.score(makeRecord({ metadata: { questionId: 'q2' } }));
      const [stored] = await engine.history();

      // 1 y-flip and a deviation of 1: 0.25·0.05 + 0.15·0.02 + 0.10
      expect(extreme).toEqual({ SCI: 11.55, UEI: 75, SEI: 62.31 });
      expect(Number.isFinite(stored.sci)).toBe(true);
      expect(next.SCI).toBe(10);
      expect(next.SEI).toBeCloseTo(62.155, 1);
    });

    it('should append every concurrent score', async () => {
      const results = await Promise.all(
        Array.from({ length: 5 }, (_, i) => engine.score(makeRecord({ metadata: { questionId: `q${i}` } })))
      );

      expect(results.every((r) => r.SEI === 62)).toBe(true);
      expect((await engine.stats()).totalCalculations).toBe(5);
    });
  });

  describe('scoreBatch', () => {
    it('should report failures in place and carry on', async () => {
      const results = await engine.scoreBatch([
        makeRecord(),
        { metadata: { userId: 'user-2' } },
        makeRecord({ metadata: { questionId: 'q2' }, complexity: { initiationTimeMs: 50 } }),
      ]);

      expect(results).toHaveLength(3);
      expect(results[0]).toEqual({
        SCI: 10,
        UEI: 75,
        SEI: 62,
        metadata: {
          userId: 'user-1',
          surveyId: 'survey-1',
          questionId: 'q1',
          timestamp: '2026-01-01T10:00:00.000Z',
          selectedResponse: 'A',
        },
      });
      expect(results[1]).toEqual({
        error: 'Missing required fields: trajectory, metrics',
        code: 'VALIDATION_ERROR',
        metadata: { userId: 'user-2' },
      });
      expect(results[2]).toMatchObject({ SCI: 10, UEI: 52.5, SEI: 49.5 });
    });

    it('should return an empty list for an empty batch', async () => {
      expect(await engine.scoreBatch([])).toEqual([]);
    });
  });

  describe('history, stats and reset', () => {
    it('should count calculations and users', async () => {
      await engine.score(makeRecord());
      await engine.score(makeRecord({ metadata: { questionId: 'q2' } }));
      await engine.score(makeRecord({ metadata: { userId: 'user-2' } }));

      expect(await engine.stats()).toEqual({ totalCalculations: 3, uniqueUsers: 2 });
    });

    it('should clear everything on reset', async () => {
      await engine.score(makeRecord());
      await engine.score(makeRecord({ metadata: { userId: 'user-2' } }));

      expect(await engine.reset()).toBe(2);
      expect(await engine.history()).toEqual([]);
      expect(await engine.stats()).toEqual({ totalCalculations: 0, uniqueUsers: 0 });
      expect((await engine.score(makeRecord())).SEI).toBe(62);
    });

    it('should use an injected store', async () => {
      const store = new HistoryStore();
      const shared = new IndexEngine({ store, logger: quietLogger() });

      await shared.score(makeRecord());
      expect(store.count()).toBe(1);
    });
  });
});
