/**
 * Index Engine
 * Facade over the scorers and the session history.
 *
 * One engine is one survey session: it owns its HistoryStore, and every
 * operation touching that store runs under the engine's Mutex so that a
 * score's append and the SEI query that follows it form one critical section.
 */

import { HistoryStore } from './HistoryStore.js';
import { Mutex } from './Mutex.js';
import { getErrorCode, getErrorMessage } from './errors.js';
import { analyzeTrajectory } from './scoring/GeometryAnalyzer.js';
import { calculateSci } from './scoring/ConflictScorer.js';
import { calculateUei } from './scoring/EngagementScorer.js';
import { calculateSei } from './scoring/SessionQualityScorer.js';
import { roundTo } from './stats.js';
import { peekMetadata, validateRecord } from './validation/index.js';
import { SCORE_DECIMALS } from '../config/constants.js';
import { logger as defaultLogger, type Logger } from '../services/Logger.js';
import type {
  BatchItemResult,
  EngineStats,
  HistoryEntry,
  IndexScores,
  TelemetryRecord,
} from '../types/index.js';

export interface IndexEngineOptions {
  store?: HistoryStore;
  logger?: Logger;
}

export class IndexEngine {
  private readonly store: HistoryStore;
  private readonly logger: Logger;
  private readonly lock = new Mutex();

  constructor(options: IndexEngineOptions = {}) {
    this.store = options.store ?? new HistoryStore();
    this.logger = options.logger ?? defaultLogger;
  }

  /**
   * Score one telemetry record.
   * Throws ValidationError / MalformedRecordError before touching history.
   */
  async score(input: unknown, updateHistory: boolean = true): Promise<IndexScores> {
    const record = validateRecord(input);
    const { sci, uei } = this.scoreQuestion(record);

    return this.lock.runExclusive(() => {
      const { userId, questionId, timestamp } = record.metadata;
      if (updateHistory) {
        this.store.append({ sci, uei, userId, questionId, timestamp });
      }
      const sei = calculateSei(this.store.query(userId));

      const scores: IndexScores = {
        SCI: roundTo(sci, SCORE_DECIMALS),
        UEI: roundTo(uei, SCORE_DECIMALS),
        SEI: roundTo(sei, SCORE_DECIMALS),
      };
      this.logger.scored(userId, questionId, scores);
      return scores;
    });
  }

  /**
   * Score records in order. A failing record reports its error in place
   * and the rest of the batch carries on.
   */
  async scoreBatch(inputs: readonly unknown[], updateHistory: boolean = true): Promise<BatchItemResult[]> {
    const results: BatchItemResult[] = [];
    let failed = 0;

    for (const input of inputs) {
      const metadata = peekMetadata(input);
      try {
        const scores = await this.score(input, updateHistory);
        results.push({ ...scores, metadata });
      } catch (error) {
        failed++;
        this.logger.warn(`Skipping record ${results.length}: ${getErrorMessage(error)}`);
        results.push({ error: getErrorMessage(error), code: getErrorCode(error), metadata });
      }
    }

    this.logger.batchComplete(inputs.length, failed);
    return results;
  }

  /**
   * Snapshot of the history, optionally for one user
   */
  async history(userId?: string): Promise<readonly HistoryEntry[]> {
    return this.lock.runExclusive(() => this.store.query(userId));
  }

  /**
   * Start a new session: clears all history, returns the number of entries dropped
   */
  async reset(): Promise<number> {
    const cleared = await this.lock.runExclusive(() => this.store.reset());
    this.logger.historyReset(cleared);
    return cleared;
  }

  async stats(): Promise<EngineStats> {
    return this.lock.runExclusive(() => ({
      totalCalculations: this.store.count(),
      uniqueUsers: this.store.uniqueUsers(),
    }));
  }

  private scoreQuestion(record: TelemetryRecord): { sci: number; uei: number } {
    const shape = analyzeTrajectory(record.trajectory);
    return {
      sci: calculateSci(record, shape),
      uei: calculateUei(record, shape),
    };
  }
}
