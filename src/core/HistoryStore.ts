/**
 * History Store
 * In-memory, append-only log of scored questions for one survey session
 */

import type { HistoryEntry } from '../types/index.js';

export class HistoryStore {
  private entries: HistoryEntry[] = [];

  /**
   * Append an entry. The stored copy is frozen.
   */
  append(entry: HistoryEntry): HistoryEntry {
    const stored = Object.freeze({ ...entry });
    this.entries.push(stored);
    return stored;
  }

  /**
   * All entries, or the entries of one user, in insertion order.
   * Always a fresh array, never the internal log.
   */
  query(userId?: string): readonly HistoryEntry[] {
    if (userId === undefined) {
      return [...this.entries];
    }
    return this.entries.filter((e) => e.userId === userId);
  }

  /**
   * Get total count
   */
  count(): number {
    return this.entries.length;
  }

  /**
   * Number of distinct user ids in the log
   */
  uniqueUsers(): number {
    return new Set(this.entries.map((e) => e.userId)).size;
  }

  /**
   * Clear all entries
   */
  reset(): number {
    const count = this.entries.length;
    this.entries = [];
    return count;
  }
}
