/**
 * API Types - Request and response shapes
 */

import type {
  BatchItemResult,
  HistoryEntry,
  IndexScores,
  RecordMetadata,
} from '../../types/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// Server Types
// ═══════════════════════════════════════════════════════════════════════════

export interface ServerInfo {
  name: string;
  version: string;
  endpoints: string[];
}

export interface HealthResponse {
  status: 'healthy';
  message: string;
  version: string;
  timestamp: string;
  uptime: number;
}

// ═══════════════════════════════════════════════════════════════════════════
// Calculation Types
// ═══════════════════════════════════════════════════════════════════════════

export interface CalculateResponse {
  status: 'success';
  data: IndexScores;
  metadata: Partial<RecordMetadata>;
}

export interface BatchResponse {
  status: 'success';
  data: BatchItemResult[];
}

// ═══════════════════════════════════════════════════════════════════════════
// History Types
// ═══════════════════════════════════════════════════════════════════════════

export interface HistoryResponse {
  status: 'success';
  data: readonly HistoryEntry[];
}

export interface ResetResponse {
  status: 'success';
  message: string;
  cleared: number;
}

export interface StatsResponse {
  status: 'success';
  data: {
    total_calculations: number;
    unique_users: number;
  };
}
