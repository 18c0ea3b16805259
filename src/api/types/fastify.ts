/**
 * Fastify Type Extensions
 */

import type { IndexEngine } from '../../core/IndexEngine.js';

// ═══════════════════════════════════════════════════════════════════════════
// Plugin Options
// ═══════════════════════════════════════════════════════════════════════════

/** Options shared by every route plugin: the engine holding the session */
export interface EngineRouteOptions {
  engine: IndexEngine;
}

// ═══════════════════════════════════════════════════════════════════════════
// Request Types
// ═══════════════════════════════════════════════════════════════════════════

export interface HistoryQueryRequest {
  Querystring: {
    userId?: string;
  };
}

export interface HistoryParamsRequest {
  Params: {
    userId: string;
  };
}
