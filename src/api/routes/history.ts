/**
 * History Routes
 * Session history endpoints
 */

import { FastifyPluginAsync } from 'fastify';
import { validateUserIdFilter } from '../validators/index.js';
import { LOG_MESSAGES, SUCCESS_MESSAGES } from '../constants/index.js';
import type { HistoryResponse, ResetResponse, StatsResponse } from '../types/index.js';
import type {
  EngineRouteOptions,
  HistoryParamsRequest,
  HistoryQueryRequest,
} from '../types/fastify.js';

export const historyRoutes: FastifyPluginAsync<EngineRouteOptions> = async (fastify, { engine }) => {
  /**
   * GET /api/history
   * Full history, or one user's with ?userId=
   */
  fastify.get<HistoryQueryRequest & { Reply: HistoryResponse }>('/history', async (request) => {
    const userId = validateUserIdFilter(request.query.userId);
    return {
      status: 'success',
      data: await engine.history(userId),
    };
  });

  /**
   * GET /api/history/:userId
   * History of one user
   */
  fastify.get<HistoryParamsRequest & { Reply: HistoryResponse }>('/history/:userId', async (request) => {
    return {
      status: 'success',
      data: await engine.history(request.params.userId),
    };
  });

  /**
   * POST /api/reset
   * Start a new survey session
   */
  fastify.post<{ Reply: ResetResponse }>('/reset', async (request) => {
    const cleared = await engine.reset();
    request.log.info(LOG_MESSAGES.HISTORY_RESET(cleared));
    return {
      status: 'success',
      message: SUCCESS_MESSAGES.HISTORY_RESET,
      cleared,
    };
  });

  /**
   * GET /api/stats
   * Size of the current session
   */
  fastify.get<{ Reply: StatsResponse }>('/stats', async () => {
    const { totalCalculations, uniqueUsers } = await engine.stats();
    return {
      status: 'success',
      data: {
        total_calculations: totalCalculations,
        unique_users: uniqueUsers,
      },
    };
  });
};
