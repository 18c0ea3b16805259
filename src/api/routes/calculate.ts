/**
 * Calculation Routes
 * Score telemetry records into SCI / UEI / SEI
 */

import { FastifyPluginAsync } from 'fastify';
import { peekMetadata } from '../../core/validation/index.js';
import { validateBatchBody, validateCalculateBody } from '../validators/index.js';
import { LOG_MESSAGES } from '../constants/index.js';
import type { BatchResponse, CalculateResponse } from '../types/index.js';
import type { EngineRouteOptions } from '../types/fastify.js';

export const calculateRoutes: FastifyPluginAsync<EngineRouteOptions> = async (fastify, { engine }) => {
  /**
   * POST /api/calculate
   * Score a single question and append it to the session history
   */
  fastify.post<{ Body: unknown; Reply: CalculateResponse }>('/calculate', async (request) => {
    const body = validateCalculateBody(request.body);
    const scores = await engine.score(body, true);
    const metadata = peekMetadata(body);

    request.log.info(
      LOG_MESSAGES.CALCULATED(
        metadata.userId ?? '',
        metadata.questionId ?? '',
        scores.SCI,
        scores.UEI,
        scores.SEI
      )
    );

    return {
      status: 'success',
      data: scores,
      metadata,
    };
  });

  /**
   * POST /api/calculate_batch
   * Score several questions in order; failures are reported per item
   */
  fastify.post<{ Body: unknown; Reply: BatchResponse }>('/calculate_batch', async (request) => {
    const questions = validateBatchBody(request.body);
    const data = await engine.scoreBatch(questions, true);

    request.log.info(LOG_MESSAGES.BATCH_COMPLETED(questions.length));

    return {
      status: 'success',
      data,
    };
  });
};
