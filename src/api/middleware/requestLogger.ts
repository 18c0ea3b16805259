/**
 * Request Logger Middleware
 * Request timing and slow-request warnings
 */

import type { FastifyRequest, FastifyReply, HookHandlerDoneFunction } from 'fastify';
import { API_CONFIG } from '../config/index.js';
import { LOG_MESSAGES } from '../constants/index.js';

// ═══════════════════════════════════════════════════════════════════════════
// Request Timing
// ═══════════════════════════════════════════════════════════════════════════

const requestTimes = new Map<string, number>();

export function onRequest(
  request: FastifyRequest,
  _reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  requestTimes.set(request.id, Date.now());
  done();
}

export function onResponse(
  request: FastifyRequest,
  reply: FastifyReply,
  done: HookHandlerDoneFunction
): void {
  const startTime = requestTimes.get(request.id);
  requestTimes.delete(request.id);

  if (startTime) {
    const duration = Date.now() - startTime;

    if (duration > API_CONFIG.monitoring.slowRequestThresholdMs) {
      request.log.warn({
        msg: LOG_MESSAGES.SLOW_REQUEST,
        duration,
        url: request.url,
        method: request.method,
        statusCode: reply.statusCode,
      });
    }
  }

  done();
}

// ═══════════════════════════════════════════════════════════════════════════
// Request ID Generator
// ═══════════════════════════════════════════════════════════════════════════

let requestCounter = 0;

export function generateRequestId(): string {
  requestCounter += 1;
  return `req-${requestCounter}`;
}
