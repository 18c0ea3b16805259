/**
 * Survey Index HTTP API Server
 * Fastify transport over one IndexEngine session
 */

import Fastify from 'fastify';
import cors from '@fastify/cors';

// Routes
import {
  healthRoutes,
  calculateRoutes,
  historyRoutes,
} from './routes/index.js';

// Middleware
import {
  errorHandler,
  notFoundHandler,
  onRequest,
  onResponse,
  generateRequestId,
} from './middleware/index.js';

// Engine
import { IndexEngine } from '../core/IndexEngine.js';

// Types
import type { ServerInfo } from './types/index.js';

// Config
import { API_CONFIG } from './config/index.js';
import { LOG_MESSAGES } from './constants/index.js';

export interface ServerOptions {
  port?: number;
  host?: string;
  /** Enable Fastify's pino logger with pretty output */
  logger?: boolean;
  /** Session engine; a fresh one per server when omitted */
  engine?: IndexEngine;
}

// ═══════════════════════════════════════════════════════════════════════════
// Server Factory
// ═══════════════════════════════════════════════════════════════════════════

export async function createServer(options: ServerOptions = {}) {
  const {
    port = API_CONFIG.server.port,
    host = API_CONFIG.server.host,
    logger = true,
    engine = new IndexEngine(),
  } = options;

  // Create Fastify instance
  const fastify = Fastify({
    logger: logger
      ? {
          level: API_CONFIG.logger.level,
          ...(API_CONFIG.logger.pretty && {
            transport: {
              target: 'pino-pretty',
              options: {
                colorize: true,
                translateTime: 'HH:MM:ss',
                ignore: 'pid,hostname',
              },
            },
          }),
        }
      : false,
    genReqId: generateRequestId,
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Plugins
  // ═══════════════════════════════════════════════════════════════════════════

  await fastify.register(cors, {
    origin: true,
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  });

  // ═══════════════════════════════════════════════════════════════════════════
  // Hooks
  // ═══════════════════════════════════════════════════════════════════════════

  fastify.addHook('onRequest', onRequest);
  fastify.addHook('onResponse', onResponse);

  // ═══════════════════════════════════════════════════════════════════════════
  // Error Handling
  // ═══════════════════════════════════════════════════════════════════════════

  fastify.setErrorHandler(errorHandler);
  fastify.setNotFoundHandler(notFoundHandler);

  // ═══════════════════════════════════════════════════════════════════════════
  // Routes
  // ═══════════════════════════════════════════════════════════════════════════

  await fastify.register(healthRoutes, { prefix: '/api' });
  await fastify.register(calculateRoutes, { prefix: '/api', engine });
  await fastify.register(historyRoutes, { prefix: '/api', engine });

  // Root endpoint - server info
  fastify.get<{ Reply: ServerInfo }>('/', async () => {
    return {
      name: 'Survey Index API',
      version: API_CONFIG.version,
      endpoints: [
        'GET  /api/health',
        'POST /api/calculate',
        'POST /api/calculate_batch',
        'POST /api/reset',
        'GET  /api/history',
        'GET  /api/history/:userId',
        'GET  /api/stats',
      ],
    };
  });

  return { fastify, port, host, engine };
}

// ═══════════════════════════════════════════════════════════════════════════
// Server Startup
// ═══════════════════════════════════════════════════════════════════════════

export async function startServer(options: ServerOptions = {}) {
  const { fastify, port, host } = await createServer(options);

  await fastify.listen({ port, host });
  fastify.log.info(LOG_MESSAGES.SERVER_STARTED(host, port));

  return fastify;
}
