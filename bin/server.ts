#!/usr/bin/env npx tsx
/**
 * Survey Index API Server Entry Point
 */

import 'dotenv/config';
import { startServer, API_CONFIG } from '../src/api/index.js';
import { logger } from '../src/services/Logger.js';

logger.configure({ level: API_CONFIG.logger.level });

// Handle graceful shutdown
process.on('SIGINT', () => {
  logger.info('\nShutting down server...');
  process.exit(0);
});

process.on('SIGTERM', () => {
  logger.info('\nShutting down server...');
  process.exit(0);
});

logger.banner(`Survey Index API v${API_CONFIG.version}`);

startServer().catch((error) => {
  logger.error(`Failed to start server: ${error instanceof Error ? error.message : String(error)}`);
  process.exit(1);
});
