#!/usr/bin/env node
/**
 * Survey Index CLI Entry Point
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerScoreCommand } from '../src/cli/ScoreCommand.js';
import { API_CONFIG } from '../src/api/config/index.js';
import { logger } from '../src/services/Logger.js';

const program = new Command();

program
  .name('survey-index')
  .description('Score pointer-trajectory survey telemetry')
  .version(API_CONFIG.version)
  .option('-v, --verbose', 'Log every scored record')
  .hook('preAction', (command) => {
    // Results go to stdout; keep progress logging out of the way unless asked
    logger.configure({ level: command.opts().verbose ? 'debug' : 'warn' });
  });

registerScoreCommand(program);

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(error instanceof Error ? error.message : String(error)));
  process.exit(1);
});
