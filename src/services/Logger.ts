/**
 * Survey Index Engine - Logger Service
 * Centralized logging with chalk styling and headless mode support
 */

import chalk from 'chalk';
import type { IndexScores, LogLevel } from '../types/index.js';

export interface LoggerOptions {
  level?: LogLevel;
  headless?: boolean;
}

export class Logger {
  private static instance: Logger;
  private level: LogLevel = 'info';
  private headless: boolean = false;

  static getInstance(): Logger {
    if (!this.instance) {
      this.instance = new Logger();
    }
    return this.instance;
  }

  configure(options: LoggerOptions): void {
    if (options.level) this.level = options.level;
    if (options.headless !== undefined) this.headless = options.headless;
  }

  private shouldLog(level: LogLevel): boolean {
    if (this.headless && level !== 'error') return false;
    if (this.level === 'silent') return false;

    const levels: LogLevel[] = ['debug', 'info', 'warn', 'error'];
    return levels.indexOf(level) >= levels.indexOf(this.level);
  }

  // Scoring
  scored(userId: string, questionId: string, scores: IndexScores): void {
    if (!this.shouldLog('debug')) return;
    console.log(
      chalk.gray(`[DEBUG] Scored user ${userId || '(anonymous)'}, question ${questionId || '(none)'}: `) +
        chalk.cyan(`SCI=${scores.SCI}`) + ' ' +
        chalk.green(`UEI=${scores.UEI}`) + ' ' +
        chalk.magenta(`SEI=${scores.SEI}`)
    );
  }

  historyReset(count: number): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.yellow(`History reset (${count} entries cleared)`));
  }

  batchComplete(count: number, failed: number): void {
    if (!this.shouldLog('info')) return;
    const color = failed > 0 ? chalk.yellow : chalk.green;
    console.log(color(`Batch scored: ${count - failed}/${count} records`));
  }

  // General logging
  debug(message: string): void {
    if (!this.shouldLog('debug')) return;
    console.log(chalk.gray(`[DEBUG] ${message}`));
  }

  info(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.white(message));
  }

  success(message: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.green(message));
  }

  warn(message: string): void {
    if (!this.shouldLog('warn')) return;
    console.log(chalk.yellow(message));
  }

  error(message: string): void {
    if (this.level === 'silent') return;
    console.log(chalk.red(message));
  }

  // Banner
  banner(title: string): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan('\n' + '='.repeat(50)));
    console.log(chalk.cyan(`  ${title}`));
    console.log(chalk.cyan('='.repeat(50)));
  }

  // Separator
  separator(): void {
    if (!this.shouldLog('info')) return;
    console.log(chalk.cyan('-'.repeat(50)));
  }
}

export const logger = Logger.getInstance();
