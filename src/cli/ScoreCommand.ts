/**
 * ScoreCommand - score telemetry JSON files from the command line
 *
 * Usage:
 *   survey-index score <files...> [--json] [--no-history]
 *
 * Each file holds one record, an array of records, or a batch body
 * ({ "questions": [...] }). Files are scored in order through one engine,
 * so SEI accumulates across all of them.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import fs from 'fs/promises';
import path from 'path';
import { IndexEngine } from '../core/IndexEngine.js';
import { ValidationError } from '../core/errors.js';
import { isPlainObject } from '../core/validation/index.js';
import { logger as defaultLogger, type Logger } from '../services/Logger.js';
import type { BatchItemResult } from '../types/index.js';

export interface ScoreCommandOptions {
  json?: boolean;
  history: boolean;
}

export interface ScoredFileRecord {
  file: string;
  index: number;
  result: BatchItemResult;
}

// ============================================================
// Helpers
// ============================================================

/**
 * Read the records held by one JSON file
 */
export async function loadRecords(filePath: string): Promise<unknown[]> {
  const raw = await fs.readFile(filePath, 'utf-8');

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ValidationError(`${filePath} is not valid JSON`, [], {
      cause: error instanceof Error ? error : undefined,
    });
  }

  if (Array.isArray(parsed)) return parsed;
  if (isPlainObject(parsed) && Array.isArray(parsed.questions)) return parsed.questions;
  return [parsed];
}

export function formatResultLine(entry: ScoredFileRecord): string {
  const { result } = entry;
  const label = `${path.basename(entry.file)}#${entry.index}`;
  const who = [result.metadata.userId, result.metadata.questionId].filter(Boolean).join('/');
  const prefix = chalk.gray(`${label}${who ? ` (${who})` : ''}`);

  if ('error' in result) {
    return `${prefix} ${chalk.red(`${result.code}: ${result.error}`)}`;
  }
  return (
    `${prefix} ` +
    chalk.cyan(`SCI=${result.SCI.toFixed(2)}`) + ' ' +
    chalk.green(`UEI=${result.UEI.toFixed(2)}`) + ' ' +
    chalk.magenta(`SEI=${result.SEI.toFixed(2)}`)
  );
}

/**
 * Score every record of every file, in order, through one engine
 */
export async function scoreFiles(
  files: readonly string[],
  engine: IndexEngine,
  updateHistory: boolean
): Promise<ScoredFileRecord[]> {
  const scored: ScoredFileRecord[] = [];
  for (const file of files) {
    const records = await loadRecords(file);
    const results = await engine.scoreBatch(records, updateHistory);
    results.forEach((result, index) => scored.push({ file, index, result }));
  }
  return scored;
}

// ============================================================
// Registration
// ============================================================

export function registerScoreCommand(
  program: Command,
  createEngine: (log: Logger) => IndexEngine = (log) => new IndexEngine({ logger: log }),
  log: Logger = defaultLogger
): void {
  program
    .command('score <files...>')
    .description('Score telemetry JSON files into SCI / UEI / SEI')
    .option('--json', 'Print results as a JSON array')
    .option('--no-history', 'Score without appending to the session history')
    .action(async (files: string[], options: ScoreCommandOptions) => {
      // stdout carries the JSON document; only errors may still be logged
      if (options.json) {
        log.configure({ headless: true });
      }
      const scored = await scoreFiles(files, createEngine(log), options.history);

      if (options.json) {
        console.log(JSON.stringify(scored.map(({ file, index, result }) => ({ file, index, ...result })), null, 2));
        return;
      }
      for (const entry of scored) {
        console.log(formatResultLine(entry));
      }
    });
}
