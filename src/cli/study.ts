#!/usr/bin/env node
/**
 * Quant Study CLI
 *
 * Usage:
 *   quant-study roadmap                  # List the 21 days by phase
 *   quant-study validate --data ./data   # Check curriculum files
 *   quant-study study                    # Work through the roadmap from day 1
 *   quant-study study --day 6 --review 3 # Practice a single day
 *
 * Environment: QUANT_STUDY_DATA_DIR, LOG_LEVEL, REVIEW_COUNT (see config.ts).
 */

import * as path from 'path';
import { Command, InvalidArgumentError } from 'commander';

import { loadConfig, parseReviewCount, type Config } from '../config.js';
import { loadCurriculumFromDir } from '../curriculum/loader.js';
import { QuizEngine } from '../engine/quiz-engine.js';
import { isQuizError } from '../errors.js';
import { ConsoleLogger, type Logger } from '../logger.js';
import { ROADMAP_DAYS } from '../types.js';
import {
  formatRoadmap,
  readlineIO,
  runStudySession,
  runValidate,
} from './handlers/study-handlers.js';

function parseDay(raw: string): number {
  const day = Number(raw);
  if (!Number.isInteger(day) || day < 1 || day > ROADMAP_DAYS) {
    throw new InvalidArgumentError(`Expected a day from 1 to ${ROADMAP_DAYS}.`);
  }
  return day;
}

function parseReview(raw: string): number {
  try {
    return parseReviewCount(raw);
  } catch (err) {
    throw new InvalidArgumentError(err instanceof Error ? err.message : String(err));
  }
}

function resolveDataDir(config: Config, option: string | undefined): string {
  return option ? path.resolve(option) : config.dataDir;
}

let logger: Logger = new ConsoleLogger('quant-study');

function buildProgram(config: Config): Command {
  const program = new Command();

  program
    .name('quant-study')
    .description('21-day finance/quant study coach')
    .version('1.0.0');

  program
    .command('roadmap')
    .description('List the roadmap days grouped by phase')
    .option('-d, --data <dir>', 'Curriculum data directory')
    .action(async (options: { data?: string }) => {
      const topics = await loadCurriculumFromDir(resolveDataDir(config, options.data), { logger });
      for (const line of formatRoadmap(topics)) console.log(line);
    });

  program
    .command('validate')
    .description('Validate roadmap.json and every day file')
    .option('-d, --data <dir>', 'Curriculum data directory')
    .action(async (options: { data?: string }) => {
      const code = await runValidate(resolveDataDir(config, options.data), line => console.log(line));
      process.exitCode = code;
    });

  program
    .command('study')
    .description('Answer questions day by day; type "quit" to stop')
    .option('-d, --data <dir>', 'Curriculum data directory')
    .option('--day <n>', 'Practice a single day instead of the whole roadmap', parseDay)
    .option('-r, --review <k>', 'Review questions after each day', parseReview)
    .action(async (options: { data?: string; day?: number; review?: number }) => {
      const topics = await loadCurriculumFromDir(resolveDataDir(config, options.data), { logger });
      const engineTopics = options.day === undefined
        ? topics
        : topics.filter(topic => topic.day === options.day);
      const engine = new QuizEngine(engineTopics, { logger });

      const io = readlineIO(process.stdin, process.stdout);
      try {
        const outcome = await runStudySession(
          engine,
          io,
          { reviewCount: options.review ?? config.reviewCount },
          topics
        );
        logger.debug('Study session ended', { completed: outcome.completed });
      } finally {
        io.close();
      }
    });

  return program;
}

async function main(): Promise<void> {
  const config = loadConfig();
  logger = new ConsoleLogger('quant-study', config.logLevel);
  await buildProgram(config).parseAsync(process.argv);
}

main().catch((err: unknown) => {
  if (isQuizError(err)) {
    console.error(err.getUserMessage());
  } else {
    logger.error('Unexpected failure', err);
  }
  process.exit(1);
});
