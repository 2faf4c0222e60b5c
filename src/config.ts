/**
 * Configuration loaded from environment variables
 *
 * CLI options override these values; see cli/study.ts.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import { ConfigError } from './errors.js';
import { isLogLevel, type LogLevel } from './logger.js';

export interface Config {
  /** Directory holding roadmap.json and the day files */
  dataDir: string;
  /** Log level */
  logLevel: LogLevel;
  /** Review questions offered at the end of each topic (0 disables review) */
  reviewCount: number;
}

/** Upper bound on review questions per topic */
export const MAX_REVIEW_COUNT = 5;

/** The data/ directory shipped beside src/ (and beside dist/ once built) */
export const DEFAULT_DATA_DIR = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  '..',
  'data'
);

function getEnvOrDefault(env: NodeJS.ProcessEnv, name: string, defaultValue: string): string {
  return env[name] ?? defaultValue;
}

function parseCount(name: string, raw: string, max: number): number {
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 0 || value > max) {
    throw new ConfigError(`Invalid ${name}: '${raw}' (expected an integer from 0 to ${max})`);
  }
  return value;
}

export function parseReviewCount(raw: string): number {
  return parseCount('review count', raw, MAX_REVIEW_COUNT);
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const logLevel = getEnvOrDefault(env, 'LOG_LEVEL', 'info').toLowerCase();
  if (!isLogLevel(logLevel)) {
    throw new ConfigError(`Invalid LOG_LEVEL: '${logLevel}' (expected debug, info, warn or error)`);
  }

  return {
    dataDir: path.resolve(getEnvOrDefault(env, 'QUANT_STUDY_DATA_DIR', DEFAULT_DATA_DIR)),
    logLevel,
    reviewCount: parseReviewCount(getEnvOrDefault(env, 'REVIEW_COUNT', '2')),
  };
}
