/**
 * Shared test fixtures: a three-day curriculum small enough to trace by
 * hand, and helpers for throwaway data directories.
 */

import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { loadCurriculum } from '../curriculum/loader.js';
import type { CurriculumDocument } from '../schemas/index.js';
import type { Topic } from '../types.js';

export const SAMPLE_DAYS = 3;

/**
 * Days and question ids are deliberately out of order; loading sorts them to
 * day 1 (q1 numeric, q2 mcq, q3 short-answer), day 2 (q1 mcq, q2
 * short-answer), day 3 (q1 numeric).
 */
export function sampleDocument(): CurriculumDocument {
  return {
    topics: [
      {
        day: 2,
        phase: 'Foundations',
        title: 'Candles',
        questions: [
          {
            id: 2,
            type: 'short-answer',
            question: 'Up body fully covering the prior down body?',
            answers: ['bullish engulfing'],
            explanation: 'Buyers took over.',
          },
          {
            id: 1,
            type: 'mcq',
            question: 'Long lower wick after a decline?',
            options: ['Doji', 'Hammer'],
            answer: 1,
            explanation: 'Hammer.',
          },
        ],
      },
      {
        day: 1,
        phase: 'Foundations',
        title: 'Screening',
        questions: [
          {
            id: 1,
            type: 'numeric',
            question: '400,000 shares at $12.50: average daily dollar volume in $M?',
            answer: 5,
            tolerance: 0.01,
            explanation: '5 million.',
          },
          {
            id: 3,
            type: 'short-answer',
            question: 'Liquidity metric used to drop thin names?',
            answers: ['average daily volume', 'ADV'],
            explanation: 'ADV.',
          },
          {
            id: 2,
            type: 'mcq',
            question: 'Why skip stocks under $1?',
            options: ['They outperform', 'Delisting risk'],
            answer: 1,
          },
        ],
      },
      {
        day: 3,
        phase: 'Foundations',
        title: 'Kelly',
        questions: [
          {
            id: 1,
            type: 'numeric',
            question: 'p = 0.55, b = 1: full Kelly?',
            answer: 0.1,
            tolerance: 0.001,
            explanation: '0.55 - 0.45.',
          },
        ],
      },
    ],
  };
}

/** A correct answer for every sample question, in asking order */
export const SAMPLE_CORRECT_ANSWERS = ['5', 'b', 'adv', 'hammer', 'bullish engulfing', '0.1'];

export function sampleTopics(): Topic[] {
  return loadCurriculum(sampleDocument(), { expectedDays: SAMPLE_DAYS });
}

/** Deterministic epoch-ms clock: start, start + 1, ... */
export function fixedClock(start = 1_700_000_000_000): () => number {
  let now = start;
  return () => now++;
}

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'quant-study-'));
}

export async function removeTempDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Write files into `dir`; objects are JSON-encoded, strings written as-is.
 */
export async function writeDataFiles(dir: string, files: Record<string, unknown>): Promise<void> {
  for (const [name, content] of Object.entries(files)) {
    const body = typeof content === 'string' ? content : JSON.stringify(content, null, 2);
    await fs.writeFile(path.join(dir, name), body, 'utf-8');
  }
}
