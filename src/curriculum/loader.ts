/**
 * Curriculum Loader
 *
 * Turns a curriculum source into validated, immutable Topics:
 *
 *   loadCurriculum(document)        in-memory document (tests, embedding)
 *   loadCurriculumFromDir(dataDir)  data/roadmap.json + one file per day
 *
 * Both fail with CurriculumLoadError listing every problem found, never just
 * the first. Day files are the ones roadmap.json names; nothing is globbed.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { CurriculumLoadError } from '../errors.js';
import { compileQuestion } from '../engine/answer-matcher.js';
import { silentLogger, type Logger } from '../logger.js';
import {
  curriculumDocumentSchema,
  dayFileSchema,
  roadmapSchema,
  type DayFile,
  type QuestionRecord,
  type Roadmap,
} from '../schemas/index.js';
import { ROADMAP_DAYS, type Phase, type Topic } from '../types.js';
import { dayNumberIssues, formatIssue, phaseIssues, zodIssues, type CurriculumIssue } from './issues.js';

export const ROADMAP_FILE = 'roadmap.json';

export interface LoadOptions {
  /** Number of days the roadmap must cover (default 21) */
  expectedDays?: number;
  logger?: Logger;
}

interface TopicRecord {
  day: number;
  phase: Phase;
  title: string;
  questions: QuestionRecord[];
}

type ReadResult<T> = { ok: true; value: T } | { ok: false; issues: CurriculumIssue[] };

/**
 * Read and JSON-parse a file, reporting failures as issues against `label`.
 */
export async function readJsonFile(filePath: string, label: string): Promise<ReadResult<unknown>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf-8');
  } catch (err) {
    const missing = err instanceof Error && 'code' in err && err.code === 'ENOENT';
    const reason = missing ? 'file not found' : String(err);
    return { ok: false, issues: [{ file: label, message: reason }] };
  }

  try {
    return { ok: true, value: JSON.parse(raw) };
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    return { ok: false, issues: [{ file: label, message: `JSON parse error: ${reason}` }] };
  }
}

export async function readRoadmap(dataDir: string): Promise<ReadResult<Roadmap>> {
  const read = await readJsonFile(path.join(dataDir, ROADMAP_FILE), ROADMAP_FILE);
  if (!read.ok) return read;

  const parsed = roadmapSchema.safeParse(read.value);
  if (!parsed.success) {
    return { ok: false, issues: zodIssues(ROADMAP_FILE, parsed.error) };
  }
  return { ok: true, value: parsed.data };
}

export async function readDayFile(dataDir: string, file: string): Promise<ReadResult<DayFile>> {
  const read = await readJsonFile(path.join(dataDir, file), file);
  if (!read.ok) return read;

  const parsed = dayFileSchema.safeParse(read.value);
  if (!parsed.success) {
    return { ok: false, issues: zodIssues(file, parsed.error) };
  }
  return { ok: true, value: parsed.data };
}

function fail(summary: string, issues: CurriculumIssue[]): never {
  throw new CurriculumLoadError(summary, issues.map(formatIssue));
}

/**
 * Compile validated records into Topics ordered by day, questions by id.
 */
export function buildTopics(records: TopicRecord[]): Topic[] {
  return [...records]
    .sort((a, b) => a.day - b.day)
    .map(record => Object.freeze({
      day: record.day,
      phase: record.phase,
      title: record.title,
      questions: Object.freeze(
        [...record.questions]
          .sort((a, b) => a.id - b.id)
          .map(question => compileQuestion(record.day, question))
      ),
    }));
}

/**
 * Load an in-memory curriculum document.
 */
export function loadCurriculum(document: unknown, options: LoadOptions = {}): Topic[] {
  const expectedDays = options.expectedDays ?? ROADMAP_DAYS;
  const label = '<document>';

  const parsed = curriculumDocumentSchema.safeParse(document);
  if (!parsed.success) {
    fail('Malformed curriculum document', zodIssues(label, parsed.error));
  }

  const dayIssues = [
    ...dayNumberIssues(label, parsed.data.topics.map(t => t.day), expectedDays),
    ...phaseIssues(label, parsed.data.topics),
  ];
  if (dayIssues.length > 0) {
    fail(`Curriculum days do not fit the ${expectedDays}-day roadmap`, dayIssues);
  }

  const topics = buildTopics(parsed.data.topics);
  (options.logger ?? silentLogger).debug('Curriculum loaded from document', { topics: topics.length });
  return topics;
}

/**
 * Load data/roadmap.json and every day file it names.
 */
export async function loadCurriculumFromDir(dataDir: string, options: LoadOptions = {}): Promise<Topic[]> {
  const expectedDays = options.expectedDays ?? ROADMAP_DAYS;
  const logger = options.logger ?? silentLogger;

  const roadmap = await readRoadmap(dataDir);
  if (!roadmap.ok) {
    fail(`Cannot read ${ROADMAP_FILE} in ${dataDir}`, roadmap.issues);
  }

  const entries = roadmap.value.days;
  const issues = [
    ...dayNumberIssues(ROADMAP_FILE, entries.map(e => e.day), expectedDays),
    ...phaseIssues(ROADMAP_FILE, entries),
  ];

  const dayFiles = await Promise.all(entries.map(entry => readDayFile(dataDir, entry.file)));
  const records: TopicRecord[] = [];
  entries.forEach((entry, index) => {
    const dayFile = dayFiles[index];
    if (dayFile.ok) {
      records.push({
        day: entry.day,
        phase: entry.phase,
        title: entry.title,
        questions: dayFile.value.questions,
      });
    } else {
      issues.push(...dayFile.issues);
    }
  });

  if (issues.length > 0) {
    fail(`${issues.length} problem${issues.length === 1 ? '' : 's'} in curriculum at ${dataDir}`, issues);
  }

  const topics = buildTopics(records);
  logger.info('Curriculum loaded', {
    dataDir,
    topics: topics.length,
    questions: topics.reduce((sum, topic) => sum + topic.questions.length, 0),
  });
  return topics;
}
