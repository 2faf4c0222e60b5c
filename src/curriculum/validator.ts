/**
 * Curriculum Validator
 *
 * Offline check of everything under data/ before a learner ever sees it.
 * The loader reads only the files roadmap.json names and throws; this also
 * globs for day files the roadmap leaves out, and returns its issues instead
 * of throwing.
 *
 * Usage:
 *   const issues = await validateCurriculumDir('./data');
 *   if (issues.length > 0) { ... }
 */

import * as path from 'path';
import { glob } from 'glob';
import { ROADMAP_DAYS } from '../types.js';
import { dayNumberIssues, phaseIssues, type CurriculumIssue } from './issues.js';
import { readDayFile, readRoadmap, ROADMAP_FILE } from './loader.js';

const DAY_FILE_PATTERN = 'day*.json';

/**
 * Validate a single day file.
 */
export async function validateDayFile(dataDir: string, file: string): Promise<CurriculumIssue[]> {
  const result = await readDayFile(dataDir, file);
  return result.ok ? [] : result.issues;
}

/**
 * Validate roadmap.json and every day*.json in the directory, including
 * files the roadmap does not reference.
 */
export async function validateCurriculumDir(
  dataDir: string,
  expectedDays: number = ROADMAP_DAYS
): Promise<CurriculumIssue[]> {
  const issues: CurriculumIssue[] = [];

  const dayFiles = (await glob(DAY_FILE_PATTERN, { cwd: dataDir, nodir: true }))
    .map(file => file.split(path.sep).join('/'))
    .sort();

  const roadmap = await readRoadmap(dataDir);
  if (roadmap.ok) {
    const entries = roadmap.value.days;
    issues.push(...dayNumberIssues(ROADMAP_FILE, entries.map(e => e.day), expectedDays));
    issues.push(...phaseIssues(ROADMAP_FILE, entries));

    const present = new Set(dayFiles);
    const referenced = new Set<string>();
    for (const entry of entries) {
      if (referenced.has(entry.file)) {
        issues.push({ file: ROADMAP_FILE, message: `${entry.file} is used by more than one day` });
      }
      referenced.add(entry.file);
      if (!present.has(entry.file)) {
        issues.push({ file: ROADMAP_FILE, message: `day ${entry.day}: ${entry.file} not found` });
      }
    }
    for (const file of dayFiles) {
      if (!referenced.has(file)) {
        issues.push({ file, message: `not referenced by ${ROADMAP_FILE}` });
      }
    }
  } else {
    issues.push(...roadmap.issues);
  }

  for (const file of dayFiles) {
    issues.push(...(await validateDayFile(dataDir, file)));
  }

  return issues;
}
