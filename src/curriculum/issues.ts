/**
 * Issue formatting shared by the loader and the validator.
 */

import type { ZodError } from 'zod';
import { phaseForDay, type Phase } from '../types.js';

export interface CurriculumIssue {
  file: string;
  message: string;
}

/**
 * Render a zod path the way learners number questions:
 * ['questions', 2, 'options'] -> "Q3.options"
 */
function formatPath(path: (string | number)[]): string {
  const parts: string[] = [];
  for (let i = 0; i < path.length; i++) {
    const segment = path[i];
    const next = path[i + 1];
    if (segment === 'questions' && typeof next === 'number') {
      parts.push(`Q${next + 1}`);
      i++;
    } else if (segment === 'days' && typeof next === 'number') {
      parts.push(`entry ${next + 1}`);
      i++;
    } else {
      parts.push(String(segment));
    }
  }
  return parts.join('.');
}

export function zodIssues(file: string, error: ZodError): CurriculumIssue[] {
  return error.issues.map(issue => {
    const location = formatPath(issue.path);
    return {
      file,
      message: location ? `${location}: ${issue.message}` : issue.message,
    };
  });
}

/**
 * Days must be exactly 1..expected, each once.
 */
export function dayNumberIssues(file: string, days: number[], expected: number): CurriculumIssue[] {
  const issues: CurriculumIssue[] = [];
  const counts = new Map<number, number>();
  for (const day of days) {
    counts.set(day, (counts.get(day) ?? 0) + 1);
  }

  for (const [day, count] of counts) {
    if (count > 1) {
      issues.push({ file, message: `day ${day} is listed ${count} times` });
    }
    if (day > expected) {
      issues.push({ file, message: `day ${day} is outside the ${expected}-day roadmap` });
    }
  }
  for (let day = 1; day <= expected; day++) {
    if (!counts.has(day)) {
      issues.push({ file, message: `day ${day} is missing` });
    }
  }
  return issues;
}

/**
 * Each day must sit in its fixed phase: 1-7 Foundations, 8-14
 * QuantMechanics, 15-21 Application. Days outside the roadmap are left to
 * dayNumberIssues().
 */
export function phaseIssues(file: string, days: { day: number; phase: Phase }[]): CurriculumIssue[] {
  const issues: CurriculumIssue[] = [];
  for (const { day, phase } of days) {
    const expected = phaseForDay(day);
    if (expected !== null && expected !== phase) {
      issues.push({ file, message: `day ${day} should be in ${expected}` });
    }
  }
  return issues;
}

export function formatIssue(issue: CurriculumIssue): string {
  return `[${issue.file}] ${issue.message}`;
}
