/**
 * Review Selection
 *
 * Picks earlier questions to revisit at the end of a topic. Missed
 * questions come back first, most recently missed first; remaining slots
 * take one question per earlier day, latest day first, preferring
 * multiple-choice and numeric questions for active recall.
 *
 * Review answers are graded with gradeAnswer() and never enter the session
 * score.
 */

import type { Attempt, Question, Topic } from '../types.js';

export interface ReviewOptions {
  /** Only questions from days strictly before this one */
  beforeDay: number;
  limit: number;
}

const ACTIVE_RECALL_KINDS = new Set<Question['kind']>(['multiple-choice', 'numeric']);

function key(day: number, id: number): string {
  return `${day}:${id}`;
}

export function selectReviewQuestions(
  topics: readonly Topic[],
  attempts: readonly Attempt[],
  options: ReviewOptions
): Question[] {
  const { beforeDay, limit } = options;
  if (limit <= 0) return [];

  const earlier = topics.filter(topic => topic.day < beforeDay);
  const byKey = new Map<string, Question>();
  for (const topic of earlier) {
    for (const question of topic.questions) {
      byKey.set(key(topic.day, question.id), question);
    }
  }

  const picked: Question[] = [];
  const seen = new Set<string>();
  const take = (question: Question): void => {
    const k = key(question.day, question.id);
    if (picked.length < limit && !seen.has(k)) {
      seen.add(k);
      picked.push(question);
    }
  };

  for (let i = attempts.length - 1; i >= 0; i--) {
    const attempt = attempts[i];
    if (attempt.isCorrect) continue;
    const question = byKey.get(key(attempt.day, attempt.questionId));
    if (question) take(question);
  }

  for (const topic of [...earlier].reverse()) {
    const pool = topic.questions.filter(q => ACTIVE_RECALL_KINDS.has(q.kind) && !seen.has(key(q.day, q.id)));
    const fallback = topic.questions.filter(q => !seen.has(key(q.day, q.id)));
    const candidate = pool[0] ?? fallback[0];
    if (candidate) take(candidate);
  }

  return picked;
}
