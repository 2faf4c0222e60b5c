/**
 * Session State
 *
 * The mutable progress of one learner. Each QuizEngine owns exactly one;
 * nothing here is module-level, so any number of sessions can coexist.
 */

import { SessionSnapshotError } from '../errors.js';
import {
  SNAPSHOT_VERSION,
  sessionSnapshotSchema,
  type SessionSnapshot,
} from '../schemas/index.js';
import type { Attempt, Topic } from '../types.js';

export interface SessionState {
  currentTopicIndex: number;
  /** Equals the topic's question count once the topic is complete */
  currentQuestionIndex: number;
  /** Set by advanceTopic() after the last topic */
  finished: boolean;
  readonly attempts: Attempt[];
}

export function createSessionState(): SessionState {
  return {
    currentTopicIndex: 0,
    currentQuestionIndex: 0,
    finished: false,
    attempts: [],
  };
}

export function countCorrect(attempts: readonly Attempt[]): number {
  return attempts.filter(attempt => attempt.isCorrect).length;
}

/**
 * Correct attempts / total attempts, 0 when nothing has been answered.
 */
export function scoreOf(attempts: readonly Attempt[]): number {
  return attempts.length === 0 ? 0 : countCorrect(attempts) / attempts.length;
}

/**
 * One `day:id,id,...` entry per topic. A snapshot only restores against a
 * curriculum with the same fingerprint.
 */
export function curriculumFingerprint(topics: readonly Topic[]): string[] {
  return topics.map(topic => `${topic.day}:${topic.questions.map(q => q.id).join(',')}`);
}

export function toSnapshot(state: SessionState, topics: readonly Topic[]): SessionSnapshot {
  return {
    version: SNAPSHOT_VERSION,
    curriculum: curriculumFingerprint(topics),
    currentTopicIndex: state.currentTopicIndex,
    currentQuestionIndex: state.currentQuestionIndex,
    attempts: state.attempts.map(attempt => ({ ...attempt })),
  };
}

export function serializeSnapshot(snapshot: SessionSnapshot): string {
  return JSON.stringify(snapshot);
}

export function parseSnapshot(json: string): SessionSnapshot {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (err) {
    throw new SessionSnapshotError('snapshot is not valid JSON', err instanceof Error ? err : undefined);
  }

  const parsed = sessionSnapshotSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map(issue => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
      .join('; ');
    throw new SessionSnapshotError(`snapshot is malformed (${detail})`, parsed.error);
  }
  return parsed.data;
}

/**
 * Rebuild a SessionState from a snapshot, checking that it describes a
 * position this curriculum can actually reach: the attempts must be exactly
 * the questions before the current position, in order. Snapshots are only
 * taken before RoadmapComplete, so the restored session is never finished.
 */
export function restoreState(topics: readonly Topic[], snapshot: SessionSnapshot): SessionState {
  const expected = curriculumFingerprint(topics);
  if (
    expected.length !== snapshot.curriculum.length ||
    expected.some((entry, index) => entry !== snapshot.curriculum[index])
  ) {
    throw new SessionSnapshotError('snapshot was taken against a different curriculum');
  }

  const { currentTopicIndex, currentQuestionIndex } = snapshot;
  if (currentTopicIndex >= topics.length) {
    throw new SessionSnapshotError(`topic index ${currentTopicIndex} is out of range`);
  }
  const topic = topics[currentTopicIndex];
  if (currentQuestionIndex > topic.questions.length) {
    throw new SessionSnapshotError(`question index ${currentQuestionIndex} is out of range for day ${topic.day}`);
  }

  const answered = topics
    .slice(0, currentTopicIndex)
    .flatMap(t => t.questions)
    .concat(topic.questions.slice(0, currentQuestionIndex));
  if (answered.length !== snapshot.attempts.length) {
    throw new SessionSnapshotError(
      `snapshot has ${snapshot.attempts.length} attempts but its position implies ${answered.length}`
    );
  }
  answered.forEach((question, index) => {
    const attempt = snapshot.attempts[index];
    if (attempt.day !== question.day || attempt.questionId !== question.id) {
      throw new SessionSnapshotError(
        `attempt ${index + 1} is for day ${attempt.day} question ${attempt.questionId}, expected day ${question.day} question ${question.id}`
      );
    }
  });

  return {
    currentTopicIndex,
    currentQuestionIndex,
    finished: false,
    attempts: snapshot.attempts.map(attempt => ({ ...attempt })),
  };
}
