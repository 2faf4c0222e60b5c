/**
 * Quant Study Coach - Domain Types
 *
 * Loaded curriculum (Topic, Question), learner history (Attempt) and the
 * values the engine hands back to a presentation shell.
 */

// =============================================================================
// Curriculum
// =============================================================================

export const PHASES = ['Foundations', 'QuantMechanics', 'Application'] as const;

/** Curriculum phase: days 1-7, 8-14 and 15-21 */
export type Phase = (typeof PHASES)[number];

/** Number of days in the full roadmap */
export const ROADMAP_DAYS = 21;

/** Days per phase */
export const PHASE_LENGTH = 7;

/**
 * The phase a roadmap day belongs to, or null for a day outside 1..21.
 */
export function phaseForDay(day: number): Phase | null {
  if (!Number.isInteger(day) || day < 1 || day > ROADMAP_DAYS) return null;
  return PHASES[Math.floor((day - 1) / PHASE_LENGTH)] ?? null;
}

export type QuestionKind = 'short-answer' | 'multiple-choice' | 'numeric';

/** Returns true when a learner's raw answer text is acceptable */
export type AnswerPredicate = (text: string) => boolean;

export interface Question {
  /** Day of the topic this question belongs to */
  readonly day: number;
  /** Positive integer, unique within the topic; questions are asked in ascending id order */
  readonly id: number;
  readonly kind: QuestionKind;
  readonly prompt: string;
  /** Choices for multiple-choice questions; empty otherwise */
  readonly options: readonly string[];
  /** Human-readable forms of the accepted answers */
  readonly acceptedAnswers: readonly string[];
  /** Shown after the learner answers, right or wrong */
  readonly explanation: string;
  readonly accepts: AnswerPredicate;
}

export interface Topic {
  readonly day: number;
  readonly phase: Phase;
  readonly title: string;
  readonly questions: readonly Question[];
}

// =============================================================================
// Session
// =============================================================================

export interface Attempt {
  readonly day: number;
  readonly questionId: number;
  readonly submittedText: string;
  readonly isCorrect: boolean;
  /** Epoch milliseconds */
  readonly timestamp: number;
}

export interface AttemptResult {
  isCorrect: boolean;
  explanation: string;
  /** Display form of the expected answer */
  correctAnswer: string;
}

/** Returned by currentQuestion() once every question of the topic is answered */
export interface TopicComplete {
  readonly kind: 'topic-complete';
  readonly day: number;
}

/**
 * Returned by advanceTopic() after the last topic. The engine rejects every
 * call from then on, so the final report travels with the marker.
 */
export interface RoadmapComplete {
  readonly kind: 'roadmap-complete';
  readonly report: ProgressReport;
}

export type EngineStatus =
  | { state: 'in-topic'; day: number; questionIndex: number }
  | { state: 'topic-complete'; day: number };

export interface ProgressReport {
  topicsCompleted: number;
  totalTopics: number;
  /** Correct attempts / total attempts; 0 before the first attempt */
  overallScore: number;
  correctAttempts: number;
  totalAttempts: number;
}

export function isTopicComplete(value: Question | TopicComplete): value is TopicComplete {
  return value.kind === 'topic-complete';
}

export function isRoadmapComplete(value: Topic | RoadmapComplete): value is RoadmapComplete {
  return 'kind' in value && value.kind === 'roadmap-complete';
}
