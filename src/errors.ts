/**
 * Quiz Error Hierarchy
 *
 * Typed error classes for every failure the engine can report to a shell.
 * Shells branch on `code` / `recoverable` and show `getUserMessage()`.
 */

/**
 * Base error class for all quiz errors
 */
export abstract class QuizError extends Error {
  constructor(
    message: string,
    public readonly code: QuizErrorCode,
    public readonly recoverable: boolean = false,
    public readonly cause?: Error
  ) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Get user-friendly error message
   */
  abstract getUserMessage(): string;
}

export type QuizErrorCode =
  | 'CURRICULUM_LOAD'
  | 'OUT_OF_SEQUENCE'
  | 'TOPIC_NOT_FINISHED'
  | 'ROADMAP_FINISHED'
  | 'SESSION_SNAPSHOT'
  | 'CONFIG';

/**
 * Curriculum data is malformed, or a day is missing or duplicated.
 * Fatal: the shell must abort initialization.
 */
export class CurriculumLoadError extends QuizError {
  constructor(
    message: string,
    public readonly issues: string[] = [],
    cause?: Error
  ) {
    super(message, 'CURRICULUM_LOAD', false, cause);
  }

  getUserMessage(): string {
    if (this.issues.length === 0) {
      return `The curriculum could not be loaded: ${this.message}`;
    }
    return [
      `The curriculum could not be loaded (${this.issues.length} problem${this.issues.length === 1 ? '' : 's'}):`,
      ...this.issues.map(issue => `  - ${issue}`),
    ].join('\n');
  }
}

/**
 * An answer was submitted for a question that is not the current one.
 */
export class OutOfSequenceError extends QuizError {
  constructor(
    public readonly expectedQuestionId: number | null,
    public readonly receivedQuestionId: number
  ) {
    super(
      expectedQuestionId === null
        ? `Answer for question ${receivedQuestionId} submitted but the current topic is complete`
        : `Answer for question ${receivedQuestionId} submitted but the current question is ${expectedQuestionId}`,
      'OUT_OF_SEQUENCE',
      true
    );
  }

  getUserMessage(): string {
    return 'That answer was for a different question. Reloading the current question.';
  }
}

/**
 * advanceTopic() was called while the current topic still has questions.
 */
export class TopicNotFinishedError extends QuizError {
  constructor(
    public readonly day: number,
    public readonly remainingQuestions: number
  ) {
    super(
      `Day ${day} still has ${remainingQuestions} unanswered question${remainingQuestions === 1 ? '' : 's'}`,
      'TOPIC_NOT_FINISHED',
      true
    );
  }

  getUserMessage(): string {
    return `Not ready yet: finish the remaining ${this.remainingQuestions} question${this.remainingQuestions === 1 ? '' : 's'} of day ${this.day} first.`;
  }
}

/**
 * Any question or transition operation after the roadmap is complete.
 */
export class RoadmapFinishedError extends QuizError {
  constructor(public readonly operation: string) {
    super(`Cannot call ${operation}(): the roadmap is complete`, 'ROADMAP_FINISHED', true);
  }

  getUserMessage(): string {
    return 'The 21-day roadmap is complete. Start a new session to go again.';
  }
}

/**
 * A serialized session could not be parsed or does not fit the curriculum.
 */
export class SessionSnapshotError extends QuizError {
  constructor(message: string, cause?: Error) {
    super(message, 'SESSION_SNAPSHOT', false, cause);
  }

  getUserMessage(): string {
    return `The saved session could not be restored: ${this.message}`;
  }
}

/**
 * An environment variable or command-line value is out of range.
 */
export class ConfigError extends QuizError {
  constructor(message: string) {
    super(message, 'CONFIG', false);
  }

  getUserMessage(): string {
    return `Configuration error: ${this.message}`;
  }
}

/**
 * Type guard for quiz errors
 */
export function isQuizError(error: unknown): error is QuizError {
  return error instanceof QuizError;
}
