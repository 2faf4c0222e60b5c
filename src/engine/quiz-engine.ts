/**
 * Quiz Engine
 *
 * Walks one learner through the roadmap:
 *
 *   InTopic(day, q) --submitAnswer--> InTopic(day, q + 1) | TopicComplete(day)
 *   TopicComplete(day) --advanceTopic--> InTopic(day + 1, 0) | RoadmapComplete
 *
 * Questions come in ascending id order within a topic, topics in ascending
 * day order, and every submission consumes the current question whether it
 * was right or wrong. RoadmapComplete is terminal: every later call throws
 * RoadmapFinishedError, and the marker carries the final ProgressReport.
 */

import {
  OutOfSequenceError,
  RoadmapFinishedError,
  TopicNotFinishedError,
  CurriculumLoadError,
} from '../errors.js';
import { silentLogger, type Logger } from '../logger.js';
import type { SessionSnapshot } from '../schemas/index.js';
import { loadCurriculum, loadCurriculumFromDir, type LoadOptions } from '../curriculum/loader.js';
import type {
  Attempt,
  AttemptResult,
  EngineStatus,
  ProgressReport,
  Question,
  RoadmapComplete,
  Topic,
  TopicComplete,
} from '../types.js';
import { gradeAnswer } from './answer-matcher.js';
import {
  countCorrect,
  createSessionState,
  restoreState,
  scoreOf,
  toSnapshot,
  type SessionState,
} from './session-state.js';

export interface QuizEngineOptions {
  /** Start from an existing state instead of day 1, question 1 */
  state?: SessionState;
  /** Epoch-millisecond clock for attempt timestamps */
  clock?: () => number;
  logger?: Logger;
}

/** Where a curriculum comes from */
export type CurriculumSource = { dataDir: string } | { document: unknown };

export class QuizEngine {
  private readonly topics: readonly Topic[];
  private readonly state: SessionState;
  private readonly clock: () => number;
  private readonly logger: Logger;

  constructor(topics: readonly Topic[], options: QuizEngineOptions = {}) {
    if (topics.length === 0) {
      throw new CurriculumLoadError('A curriculum needs at least one topic');
    }
    this.topics = topics;
    this.state = options.state ?? createSessionState();
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? silentLogger;
  }

  /**
   * Load a curriculum and start a fresh session on it.
   */
  static async load(
    source: CurriculumSource,
    options: QuizEngineOptions & LoadOptions = {}
  ): Promise<QuizEngine> {
    const loadOptions: LoadOptions = { expectedDays: options.expectedDays, logger: options.logger };
    const topics = 'dataDir' in source
      ? await loadCurriculumFromDir(source.dataDir, loadOptions)
      : loadCurriculum(source.document, loadOptions);
    return new QuizEngine(topics, options);
  }

  /**
   * Resume a session from a snapshot taken against the same curriculum.
   */
  static restore(
    topics: readonly Topic[],
    snapshot: SessionSnapshot,
    options: Omit<QuizEngineOptions, 'state'> = {}
  ): QuizEngine {
    return new QuizEngine(topics, { ...options, state: restoreState(topics, snapshot) });
  }

  get totalTopics(): number {
    this.assertNotFinished('totalTopics');
    return this.topics.length;
  }

  /** The loaded curriculum, in day order */
  get curriculum(): readonly Topic[] {
    this.assertNotFinished('curriculum');
    return this.topics;
  }

  get attempts(): readonly Attempt[] {
    this.assertNotFinished('attempts');
    return [...this.state.attempts];
  }

  status(): EngineStatus {
    const topic = this.currentTopicOrThrow('status');
    if (this.state.currentQuestionIndex >= topic.questions.length) {
      return { state: 'topic-complete', day: topic.day };
    }
    return { state: 'in-topic', day: topic.day, questionIndex: this.state.currentQuestionIndex };
  }

  currentTopic(): Topic {
    return this.currentTopicOrThrow('currentTopic');
  }

  currentQuestion(): Question | TopicComplete {
    const topic = this.currentTopicOrThrow('currentQuestion');
    const question = topic.questions[this.state.currentQuestionIndex];
    if (question === undefined) {
      return { kind: 'topic-complete', day: topic.day };
    }
    return question;
  }

  /**
   * Grade `text` against the current question, record the attempt and move
   * to the next question.
   */
  submitAnswer(questionId: number, text: string): AttemptResult {
    const topic = this.currentTopicOrThrow('submitAnswer');
    const question = topic.questions[this.state.currentQuestionIndex];
    if (question === undefined || question.id !== questionId) {
      this.logger.warn('Out-of-sequence answer rejected', {
        day: topic.day,
        expected: question?.id ?? null,
        received: questionId,
      });
      throw new OutOfSequenceError(question?.id ?? null, questionId);
    }

    const result = gradeAnswer(question, text);
    this.state.attempts.push({
      day: topic.day,
      questionId,
      submittedText: text,
      isCorrect: result.isCorrect,
      timestamp: this.clock(),
    });
    this.state.currentQuestionIndex += 1;

    this.logger.debug('Answer recorded', {
      day: topic.day,
      questionId,
      isCorrect: result.isCorrect,
      remaining: topic.questions.length - this.state.currentQuestionIndex,
    });
    return result;
  }

  /**
   * Leave a completed topic for the next one, or finish the roadmap.
   */
  advanceTopic(): Topic | RoadmapComplete {
    const topic = this.currentTopicOrThrow('advanceTopic');
    const remaining = topic.questions.length - this.state.currentQuestionIndex;
    if (remaining > 0) {
      throw new TopicNotFinishedError(topic.day, remaining);
    }

    if (this.state.currentTopicIndex === this.topics.length - 1) {
      this.state.finished = true;
      const report = this.buildReport();
      this.logger.info('Roadmap complete', { score: report.overallScore });
      return { kind: 'roadmap-complete', report };
    }

    this.state.currentTopicIndex += 1;
    this.state.currentQuestionIndex = 0;
    const next = this.topics[this.state.currentTopicIndex];
    this.logger.debug('Advanced to next topic', { day: next.day, title: next.title });
    return next;
  }

  progressReport(): ProgressReport {
    this.assertNotFinished('progressReport');
    return this.buildReport();
  }

  attemptsFor(day: number): readonly Attempt[] {
    this.assertNotFinished('attemptsFor');
    return this.state.attempts.filter(attempt => attempt.day === day);
  }

  snapshot(): SessionSnapshot {
    this.assertNotFinished('snapshot');
    return toSnapshot(this.state, this.topics);
  }

  private buildReport(): ProgressReport {
    const { attempts, currentTopicIndex, currentQuestionIndex, finished } = this.state;
    const topicDone = currentQuestionIndex >= this.topics[currentTopicIndex].questions.length;
    const topicsCompleted = finished ? this.topics.length : currentTopicIndex + (topicDone ? 1 : 0);

    return {
      topicsCompleted,
      totalTopics: this.topics.length,
      overallScore: scoreOf(attempts),
      correctAttempts: countCorrect(attempts),
      totalAttempts: attempts.length,
    };
  }

  private assertNotFinished(operation: string): void {
    if (this.state.finished) {
      throw new RoadmapFinishedError(operation);
    }
  }

  private currentTopicOrThrow(operation: string): Topic {
    this.assertNotFinished(operation);
    return this.topics[this.state.currentTopicIndex];
  }
}
