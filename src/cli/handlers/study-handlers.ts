/**
 * CLI Handlers
 *
 * Everything the quant-study commands do, behind a tiny IO interface so the
 * handlers run against scripted answers in tests.
 */

import { createInterface } from 'readline';
import { gradeAnswer, optionLetter } from '../../engine/answer-matcher.js';
import type { QuizEngine } from '../../engine/quiz-engine.js';
import { selectReviewQuestions } from '../../engine/review.js';
import { formatIssue } from '../../curriculum/issues.js';
import { validateCurriculumDir } from '../../curriculum/validator.js';
import {
  PHASES,
  isRoadmapComplete,
  isTopicComplete,
  type AttemptResult,
  type ProgressReport,
  type Question,
  type Topic,
} from '../../types.js';

export interface StudyIO {
  print(line: string): void;
  /** Resolves with the learner's line, or null once input is closed */
  ask(prompt: string): Promise<string | null>;
}

/** A StudyIO over streams; close() releases the input */
export interface ClosableStudyIO extends StudyIO {
  close(): void;
}

export interface StudyOptions {
  /** Review questions after each topic (0 disables) */
  reviewCount: number;
}

export interface StudyOutcome {
  /** False when the learner quit (or input ended) before the roadmap finished */
  completed: boolean;
  report: ProgressReport;
}

const QUIT_COMMANDS = new Set(['quit', 'exit', ':q']);

const PHASE_LABELS: Record<Topic['phase'], string> = {
  Foundations: 'Phase 1 - Foundations',
  QuantMechanics: 'Phase 2 - Quant Mechanics',
  Application: 'Phase 3 - Application',
};

// =============================================================================
// Formatting
// =============================================================================

export function formatRoadmap(topics: readonly Topic[]): string[] {
  const lines: string[] = [];
  for (const phase of PHASES) {
    const inPhase = topics.filter(topic => topic.phase === phase);
    if (inPhase.length === 0) continue;
    if (lines.length > 0) lines.push('');
    lines.push(PHASE_LABELS[phase]);
    for (const topic of inPhase) {
      const count = topic.questions.length;
      lines.push(`  Day ${topic.day}: ${topic.title} (${count} question${count === 1 ? '' : 's'})`);
    }
  }
  return lines;
}

export function formatQuestion(question: Question, position: number, total: number): string[] {
  const lines = [`Q${position}/${total}: ${question.prompt}`];
  question.options.forEach((option, index) => {
    lines.push(`  ${optionLetter(index)}) ${option}`);
  });
  return lines;
}

export function formatResult(result: AttemptResult): string {
  const feedback = result.isCorrect ? 'Correct!' : `Incorrect. Expected: ${result.correctAnswer}.`;
  return result.explanation ? `${feedback} ${result.explanation}` : feedback;
}

export function formatScore(report: ProgressReport): string {
  const pct = Math.round(report.overallScore * 100);
  return `Score: ${report.correctAttempts}/${report.totalAttempts} (${pct}%)`;
}

export function formatProgress(report: ProgressReport): string {
  return `Topics completed: ${report.topicsCompleted}/${report.totalTopics} | ${formatScore(report)}`;
}

// =============================================================================
// IO
// =============================================================================

/**
 * Line-based StudyIO over a pair of streams. Lines are read through the
 * readline async iterator, which queues them, so piped input that arrives in
 * one chunk is answered line by line. ask() resolves null at end of input.
 */
export function readlineIO(input: NodeJS.ReadableStream, output: NodeJS.WritableStream): ClosableStudyIO {
  const rl = createInterface({ input, crlfDelay: Infinity });
  const lines = rl[Symbol.asyncIterator]();

  return {
    print: line => {
      output.write(`${line}\n`);
    },
    ask: async prompt => {
      output.write(prompt);
      const next = await lines.next();
      return next.done ? null : next.value;
    },
    close: () => rl.close(),
  };
}

// =============================================================================
// Commands
// =============================================================================

/**
 * `validate`: returns the process exit code.
 */
export async function runValidate(dataDir: string, print: (line: string) => void): Promise<number> {
  const issues = await validateCurriculumDir(dataDir);
  if (issues.length === 0) {
    print('OK: all quiz files valid.');
    return 0;
  }
  for (const issue of issues) {
    print(formatIssue(issue));
  }
  return 1;
}

async function askAnswer(io: StudyIO): Promise<string | null> {
  for (;;) {
    const line = await io.ask('> ');
    if (line === null) return null;
    if (line.trim() !== '') return line;
  }
}

async function runReview(
  engine: QuizEngine,
  allTopics: readonly Topic[],
  day: number,
  io: StudyIO,
  limit: number
): Promise<boolean> {
  const questions = selectReviewQuestions(allTopics, engine.attempts, { beforeDay: day, limit });
  if (questions.length === 0) return true;

  io.print(`Review (${questions.length} from earlier days, not scored)`);
  for (const [index, question] of questions.entries()) {
    for (const line of formatQuestion(question, index + 1, questions.length)) io.print(line);
    const answer = await askAnswer(io);
    if (answer === null || QUIT_COMMANDS.has(answer.trim().toLowerCase())) return false;
    io.print(formatResult(gradeAnswer(question, answer)));
  }
  return true;
}

/**
 * `study`: the interactive loop. Drives the engine until the roadmap is
 * complete or the learner quits.
 *
 * @param allTopics full curriculum, used for review when the engine only
 *   holds a single practice day
 */
export async function runStudySession(
  engine: QuizEngine,
  io: StudyIO,
  options: StudyOptions,
  allTopics: readonly Topic[] = engine.curriculum
): Promise<StudyOutcome> {
  // An engine holding part of the curriculum is a practice run, not the roadmap
  const practice = engine.totalTopics < allTopics.length;

  const finish = (completed: boolean, report: ProgressReport): StudyOutcome => {
    io.print(practice ? formatScore(report) : formatProgress(report));
    return { completed, report };
  };

  let topic = engine.currentTopic();
  io.print(`Day ${topic.day}: ${topic.title}`);

  for (;;) {
    const current = engine.currentQuestion();

    if (isTopicComplete(current)) {
      const attempts = engine.attemptsFor(topic.day);
      const correct = attempts.filter(a => a.isCorrect).length;
      io.print(`Day ${topic.day} complete: ${correct}/${attempts.length} correct`);

      if (options.reviewCount > 0) {
        const keepGoing = await runReview(engine, allTopics, topic.day, io, options.reviewCount);
        if (!keepGoing) return finish(false, engine.progressReport());
      }

      const next = engine.advanceTopic();
      if (isRoadmapComplete(next)) {
        io.print(practice ? `Day ${topic.day} practice complete` : 'Roadmap complete!');
        return finish(true, next.report);
      }
      topic = next;
      io.print(`Day ${topic.day}: ${topic.title}`);
      continue;
    }

    const position = topic.questions.indexOf(current) + 1;
    for (const line of formatQuestion(current, position, topic.questions.length)) io.print(line);

    const answer = await askAnswer(io);
    if (answer === null || QUIT_COMMANDS.has(answer.trim().toLowerCase())) {
      return finish(false, engine.progressReport());
    }
    io.print(formatResult(engine.submitAnswer(current.id, answer)));
  }
}
