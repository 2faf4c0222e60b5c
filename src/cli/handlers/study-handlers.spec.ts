/**
 * CLI Handler Tests
 *
 * Sessions are driven with scripted answers; every printed line is captured.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Readable, Writable } from 'stream';
import {
  formatProgress,
  formatQuestion,
  formatResult,
  formatRoadmap,
  formatScore,
  readlineIO,
  runStudySession,
  runValidate,
  type StudyIO,
} from './study-handlers.js';
import { QuizEngine } from '../../engine/quiz-engine.js';
import { DEFAULT_DATA_DIR } from '../../config.js';
import { loadCurriculumFromDir } from '../../curriculum/loader.js';
import { isTopicComplete, type Topic } from '../../types.js';
import { SAMPLE_CORRECT_ANSWERS, makeTempDir, removeTempDir, sampleTopics } from '../../__tests__/fixtures.js';

interface ScriptedIO extends StudyIO {
  lines: string[];
  prompts: number;
}

/** Answers are handed out in order; null once the script runs out */
function scriptedIO(answers: string[]): ScriptedIO {
  const queue = [...answers];
  const io: ScriptedIO = {
    lines: [],
    prompts: 0,
    print: line => {
      io.lines.push(line);
    },
    ask: async () => {
      io.prompts++;
      return queue.shift() ?? null;
    },
  };
  return io;
}

/** Writable that keeps everything written to it */
function captureOutput(): { stream: Writable; text: () => string } {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join('') };
}

describe('study handlers', () => {
  let topics: Topic[];

  beforeEach(() => {
    topics = sampleTopics();
  });

  describe('formatting', () => {
    it('lists days under their phase with question counts', () => {
      expect(formatRoadmap(topics)).toEqual([
        'Phase 1 - Foundations',
        '  Day 1: Screening (3 questions)',
        '  Day 2: Candles (2 questions)',
        '  Day 3: Kelly (1 question)',
      ]);
    });

    it('separates the three phases of the shipped roadmap', async () => {
      const lines = formatRoadmap(await loadCurriculumFromDir(DEFAULT_DATA_DIR));

      expect(lines).toHaveLength(26);
      expect(lines[0]).toBe('Phase 1 - Foundations');
      expect(lines[1]).toBe('  Day 1: Screening & Filtering (4 questions)');
      expect(lines.slice(7, 11)).toEqual([
        '  Day 7: Integration & Case Study (Week 1) (3 questions)',
        '',
        'Phase 2 - Quant Mechanics',
        '  Day 8: Transition Matrices & Stationary Probs (3 questions)',
      ]);
      expect(lines[18]).toBe('Phase 3 - Application');
      expect(lines[25]).toBe('  Day 21: Final Synthesis & Mastery Check (4 questions)');
    });

    it('lists multiple-choice options with letters', () => {
      const question = topics[1].questions[0];
      expect(formatQuestion(question, 1, 2)).toEqual([
        'Q1/2: Long lower wick after a decline?',
        '  a) Doji',
        '  b) Hammer',
      ]);
    });

    it('shows the expected answer for a miss', () => {
      expect(formatResult({ isCorrect: false, explanation: 'Hammer.', correctAnswer: 'Hammer' })).toBe(
        'Incorrect. Expected: Hammer. Hammer.'
      );
      expect(formatResult({ isCorrect: true, explanation: '', correctAnswer: 'x' })).toBe('Correct!');
    });

    it('rounds the score to a whole percentage', () => {
      expect(formatProgress({
        topicsCompleted: 1,
        totalTopics: 21,
        overallScore: 2 / 3,
        correctAttempts: 2,
        totalAttempts: 3,
      })).toBe('Topics completed: 1/21 | Score: 2/3 (67%)');
    });

    it('formats the score alone for practice runs', () => {
      expect(formatScore({
        topicsCompleted: 1,
        totalTopics: 1,
        overallScore: 0.5,
        correctAttempts: 1,
        totalAttempts: 2,
      })).toBe('Score: 1/2 (50%)');
    });
  });

  describe('runStudySession', () => {
    it('walks the whole roadmap and re-prompts on blank input', async () => {
      const [first, ...rest] = SAMPLE_CORRECT_ANSWERS;
      const io = scriptedIO([first, '   ', ...rest]);

      const outcome = await runStudySession(new QuizEngine(topics), io, { reviewCount: 0 });

      expect(outcome.completed).toBe(true);
      expect(outcome.report).toMatchObject({ topicsCompleted: 3, correctAttempts: 6, totalAttempts: 6 });
      expect(io.prompts).toBe(7);
      expect(io.lines).toEqual([
        'Day 1: Screening',
        'Q1/3: 400,000 shares at $12.50: average daily dollar volume in $M?',
        'Correct! 5 million.',
        'Q2/3: Why skip stocks under $1?',
        '  a) They outperform',
        '  b) Delisting risk',
        'Correct!',
        'Q3/3: Liquidity metric used to drop thin names?',
        'Correct! ADV.',
        'Day 1 complete: 3/3 correct',
        'Day 2: Candles',
        'Q1/2: Long lower wick after a decline?',
        '  a) Doji',
        '  b) Hammer',
        'Correct! Hammer.',
        'Q2/2: Up body fully covering the prior down body?',
        'Correct! Buyers took over.',
        'Day 2 complete: 2/2 correct',
        'Day 3: Kelly',
        'Q1/1: p = 0.55, b = 1: full Kelly?',
        'Correct! 0.55 - 0.45.',
        'Day 3 complete: 1/1 correct',
        'Roadmap complete!',
        'Topics completed: 3/3 | Score: 6/6 (100%)',
      ]);
    });

    it('brings missed questions back for unscored review', async () => {
      const io = scriptedIO(['4', 'b', 'adv', 'hammer', 'bullish engulfing', '5', '0.1', '5']);

      const outcome = await runStudySession(new QuizEngine(topics), io, { reviewCount: 1 });

      expect(outcome.completed).toBe(true);
      expect(outcome.report).toMatchObject({ correctAttempts: 5, totalAttempts: 6 });
      expect(io.lines.filter(line => line.startsWith('Review'))).toEqual([
        'Review (1 from earlier days, not scored)',
        'Review (1 from earlier days, not scored)',
      ]);
      expect(io.lines[2]).toBe('Incorrect. Expected: 5 (±0.01). 5 million.');
      expect(io.lines.at(-1)).toBe('Topics completed: 3/3 | Score: 5/6 (83%)');
    });

    it('stops when the learner quits', async () => {
      const engine = new QuizEngine(topics);
      const io = scriptedIO(['5', ' QUIT ']);

      const outcome = await runStudySession(engine, io, { reviewCount: 0 });

      expect(outcome.completed).toBe(false);
      expect(outcome.report).toMatchObject({ topicsCompleted: 0, totalAttempts: 1 });
      expect(io.lines.at(-1)).toBe('Topics completed: 0/3 | Score: 1/1 (100%)');
      const current = engine.currentQuestion();
      expect(isTopicComplete(current) ? null : current.id).toBe(2);
    });

    it('stops when input ends', async () => {
      const io = scriptedIO([]);

      const outcome = await runStudySession(new QuizEngine(topics), io, { reviewCount: 2 });

      expect(outcome.completed).toBe(false);
      expect(io.lines.at(-1)).toBe('Topics completed: 0/3 | Score: 0/0 (0%)');
    });

    it('reviews earlier days while practicing a single day', async () => {
      const io = scriptedIO(['a', 'bullish engulfing', '5.00']);

      const outcome = await runStudySession(new QuizEngine([topics[1]]), io, { reviewCount: 2 }, topics);

      expect(outcome.completed).toBe(true);
      expect(io.lines).toEqual([
        'Day 2: Candles',
        'Q1/2: Long lower wick after a decline?',
        '  a) Doji',
        '  b) Hammer',
        'Incorrect. Expected: Hammer. Hammer.',
        'Q2/2: Up body fully covering the prior down body?',
        'Correct! Buyers took over.',
        'Day 2 complete: 1/2 correct',
        'Review (1 from earlier days, not scored)',
        'Q1/1: 400,000 shares at $12.50: average daily dollar volume in $M?',
        'Correct! 5 million.',
        'Day 2 practice complete',
        'Score: 1/2 (50%)',
      ]);
    });
  });

  describe('readlineIO', () => {
    it('answers each prompt with the next piped line, then null', async () => {
      const output = captureOutput();
      const io = readlineIO(Readable.from(['5\nb\nadv\n']), output.stream);

      const answers = [await io.ask('> '), await io.ask('> '), await io.ask('> '), await io.ask('> ')];
      io.close();

      expect(answers).toEqual(['5', 'b', 'adv', null]);
      expect(output.text()).toBe('> > > > ');
    });

    it('runs a whole piped session without losing lines', async () => {
      const output = captureOutput();
      const io = readlineIO(Readable.from(['5\nb\nadv\nquit\n']), output.stream);

      const outcome = await runStudySession(new QuizEngine(topics), io, { reviewCount: 0 });
      io.close();

      expect(outcome).toEqual({
        completed: false,
        report: { topicsCompleted: 1, totalTopics: 3, overallScore: 1, correctAttempts: 3, totalAttempts: 3 },
      });
      // the quit prompt is never followed by an echoed newline
      expect(output.text().split('\n').at(-2)).toBe('> Topics completed: 1/3 | Score: 3/3 (100%)');
    });

    it('writes printed lines with a newline', () => {
      const output = captureOutput();
      const io = readlineIO(Readable.from([]), output.stream);

      io.print('Day 1: Screening');
      io.close();

      expect(output.text()).toBe('Day 1: Screening\n');
    });
  });

  describe('runValidate', () => {
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeTempDir(dir);
    });

    it('passes the shipped data', async () => {
      const lines: string[] = [];
      expect(await runValidate(DEFAULT_DATA_DIR, line => lines.push(line))).toBe(0);
      expect(lines).toEqual(['OK: all quiz files valid.']);
    });

    it('prints every issue and fails', async () => {
      const lines: string[] = [];
      expect(await runValidate(dir, line => lines.push(line))).toBe(1);
      expect(lines).toEqual(['[roadmap.json] file not found']);
    });
  });
});
