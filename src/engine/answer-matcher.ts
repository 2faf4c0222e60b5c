/**
 * Answer Matching
 *
 * Normalization rule, applied to both the learner's text and every accepted
 * answer before comparison:
 *
 *   1. Unicode NFKC (full-width digits, ligatures, non-breaking spaces)
 *   2. trim leading/trailing whitespace
 *   3. lower-case (locale independent)
 *   4. collapse runs of internal whitespace to a single space
 *
 * Each question kind compiles to an AnswerPredicate built on that rule.
 */

import type { QuestionRecord } from '../schemas/index.js';
import type { AnswerPredicate, AttemptResult, Question } from '../types.js';

/** Absorbs binary floating point error at the tolerance boundary */
const NUMERIC_EPSILON = 1e-9;

const NUMBER_PATTERN = /^[-+]?(\d+(\.\d*)?|\.\d+)(e[-+]?\d+)?$/;

export function normalizeAnswer(text: string): string {
  return text.normalize('NFKC').trim().toLowerCase().replace(/\s+/g, ' ');
}

/**
 * Parse a learner's numeric answer. Accepts thousands separators and a
 * trailing percent sign ("1,250", "12.5%"); returns null for anything else.
 */
export function parseNumericAnswer(text: string): number | null {
  const cleaned = normalizeAnswer(text).replace(/,/g, '').replace(/\s*%$/, '');
  if (!NUMBER_PATTERN.test(cleaned)) return null;

  const value = Number(cleaned);
  return Number.isFinite(value) ? value : null;
}

/** Option letter for a zero-based index: 0 -> "a" */
export function optionLetter(index: number): string {
  return String.fromCharCode('a'.charCodeAt(0) + index);
}

function setMembership(accepted: Iterable<string>): AnswerPredicate {
  const normalized = new Set(Array.from(accepted, normalizeAnswer));
  return text => normalized.has(normalizeAnswer(text));
}

/**
 * A reply naming an option by its text decides on that text alone; a letter
 * or 1-based number only counts when it is not also some option's text.
 */
function choiceMatch(options: readonly string[], answer: number): AnswerPredicate {
  const texts = options.map(normalizeAnswer);
  const byPosition = new Set([optionLetter(answer), String(answer + 1)]);
  return text => {
    const reply = normalizeAnswer(text);
    const named = texts.flatMap((option, index) => (option === reply ? [index] : []));
    if (named.length > 0) return named.includes(answer);
    return byPosition.has(reply);
  };
}

function withinTolerance(expected: number, tolerance: number): AnswerPredicate {
  return text => {
    const value = parseNumericAnswer(text);
    return value !== null && Math.abs(value - expected) <= tolerance + NUMERIC_EPSILON;
  };
}

/**
 * Turn a validated question record into an immutable Question.
 */
export function compileQuestion(day: number, record: QuestionRecord): Question {
  const base = {
    day,
    id: record.id,
    prompt: record.question,
    explanation: record.explanation,
  };

  switch (record.type) {
    case 'short-answer':
      return Object.freeze({
        ...base,
        kind: 'short-answer' as const,
        options: Object.freeze([]),
        acceptedAnswers: Object.freeze([...record.answers]),
        accepts: setMembership(record.answers),
      });

    case 'mcq': {
      const correct = record.options[record.answer];
      return Object.freeze({
        ...base,
        kind: 'multiple-choice' as const,
        options: Object.freeze([...record.options]),
        acceptedAnswers: Object.freeze([correct]),
        accepts: choiceMatch(record.options, record.answer),
      });
    }

    case 'numeric':
      return Object.freeze({
        ...base,
        kind: 'numeric' as const,
        options: Object.freeze([]),
        acceptedAnswers: Object.freeze([`${record.answer} (±${record.tolerance})`]),
        accepts: withinTolerance(record.answer, record.tolerance),
      });
  }
}

/**
 * Check an answer against a question without touching any session state.
 */
export function gradeAnswer(question: Question, text: string): AttemptResult {
  return {
    isCorrect: question.accepts(text),
    explanation: question.explanation,
    correctAnswer: question.acceptedAnswers[0] ?? '',
  };
}
