/**
 * Zod Schemas for Curriculum Data and Session Snapshots
 *
 * These schemas describe the JSON under data/ (roadmap.json and the day
 * files) and the serialized form of a learner session.
 */

import { z } from 'zod';
import { PHASES } from '../types.js';

export const phaseEnum = z.enum(PHASES);

const questionId = z.number().int().positive();
const nonEmpty = z.string().trim().min(1);

// =============================================================================
// Questions
// =============================================================================

/**
 * Free-text question; any of `answers` is accepted after normalization.
 */
export const shortAnswerQuestionSchema = z.object({
  id: questionId,
  type: z.literal('short-answer'),
  question: nonEmpty,
  answers: z.array(nonEmpty).min(1, 'short-answer needs at least one accepted answer'),
  explanation: z.string().default(''),
});

/**
 * Multiple choice; `answer` is the zero-based index of the correct option.
 */
export const mcqQuestionSchema = z.object({
  id: questionId,
  type: z.literal('mcq'),
  question: nonEmpty,
  options: z.array(nonEmpty).min(2, 'mcq needs >=2 options'),
  answer: z.number({ invalid_type_error: "mcq 'answer' must be index (int)" })
    .int("mcq 'answer' must be index (int)")
    .nonnegative("mcq 'answer' index out of range"),
  explanation: z.string().default(''),
});

/**
 * Numeric answer checked within `answer ± tolerance`.
 */
export const numericQuestionSchema = z.object({
  id: questionId,
  type: z.literal('numeric'),
  question: nonEmpty,
  answer: z.number({
    required_error: "numeric needs 'answer'",
    invalid_type_error: "numeric 'answer' must be number",
  }).finite(),
  tolerance: z.number({ invalid_type_error: "numeric 'tolerance' must be non-negative number" })
    .nonnegative("numeric 'tolerance' must be non-negative number")
    .default(0.01),
  explanation: z.string().default(''),
});

export const questionSchema = z.discriminatedUnion('type', [
  shortAnswerQuestionSchema,
  mcqQuestionSchema,
  numericQuestionSchema,
]);

export type QuestionRecord = z.infer<typeof questionSchema>;

const questionListSchema = z
  .array(questionSchema)
  .min(1, 'a day needs at least one question')
  .superRefine((questions, ctx) => {
    const seenIds = new Set<number>();
    const seenText = new Set<string>();
    questions.forEach((question, index) => {
      if (seenIds.has(question.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'id'],
          message: `duplicate question id ${question.id}`,
        });
      }
      seenIds.add(question.id);

      if (seenText.has(question.question)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'question'],
          message: 'duplicate question text',
        });
      }
      seenText.add(question.question);

      if (question.type === 'mcq' && question.answer >= question.options.length) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: [index, 'answer'],
          message: "mcq 'answer' index out of range",
        });
      }
    });
  });

// =============================================================================
// Curriculum files
// =============================================================================

/**
 * One day file, e.g. data/day06_kelly.json
 */
export const dayFileSchema = z.object({
  title: nonEmpty,
  questions: questionListSchema,
});

export type DayFile = z.infer<typeof dayFileSchema>;

export const roadmapEntrySchema = z.object({
  day: z.number().int().positive(),
  phase: phaseEnum,
  title: nonEmpty,
  file: z.string().regex(/^day\d{2}_[a-z0-9_]+\.json$/, 'file must look like dayNN_name.json'),
});

export type RoadmapEntry = z.infer<typeof roadmapEntrySchema>;

/**
 * data/roadmap.json - the ordered day plan
 */
export const roadmapSchema = z.object({
  days: z.array(roadmapEntrySchema).min(1),
});

export type Roadmap = z.infer<typeof roadmapSchema>;

/**
 * In-memory curriculum: the roadmap entries with their questions inlined.
 */
export const curriculumDocumentSchema = z.object({
  topics: z.array(z.object({
    day: z.number().int().positive(),
    phase: phaseEnum,
    title: nonEmpty,
    questions: questionListSchema,
  })).min(1),
});

export type CurriculumDocument = z.input<typeof curriculumDocumentSchema>;

// =============================================================================
// Session snapshots
// =============================================================================

export const attemptSchema = z.object({
  day: z.number().int().positive(),
  questionId,
  submittedText: z.string(),
  isCorrect: z.boolean(),
  timestamp: z.number().int().nonnegative(),
});

export const SNAPSHOT_VERSION = 1;

export const sessionSnapshotSchema = z.object({
  version: z.literal(SNAPSHOT_VERSION),
  /** `day:id,id,...` per topic, to refuse a snapshot taken against other data */
  curriculum: z.array(z.string()),
  currentTopicIndex: z.number().int().nonnegative(),
  currentQuestionIndex: z.number().int().nonnegative(),
  attempts: z.array(attemptSchema),
});

export type SessionSnapshot = z.infer<typeof sessionSnapshotSchema>;
