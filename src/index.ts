/**
 * Quant Study Coach
 *
 * Quiz progression engine for the 21-day finance/quant roadmap.
 *
 * @example
 * ```typescript
 * import { QuizEngine, isTopicComplete, DEFAULT_DATA_DIR } from 'quant-study-coach';
 *
 * const engine = await QuizEngine.load({ dataDir: DEFAULT_DATA_DIR });
 * const question = engine.currentQuestion();
 * if (!isTopicComplete(question)) {
 *   const result = engine.submitAnswer(question.id, 'volume spike');
 *   console.log(result.isCorrect, result.explanation);
 * }
 * console.log(engine.progressReport());
 * ```
 */

export * from './types.js';
export * from './errors.js';
export { ConsoleLogger, silentLogger, isLogLevel, LOG_LEVELS } from './logger.js';
export type { Logger, LogLevel } from './logger.js';
export { loadConfig, DEFAULT_DATA_DIR, MAX_REVIEW_COUNT } from './config.js';
export type { Config } from './config.js';

export { QuizEngine } from './engine/quiz-engine.js';
export type { QuizEngineOptions, CurriculumSource } from './engine/quiz-engine.js';
export { normalizeAnswer, parseNumericAnswer, gradeAnswer, compileQuestion } from './engine/answer-matcher.js';
export {
  createSessionState,
  scoreOf,
  serializeSnapshot,
  parseSnapshot,
  restoreState,
  curriculumFingerprint,
} from './engine/session-state.js';
export type { SessionState } from './engine/session-state.js';
export { selectReviewQuestions } from './engine/review.js';
export type { ReviewOptions } from './engine/review.js';

export { loadCurriculum, loadCurriculumFromDir, ROADMAP_FILE } from './curriculum/loader.js';
export type { LoadOptions } from './curriculum/loader.js';
export { validateCurriculumDir, validateDayFile } from './curriculum/validator.js';
export type { CurriculumIssue } from './curriculum/issues.js';
export * from './schemas/index.js';
