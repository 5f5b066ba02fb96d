/**
 * Quiz Engine - Barrel Export
 *
 * The staged drill: practice walkthrough, adaptive quiz, and strict final
 * review, with a timed review gate on repeated failure.
 *
 * @example
 * ```typescript
 * import { QuizSession } from '@/core/quiz';
 *
 * const session = new QuizSession(knowledgeSet, { completionLogger });
 * session.advanceStage();
 * const result = session.submitAnswer('banana');
 * ```
 */

export { QuizSession, type CompletionLogger, type QuizSessionOptions } from './quiz-session';
export { StageController, PRACTICE_WINDOW_SIZE, shuffle, type RandomSource } from './stage-controller';
export {
  DifficultyLedger,
  WRONG_STREAK_LIMIT,
  type KeyProgress,
  type KeyProgressSnapshot,
} from './difficulty-ledger';
export { ReviewGate, REVIEW_PAUSE_SECONDS, systemClock, type Clock } from './review-gate';
export {
  normalizeAnswer,
  isBlankAnswer,
  findMatch,
  matches,
  distinctValueCount,
} from './answer-matcher';
export { QuizStateError, InvalidKnowledgeSetError, type QuizStateErrorCode } from './errors';
export {
  STAGE_ORDER,
  type Stage,
  type GateReason,
  type LedgerOutcome,
  type SubmissionResult,
  type SubmissionResultType,
  type QuizEvent,
  type QuizEventListener,
  type PracticeWindow,
  type ProgressSummary,
} from './types';
