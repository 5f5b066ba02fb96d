/**
 * Quiz Engine Errors
 *
 * Domain outcomes (wrong answers, lockouts, blank input) are returned as
 * values, never thrown. Errors are reserved for calls that make no sense in
 * the session's current state, such as answering during practice or
 * advancing out of a stage that only ends on its own.
 */

import type { Stage } from './types';

export type QuizStateErrorCode =
  | 'SUBMISSION_NOT_ACCEPTED'
  | 'INVALID_STAGE_TRANSITION'
  | 'NAVIGATION_NOT_AVAILABLE';

/**
 * Thrown when an operation is not valid in the session's current stage.
 */
export class QuizStateError extends Error {
  public readonly code: QuizStateErrorCode;
  public readonly stage: Stage;

  constructor(code: QuizStateErrorCode, stage: Stage, message: string) {
    super(message);
    this.name = 'QuizStateError';
    this.code = code;
    this.stage = stage;
  }
}

/**
 * Thrown when a knowledge set cannot back a session: no keys, a blank key,
 * or a key without accepted values.
 */
export class InvalidKnowledgeSetError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidKnowledgeSetError';
  }
}
