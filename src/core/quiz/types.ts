/**
 * Quiz Engine Types
 *
 * This module defines the types shared by the quiz engine components:
 *
 * 1. **Stages**: the four states of a drill session.
 * 2. **Outcomes**: the closed set of results a submission can produce. Every
 *    presentation layer (API, CLI) switches on `type` and nothing else.
 * 3. **Events**: notifications emitted by QuizSession for logging and for
 *    collaborators such as the completion log.
 * 4. **Progress**: read-only snapshots for rendering.
 */

import type { CompletionRecord, KnowledgePair } from '../models';

/**
 * Session stages, in the only order a session moves through them.
 */
export type Stage = 'practice' | 'quiz' | 'final' | 'complete';

export const STAGE_ORDER: readonly Stage[] = ['practice', 'quiz', 'final', 'complete'];

/**
 * Why a lockout is being reported.
 *
 * - 'locked': a submission arrived while an earlier lockout is still running
 * - 'quiz_wrong_streak': three consecutive wrong answers for a quiz key
 * - 'final_wrong_streak': three consecutive wrong answers in the final review
 */
export type GateReason = 'locked' | 'quiz_wrong_streak' | 'final_wrong_streak';

/**
 * Result of the difficulty ledger judging one non-blank answer.
 */
export type LedgerOutcome =
  | { type: 'wrong'; key: string; wrongStreak: number; requiredCorrect: number; gateTriggered: boolean }
  | { type: 'duplicate_correct'; key: string; value: string }
  | { type: 'correct_more_needed'; key: string; value: string; remaining: number }
  | { type: 'key_completed'; key: string; value: string };

/**
 * Feedback returned to the caller for every submission or stage change.
 *
 * `wrong.expected` lists the key's accepted values so the learner can see
 * what was wanted. `gate_active.review` carries every pair of the set when
 * the lockout has just been triggered, for the reflection pause.
 */
export type SubmissionResult =
  | { type: 'blank_input' }
  | {
      type: 'wrong';
      stage: 'quiz' | 'final';
      key: string;
      expected: string[];
      wrongStreak: number;
      requiredCorrect: number;
      /** Final review only: progress was discarded and the cursor is back on the first key */
      restarted: boolean;
      nextKey: string;
    }
  | { type: 'duplicate_correct'; stage: 'quiz' | 'final'; key: string; value: string }
  | { type: 'correct_more_needed'; stage: 'quiz' | 'final'; key: string; value: string; remaining: number }
  | { type: 'key_completed'; stage: 'quiz' | 'final'; key: string; nextKey: string }
  | {
      type: 'gate_active';
      remainingSeconds: number;
      reason: GateReason;
      key: string | null;
      requiredCorrect: number | null;
      review: KnowledgePair[] | null;
    }
  | { type: 'stage_advanced'; stage: Stage; completedKey: string | null }
  | { type: 'session_complete'; record: CompletionRecord };

export type SubmissionResultType = SubmissionResult['type'];

/**
 * Events emitted by QuizSession. A single listener may be registered.
 */
export type QuizEvent =
  | { type: 'stage_advanced'; from: Stage; to: Stage }
  | { type: 'key_completed'; stage: 'quiz' | 'final'; key: string }
  | { type: 'required_correct_raised'; key: string; requiredCorrect: number }
  | { type: 'gate_activated'; reason: GateReason; expiresAt: Date }
  | { type: 'final_restarted'; failedKey: string }
  | { type: 'session_completed'; record: CompletionRecord };

export type QuizEventListener = (event: QuizEvent) => void;

/**
 * One page of the practice walkthrough.
 */
export interface PracticeWindow {
  /** Zero-based window index */
  index: number;
  totalWindows: number;
  pairs: KnowledgePair[];
  hasPrevious: boolean;
  hasNext: boolean;
}

/**
 * Snapshot of a session for rendering a status line or progress bar.
 */
export interface ProgressSummary {
  stage: Stage;
  totalKeys: number;
  /** Keys cleared in the current stage (quiz keys mastered, or final keys passed this attempt) */
  completedKeys: number;
  remainingKeys: number;
  /** The key the learner is being asked about, or null outside quiz/final */
  activeKey: string | null;
  /** Quiz only: distinct correct values needed for the active key */
  requiredCorrect: number | null;
  /** Distinct correct values already given for the active key in this stage */
  correctForActiveKey: number | null;
  gateRemainingSeconds: number;
  /** Present only during practice */
  practice: { index: number; totalWindows: number } | null;
}
