/**
 * Stage Controller
 *
 * The state machine that moves a session through its stages:
 *
 * ```
 * practice ──advance()──▶ quiz ──(queue empty)──▶ final ──(last key)──▶ complete
 * ```
 *
 * - **practice**: a read-only walkthrough in windows of four pairs. Nothing
 *   is checked and nothing can fail; the learner advances manually.
 * - **quiz**: keys are asked in random order without replacement. Answers are
 *   judged by the DifficultyLedger; a key leaves the queue once it reaches its
 *   required number of distinct correct values. Three wrong answers in a row
 *   raise the key's threshold and lock submissions behind the ReviewGate.
 * - **final**: keys are asked in alphabetical order and every accepted value
 *   of a key must be given before moving on. Any wrong answer sends the
 *   learner back to the first key with all final progress discarded.
 * - **complete**: terminal. The completion record is produced on entry.
 *
 * Final-review bookkeeping is separate from the quiz ledger: each key starts
 * with no values supplied.
 */

import { toSortedPairs, type CompletionRecord, type KnowledgePair, type KnowledgeSet } from '../models';
import { distinctValueCount, findMatch, isBlankAnswer } from './answer-matcher';
import type { DifficultyLedger } from './difficulty-ledger';
import { WRONG_STREAK_LIMIT } from './difficulty-ledger';
import { QuizStateError } from './errors';
import { REVIEW_PAUSE_SECONDS, type Clock, type ReviewGate } from './review-gate';
import type { PracticeWindow, QuizEvent, Stage, SubmissionResult } from './types';

/**
 * Number of pairs shown per practice window.
 */
export const PRACTICE_WINDOW_SIZE = 4;

export type RandomSource = () => number;

export interface StageControllerOptions {
  clock: Clock;
  random: RandomSource;
  /** Receives every state-changing event */
  emit: (event: QuizEvent) => void;
}

export class StageController {
  private stage: Stage = 'practice';

  /** All pairs, alphabetical by key */
  private readonly pairs: KnowledgePair[];

  /** Keys in final-review order */
  private readonly finalKeys: string[];

  private practiceIndex = 0;

  /** Quiz keys not yet mastered; the head is the current key */
  private quizQueue: string[] = [];

  private finalCursor = 0;
  private finalSupplied = new Set<string>();
  private finalWrongStreak = 0;

  constructor(
    private readonly knowledgeSet: KnowledgeSet,
    private readonly ledger: DifficultyLedger,
    private readonly gate: ReviewGate,
    private readonly options: StageControllerOptions
  ) {
    this.pairs = toSortedPairs(knowledgeSet);
    this.finalKeys = this.pairs.map((pair) => pair.key);
  }

  get current(): Stage {
    return this.stage;
  }

  get totalKeys(): number {
    return this.finalKeys.length;
  }

  /**
   * The key currently being asked, or null in practice/complete.
   */
  activeKey(): string | null {
    switch (this.stage) {
      case 'quiz':
        return this.quizQueue.length > 0 ? this.quizQueue[0] : null;
      case 'final':
        return this.finalKeys[this.finalCursor] ?? null;
      default:
        return null;
    }
  }

  /**
   * Keys cleared in the current stage.
   */
  completedCount(): number {
    switch (this.stage) {
      case 'practice':
        return 0;
      case 'quiz':
        return this.totalKeys - this.quizQueue.length;
      case 'final':
        return this.finalCursor;
      case 'complete':
        return this.totalKeys;
    }
  }

  /**
   * Distinct correct values given so far for the active final-review key.
   */
  finalSuppliedCount(): number {
    return this.stage === 'final' ? this.finalSupplied.size : 0;
  }

  practiceWindowCount(): number {
    return Math.ceil(this.pairs.length / PRACTICE_WINDOW_SIZE);
  }

  practiceWindowIndex(): number {
    return this.practiceIndex;
  }

  /**
   * The pairs on the current practice window.
   *
   * @throws QuizStateError outside the practice stage
   */
  practiceWindow(): PracticeWindow {
    this.requireStage('practice', 'NAVIGATION_NOT_AVAILABLE', 'Practice pairs are only shown during practice');

    const start = this.practiceIndex * PRACTICE_WINDOW_SIZE;
    const totalWindows = this.practiceWindowCount();

    return {
      index: this.practiceIndex,
      totalWindows,
      pairs: this.pairs.slice(start, start + PRACTICE_WINDOW_SIZE).map(clonePair),
      hasPrevious: this.practiceIndex > 0,
      hasNext: this.practiceIndex < totalWindows - 1,
    };
  }

  /**
   * Moves the practice walkthrough one window forward or back. Moving past
   * either end leaves the window where it is.
   */
  navigatePractice(direction: 'next' | 'previous'): PracticeWindow {
    this.requireStage('practice', 'NAVIGATION_NOT_AVAILABLE', 'Practice navigation is only available during practice');

    const last = this.practiceWindowCount() - 1;
    if (direction === 'next') {
      this.practiceIndex = Math.min(this.practiceIndex + 1, last);
    } else {
      this.practiceIndex = Math.max(this.practiceIndex - 1, 0);
    }

    return this.practiceWindow();
  }

  /**
   * Manual transition out of practice. Every other stage ends on its own.
   *
   * @throws QuizStateError when not in practice
   */
  advance(): SubmissionResult {
    this.requireStage(
      'practice',
      'INVALID_STAGE_TRANSITION',
      `Cannot advance manually from the ${this.stage} stage`
    );

    this.enterQuiz();
    return { type: 'stage_advanced', stage: 'quiz', completedKey: null };
  }

  /**
   * Routes an answer to the active stage.
   *
   * Checks run in a fixed order: an active lockout rejects everything, then
   * blank input is rejected without touching any streak, then the answer is
   * judged.
   *
   * @throws QuizStateError during practice or after completion
   */
  submit(candidate: string, now: number = this.options.clock()): SubmissionResult {
    if (this.stage !== 'quiz' && this.stage !== 'final') {
      throw new QuizStateError(
        'SUBMISSION_NOT_ACCEPTED',
        this.stage,
        this.stage === 'complete'
          ? 'This session is complete; start a new session to drill again'
          : 'Answers are not accepted during practice; advance to the quiz first'
      );
    }

    if (this.gate.isActive(now)) {
      return {
        type: 'gate_active',
        remainingSeconds: this.gate.remaining(now),
        reason: 'locked',
        key: this.activeKey(),
        requiredCorrect: null,
        review: null,
      };
    }

    if (isBlankAnswer(candidate)) {
      return { type: 'blank_input' };
    }

    return this.stage === 'quiz'
      ? this.submitQuiz(candidate, now)
      : this.submitFinal(candidate, now);
  }

  // ==========================================================================
  // Quiz stage
  // ==========================================================================

  private enterQuiz(): void {
    this.quizQueue = shuffle(
      this.finalKeys.filter((key) => !this.ledger.isCompleted(key)),
      this.options.random
    );
    this.transition('quiz');

    if (this.quizQueue.length === 0) {
      this.enterFinal();
    }
  }

  private submitQuiz(candidate: string, now: number): SubmissionResult {
    const key = this.requireActiveKey();
    const outcome = this.ledger.submit(key, candidate);

    switch (outcome.type) {
      case 'wrong': {
        if (outcome.gateTriggered) {
          this.options.emit({
            type: 'required_correct_raised',
            key,
            requiredCorrect: outcome.requiredCorrect,
          });
          return this.lockOut('quiz_wrong_streak', key, outcome.requiredCorrect, now);
        }

        return {
          type: 'wrong',
          stage: 'quiz',
          key,
          expected: this.expectedValues(key),
          wrongStreak: outcome.wrongStreak,
          requiredCorrect: outcome.requiredCorrect,
          restarted: false,
          nextKey: key,
        };
      }

      case 'duplicate_correct':
        return { type: 'duplicate_correct', stage: 'quiz', key, value: outcome.value };

      case 'correct_more_needed':
        return {
          type: 'correct_more_needed',
          stage: 'quiz',
          key,
          value: outcome.value,
          remaining: outcome.remaining,
        };

      case 'key_completed': {
        this.quizQueue = this.quizQueue.filter((queued) => queued !== key);
        this.options.emit({ type: 'key_completed', stage: 'quiz', key });

        if (this.quizQueue.length === 0) {
          this.enterFinal();
          return { type: 'stage_advanced', stage: 'final', completedKey: key };
        }

        return { type: 'key_completed', stage: 'quiz', key, nextKey: this.requireActiveKey() };
      }
    }
  }

  // ==========================================================================
  // Final stage
  // ==========================================================================

  private enterFinal(): void {
    this.resetFinalProgress();
    this.finalWrongStreak = 0;
    this.transition('final');
  }

  private resetFinalProgress(): void {
    this.finalCursor = 0;
    this.finalSupplied = new Set();
  }

  private submitFinal(candidate: string, now: number): SubmissionResult {
    const key = this.requireActiveKey();
    const accepted = this.acceptedFor(key);
    const needed = distinctValueCount(accepted);
    const matched = findMatch(candidate, accepted);

    if (matched === null) {
      this.finalWrongStreak += 1;
      this.resetFinalProgress();
      this.options.emit({ type: 'final_restarted', failedKey: key });

      if (this.finalWrongStreak >= WRONG_STREAK_LIMIT) {
        this.finalWrongStreak = 0;
        return this.lockOut('final_wrong_streak', key, null, now);
      }

      return {
        type: 'wrong',
        stage: 'final',
        key,
        expected: this.expectedValues(key),
        wrongStreak: this.finalWrongStreak,
        requiredCorrect: needed,
        restarted: true,
        nextKey: this.finalKeys[0],
      };
    }

    this.finalWrongStreak = 0;

    if (this.finalSupplied.has(matched)) {
      return { type: 'duplicate_correct', stage: 'final', key, value: matched };
    }

    this.finalSupplied.add(matched);

    if (this.finalSupplied.size < needed) {
      return {
        type: 'correct_more_needed',
        stage: 'final',
        key,
        value: matched,
        remaining: needed - this.finalSupplied.size,
      };
    }

    this.finalCursor += 1;
    this.finalSupplied = new Set();
    this.options.emit({ type: 'key_completed', stage: 'final', key });

    if (this.finalCursor >= this.finalKeys.length) {
      return this.complete(now);
    }

    return { type: 'key_completed', stage: 'final', key, nextKey: this.requireActiveKey() };
  }

  private complete(now: number): SubmissionResult {
    this.transition('complete');

    const record: CompletionRecord = {
      timestamp: new Date(now),
      knowledgeSetId: this.knowledgeSet.id,
      status: 'completed',
    };
    this.options.emit({ type: 'session_completed', record });

    return { type: 'session_complete', record };
  }

  // ==========================================================================
  // Helpers
  // ==========================================================================

  private lockOut(
    reason: 'quiz_wrong_streak' | 'final_wrong_streak',
    key: string,
    requiredCorrect: number | null,
    now: number
  ): SubmissionResult {
    this.gate.activate(REVIEW_PAUSE_SECONDS, now);

    const expiresAt = this.gate.expiresAt;
    if (expiresAt) {
      this.options.emit({ type: 'gate_activated', reason, expiresAt });
    }

    return {
      type: 'gate_active',
      remainingSeconds: this.gate.remaining(now),
      reason,
      key,
      requiredCorrect,
      review: this.pairs.map(clonePair),
    };
  }

  private transition(to: Stage): void {
    const from = this.stage;
    this.stage = to;
    this.options.emit({ type: 'stage_advanced', from, to });
  }

  private requireStage(
    stage: Stage,
    code: 'INVALID_STAGE_TRANSITION' | 'NAVIGATION_NOT_AVAILABLE',
    message: string
  ): void {
    if (this.stage !== stage) {
      throw new QuizStateError(code, this.stage, message);
    }
  }

  private requireActiveKey(): string {
    const key = this.activeKey();
    if (key === null) {
      throw new Error(`No active key in the ${this.stage} stage`);
    }
    return key;
  }

  private acceptedFor(key: string): ReadonlySet<string> {
    const accepted = this.knowledgeSet.entries.get(key);
    if (!accepted) {
      throw new Error(`Key '${key}' is not part of this knowledge set`);
    }
    return accepted;
  }

  private expectedValues(key: string): string[] {
    return [...this.acceptedFor(key)];
  }
}

function clonePair(pair: KnowledgePair): KnowledgePair {
  return { key: pair.key, values: [...pair.values] };
}

/**
 * Fisher–Yates shuffle into a new array.
 */
export function shuffle<T>(items: readonly T[], random: RandomSource): T[] {
  const result = [...items];
  for (let i = result.length - 1; i > 0; i--) {
    const j = Math.floor(random() * (i + 1));
    [result[i], result[j]] = [result[j], result[i]];
  }
  return result;
}
