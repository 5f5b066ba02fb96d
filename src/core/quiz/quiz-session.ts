/**
 * Quiz Session
 *
 * One learner's drill over one knowledge set. The session owns every piece
 * of mutable state (stage, per-key ledger, review gate) and is the single
 * source of truth for it; nothing is shared between sessions and nothing is
 * process-global.
 *
 * All operations are synchronous and return immediately. Callers serialize
 * them: one submission is fully processed before the next is made.
 *
 * When the final review is cleared, the session hands its CompletionRecord
 * to the completion logger once. The write is fire-and-forget: a failed
 * write is logged and does not undo the completed state. The record is also
 * returned in the `session_complete` result so the caller can retry.
 *
 * @example
 * ```typescript
 * const session = new QuizSession(knowledgeSet, { completionLogger });
 *
 * session.practiceWindow();     // first four pairs
 * session.advanceStage();       // → quiz
 * const result = session.submitAnswer('apple');
 * if (result.type === 'gate_active') {
 *   showCountdown(result.remainingSeconds);
 * }
 * ```
 */

import type { CompletionRecord, KnowledgeSet } from '../models';
import { DifficultyLedger, type KeyProgressSnapshot } from './difficulty-ledger';
import { InvalidKnowledgeSetError } from './errors';
import { ReviewGate, systemClock, type Clock } from './review-gate';
import { StageController, type RandomSource } from './stage-controller';
import type {
  PracticeWindow,
  ProgressSummary,
  QuizEvent,
  QuizEventListener,
  Stage,
  SubmissionResult,
} from './types';

/**
 * Receives the record written when a session completes.
 */
export interface CompletionLogger {
  record(record: CompletionRecord): Promise<void>;
}

export interface QuizSessionOptions {
  completionLogger?: CompletionLogger;
  /** Defaults to Date.now */
  clock?: Clock;
  /** Defaults to Math.random; used to order quiz keys */
  random?: RandomSource;
}

export class QuizSession {
  private readonly ledger: DifficultyLedger;
  private readonly gate: ReviewGate;
  private readonly controller: StageController;
  private readonly clock: Clock;
  private readonly completionLogger: CompletionLogger | undefined;
  private eventListener?: QuizEventListener;

  /**
   * @throws InvalidKnowledgeSetError if the set has no keys, a blank key, or a key without values
   */
  constructor(
    readonly knowledgeSet: KnowledgeSet,
    options: QuizSessionOptions = {}
  ) {
    assertUsableKnowledgeSet(knowledgeSet);

    this.clock = options.clock ?? systemClock;
    this.completionLogger = options.completionLogger;
    this.ledger = new DifficultyLedger(knowledgeSet.entries);
    this.gate = new ReviewGate(this.clock);
    this.controller = new StageController(knowledgeSet, this.ledger, this.gate, {
      clock: this.clock,
      random: options.random ?? Math.random,
      emit: (event) => this.handleEvent(event),
    });
  }

  /**
   * Sets the listener for session events. Setting a new listener replaces
   * the previous one; pass undefined to remove it.
   */
  setEventListener(listener: QuizEventListener | undefined): void {
    this.eventListener = listener;
  }

  currentStage(): Stage {
    return this.controller.current;
  }

  submitAnswer(candidate: string, now: number = this.clock()): SubmissionResult {
    return this.controller.submit(candidate, now);
  }

  advanceStage(): SubmissionResult {
    return this.controller.advance();
  }

  practiceWindow(): PracticeWindow {
    return this.controller.practiceWindow();
  }

  navigatePractice(direction: 'next' | 'previous'): PracticeWindow {
    return this.controller.navigatePractice(direction);
  }

  /**
   * Whether submissions are currently locked. Callers poll this to drive
   * the countdown.
   */
  isLocked(now: number = this.clock()): boolean {
    return this.gate.isActive(now);
  }

  progressSummary(now: number = this.clock()): ProgressSummary {
    const stage = this.controller.current;
    const activeKey = this.controller.activeKey();
    const totalKeys = this.controller.totalKeys;
    const completedKeys = this.controller.completedCount();

    let requiredCorrect: number | null = null;
    let correctForActiveKey: number | null = null;

    if (stage === 'quiz' && activeKey !== null) {
      const progress = this.ledger.getProgress(activeKey);
      requiredCorrect = progress.requiredCorrect;
      correctForActiveKey = progress.submittedValues.length;
    } else if (stage === 'final' && activeKey !== null) {
      correctForActiveKey = this.controller.finalSuppliedCount();
    }

    return {
      stage,
      totalKeys,
      completedKeys,
      remainingKeys: totalKeys - completedKeys,
      activeKey,
      requiredCorrect,
      correctForActiveKey,
      gateRemainingSeconds: this.gate.remaining(now),
      practice:
        stage === 'practice'
          ? {
              index: this.controller.practiceWindowIndex(),
              totalWindows: this.controller.practiceWindowCount(),
            }
          : null,
    };
  }

  /**
   * Quiz-stage mastery state for a key.
   */
  keyProgress(key: string): KeyProgressSnapshot {
    return this.ledger.getProgress(key);
  }

  private handleEvent(event: QuizEvent): void {
    if (event.type === 'session_completed') {
      this.recordCompletion(event.record);
    }

    this.eventListener?.(event);
  }

  private recordCompletion(record: CompletionRecord): void {
    if (!this.completionLogger) {
      return;
    }

    this.completionLogger.record(record).catch((error: unknown) => {
      console.error(
        `[QuizSession] Failed to record completion for knowledge set '${record.knowledgeSetId}':`,
        error
      );
    });
  }
}

function assertUsableKnowledgeSet(set: KnowledgeSet): void {
  if (set.entries.size === 0) {
    throw new InvalidKnowledgeSetError(`Knowledge set '${set.name}' has no keys`);
  }

  for (const [key, values] of set.entries) {
    if (key.trim().length === 0) {
      throw new InvalidKnowledgeSetError(`Knowledge set '${set.name}' contains a blank key`);
    }
    if (values.size === 0) {
      throw new InvalidKnowledgeSetError(
        `Key '${key}' in knowledge set '${set.name}' has no accepted values`
      );
    }
  }
}
