/**
 * Difficulty Ledger
 *
 * Per-key mastery bookkeeping for the quiz stage. For each key the ledger
 * tracks how many distinct correct values the learner must give
 * (`requiredCorrect`, starting at 1), which values have already been
 * accepted, and the current run of wrong answers.
 *
 * Every third consecutive wrong answer for a key doubles its
 * `requiredCorrect` and asks the caller to open the review gate; the streak
 * then starts over. There is no cap on the doubling: a key whose threshold
 * exceeds its number of accepted values cannot be completed in this session.
 *
 * Progress entries are created lazily the first time a key is referenced.
 */

import { findMatch } from './answer-matcher';
import type { LedgerOutcome } from './types';

/**
 * Consecutive wrong answers that trigger a lockout and a harder threshold.
 */
export const WRONG_STREAK_LIMIT = 3;

/**
 * Mastery state for a single key.
 */
export interface KeyProgress {
  requiredCorrect: number;
  /** Normalized values already accepted for this key */
  submittedValues: Set<string>;
  wrongStreak: number;
  completed: boolean;
}

/**
 * Read-only copy of a key's progress, safe to hand to callers.
 */
export interface KeyProgressSnapshot {
  key: string;
  requiredCorrect: number;
  submittedValues: string[];
  wrongStreak: number;
  completed: boolean;
}

export class DifficultyLedger {
  private readonly progress = new Map<string, KeyProgress>();

  /**
   * @param acceptedValues - key → accepted values, usually a session's knowledge set entries
   */
  constructor(private readonly acceptedValues: ReadonlyMap<string, ReadonlySet<string>>) {}

  /**
   * Judges a non-blank answer for `key` and updates the key's progress.
   *
   * Blank input must be filtered out before calling this method; a blank
   * candidate reaching here would count as wrong.
   *
   * @throws Error if the key is not part of the knowledge set
   */
  submit(key: string, candidate: string): LedgerOutcome {
    const accepted = this.acceptedFor(key);
    const entry = this.entryFor(key);
    const matched = findMatch(candidate, accepted);

    if (matched === null) {
      entry.wrongStreak += 1;
      let gateTriggered = false;

      if (entry.wrongStreak >= WRONG_STREAK_LIMIT) {
        entry.requiredCorrect *= 2;
        entry.wrongStreak = 0;
        gateTriggered = true;
      }

      return {
        type: 'wrong',
        key,
        wrongStreak: entry.wrongStreak,
        requiredCorrect: entry.requiredCorrect,
        gateTriggered,
      };
    }

    entry.wrongStreak = 0;

    if (entry.submittedValues.has(matched)) {
      return { type: 'duplicate_correct', key, value: matched };
    }

    entry.submittedValues.add(matched);

    if (entry.submittedValues.size >= entry.requiredCorrect) {
      entry.completed = true;
      return { type: 'key_completed', key, value: matched };
    }

    return {
      type: 'correct_more_needed',
      key,
      value: matched,
      remaining: entry.requiredCorrect - entry.submittedValues.size,
    };
  }

  /**
   * Returns a snapshot of the key's progress, creating the entry if needed.
   */
  getProgress(key: string): KeyProgressSnapshot {
    this.acceptedFor(key);
    const entry = this.entryFor(key);
    return {
      key,
      requiredCorrect: entry.requiredCorrect,
      submittedValues: [...entry.submittedValues],
      wrongStreak: entry.wrongStreak,
      completed: entry.completed,
    };
  }

  isCompleted(key: string): boolean {
    return this.progress.get(key)?.completed ?? false;
  }

  /**
   * Snapshots of every key referenced so far.
   */
  snapshot(): KeyProgressSnapshot[] {
    return [...this.progress.keys()].map((key) => this.getProgress(key));
  }

  private acceptedFor(key: string): ReadonlySet<string> {
    const accepted = this.acceptedValues.get(key);
    if (!accepted) {
      throw new Error(`Key '${key}' is not part of this knowledge set`);
    }
    return accepted;
  }

  private entryFor(key: string): KeyProgress {
    let entry = this.progress.get(key);
    if (!entry) {
      entry = {
        requiredCorrect: 1,
        submittedValues: new Set(),
        wrongStreak: 0,
        completed: false,
      };
      this.progress.set(key, entry);
    }
    return entry;
  }
}
