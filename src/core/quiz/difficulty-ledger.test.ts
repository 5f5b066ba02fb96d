/**
 * DifficultyLedger Unit Tests
 *
 * These tests verify the per-key mastery rules:
 * - novel correct answers count toward the threshold
 * - duplicates are idempotent
 * - every third consecutive wrong answer doubles the threshold and
 *   requests a lockout, then the streak starts over
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { DifficultyLedger } from './difficulty-ledger';

describe('DifficultyLedger', () => {
  let ledger: DifficultyLedger;

  beforeEach(() => {
    ledger = new DifficultyLedger(
      new Map<string, ReadonlySet<string>>([
        ['A', new Set(['apple', 'apricot', 'avocado'])],
        ['B', new Set(['banana'])],
      ])
    );
  });

  it('creates progress lazily with a threshold of one', () => {
    expect(ledger.snapshot()).toHaveLength(0);

    expect(ledger.getProgress('A')).toEqual({
      key: 'A',
      requiredCorrect: 1,
      submittedValues: [],
      wrongStreak: 0,
      completed: false,
    });
    expect(ledger.snapshot()).toHaveLength(1);
  });

  it('completes a key on the first normalized match', () => {
    const outcome = ledger.submit('A', 'Apple ');

    expect(outcome).toEqual({ type: 'key_completed', key: 'A', value: 'apple' });
    expect(ledger.isCompleted('A')).toBe(true);
  });

  it('counts wrong answers and keeps the threshold until the third', () => {
    expect(ledger.submit('B', 'mango')).toEqual({
      type: 'wrong',
      key: 'B',
      wrongStreak: 1,
      requiredCorrect: 1,
      gateTriggered: false,
    });
    expect(ledger.submit('B', 'pear')).toMatchObject({ wrongStreak: 2, gateTriggered: false });
  });

  it('doubles the threshold and resets the streak on the third wrong answer', () => {
    ledger.submit('B', 'mango');
    ledger.submit('B', 'pear');
    const third = ledger.submit('B', 'kiwi');

    expect(third).toEqual({
      type: 'wrong',
      key: 'B',
      wrongStreak: 0,
      requiredCorrect: 2,
      gateTriggered: true,
    });
    expect(ledger.getProgress('B').wrongStreak).toBe(0);
  });

  it('doubles again on every further run of three', () => {
    for (let i = 0; i < 6; i++) {
      ledger.submit('A', `wrong-${i}`);
    }
    expect(ledger.getProgress('A').requiredCorrect).toBe(4);

    for (let i = 0; i < 3; i++) {
      ledger.submit('A', `again-${i}`);
    }
    expect(ledger.getProgress('A').requiredCorrect).toBe(8);
  });

  it('resets the wrong streak on any correct answer', () => {
    for (let i = 0; i < 3; i++) {
      ledger.submit('A', `wrong-${i}`);
    }
    ledger.submit('A', 'nope');
    ledger.submit('A', 'nope again');
    expect(ledger.getProgress('A').wrongStreak).toBe(2);

    const outcome = ledger.submit('A', 'apple');

    expect(outcome).toEqual({ type: 'correct_more_needed', key: 'A', value: 'apple', remaining: 1 });
    expect(ledger.getProgress('A').wrongStreak).toBe(0);
  });

  it('treats a repeated value as a duplicate without changing progress', () => {
    for (let i = 0; i < 3; i++) {
      ledger.submit('A', `wrong-${i}`);
    }
    ledger.submit('A', 'apple');
    const before = ledger.getProgress('A');

    const outcome = ledger.submit('A', '  APPLE');

    expect(outcome).toEqual({ type: 'duplicate_correct', key: 'A', value: 'apple' });
    const after = ledger.getProgress('A');
    expect(after.requiredCorrect).toBe(before.requiredCorrect);
    expect(after.submittedValues).toEqual(before.submittedValues);
    expect(after.completed).toBe(false);
  });

  it('a duplicate clears the wrong streak', () => {
    for (let i = 0; i < 3; i++) {
      ledger.submit('A', `wrong-${i}`);
    }
    ledger.submit('A', 'apple');
    ledger.submit('A', 'wrong');

    ledger.submit('A', 'apple');

    expect(ledger.getProgress('A').wrongStreak).toBe(0);
  });

  it('completes once enough distinct values have been given', () => {
    for (let i = 0; i < 3; i++) {
      ledger.submit('A', `wrong-${i}`);
    }

    expect(ledger.submit('A', 'apricot')).toMatchObject({ type: 'correct_more_needed', remaining: 1 });
    expect(ledger.submit('A', 'avocado')).toEqual({ type: 'key_completed', key: 'A', value: 'avocado' });

    const progress = ledger.getProgress('A');
    expect(progress.completed).toBe(true);
    expect(progress.submittedValues.length).toBeGreaterThanOrEqual(progress.requiredCorrect);
  });

  it('keeps the wrong streak within [0, 2] after every call', () => {
    const inputs = ['x', 'y', 'z', 'apple', 'q', 'r', 's', 't', 'apricot', 'u'];
    for (const input of inputs) {
      ledger.submit('A', input);
      const { wrongStreak } = ledger.getProgress('A');
      expect(wrongStreak).toBeGreaterThanOrEqual(0);
      expect(wrongStreak).toBeLessThanOrEqual(2);
    }
  });

  it('rejects keys outside the knowledge set', () => {
    expect(() => ledger.submit('Z', 'zebra')).toThrow("Key 'Z' is not part of this knowledge set");
  });
});
