/**
 * SessionRegistry Unit Tests
 */

import { describe, it, expect, vi, beforeEach, afterEach, type MockInstance } from 'vitest';
import { SessionRegistry, describeEvent } from './session-registry';
import type { KnowledgeSet } from '../models';
import { KnowledgeSetNotFoundError } from '../knowledge/errors';

const T0 = new Date('2024-03-01T12:00:00Z').getTime();

function setOf(id: string, name: string, entries: Record<string, string[]>): KnowledgeSet {
  return {
    id,
    name,
    entries: new Map(Object.entries(entries).map(([key, values]) => [key, new Set(values)])),
  };
}

const fruit = setOf('ks_fruit', 'Fruit', { A: ['Apple'], B: ['Banana'] });
const rivers = setOf('ks_rivers', 'Rivers', { N: ['Nile'] });

const loader = {
  async load(id: string): Promise<KnowledgeSet> {
    const found = [fruit, rivers].find((set) => set.id === id);
    if (!found) {
      throw new KnowledgeSetNotFoundError(id);
    }
    return found;
  },
};

describe('SessionRegistry', () => {
  let logSpy: MockInstance<typeof console.log>;

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('starts a session in practice', async () => {
    const registry = new SessionRegistry({ loader, clock: () => T0, logEvents: false });

    const live = await registry.start('ks_fruit');

    expect(live.id).toMatch(/^qs_/);
    expect(live.knowledgeSetId).toBe('ks_fruit');
    expect(live.knowledgeSetName).toBe('Fruit');
    expect(live.startedAt).toEqual(new Date(T0));
    expect(live.quiz.currentStage()).toBe('practice');
    expect(registry.get(live.id)).toBe(live);
    expect(registry.size).toBe(1);
    expect(logSpy).toHaveBeenCalledWith(`[SessionRegistry] Started session ${live.id} for 'Fruit' (2 keys)`);
  });

  it('replaces the session of a set that is started again', async () => {
    const registry = new SessionRegistry({ loader, logEvents: false });

    const first = await registry.start('ks_fruit');
    const other = await registry.start('ks_rivers');
    const second = await registry.start('ks_fruit');

    expect(registry.get(first.id)).toBeUndefined();
    expect(registry.get(second.id)).toBe(second);
    expect(registry.get(other.id)).toBe(other);
    expect(registry.size).toBe(2);
  });

  it('leaves the registry untouched when the set cannot be loaded', async () => {
    const registry = new SessionRegistry({ loader, logEvents: false });

    await expect(registry.start('ks_missing')).rejects.toBeInstanceOf(KnowledgeSetNotFoundError);
    expect(registry.size).toBe(0);
  });

  it('removes sessions by id and by set', async () => {
    const registry = new SessionRegistry({ loader, logEvents: false });
    const live = await registry.start('ks_fruit');
    await registry.start('ks_rivers');

    expect(registry.remove(live.id)).toBe(true);
    expect(registry.remove(live.id)).toBe(false);
    expect(registry.removeForKnowledgeSet('ks_rivers')).toBe(1);
    expect(registry.removeForKnowledgeSet('ks_rivers')).toBe(0);
    expect(registry.size).toBe(0);
  });

  it('logs session events when enabled', async () => {
    const registry = new SessionRegistry({ loader, clock: () => T0 });
    const live = await registry.start('ks_rivers');

    live.quiz.advanceStage();

    expect(logSpy).toHaveBeenCalledWith(`[QuizSession] ${live.id}: stage practice -> quiz`);
  });

  it('hands completions to the completion logger', async () => {
    const record = vi.fn(async () => {});
    const registry = new SessionRegistry({
      loader,
      clock: () => T0,
      completionLogger: { record },
      logEvents: false,
    });
    const live = await registry.start('ks_rivers');

    live.quiz.advanceStage();
    live.quiz.submitAnswer('nile');
    const result = live.quiz.submitAnswer('Nile');

    expect(result.type).toBe('session_complete');
    expect(record).toHaveBeenCalledWith({
      timestamp: new Date(T0),
      knowledgeSetId: 'ks_rivers',
      status: 'completed',
    });
  });
});

describe('describeEvent', () => {
  it('describes each event in one line', () => {
    expect(describeEvent({ type: 'key_completed', stage: 'final', key: 'B' })).toBe("final key 'B' completed");
    expect(describeEvent({ type: 'required_correct_raised', key: 'A', requiredCorrect: 4 })).toBe(
      "key 'A' now needs 4 correct"
    );
    expect(
      describeEvent({
        type: 'gate_activated',
        reason: 'quiz_wrong_streak',
        expiresAt: new Date('2024-03-01T12:00:45Z'),
      })
    ).toBe('review gate (quiz_wrong_streak) until 2024-03-01T12:00:45.000Z');
    expect(describeEvent({ type: 'final_restarted', failedKey: 'C' })).toBe("final review restarted after 'C'");
  });
});
