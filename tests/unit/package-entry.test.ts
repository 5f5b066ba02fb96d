/**
 * Package Entry Tests
 *
 * Drives a one-key drill using only what the package root exports.
 */

import { describe, it, expect, afterEach } from 'vitest';
import {
  KnowledgeEntryRepository,
  KnowledgeSetLoader,
  KnowledgeSetRepository,
  QuizSession,
  createDatabase,
  type AppDatabase,
} from '../../src/index';

describe('package entry', () => {
  let db: AppDatabase | undefined;

  afterEach(() => {
    db?.$client.close();
    db = undefined;
  });

  it('exposes the store, loader and session', async () => {
    db = createDatabase(':memory:');
    const sets = new KnowledgeSetRepository(db);
    const entries = new KnowledgeEntryRepository(db);

    const fruit = await sets.create({ id: 'ks_fruit', name: 'Fruit' });
    await entries.setValues(fruit.id, 'A', ['Apple']);

    const knowledgeSet = await new KnowledgeSetLoader(sets, entries).load(fruit.id);
    const session = new QuizSession(knowledgeSet, { clock: () => Date.parse('2024-03-01T12:00:00.000Z') });

    expect(session.advanceStage()).toMatchObject({ type: 'stage_advanced', stage: 'quiz' });
    expect(session.submitAnswer('apple')).toMatchObject({ type: 'stage_advanced', stage: 'final' });
    expect(session.submitAnswer('Apple')).toEqual({
      type: 'session_complete',
      record: {
        timestamp: new Date('2024-03-01T12:00:00.000Z'),
        knowledgeSetId: 'ks_fruit',
        status: 'completed',
      },
    });
  });
});
