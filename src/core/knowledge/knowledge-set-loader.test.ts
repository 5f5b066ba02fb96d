/**
 * KnowledgeSetLoader Unit Tests
 *
 * Uses plain object fakes in place of the repositories.
 */

import { describe, it, expect } from 'vitest';
import { KnowledgeSetLoader } from './knowledge-set-loader';
import { EmptyKnowledgeSetError, KnowledgeSetNotFoundError } from './errors';
import type { KnowledgeEntry, KnowledgeSetRecord } from '../models';

const stamp = new Date('2024-03-01T12:00:00Z');

const fruit: KnowledgeSetRecord = {
  id: 'ks_fruit',
  name: 'Fruit',
  createdAt: stamp,
  updatedAt: stamp,
};

function entry(key: string, values: string[]): KnowledgeEntry {
  return { id: `ke_${key}`, knowledgeSetId: 'ks_fruit', key, values, updatedAt: stamp };
}

function loaderWith(entries: KnowledgeEntry[]): KnowledgeSetLoader {
  return new KnowledgeSetLoader(
    { findById: async (id) => (id === fruit.id ? fruit : null) },
    { findBySetId: async () => entries }
  );
}

describe('KnowledgeSetLoader', () => {
  it('keeps only populated keys', async () => {
    const loader = loaderWith([
      entry('A', ['Apple', 'Apricot']),
      entry('B', []),
      entry('C', ['Cherry']),
    ]);

    const set = await loader.load('ks_fruit');

    expect(set.id).toBe('ks_fruit');
    expect(set.name).toBe('Fruit');
    expect([...set.entries.keys()]).toEqual(['A', 'C']);
    expect([...(set.entries.get('A') ?? [])]).toEqual(['Apple', 'Apricot']);
  });

  it('skips keys whose values are all blank', async () => {
    const loader = loaderWith([entry('A', ['  ', '']), entry('B', [' Banana '])]);

    const set = await loader.load('ks_fruit');

    expect([...set.entries.keys()]).toEqual(['B']);
    expect([...(set.entries.get('B') ?? [])]).toEqual(['Banana']);
  });

  it('throws when the set does not exist', async () => {
    await expect(loaderWith([]).load('ks_missing')).rejects.toBeInstanceOf(KnowledgeSetNotFoundError);
  });

  it('throws when no key has a value', async () => {
    const loader = loaderWith([entry('A', []), entry('B', [])]);

    await expect(loader.load('ks_fruit')).rejects.toThrow(EmptyKnowledgeSetError);
    await expect(loader.load('ks_fruit')).rejects.toThrow('No quiz questions available. Add data first.');
  });
});
