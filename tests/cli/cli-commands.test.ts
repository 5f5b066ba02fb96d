/**
 * CLI Command Tests
 *
 * Runs the commander program in-process against an in-memory database and
 * a fake LLM client, capturing what the commands print. ANSI styling is
 * stripped before comparing lines.
 */

import { describe, it, expect, beforeEach, afterEach, vi, type MockInstance } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { stripVTControlCharacters } from 'node:util';
import { createTestDatabase, cleanupTestDatabase, TEST_EPOCH } from '../setup';
import { FakeCompleter } from '../helpers';
import type { AppDatabase } from '../../src/storage/db';
import { createCliContext, type CliContext } from '../../src/cli/context';
import { createProgram, describeCliError } from '../../src/cli/program';
import { EmptyKnowledgeSetError, KnowledgeSetNotFoundError } from '../../src/core/knowledge';
import { LLMError } from '../../src/llm/types';

describe('CLI commands', () => {
  let db: AppDatabase;
  let ctx: CliContext;
  let llm: FakeCompleter;
  let logSpy: MockInstance<typeof console.log>;

  async function run(...args: string[]): Promise<void> {
    await createProgram(() => ctx).parseAsync(['node', 'abc-drill', ...args]);
  }

  function printed(): string[] {
    return logSpy.mock.calls.map((call) => stripVTControlCharacters(call.map(String).join(' ')));
  }

  beforeEach(() => {
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    db = createTestDatabase();
    llm = new FakeCompleter({ A: 'Apple, Apricot', B: 'Blueberry' });
    ctx = createCliContext(db, () => llm);
  });

  afterEach(() => {
    cleanupTestDatabase(db);
    vi.restoreAllMocks();
  });

  // ==========================================================================
  // sets
  // ==========================================================================

  describe('sets', () => {
    it('says when there are no sets', async () => {
      await run('sets', 'list');

      expect(printed()).toEqual(['No knowledge sets yet.', 'Create one with: sets create <name>']);
    });

    it('creates, lists, renames and deletes a set', async () => {
      await run('sets', 'create', 'Fruit');
      const fruit = await ctx.sets.findByName('Fruit');
      expect(printed()).toEqual([`Created "Fruit" (${fruit?.id})`]);

      logSpy.mockClear();
      await run('sets', 'ls');
      expect(printed()).toEqual([`  Fruit (${fruit?.id})`]);

      logSpy.mockClear();
      await run('sets', 'rename', 'fruit', 'Fruits');
      expect(printed()).toEqual(['Renamed "Fruit" to "Fruits"']);

      logSpy.mockClear();
      await run('sets', 'rm', 'Fruits');
      expect(printed()).toEqual(['Deleted "Fruits"']);
      expect(await ctx.sets.findAll()).toEqual([]);
    });

    it('fails on an unknown set', async () => {
      await expect(run('sets', 'delete', 'Vegetables')).rejects.toBeInstanceOf(KnowledgeSetNotFoundError);
    });
  });

  // ==========================================================================
  // entries
  // ==========================================================================

  describe('entries', () => {
    let tempDir: string | undefined;

    beforeEach(async () => {
      await ctx.sets.create({ name: 'Fruit' });
      logSpy.mockClear();
    });

    afterEach(() => {
      if (tempDir) {
        rmSync(tempDir, { recursive: true, force: true });
        tempDir = undefined;
      }
    });

    it('sets a key from a comma-separated cell', async () => {
      await run('entries', 'set', 'Fruit', 'a', 'Apple, Apricot, apple');

      expect(printed()).toEqual(['A: Apple, Apricot']);
    });

    it('shows every key with a populated count', async () => {
      await run('entries', 'set', 'Fruit', 'A', 'Apple, Apricot');
      logSpy.mockClear();

      await run('entries', 'show', 'Fruit');

      const lines = printed();
      expect(lines).toHaveLength(28);
      expect(lines[0]).toBe('Fruit');
      expect(lines[1]).toBe('  A   Apple, Apricot');
      expect(lines[2]).toBe('  B   (empty)');
      expect(lines[27]).toBe('  1 of 26 keys populated');
    });

    it('clears keys', async () => {
      await run('entries', 'set', 'Fruit', 'A', 'Apple');
      logSpy.mockClear();

      await run('entries', 'clear', 'Fruit', 'a', 'Zz');
      await run('entries', 'clear', 'Fruit', 'Zz');

      expect(printed()).toEqual(['Cleared 1 key(s)', 'No matching keys']);
    });

    it('imports items from a file, one per line', async () => {
      tempDir = mkdtempSync(join(tmpdir(), 'abc-drill-'));
      const file = join(tempDir, 'fruit.txt');
      writeFileSync(file, 'Apple\r\nBanana\n\nblueberry\n42\n');

      await run('entries', 'import', 'Fruit', file);

      expect(printed()).toEqual(['Imported into "Fruit": 2 key(s) populated']);
      const fruit = await ctx.sets.findByName('Fruit');
      expect((await ctx.entries.findOne(fruit?.id ?? '', 'B'))?.values).toEqual(['Banana', 'blueberry']);
    });
  });

  // ==========================================================================
  // suggest
  // ==========================================================================

  describe('suggest', () => {
    beforeEach(async () => {
      await ctx.sets.create({ name: 'Fruit' });
      logSpy.mockClear();
    });

    it('fills the set from the LLM', async () => {
      await run('suggest', 'Fruit', 'fruit', '--per-key', '1');

      const lines = printed();
      expect(lines[0]).toBe("Asking for 'fruit', one letter at a time...");
      expect(lines).toContain('  A   Apple');
      expect(lines).toContain('  B   Blueberry');
      expect(lines).toContain('  2 of 26 keys populated');
      expect(llm.prompts).toHaveLength(26);
    });

    it('rejects a per-key count below one', async () => {
      await expect(run('suggest', 'Fruit', 'fruit', '-k', '0')).rejects.toThrow('Invalid --per-key: 0');
      expect(llm.prompts).toEqual([]);
    });
  });

  // ==========================================================================
  // results
  // ==========================================================================

  describe('results', () => {
    it('says when nothing has been completed', async () => {
      await run('results');

      expect(printed()).toEqual(['No completed drills yet.']);
    });

    it('lists completed drills', async () => {
      const fruit = await ctx.sets.create({ name: 'Fruit' });
      await ctx.completionLog.record({
        timestamp: new Date(TEST_EPOCH),
        knowledgeSetId: fruit.id,
        status: 'completed',
      });
      logSpy.mockClear();

      await run('results', '--limit', '5');

      expect(printed()).toEqual(['Quiz Results', '  2024-03-01T12:00:00.000Z  Fruit  completed']);
    });

    it('rejects a limit that is not a positive integer', async () => {
      await expect(run('results', '-n', '0')).rejects.toThrow('Invalid limit: 0');
    });
  });
});

describe('describeCliError', () => {
  const plain = (error: unknown): string[] => describeCliError(error).map((line) => stripVTControlCharacters(line));

  it('points to the set list for an unknown set', () => {
    expect(plain(new KnowledgeSetNotFoundError('Vegetables'))).toEqual([
      "Error: Knowledge set 'Vegetables' not found.",
      'Use "sets list" to see available sets.',
    ]);
  });

  it('explains how to fill an empty set', () => {
    expect(plain(new EmptyKnowledgeSetError('ks_fruit'))).toEqual([
      'Error: No quiz questions available. Add data first.',
      'Fill some keys with "entries set" or "suggest".',
    ]);
  });

  it('explains a missing API key', () => {
    expect(plain(new LLMError('no key', 'authentication'))).toEqual([
      'Error: ANTHROPIC_API_KEY environment variable is not set.',
      'Then set it: export ANTHROPIC_API_KEY=your-key-here',
    ]);
  });

  it('falls back to the message', () => {
    expect(plain(new Error('disk full'))).toEqual(['Error: disk full']);
    expect(plain('odd')).toEqual(['Error: odd']);
  });
});
