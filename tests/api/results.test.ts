/**
 * Results, Health and API Root Tests
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { createTestContext, cleanupTestContext, TEST_EPOCH, type TestContext } from '../setup';
import { createTestKnowledgeSet, readData, readError, sendJson } from '../helpers';

describe('Results API', () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestContext(ctx);
    vi.restoreAllMocks();
  });

  describe('GET /api/results', () => {
    it('returns an empty list before any drill is completed', async () => {
      const response = await ctx.app.request('/api/results');

      expect(response.status).toBe(200);
      expect(await readData(response)).toEqual([]);
    });

    it('lists completions newest first and honours the limit', async () => {
      const fruit = await createTestKnowledgeSet(ctx.deps, 'Fruit');
      const rivers = await createTestKnowledgeSet(ctx.deps, 'Rivers');
      await ctx.deps.completionLog.record({
        timestamp: new Date(TEST_EPOCH),
        knowledgeSetId: fruit.id,
        status: 'completed',
      });
      await ctx.deps.completionLog.record({
        timestamp: new Date(TEST_EPOCH + 60_000),
        knowledgeSetId: rivers.id,
        status: 'completed',
      });

      const all = await readData(await ctx.app.request('/api/results'));
      expect(all).toMatchObject([
        { knowledgeSetName: 'Rivers', timestamp: '2024-03-01T12:01:00.000Z' },
        { knowledgeSetName: 'Fruit', timestamp: '2024-03-01T12:00:00.000Z' },
      ]);

      const latest = await readData(await ctx.app.request('/api/results?limit=1'));
      expect(latest).toMatchObject([{ knowledgeSetName: 'Rivers' }]);
    });

    it('keeps the history of a deleted set', async () => {
      const fruit = await createTestKnowledgeSet(ctx.deps, 'Fruit');
      await ctx.deps.completionLog.record({
        timestamp: new Date(TEST_EPOCH),
        knowledgeSetId: fruit.id,
        status: 'completed',
      });

      await sendJson(ctx.app, 'DELETE', `/api/knowledge-sets/${fruit.id}`);

      expect(await readData(await ctx.app.request('/api/results'))).toMatchObject([
        { knowledgeSetId: fruit.id, knowledgeSetName: null, status: 'completed' },
      ]);
    });

    it('rejects a limit that is not a positive integer', async () => {
      const zero = await ctx.app.request('/api/results?limit=0');
      const word = await ctx.app.request('/api/results?limit=ten');

      expect(zero.status).toBe(400);
      expect(word.status).toBe(400);
      expect((await readError(zero)).message).toBe('Invalid query parameters');
    });
  });
});

describe('Health and API root', () => {
  let ctx: TestContext;

  beforeEach(() => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    ctx = createTestContext();
  });

  afterEach(() => {
    cleanupTestContext(ctx);
    vi.restoreAllMocks();
  });

  it('reports status, version and live sessions', async () => {
    const fruit = await createTestKnowledgeSet(ctx.deps, 'Fruit', { A: ['Apple'] });
    await ctx.deps.sessions.start(fruit.id);

    const health = await readData(await ctx.app.request('/health'));

    expect(health).toMatchObject({ status: 'ok', version: '0.1.0', activeSessions: 1 });
  });

  it('describes the API at its root', async () => {
    const info = await readData(await ctx.app.request('/api'));

    expect(info).toMatchObject({ name: 'ABC Drill API', version: '0.1.0' });
  });

  it('answers unknown routes with a 404 envelope', async () => {
    const response = await ctx.app.request('/api/nothing-here');

    expect(response.status).toBe(404);
    expect(await readError(response)).toEqual({
      code: 'NOT_FOUND',
      message: 'Route GET /api/nothing-here not found',
    });
  });
});
