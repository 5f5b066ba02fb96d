/**
 * Test Setup Module
 *
 * Builds isolated test environments: an in-memory SQLite database with the
 * schema applied, the API dependencies wired to a controllable clock and a
 * fake LLM client, and the Hono app on top. Every test gets its own
 * context, so nothing leaks between tests.
 */

import type { Hono } from 'hono';
import { createDatabase, type AppDatabase } from '../src/storage/db';
import { createDependencies, type ApiDependencies } from '../src/api/dependencies';
import { createApp } from '../src/api/app';
import type { RateLimitConfig } from '../src/api/middleware';
import { LLMError } from '../src/llm/types';
import { FakeCompleter, type FakeReplies } from './helpers';

// ============================================================================
// Clock
// ============================================================================

/** 2024-03-01T12:00:00.000Z, the start time of every test clock */
export const TEST_EPOCH = Date.parse('2024-03-01T12:00:00.000Z');

/**
 * A clock that only moves when told to.
 *
 * @example
 * ```typescript
 * const clock = new TestClock();
 * session.submitAnswer('kiwi', clock.read());
 * clock.advance(45_000);
 * ```
 */
export class TestClock {
  private current: number;

  constructor(start: number = TEST_EPOCH) {
    this.current = start;
  }

  /** Bound so it can be handed over as a Clock */
  read = (): number => this.current;

  advance(ms: number): void {
    this.current += ms;
  }
}

/**
 * Always picks the last remaining item, which leaves a Fisher–Yates
 * shuffle in its original (alphabetical) order.
 */
export const keepOrder = (): number => 0.999;

// ============================================================================
// Database
// ============================================================================

export function createTestDatabase(): AppDatabase {
  return createDatabase(':memory:');
}

export function cleanupTestDatabase(db: AppDatabase): void {
  db.$client.close();
}

// ============================================================================
// API Context
// ============================================================================

export interface TestContextOptions {
  /** Replies of the fake LLM, by letter */
  replies?: FakeReplies;
  /** Make LLM client creation fail as it does without an API key */
  llmUnavailable?: boolean;
  suggestionRateLimit?: Partial<RateLimitConfig>;
}

export interface TestContext {
  db: AppDatabase;
  deps: ApiDependencies;
  app: Hono;
  clock: TestClock;
  llm: FakeCompleter;
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const db = createTestDatabase();
  const clock = new TestClock();
  const llm = new FakeCompleter(options.replies ?? {});

  const deps = createDependencies(db, {
    createLLMClient: () => {
      if (options.llmUnavailable) {
        throw new LLMError('ANTHROPIC_API_KEY environment variable is not set', 'authentication');
      }
      return llm;
    },
    clock: clock.read,
    random: keepOrder,
    suggestionsPerKey: 2,
    logSessionEvents: false,
  });

  const app = createApp(deps, {
    logRequests: false,
    suggestionRateLimit: options.suggestionRateLimit,
  });

  return { db, deps, app, clock, llm };
}

export function cleanupTestContext(ctx: TestContext): void {
  cleanupTestDatabase(ctx.db);
}
