/**
 * Test Helpers Module
 *
 * Request helpers for driving the Hono app, envelope readers, a fake LLM
 * client, and fixtures for knowledge sets.
 */

import type { Hono } from 'hono';
import { z } from 'zod';
import type { ApiDependencies } from '../src/api/dependencies';
import type { ApiError } from '../src/api/types';
import type { KnowledgeSet, KnowledgeSetRecord } from '../src/core/models';
import type { LLMCompleter, LLMMessage, LLMResponse } from '../src/llm/types';

// ============================================================================
// Fake LLM
// ============================================================================

/** Reply text (or a thrown error) per requested letter */
export type FakeReplies = Record<string, string | Error>;

/**
 * Answers letter-suggestion prompts from a fixed table. Letters without an
 * entry get an empty reply.
 */
export class FakeCompleter implements LLMCompleter {
  readonly prompts: string[] = [];

  constructor(private readonly replies: FakeReplies) {}

  async complete(messages: string | LLMMessage[]): Promise<LLMResponse> {
    const prompt = typeof messages === 'string' ? messages : messages.map((m) => m.content).join('\n');
    this.prompts.push(prompt);

    const letter = /start with the letter '([A-Z])'/.exec(prompt)?.[1] ?? '';
    const reply = this.replies[letter] ?? '';
    if (reply instanceof Error) {
      throw reply;
    }
    return { text: reply, usage: null, stopReason: 'end_turn' };
  }
}

// ============================================================================
// Requests
// ============================================================================

export async function postJson(app: Hono, path: string, body?: unknown): Promise<Response> {
  return app.request(path, {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

export async function sendJson(
  app: Hono,
  method: 'PUT' | 'PATCH' | 'DELETE',
  path: string,
  body?: unknown
): Promise<Response> {
  return app.request(path, {
    method,
    headers: { 'Content-Type': 'application/json' },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
}

// ============================================================================
// Envelopes
// ============================================================================

const envelopeSchema = z.union([
  z.object({ success: z.literal(true), data: z.unknown() }),
  z.object({
    success: z.literal(false),
    error: z.object({
      code: z.string(),
      message: z.string(),
      details: z.unknown().optional(),
    }),
  }),
]);

/**
 * Reads the `data` of a success envelope.
 *
 * @throws Error when the response is an error envelope
 */
export async function readData(response: Response): Promise<unknown> {
  const body = envelopeSchema.parse(await response.json());
  if (!body.success) {
    throw new Error(`Expected success, got ${body.error.code}: ${body.error.message}`);
  }
  return body.data;
}

/**
 * Reads the `data` of a success envelope and parses it with `schema`.
 */
export async function readDataAs<T extends z.ZodTypeAny>(response: Response, schema: T): Promise<z.output<T>> {
  return schema.parse(await readData(response));
}

/**
 * Reads the `error` of an error envelope.
 *
 * @throws Error when the response is a success envelope
 */
export async function readError(response: Response): Promise<ApiError> {
  const body = envelopeSchema.parse(await response.json());
  if (body.success) {
    throw new Error('Expected an error envelope, got success');
  }
  return body.error;
}

/** Just enough of a stored set to reach its id */
export const idSchema = z.object({ id: z.string() }).passthrough();

// ============================================================================
// Fixtures
// ============================================================================

/**
 * Creates a stored set and fills the given keys.
 *
 * @example
 * ```typescript
 * const fruit = await createTestKnowledgeSet(ctx.deps, 'Fruit', { A: ['Apple'], B: ['Banana'] });
 * ```
 */
export async function createTestKnowledgeSet(
  deps: Pick<ApiDependencies, 'knowledgeSets' | 'knowledgeEntries'>,
  name: string,
  entries: Record<string, string[]> = {}
): Promise<KnowledgeSetRecord> {
  const set = await deps.knowledgeSets.create({ name });
  for (const [key, values] of Object.entries(entries)) {
    await deps.knowledgeEntries.setValues(set.id, key, values);
  }
  return set;
}

/**
 * An in-memory snapshot for driving a QuizSession directly.
 */
export function knowledgeSetOf(
  entries: Record<string, string[]>,
  name: string = 'Fruit',
  id: string = 'ks_fruit'
): KnowledgeSet {
  return {
    id,
    name,
    entries: new Map(Object.entries(entries).map(([key, values]) => [key, new Set(values)])),
  };
}
