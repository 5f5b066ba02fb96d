/**
 * CLI Context
 *
 * The repositories and services every command works with, created once per
 * run. The LLM client is only created when a command asks for suggestions,
 * so the other commands work without an API key.
 */

import { config } from '../config';
import { CompletionLog, KnowledgeSetLoader, KnowledgeSetNotFoundError } from '../core/knowledge';
import type { KnowledgeSetRecord } from '../core/models';
import { SuggestionService } from '../core/suggestions';
import { AnthropicClient } from '../llm/client';
import type { LLMCompleter } from '../llm/types';
import type { AppDatabase } from '../storage/db';
import {
  CompletionRecordRepository,
  KnowledgeEntryRepository,
  KnowledgeSetRepository,
} from '../storage/repositories';

export interface CliContext {
  sets: KnowledgeSetRepository;
  entries: KnowledgeEntryRepository;
  loader: KnowledgeSetLoader;
  completionLog: CompletionLog;
  suggestions: SuggestionService;
}

export function createCliContext(
  db: AppDatabase,
  createLLMClient: () => LLMCompleter = () => new AnthropicClient()
): CliContext {
  const sets = new KnowledgeSetRepository(db);
  const entries = new KnowledgeEntryRepository(db);

  return {
    sets,
    entries,
    loader: new KnowledgeSetLoader(sets, entries),
    completionLog: new CompletionLog(new CompletionRecordRepository(db)),
    suggestions: new SuggestionService(createLLMClient, config.suggestions.perKey),
  };
}

/**
 * Looks a set up by id or by name (ignoring case).
 *
 * @throws KnowledgeSetNotFoundError
 */
export async function resolveSet(ctx: CliContext, reference: string): Promise<KnowledgeSetRecord> {
  const set = await ctx.sets.findByIdOrName(reference.trim());
  if (!set) {
    throw new KnowledgeSetNotFoundError(reference);
  }
  return set;
}
