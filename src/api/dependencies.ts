/**
 * API Dependencies
 *
 * Everything the routes need, built once per app. Routes receive these
 * explicitly instead of reaching for module-level singletons, so tests can
 * run the whole API against an in-memory database, a fixed clock and a
 * fake LLM client.
 */

import { config } from '../config';
import { CompletionLog, KnowledgeSetLoader } from '../core/knowledge';
import type { Clock, RandomSource } from '../core/quiz';
import { systemClock } from '../core/quiz';
import { SessionRegistry } from '../core/session';
import { SuggestionService } from '../core/suggestions';
import { AnthropicClient } from '../llm/client';
import type { LLMCompleter } from '../llm/types';
import type { AppDatabase } from '../storage/db';
import {
  CompletionRecordRepository,
  KnowledgeEntryRepository,
  KnowledgeSetRepository,
} from '../storage/repositories';

export interface ApiDependencies {
  knowledgeSets: KnowledgeSetRepository;
  knowledgeEntries: KnowledgeEntryRepository;
  completionLog: CompletionLog;
  sessions: SessionRegistry;
  suggestions: SuggestionService;
  clock: Clock;
}

export interface DependencyOverrides {
  /** Defaults to an AnthropicClient configured from the environment */
  createLLMClient?: () => LLMCompleter;
  clock?: Clock;
  /** Orders quiz keys; defaults to Math.random */
  random?: RandomSource;
  suggestionsPerKey?: number;
  logSessionEvents?: boolean;
}

export function createDependencies(db: AppDatabase, overrides: DependencyOverrides = {}): ApiDependencies {
  const knowledgeSets = new KnowledgeSetRepository(db);
  const knowledgeEntries = new KnowledgeEntryRepository(db);
  const completionLog = new CompletionLog(new CompletionRecordRepository(db));
  const clock = overrides.clock ?? systemClock;

  const sessions = new SessionRegistry({
    loader: new KnowledgeSetLoader(knowledgeSets, knowledgeEntries),
    completionLogger: completionLog,
    clock,
    random: overrides.random,
    logEvents: overrides.logSessionEvents,
  });

  const suggestions = new SuggestionService(
    overrides.createLLMClient ?? (() => new AnthropicClient()),
    overrides.suggestionsPerKey ?? config.suggestions.perKey
  );

  return { knowledgeSets, knowledgeEntries, completionLog, sessions, suggestions, clock };
}
