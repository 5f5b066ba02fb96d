/**
 * Storage Module - Barrel Export
 *
 * Usage:
 *   import { getDatabase, KnowledgeSetRepository } from '@/storage';
 *   const sets = await new KnowledgeSetRepository(getDatabase()).findAll();
 */

export { createDatabase, getDatabase, DEFAULT_DATABASE_PATH } from './db';
export type { AppDatabase } from './db';
export { applySchema } from './bootstrap';

export { knowledgeSets, knowledgeEntries, completionRecords } from './schema';

export type {
  KnowledgeSetRow,
  NewKnowledgeSetRow,
  KnowledgeEntryRow,
  NewKnowledgeEntryRow,
  CompletionRecordRow,
  NewCompletionRecordRow,
} from './schema';

export * from './repositories';
