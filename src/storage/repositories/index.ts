/**
 * Repository Layer - Barrel Export
 *
 * @example
 * ```typescript
 * import {
 *   KnowledgeSetRepository,
 *   KnowledgeEntryRepository,
 *   CompletionRecordRepository,
 * } from '@/storage/repositories';
 *
 * const sets = new KnowledgeSetRepository(db);
 * const entries = new KnowledgeEntryRepository(db);
 * const completions = new CompletionRecordRepository(db);
 * ```
 */

export type { Repository } from './base';

export {
  KnowledgeSetRepository,
  type CreateKnowledgeSetInput,
  type UpdateKnowledgeSetInput,
} from './knowledge-set.repository';

export { KnowledgeEntryRepository } from './knowledge-entry.repository';

export { CompletionRecordRepository } from './completion-record.repository';
