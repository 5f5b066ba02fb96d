/**
 * Core Domain Models - Barrel Export
 *
 * These types form the contract between the quiz engine, the storage layer,
 * and the API/CLI surfaces.
 *
 * @example
 * ```typescript
 * import type { KnowledgeSet, CompletionRecord } from '@/core/models';
 * ```
 */

export {
  ALPHABET_KEYS,
  compareKeys,
  compareTemplateKeys,
  toSortedPairs,
  type KnowledgePair,
  type KnowledgeSet,
  type KnowledgeSetRecord,
  type KnowledgeEntry,
} from './knowledge-set';

export { generateId, type IdPrefix } from './ids';

export type {
  CompletionStatus,
  CompletionRecord,
  CompletionHistoryEntry,
} from './completion-record';
