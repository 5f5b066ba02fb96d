/**
 * Knowledge Sets - Barrel Export
 *
 * Loading stored sets for a drill, logging completed drills, and the
 * comma-separated value cells used when editing entries.
 */

export { KnowledgeSetLoader } from './knowledge-set-loader';
export { CompletionLog } from './completion-log';
export { parseValueList, formatValueList, cleanValues, normalizeEntryKey } from './value-list';
export {
  KnowledgeSetNotFoundError,
  EmptyKnowledgeSetError,
  DuplicateKnowledgeSetNameError,
} from './errors';
