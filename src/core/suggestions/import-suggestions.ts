/**
 * Writes a set of letter suggestions into a stored knowledge set, replacing
 * its current entries.
 */

import type { KnowledgeSetRepository } from '../../storage/repositories/knowledge-set.repository';
import type { KnowledgeEntryRepository } from '../../storage/repositories/knowledge-entry.repository';
import type { KnowledgeEntry, KnowledgePair } from '../models';
import { KnowledgeSetNotFoundError } from '../knowledge/errors';
import { cleanValues } from '../knowledge/value-list';

export interface SuggestionImportStores {
  sets: Pick<KnowledgeSetRepository, 'findById' | 'touch'>;
  entries: Pick<KnowledgeEntryRepository, 'replaceAll'>;
}

/**
 * Replaces every entry of the set with `suggestions`. Letters without
 * suggestions end up empty.
 *
 * @throws KnowledgeSetNotFoundError if the set does not exist
 */
export async function importSuggestions(
  stores: SuggestionImportStores,
  knowledgeSetId: string,
  suggestions: ReadonlyMap<string, readonly string[]>
): Promise<KnowledgeEntry[]> {
  const set = await stores.sets.findById(knowledgeSetId);
  if (!set) {
    throw new KnowledgeSetNotFoundError(knowledgeSetId);
  }

  const pairs: KnowledgePair[] = [];
  for (const [key, values] of suggestions) {
    pairs.push({ key, values: cleanValues(values) });
  }

  const entries = await stores.entries.replaceAll(knowledgeSetId, pairs);
  await stores.sets.touch(knowledgeSetId);
  return entries;
}
