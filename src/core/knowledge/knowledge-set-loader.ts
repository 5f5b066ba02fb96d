/**
 * Knowledge Set Loader
 *
 * Turns a stored knowledge set into the immutable snapshot a QuizSession
 * runs over. Only keys with at least one value make it into the snapshot;
 * the empty letters of the A–Z template are skipped.
 */

import type { KnowledgeSetRepository } from '../../storage/repositories/knowledge-set.repository';
import type { KnowledgeEntryRepository } from '../../storage/repositories/knowledge-entry.repository';
import type { KnowledgeSet } from '../models';
import { EmptyKnowledgeSetError, KnowledgeSetNotFoundError } from './errors';
import { cleanValues } from './value-list';

export class KnowledgeSetLoader {
  constructor(
    private readonly sets: Pick<KnowledgeSetRepository, 'findById'>,
    private readonly entries: Pick<KnowledgeEntryRepository, 'findBySetId'>
  ) {}

  /**
   * @throws KnowledgeSetNotFoundError if no set has this id
   * @throws EmptyKnowledgeSetError if no key has a value
   */
  async load(knowledgeSetId: string): Promise<KnowledgeSet> {
    const record = await this.sets.findById(knowledgeSetId);
    if (!record) {
      throw new KnowledgeSetNotFoundError(knowledgeSetId);
    }

    const populated = new Map<string, ReadonlySet<string>>();
    for (const entry of await this.entries.findBySetId(knowledgeSetId)) {
      const key = entry.key.trim();
      const values = cleanValues(entry.values);
      if (key.length > 0 && values.length > 0) {
        populated.set(key, new Set(values));
      }
    }

    if (populated.size === 0) {
      throw new EmptyKnowledgeSetError(knowledgeSetId);
    }

    return { id: record.id, name: record.name, entries: populated };
  }
}
