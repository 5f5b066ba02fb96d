/**
 * KnowledgeEntry Repository Implementation
 *
 * Data access for the key → values rows of a knowledge set. Listings come
 * back in template order (A–Z first, then any extra keys). Values are
 * stored as a JSON array and returned as `string[]`.
 */

import { and, eq, inArray } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { knowledgeEntries } from '../schema';
import {
  ALPHABET_KEYS,
  compareTemplateKeys,
  generateId,
  type KnowledgeEntry,
  type KnowledgePair,
} from '@/core/models';

function mapToDomain(row: typeof knowledgeEntries.$inferSelect): KnowledgeEntry {
  return {
    id: row.id,
    knowledgeSetId: row.knowledgeSetId,
    key: row.key,
    values: [...row.values],
    updatedAt: row.updatedAt,
  };
}

/**
 * Repository for KnowledgeEntry rows.
 *
 * Entries are keyed by `(knowledgeSetId, key)`, so this repository does not
 * follow the id-based Repository interface.
 *
 * @example
 * ```typescript
 * const entries = new KnowledgeEntryRepository(db);
 * await entries.setValues(setId, 'A', ['Apple', 'Apricot']);
 * await entries.clearKeys(setId, ['A']);
 * ```
 */
export class KnowledgeEntryRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * All entries of a set in template order, including empty ones.
   */
  async findBySetId(knowledgeSetId: string): Promise<KnowledgeEntry[]> {
    const rows = await this.db
      .select()
      .from(knowledgeEntries)
      .where(eq(knowledgeEntries.knowledgeSetId, knowledgeSetId));

    return rows.map(mapToDomain).sort((a, b) => compareTemplateKeys(a.key, b.key));
  }

  async findOne(knowledgeSetId: string, key: string): Promise<KnowledgeEntry | null> {
    const result = await this.db
      .select()
      .from(knowledgeEntries)
      .where(and(eq(knowledgeEntries.knowledgeSetId, knowledgeSetId), eq(knowledgeEntries.key, key)))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Sets a key's values, creating the entry if the key is new to the set.
   * Values are stored as given; callers clean them first.
   */
  async setValues(knowledgeSetId: string, key: string, values: string[]): Promise<KnowledgeEntry> {
    const now = new Date();

    const result = await this.db
      .insert(knowledgeEntries)
      .values({ id: generateId('ke'), knowledgeSetId, key, values, updatedAt: now })
      .onConflictDoUpdate({
        target: [knowledgeEntries.knowledgeSetId, knowledgeEntries.key],
        set: { values, updatedAt: now },
      })
      .returning();

    return mapToDomain(result[0]);
  }

  /**
   * Empties the given keys. Rows are kept so the template stays intact.
   *
   * @returns Number of entries cleared
   */
  async clearKeys(knowledgeSetId: string, keys: string[]): Promise<number> {
    if (keys.length === 0) {
      return 0;
    }

    const result = await this.db
      .update(knowledgeEntries)
      .set({ values: [], updatedAt: new Date() })
      .where(and(eq(knowledgeEntries.knowledgeSetId, knowledgeSetId), inArray(knowledgeEntries.key, keys)))
      .returning({ id: knowledgeEntries.id });

    return result.length;
  }

  /**
   * Replaces every entry of a set in one transaction. Template letters
   * missing from `pairs` come back empty; extra keys from `pairs` are added.
   */
  async replaceAll(knowledgeSetId: string, pairs: readonly KnowledgePair[]): Promise<KnowledgeEntry[]> {
    const now = new Date();
    const byKey = new Map<string, string[]>(ALPHABET_KEYS.map((key) => [key, []]));
    for (const pair of pairs) {
      byKey.set(pair.key, [...pair.values]);
    }

    this.db.transaction((tx) => {
      tx.delete(knowledgeEntries).where(eq(knowledgeEntries.knowledgeSetId, knowledgeSetId)).run();
      tx.insert(knowledgeEntries)
        .values(
          [...byKey].map(([key, values]) => ({
            id: generateId('ke'),
            knowledgeSetId,
            key,
            values,
            updatedAt: now,
          }))
        )
        .run();
    });

    return this.findBySetId(knowledgeSetId);
  }
}
