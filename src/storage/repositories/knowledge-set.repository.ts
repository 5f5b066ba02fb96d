/**
 * KnowledgeSet Repository Implementation
 *
 * Data access for knowledge set metadata. Creating a set also writes the
 * A–Z template: one empty entry per letter, ready to be filled in.
 * Deleting a set removes its entries (ON DELETE CASCADE) but leaves its
 * completion history alone.
 */

import { eq, sql, and, ne } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { knowledgeSets, knowledgeEntries } from '../schema';
import { ALPHABET_KEYS, generateId, type KnowledgeSetRecord } from '@/core/models';
import { DuplicateKnowledgeSetNameError } from '@/core/knowledge/errors';
import type { Repository } from './base';

/**
 * Input type for creating a new KnowledgeSet.
 */
export interface CreateKnowledgeSetInput {
  /** Optional explicit id; a fresh 'ks_' id is generated otherwise */
  id?: string;
  /** Display name, unique regardless of case */
  name: string;
}

export interface UpdateKnowledgeSetInput {
  name?: string;
}

function mapToDomain(row: typeof knowledgeSets.$inferSelect): KnowledgeSetRecord {
  return {
    id: row.id,
    name: row.name,
    // Drizzle's timestamp_ms mode already returns Date objects
    createdAt: row.createdAt,
    updatedAt: row.updatedAt,
  };
}

/**
 * Repository for KnowledgeSet records.
 *
 * @example
 * ```typescript
 * const repo = new KnowledgeSetRepository(db);
 *
 * const set = await repo.create({ name: 'Fruit' });
 * const found = await repo.findByName('fruit'); // case-insensitive
 * ```
 */
export class KnowledgeSetRepository
  implements Repository<KnowledgeSetRecord, CreateKnowledgeSetInput, UpdateKnowledgeSetInput>
{
  constructor(private readonly db: AppDatabase) {}

  async findById(id: string): Promise<KnowledgeSetRecord | null> {
    const result = await this.db
      .select()
      .from(knowledgeSets)
      .where(eq(knowledgeSets.id, id))
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Retrieves all knowledge sets ordered by name, ignoring case.
   */
  async findAll(): Promise<KnowledgeSetRecord[]> {
    const results = await this.db
      .select()
      .from(knowledgeSets)
      .orderBy(sql`${knowledgeSets.name} COLLATE NOCASE`);
    return results.map(mapToDomain);
  }

  /**
   * Finds a knowledge set by name using case-insensitive comparison.
   */
  async findByName(name: string): Promise<KnowledgeSetRecord | null> {
    const result = await this.db
      .select()
      .from(knowledgeSets)
      .where(sql`LOWER(${knowledgeSets.name}) = LOWER(${name.trim()})`)
      .limit(1);

    if (result.length === 0) {
      return null;
    }

    return mapToDomain(result[0]);
  }

  /**
   * Resolves a user-supplied reference, tried first as an id, then as a name.
   * The CLI accepts either.
   */
  async findByIdOrName(reference: string): Promise<KnowledgeSetRecord | null> {
    return (await this.findById(reference)) ?? (await this.findByName(reference));
  }

  /**
   * Creates a knowledge set together with its 26 empty template entries.
   *
   * @throws DuplicateKnowledgeSetNameError if the name is taken (ignoring case)
   */
  async create(input: CreateKnowledgeSetInput): Promise<KnowledgeSetRecord> {
    const name = input.name.trim();
    await this.assertNameAvailable(name);

    const now = new Date();
    const id = input.id ?? generateId('ks');

    const row = this.db.transaction((tx) => {
      const inserted = tx
        .insert(knowledgeSets)
        .values({ id, name, createdAt: now, updatedAt: now })
        .returning()
        .all();

      tx.insert(knowledgeEntries)
        .values(
          ALPHABET_KEYS.map((key) => ({
            id: generateId('ke'),
            knowledgeSetId: id,
            key,
            values: [],
            updatedAt: now,
          }))
        )
        .run();

      return inserted[0];
    });

    return mapToDomain(row);
  }

  /**
   * Renames a set.
   *
   * @throws Error if the set does not exist
   * @throws DuplicateKnowledgeSetNameError if another set already has the name
   */
  async update(id: string, input: UpdateKnowledgeSetInput): Promise<KnowledgeSetRecord> {
    const name = input.name?.trim();
    if (name !== undefined) {
      await this.assertNameAvailable(name, id);
    }

    const result = await this.db
      .update(knowledgeSets)
      .set({
        ...(name !== undefined && { name }),
        updatedAt: new Date(),
      })
      .where(eq(knowledgeSets.id, id))
      .returning();

    if (result.length === 0) {
      throw new Error(`KnowledgeSet with id '${id}' not found`);
    }

    return mapToDomain(result[0]);
  }

  /**
   * Marks a set as modified, e.g. after its entries change.
   */
  async touch(id: string): Promise<void> {
    await this.db
      .update(knowledgeSets)
      .set({ updatedAt: new Date() })
      .where(eq(knowledgeSets.id, id));
  }

  /**
   * Permanently deletes a set and its entries.
   *
   * @throws Error if the set does not exist
   */
  async delete(id: string): Promise<void> {
    const result = await this.db
      .delete(knowledgeSets)
      .where(eq(knowledgeSets.id, id))
      .returning({ id: knowledgeSets.id });

    if (result.length === 0) {
      throw new Error(`KnowledgeSet with id '${id}' not found`);
    }
  }

  private async assertNameAvailable(name: string, exceptId?: string): Promise<void> {
    const conditions = [sql`LOWER(${knowledgeSets.name}) = LOWER(${name})`];
    if (exceptId !== undefined) {
      conditions.push(ne(knowledgeSets.id, exceptId));
    }

    const clash = await this.db
      .select({ id: knowledgeSets.id })
      .from(knowledgeSets)
      .where(and(...conditions))
      .limit(1);

    if (clash.length > 0) {
      throw new DuplicateKnowledgeSetNameError(name);
    }
  }
}
