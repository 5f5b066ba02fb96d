/**
 * CompletionRecord Repository Implementation
 *
 * Append-only store for finished drills. History listings are joined with
 * knowledge_sets so they can show the set's current name; records whose set
 * has been deleted come back with a null name.
 */

import { desc, eq, sql } from 'drizzle-orm';
import type { AppDatabase } from '../db';
import { completionRecords, knowledgeSets } from '../schema';
import { generateId, type CompletionHistoryEntry, type CompletionRecord } from '@/core/models';

export class CompletionRecordRepository {
  constructor(private readonly db: AppDatabase) {}

  /**
   * Persists a record and returns it with its generated id.
   */
  async create(record: CompletionRecord): Promise<CompletionRecord & { id: string }> {
    const result = await this.db
      .insert(completionRecords)
      .values({
        id: generateId('cr'),
        knowledgeSetId: record.knowledgeSetId,
        status: record.status,
        recordedAt: record.timestamp,
      })
      .returning();

    const row = result[0];
    return {
      id: row.id,
      timestamp: row.recordedAt,
      knowledgeSetId: row.knowledgeSetId,
      status: row.status,
    };
  }

  /**
   * Most recent first; records with the same timestamp come back in reverse
   * insertion order.
   *
   * @param limit - Maximum number of records (all when omitted)
   */
  async findRecent(limit?: number): Promise<CompletionHistoryEntry[]> {
    const query = this.db
      .select({
        id: completionRecords.id,
        knowledgeSetId: completionRecords.knowledgeSetId,
        status: completionRecords.status,
        recordedAt: completionRecords.recordedAt,
        knowledgeSetName: knowledgeSets.name,
      })
      .from(completionRecords)
      .leftJoin(knowledgeSets, eq(knowledgeSets.id, completionRecords.knowledgeSetId))
      .orderBy(desc(completionRecords.recordedAt), desc(sql`${completionRecords}.rowid`));

    const rows = limit === undefined ? await query : await query.limit(limit);

    return rows.map((row) => ({
      id: row.id,
      timestamp: row.recordedAt,
      knowledgeSetId: row.knowledgeSetId,
      status: row.status,
      knowledgeSetName: row.knowledgeSetName,
    }));
  }
}
