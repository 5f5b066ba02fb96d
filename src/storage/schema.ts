/**
 * Database Schema Definitions
 *
 * Drizzle ORM table definitions for SQLite. The tables mirror
 * `schema.sql`, which is what actually creates them (see bootstrap.ts);
 * these definitions give the repositories typed queries.
 *
 * - Knowledge Sets: named collections of key → values pairs
 * - Knowledge Entries: one row per key of a set, values kept as a JSON array
 * - Completion Records: one row per finished drill
 *
 * All timestamps are stored as milliseconds since epoch (integer).
 */

import { sqliteTable, text, integer, index, uniqueIndex } from 'drizzle-orm/sqlite-core';

/**
 * Knowledge Sets Table
 *
 * Names are unique regardless of case; lookups by name are
 * case-insensitive.
 */
export const knowledgeSets = sqliteTable(
  'knowledge_sets',
  {
    // Prefixed identifier (e.g., 'ks_3f2a...')
    id: text('id').primaryKey(),

    // Display name (e.g., "Fruit")
    name: text('name').notNull(),

    createdAt: integer('created_at', { mode: 'timestamp_ms' }).notNull(),
    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [uniqueIndex('knowledge_sets_name_nocase_idx').on(table.name)]
);

/**
 * Knowledge Entries Table
 *
 * A key with an empty values array is a placeholder from the A–Z template
 * and is skipped when a drill loads the set.
 */
export const knowledgeEntries = sqliteTable(
  'knowledge_entries',
  {
    id: text('id').primaryKey(),

    knowledgeSetId: text('knowledge_set_id')
      .notNull()
      .references(() => knowledgeSets.id, { onDelete: 'cascade' }),

    // Short prompt key, usually a single letter
    key: text('key').notNull(),

    // Accepted values, in entry order
    values: text('values', { mode: 'json' }).$type<string[]>().notNull(),

    updatedAt: integer('updated_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [
    uniqueIndex('knowledge_entries_set_key_idx').on(table.knowledgeSetId, table.key),
  ]
);

/**
 * Completion Records Table
 *
 * History outlives the set it refers to, so there is no foreign key here.
 */
export const completionRecords = sqliteTable(
  'completion_records',
  {
    id: text('id').primaryKey(),
    knowledgeSetId: text('knowledge_set_id').notNull(),
    status: text('status', { enum: ['completed'] }).notNull(),
    recordedAt: integer('recorded_at', { mode: 'timestamp_ms' }).notNull(),
  },
  (table) => [index('completion_records_recorded_at_idx').on(table.recordedAt)]
);

// ============================================================================
// Inferred row types
// ============================================================================

export type KnowledgeSetRow = typeof knowledgeSets.$inferSelect;
export type NewKnowledgeSetRow = typeof knowledgeSets.$inferInsert;

export type KnowledgeEntryRow = typeof knowledgeEntries.$inferSelect;
export type NewKnowledgeEntryRow = typeof knowledgeEntries.$inferInsert;

export type CompletionRecordRow = typeof completionRecords.$inferSelect;
export type NewCompletionRecordRow = typeof completionRecords.$inferInsert;
