/**
 * Schema Bootstrap
 *
 * Applies schema.sql to a raw SQLite connection. The file only contains
 * `IF NOT EXISTS` statements, so it is safe to run against an existing
 * database on every start.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import type { Database } from 'better-sqlite3';

const SCHEMA_PATH = fileURLToPath(new URL('./schema.sql', import.meta.url));

let cachedSchema: string | undefined;

function loadSchemaSql(): string {
  cachedSchema ??= readFileSync(SCHEMA_PATH, 'utf8');
  return cachedSchema;
}

/**
 * Creates any missing tables and indexes.
 */
export function applySchema(sqlite: Database): void {
  sqlite.exec(loadSchemaSql());
}
