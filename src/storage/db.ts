/**
 * Database Connection Factory
 *
 * Opens SQLite through better-sqlite3 and wraps it with Drizzle ORM. Every
 * connection gets foreign key enforcement and the schema applied before it
 * is handed out.
 *
 * Usage:
 *   // Shared connection for the server and CLI
 *   import { getDatabase } from '@/storage/db';
 *   const db = getDatabase();
 *
 *   // Or a private one, e.g. in-memory for tests
 *   import { createDatabase } from '@/storage/db';
 *   const testDb = createDatabase(':memory:');
 */

import Database from 'better-sqlite3';
import { drizzle } from 'drizzle-orm/better-sqlite3';
import { config } from '../config';
import { applySchema } from './bootstrap';
import * as schema from './schema';

export const DEFAULT_DATABASE_PATH = 'abc-drill.db';

/**
 * Creates a Drizzle ORM instance over the SQLite file at `dbPath`.
 *
 * @param dbPath - Path to the database file, or ':memory:'
 *
 * @example
 * const db = createDatabase('/var/data/abc-drill.db');
 * db.$client.close();
 */
export function createDatabase(dbPath: string = DEFAULT_DATABASE_PATH) {
  const sqlite = new Database(dbPath);

  // SQLite ships with foreign keys off; entries rely on ON DELETE CASCADE
  sqlite.pragma('foreign_keys = ON');

  applySchema(sqlite);

  return drizzle(sqlite, { schema });
}

/**
 * Type alias for the Drizzle database instance.
 */
export type AppDatabase = ReturnType<typeof createDatabase>;

let sharedDatabase: AppDatabase | undefined;

/**
 * Returns the process-wide connection, opening it on first use at
 * DATABASE_PATH (or abc-drill.db in the working directory).
 */
export function getDatabase(): AppDatabase {
  sharedDatabase ??= createDatabase(config.database.path);
  return sharedDatabase;
}
