/**
 * Schema Setup Runner
 *
 * Creates the database file (if needed) and applies schema.sql to it. The
 * schema only uses CREATE ... IF NOT EXISTS, so running this repeatedly is
 * safe. Opening the database through createDatabase() applies the same
 * schema, so this script is only needed to prepare a file ahead of time.
 *
 * Usage:
 *   npm run db:migrate
 *   DATABASE_PATH=/path/to/db npm run db:migrate
 */

import Database from 'better-sqlite3';
import { config } from '../config';
import { applySchema } from './bootstrap';

const dbPath = config.database.path;

console.log(`[migrate] Database path: ${dbPath}`);

try {
  const sqlite = new Database(dbPath);
  sqlite.pragma('foreign_keys = ON');

  applySchema(sqlite);
  console.log('[migrate] Schema applied.');

  const tables = sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type='table' AND name NOT LIKE 'sqlite_%' ORDER BY name"
    )
    .all();

  console.log('[migrate] Tables in database:');
  for (const table of tables) {
    console.log(`  - ${table.name}`);
  }

  const foreignKeys = sqlite.pragma('foreign_keys', { simple: true });
  console.log(`[migrate] Foreign key enforcement: ${foreignKeys === 1 ? 'ENABLED' : 'DISABLED'}`);

  sqlite.close();
} catch (error) {
  console.error('[migrate] Schema setup failed:', error);
  process.exit(1);
}
