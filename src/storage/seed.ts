/**
 * Database Seed Runner
 *
 * Creates the sample knowledge sets from seeds/sample-sets.json. Sets that
 * already exist (by name, ignoring case) are skipped unless --force is
 * given, in which case they are deleted and recreated.
 *
 * Usage:
 *   npm run db:seed
 *   npm run db:seed -- --force
 */

import { getDatabase } from './db';
import { KnowledgeEntryRepository, KnowledgeSetRepository } from './repositories';
import { loadSampleSets, seedKnowledgeSets } from './seeds';

async function main(): Promise<void> {
  const force = process.argv.slice(2).includes('--force');

  console.log('Seeding database...');
  if (force) {
    console.log('(--force enabled: will reseed existing data)');
  }
  console.log('');

  const db = getDatabase();
  const summary = await seedKnowledgeSets(
    { sets: new KnowledgeSetRepository(db), entries: new KnowledgeEntryRepository(db) },
    loadSampleSets(),
    force
  );

  console.log('');
  console.log(`Seeding complete: ${summary.seeded.length} created, ${summary.skipped.length} skipped.`);
}

main().catch((error: unknown) => {
  console.error('[seed] Seeding failed:', error);
  process.exit(1);
});
