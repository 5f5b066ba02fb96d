/**
 * Sample Knowledge Sets
 *
 * Demo sets read from sample-sets.json, used by `npm run db:seed`.
 */

import { readFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import type { KnowledgeEntryRepository, KnowledgeSetRepository } from '../repositories';

const sampleSetSchema = z.object({
  name: z.string().trim().min(1),
  entries: z.record(z.string(), z.array(z.string())),
});

export type SampleSet = z.infer<typeof sampleSetSchema>;

const SAMPLE_SETS_PATH = fileURLToPath(new URL('./sample-sets.json', import.meta.url));

/**
 * @throws ZodError if the file does not hold an array of sets
 */
export function loadSampleSets(path: string = SAMPLE_SETS_PATH): SampleSet[] {
  const raw: unknown = JSON.parse(readFileSync(path, 'utf-8'));
  return z.array(sampleSetSchema).parse(raw);
}

export interface SeedStores {
  sets: Pick<KnowledgeSetRepository, 'findByName' | 'create' | 'delete'>;
  entries: Pick<KnowledgeEntryRepository, 'replaceAll'>;
}

export interface SeedSummary {
  seeded: string[];
  skipped: string[];
}

/**
 * Creates each sample set that does not exist yet. With `force`, existing
 * sets of the same name are deleted and recreated.
 */
export async function seedKnowledgeSets(
  stores: SeedStores,
  samples: readonly SampleSet[],
  force = false
): Promise<SeedSummary> {
  const summary: SeedSummary = { seeded: [], skipped: [] };

  for (const sample of samples) {
    const existing = await stores.sets.findByName(sample.name);

    if (existing) {
      if (!force) {
        console.log(`  Skipping "${sample.name}" - already exists (use --force to reseed)`);
        summary.skipped.push(sample.name);
        continue;
      }

      console.log(`  Deleting existing "${sample.name}"...`);
      await stores.sets.delete(existing.id);
    }

    const created = await stores.sets.create({ name: sample.name });
    const pairs = Object.entries(sample.entries).map(([key, values]) => ({ key, values }));
    await stores.entries.replaceAll(created.id, pairs);

    console.log(`  Created "${sample.name}" (${created.id}) with ${pairs.length} populated keys`);
    summary.seeded.push(sample.name);
  }

  return summary;
}
