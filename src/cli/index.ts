/**
 * CLI Entry Point
 *
 * Usage:
 * ```bash
 * npm run cli -- sets list
 * npm run cli -- sets create Fruit
 * npm run cli -- entries set Fruit A "Apple, Apricot"
 * npm run cli -- quiz Fruit
 * npm run cli -- results
 * npm run cli -- suggest Fruit "fruit" --per-key 2
 * ```
 *
 * Uses DATABASE_PATH (default abc-drill.db) for storage.
 */

import { getDatabase } from '../storage/db';
import { createCliContext } from './context';
import { createProgram, describeCliError } from './program';

async function main(): Promise<void> {
  const program = createProgram(() => createCliContext(getDatabase()));
  await program.parseAsync(process.argv);
}

main().catch((error: unknown) => {
  for (const line of describeCliError(error)) {
    console.error(line);
  }
  process.exit(1);
});
