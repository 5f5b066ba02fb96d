/**
 * `sets` command: list, create, rename and delete knowledge sets.
 *
 * ```bash
 * npm run cli -- sets list
 * npm run cli -- sets create "Coffee shops in Cork"
 * npm run cli -- sets rename "Coffee shops in Cork" "Cafés"
 * npm run cli -- sets delete "Cafés"
 * ```
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { resolveSet } from '../context';
import { dim, formatSetLine, green, yellow } from '../utils/terminal';

export function createSetsCommand(getContext: () => CliContext): Command {
  const setsCmd = new Command('sets').description('Manage knowledge sets');

  setsCmd
    .command('list')
    .alias('ls')
    .description('List all knowledge sets')
    .action(async () => {
      const sets = await getContext().sets.findAll();
      if (sets.length === 0) {
        console.log(yellow('No knowledge sets yet.'));
        console.log(dim('Create one with: sets create <name>'));
        return;
      }
      for (const set of sets) {
        console.log(formatSetLine(set));
      }
    });

  setsCmd
    .command('create <name>')
    .description('Create a set with empty keys A–Z')
    .action(async (name: string) => {
      const created = await getContext().sets.create({ name });
      console.log(green(`Created "${created.name}"`) + ' ' + dim(`(${created.id})`));
    });

  setsCmd
    .command('rename <set> <new-name>')
    .description('Rename a set')
    .action(async (reference: string, newName: string) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);
      const updated = await ctx.sets.update(set.id, { name: newName });
      console.log(green(`Renamed "${set.name}" to "${updated.name}"`));
    });

  setsCmd
    .command('delete <set>')
    .alias('rm')
    .description('Delete a set and its entries (completion history is kept)')
    .action(async (reference: string) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);
      await ctx.sets.delete(set.id);
      console.log(green(`Deleted "${set.name}"`));
    });

  return setsCmd;
}
