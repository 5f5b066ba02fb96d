/**
 * `entries` command: show and edit the keys of a knowledge set.
 *
 * ```bash
 * npm run cli -- entries show Fruit
 * npm run cli -- entries set Fruit A "Apple, Apricot"
 * npm run cli -- entries clear Fruit A B
 * npm run cli -- entries import Fruit fruit.txt
 * ```
 *
 * `import` reads one item per line and files each under its first letter,
 * replacing the set's current entries.
 */

import { readFile } from 'node:fs/promises';
import { Command } from 'commander';
import type { CliContext } from '../context';
import { resolveSet } from '../context';
import { formatValueList, normalizeEntryKey, parseValueList } from '../../core/knowledge';
import { groupByInitial, importSuggestions } from '../../core/suggestions';
import { dim, formatEntries, green, yellow } from '../utils/terminal';

export function createEntriesCommand(getContext: () => CliContext): Command {
  const entriesCmd = new Command('entries').description('Show and edit the keys of a knowledge set');

  entriesCmd
    .command('show <set>')
    .description('Show every key and its values')
    .action(async (reference: string) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);
      console.log(green(set.name));
      for (const line of formatEntries(await ctx.entries.findBySetId(set.id))) {
        console.log(line);
      }
    });

  entriesCmd
    .command('set <set> <key> <values>')
    .description('Set the values of a key (comma-separated)')
    .action(async (reference: string, rawKey: string, cell: string) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);
      const key = normalizeEntryKey(rawKey);
      if (key.length === 0) {
        throw new Error('Key must not be blank');
      }

      const entry = await ctx.entries.setValues(set.id, key, parseValueList(cell));
      await ctx.sets.touch(set.id);

      const shown = entry.values.length > 0 ? formatValueList(entry.values) : dim('(empty)');
      console.log(`${green(entry.key)}: ${shown}`);
    });

  entriesCmd
    .command('clear <set> <keys...>')
    .description('Remove the values of one or more keys')
    .action(async (reference: string, keys: string[]) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);
      const cleared = await ctx.entries.clearKeys(set.id, keys.map(normalizeEntryKey));
      await ctx.sets.touch(set.id);
      console.log(cleared > 0 ? green(`Cleared ${cleared} key(s)`) : yellow('No matching keys'));
    });

  entriesCmd
    .command('import <set> <file>')
    .description('Replace all entries with items from a file, one per line, grouped by first letter')
    .action(async (reference: string, file: string) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);
      const items = (await readFile(file, 'utf-8')).split(/\r?\n/);

      const entries = await importSuggestions(
        { sets: ctx.sets, entries: ctx.entries },
        set.id,
        groupByInitial(items)
      );
      const populated = entries.filter((entry) => entry.values.length > 0).length;
      console.log(green(`Imported into "${set.name}": ${populated} key(s) populated`));
    });

  return entriesCmd;
}
