/**
 * `suggest` command: fill a set from a category using the LLM.
 *
 * ```bash
 * npm run cli -- suggest Fruit "fruit" --per-key 2
 * ```
 *
 * Replaces the set's current entries. Needs ANTHROPIC_API_KEY.
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { resolveSet } from '../context';
import { importSuggestions } from '../../core/suggestions';
import { dim, formatEntries, green } from '../utils/terminal';

export function createSuggestCommand(getContext: () => CliContext): Command {
  return new Command('suggest')
    .description('Generate entries for a category with the LLM (replaces current entries)')
    .argument('<set>', 'Set id or name')
    .argument('<category>', 'What the entries should be, e.g. "rivers of Europe"')
    .option('-k, --per-key <count>', 'Examples per letter')
    .action(async (reference: string, category: string, options: { perKey?: string }) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);

      let perKey: number | undefined;
      if (options.perKey !== undefined) {
        perKey = Number.parseInt(options.perKey, 10);
        if (!Number.isInteger(perKey) || perKey < 1) {
          throw new Error(`Invalid --per-key: ${options.perKey}`);
        }
      }

      console.log(dim(`Asking for '${category}', one letter at a time...`));
      const suggestions = await ctx.suggestions.suggestForCategory(category, { perKey });
      const entries = await importSuggestions({ sets: ctx.sets, entries: ctx.entries }, set.id, suggestions);

      console.log(green(set.name));
      for (const line of formatEntries(entries)) {
        console.log(line);
      }
    });
}
