/**
 * `results` command: completed drills, most recent first.
 */

import { Command } from 'commander';
import type { CliContext } from '../context';
import { bold, dim, formatHistoryLine } from '../utils/terminal';

export function createResultsCommand(getContext: () => CliContext): Command {
  return new Command('results')
    .description('Show completed drills')
    .option('-n, --limit <count>', 'How many to show', '20')
    .action(async (options: { limit: string }) => {
      const limit = Number.parseInt(options.limit, 10);
      if (!Number.isInteger(limit) || limit < 1) {
        throw new Error(`Invalid limit: ${options.limit}`);
      }

      const history = await getContext().completionLog.history(limit);
      if (history.length === 0) {
        console.log(dim('No completed drills yet.'));
        return;
      }

      console.log(bold('Quiz Results'));
      for (const entry of history) {
        console.log(formatHistoryLine(entry));
      }
    });
}
