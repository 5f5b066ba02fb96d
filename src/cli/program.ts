/**
 * CLI Program
 *
 * Builds the commander program. The context factory is only called when a
 * command runs, so `--help` never opens the database.
 */

import { Command } from 'commander';
import type { CliContext } from './context';
import { createSetsCommand } from './commands/sets';
import { createEntriesCommand } from './commands/entries';
import { createQuizCommand } from './commands/quiz';
import { createResultsCommand } from './commands/results';
import { createSuggestCommand } from './commands/suggest';
import {
  DuplicateKnowledgeSetNameError,
  EmptyKnowledgeSetError,
  KnowledgeSetNotFoundError,
} from '../core/knowledge';
import { LLMError } from '../llm/types';
import { dim, red } from './utils/terminal';

export function createProgram(createContext: () => CliContext): Command {
  let context: CliContext | undefined;
  const getContext = () => {
    context ??= createContext();
    return context;
  };

  const program = new Command('abc-drill')
    .description('Staged recall drills over A–Z knowledge sets')
    .version('0.1.0');

  program.addCommand(createSetsCommand(getContext));
  program.addCommand(createEntriesCommand(getContext));
  program.addCommand(createQuizCommand(getContext));
  program.addCommand(createResultsCommand(getContext));
  program.addCommand(createSuggestCommand(getContext));

  return program;
}

/**
 * User-facing lines for an error thrown by a command.
 */
export function describeCliError(error: unknown): string[] {
  if (error instanceof KnowledgeSetNotFoundError) {
    return [red(`Error: ${error.message}.`), dim('Use "sets list" to see available sets.')];
  }

  if (error instanceof EmptyKnowledgeSetError) {
    return [red(`Error: ${error.message}`), dim('Fill some keys with "entries set" or "suggest".')];
  }

  if (error instanceof DuplicateKnowledgeSetNameError) {
    return [red(`Error: ${error.message}.`)];
  }

  if (error instanceof LLMError && error.type === 'authentication') {
    return [
      red('Error: ANTHROPIC_API_KEY environment variable is not set.'),
      dim('Then set it: export ANTHROPIC_API_KEY=your-key-here'),
    ];
  }

  if (error instanceof Error) {
    return [red(`Error: ${error.message}`)];
  }

  return [red(`Error: ${String(error)}`)];
}
