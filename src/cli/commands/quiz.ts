/**
 * `quiz` command: an interactive drill in the terminal.
 *
 * ```bash
 * npm run cli -- quiz Fruit
 * ```
 *
 * The drill walks through the session's stages:
 *
 * 1. Practice: pairs shown four at a time; `n`/`p` to page, `s` to start
 * 2. Quiz: one accepted value per key, in shuffled order
 * 3. Final review: every value of every key, in order
 *
 * Three wrong answers in a row show the whole set and pause input for the
 * review countdown. Lines typed during the pause are read after it ends.
 */

import * as readline from 'node:readline';
import { setTimeout as delay } from 'node:timers/promises';
import { Command } from 'commander';
import { QuizSession, type CompletionLogger } from '../../core/quiz';
import type { CompletionRecord } from '../../core/models';
import type { CliContext } from '../context';
import { resolveSet } from '../context';
import {
  bold,
  dim,
  formatAnswerPrompt,
  formatBanner,
  formatCommandsHelp,
  formatCountdown,
  formatPracticeWindow,
  formatSubmissionResult,
  red,
  yellow,
} from '../utils/terminal';

/**
 * Where the drill reads answers and writes output.
 */
export interface DrillIO {
  /** One entry per line the learner typed; ends when input closes */
  lines: AsyncIterable<string>;
  /** Writes a full line */
  print(line: string): void;
  /** Writes without a newline (countdown updates) */
  write(text: string): void;
  /** Shows the input prompt */
  prompt(text: string): void;
  sleep(ms: number): Promise<void>;
}

/**
 * A completed drill carries the record to store; the session itself is not
 * given a logger, so the command decides how a failed write is reported.
 */
export type DrillOutcome = { completed: true; record: CompletionRecord } | { completed: false };

export interface CompletionReport {
  recorded: boolean;
  message: string;
}

const PRACTICE_PROMPT = 'practice > ';

const PRACTICE_COMMANDS: Record<string, 'next' | 'previous' | 'start'> = {
  n: 'next',
  next: 'next',
  p: 'previous',
  prev: 'previous',
  previous: 'previous',
  s: 'start',
  start: 'start',
};

/**
 * Runs a session until it completes, the learner types /quit, or input ends.
 */
export async function runDrill(session: QuizSession, io: DrillIO): Promise<DrillOutcome> {
  const printAll = (lines: readonly string[]) => lines.forEach((line) => io.print(line));

  const showPrompt = () => {
    if (session.currentStage() === 'practice') {
      io.prompt(PRACTICE_PROMPT);
    } else {
      io.prompt(formatAnswerPrompt(session.progressSummary()));
    }
  };

  const waitForGate = async () => {
    while (session.isLocked()) {
      io.write(formatCountdown(session.progressSummary().gateRemainingSeconds));
      await io.sleep(1000);
    }
    io.print('');
  };

  printAll(formatBanner(session.knowledgeSet.name, session.knowledgeSet.entries.size));
  printAll(formatPracticeWindow(session.practiceWindow()));
  showPrompt();

  for await (const raw of io.lines) {
    const input = raw.trim();

    if (input === '/quit') {
      io.print(yellow('Drill stopped. Only completed drills are recorded.'));
      return { completed: false };
    }

    if (input === '/help') {
      printAll(formatCommandsHelp());
      showPrompt();
      continue;
    }

    if (input === '/status') {
      const progress = session.progressSummary();
      io.print(dim(`${progress.stage}: ${progress.completedKeys} of ${progress.totalKeys} keys done`));
      showPrompt();
      continue;
    }

    if (session.currentStage() === 'practice') {
      const command = PRACTICE_COMMANDS[input.toLowerCase()];
      if (command === 'start') {
        printAll(formatSubmissionResult(session.advanceStage()));
      } else if (command !== undefined) {
        printAll(formatPracticeWindow(session.navigatePractice(command)));
      } else {
        io.print(dim('n = next | p = previous | s = start quiz'));
      }
      showPrompt();
      continue;
    }

    const result = session.submitAnswer(raw);
    printAll(formatSubmissionResult(result));

    if (result.type === 'session_complete') {
      return { completed: true, record: result.record };
    }

    if (result.type === 'gate_active') {
      await waitForGate();
    }

    showPrompt();
  }

  return { completed: false };
}

/**
 * Stores a finished drill. CompletionLog has already logged a failed write.
 */
export async function recordCompletion(
  record: CompletionRecord,
  logger: CompletionLogger
): Promise<CompletionReport> {
  try {
    await logger.record(record);
    return { recorded: true, message: bold('Recorded in results.') };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { recorded: false, message: red(`Could not record this drill in results: ${reason}`) };
  }
}

/**
 * Adapts a readline interface to DrillIO.
 */
export function readlineIO(rl: readline.Interface, output: NodeJS.WriteStream = process.stdout): DrillIO {
  return {
    lines: rl,
    print: (line) => console.log(line),
    write: (text) => {
      output.write(text);
    },
    prompt: (text) => {
      rl.setPrompt(text);
      rl.prompt();
    },
    sleep: (ms) => delay(ms),
  };
}

export function createQuizCommand(getContext: () => CliContext): Command {
  return new Command('quiz')
    .description('Drill a knowledge set interactively')
    .argument('<set>', 'Set id or name')
    .action(async (reference: string) => {
      const ctx = getContext();
      const set = await resolveSet(ctx, reference);
      const knowledgeSet = await ctx.loader.load(set.id);
      const session = new QuizSession(knowledgeSet);

      const rl = readline.createInterface({ input: process.stdin, output: process.stdout });
      let outcome: DrillOutcome;
      try {
        outcome = await runDrill(session, readlineIO(rl));
      } finally {
        rl.close();
      }

      if (outcome.completed) {
        const report = await recordCompletion(outcome.record, ctx.completionLog);
        console.log(report.message);
        if (!report.recorded) {
          process.exitCode = 1;
        }
      }
    });
}
