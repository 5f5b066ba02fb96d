/**
 * Terminal Utilities for CLI Output Formatting
 *
 * ANSI wrappers and the formatters that turn quiz state into terminal
 * lines. Formatters return strings rather than printing, so the drill loop
 * decides where output goes.
 *
 * In non-TTY environments the escape codes pass through harmlessly.
 */

import type { KnowledgeEntry, KnowledgePair, KnowledgeSetRecord, CompletionHistoryEntry } from '../../core/models';
import type { PracticeWindow, ProgressSummary, SubmissionResult } from '../../core/quiz';
import { formatValueList } from '../../core/knowledge';

// =============================================================================
// Text Styles and Colors
// =============================================================================

export const bold = (s: string): string => `\x1b[1m${s}\x1b[0m`;
export const dim = (s: string): string => `\x1b[2m${s}\x1b[0m`;
export const green = (s: string): string => `\x1b[32m${s}\x1b[0m`;
export const yellow = (s: string): string => `\x1b[33m${s}\x1b[0m`;
export const red = (s: string): string => `\x1b[31m${s}\x1b[0m`;

/**
 * @example
 * formatSeparator(); // "──────…" (50 wide, dimmed)
 */
export function formatSeparator(width: number = 50): string {
  return dim('─'.repeat(width));
}

export function formatCommandHelp(command: string, description: string): string {
  return `  ${yellow(command.padEnd(10))} - ${dim(description)}`;
}

export const clearLine = (): string => '\x1b[2K\r';

// =============================================================================
// Knowledge Sets
// =============================================================================

export function formatPair(pair: KnowledgePair): string {
  return `  ${bold(pair.key.padEnd(3))} ${pair.values.length > 0 ? formatValueList(pair.values) : dim('(empty)')}`;
}

export function formatSetLine(set: KnowledgeSetRecord): string {
  return `  ${green(set.name)} ${dim(`(${set.id})`)}`;
}

/**
 * One line per entry, followed by a count of populated keys.
 */
export function formatEntries(entries: readonly KnowledgeEntry[]): string[] {
  const populated = entries.filter((entry) => entry.values.length > 0).length;
  return [
    ...entries.map((entry) => formatPair({ key: entry.key, values: entry.values })),
    dim(`  ${populated} of ${entries.length} keys populated`),
  ];
}

export function formatHistoryLine(entry: CompletionHistoryEntry): string {
  const name = entry.knowledgeSetName ?? dim('(deleted set)');
  return `  ${entry.timestamp.toISOString()}  ${name}  ${green(entry.status)}`;
}

// =============================================================================
// Drill Output
// =============================================================================

export function formatPracticeWindow(window: PracticeWindow): string[] {
  const nav = [
    window.hasPrevious ? 'p = previous' : null,
    window.hasNext ? 'n = next' : null,
    's = start quiz',
  ].filter((item): item is string => item !== null);

  return [
    bold(`Practice ${window.index + 1} of ${window.totalWindows}`),
    ...window.pairs.map(formatPair),
    dim(`  ${nav.join(' | ')}`),
  ];
}

/**
 * Prompt shown before each answer, e.g. `[quiz 2/5] B (1 more) > `.
 */
export function formatAnswerPrompt(progress: ProgressSummary): string {
  const position = `[${progress.stage} ${progress.completedKeys + 1}/${progress.totalKeys}]`;
  const key = progress.activeKey ?? '?';

  let need = '';
  if (progress.stage === 'quiz' && progress.requiredCorrect !== null) {
    const remaining = progress.requiredCorrect - (progress.correctForActiveKey ?? 0);
    need = ` (${remaining} more)`;
  }

  return `${dim(position)} ${bold(key)}${need} > `;
}

/**
 * Feedback lines for one submission or stage change.
 */
export function formatSubmissionResult(result: SubmissionResult): string[] {
  switch (result.type) {
    case 'blank_input':
      return [dim('Type an answer, or /quit to stop.')];

    case 'wrong': {
      const lines = [red(`Wrong. ${result.key}: ${formatValueList(result.expected)}`)];
      if (result.restarted) {
        lines.push(yellow(`Final review restarts from ${result.nextKey}.`));
      } else if (result.wrongStreak > 0) {
        lines.push(dim(`${result.wrongStreak} wrong in a row`));
      }
      return lines;
    }

    case 'duplicate_correct':
      return [yellow(`Already given: ${result.value}`)];

    case 'correct_more_needed':
      return [green(`Correct! ${result.remaining} more for ${result.key}.`)];

    case 'key_completed':
      return [green(`Correct! ${result.key} done. Next: ${result.nextKey}`)];

    case 'gate_active': {
      if (result.review === null) {
        return [yellow(`Locked for ${result.remainingSeconds}s.`)];
      }
      const lines = [red(bold('Three wrong in a row. Review the set before continuing:'))];
      if (result.requiredCorrect !== null && result.key !== null) {
        lines.push(yellow(`${result.key} now needs ${result.requiredCorrect} correct answers.`));
      }
      lines.push(...result.review.map(formatPair));
      return lines;
    }

    case 'stage_advanced':
      switch (result.stage) {
        case 'quiz':
          return [bold('Quiz: give any accepted value for each key.')];
        case 'final':
          return [
            ...(result.completedKey !== null ? [green(`Correct! ${result.completedKey} done.`)] : []),
            bold('Final review: give every value for each key, in order. One mistake restarts.'),
          ];
        default:
          return [bold(`Stage: ${result.stage}`)];
      }

    case 'session_complete':
      return [green(bold('Complete! Every key recalled.'))];
  }
}

export function formatCountdown(remainingSeconds: number): string {
  return `${clearLine()}${yellow(`Resuming in ${remainingSeconds}s...`)}`;
}

export function formatBanner(setName: string, keyCount: number): string[] {
  return [
    '',
    formatSeparator(60),
    bold('  ABC Drill'),
    formatSeparator(60),
    `  Set:  ${green(setName)}`,
    `  Keys: ${yellow(keyCount.toString())}`,
    formatSeparator(60),
    dim('  Commands: /quit (exit) | /status | /help'),
    '',
  ];
}

export function formatCommandsHelp(): string[] {
  return [
    bold('Available Commands:'),
    formatCommandHelp('/quit', 'Stop the drill'),
    formatCommandHelp('/status', 'Show progress'),
    formatCommandHelp('/help', 'Show this help message'),
  ];
}
