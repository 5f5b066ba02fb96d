/**
 * Value List Cells
 *
 * Knowledge entries are edited as a single comma-separated cell per key,
 * e.g. `Apple, Apricot`. These helpers convert between that cell and the
 * stored array of values.
 */

import { normalizeAnswer } from '../quiz/answer-matcher';

/**
 * Trims each value, drops empties, and keeps only the first of any values
 * that normalize to the same answer. Values containing commas are kept whole.
 */
export function cleanValues(values: readonly string[]): string[] {
  const seen = new Set<string>();
  const cleaned: string[] = [];

  for (const raw of values) {
    const value = raw.trim();
    if (value.length === 0) continue;

    const normalized = normalizeAnswer(value);
    if (seen.has(normalized)) continue;

    seen.add(normalized);
    cleaned.push(value);
  }

  return cleaned;
}

/**
 * Splits a cell into values.
 *
 * @example
 * parseValueList(' Apple,, apricot , APPLE') // → ['Apple', 'apricot']
 */
export function parseValueList(cell: string): string[] {
  return cleanValues(cell.split(','));
}

/**
 * Joins values back into a cell.
 */
export function formatValueList(values: readonly string[]): string {
  return values.join(', ');
}

/**
 * Trims a key and upper-cases single letters, so `b` and ` B ` both address
 * the template key `B`. Longer keys are kept as typed.
 */
export function normalizeEntryKey(key: string): string {
  const trimmed = key.trim();
  return /^[a-z]$/i.test(trimmed) ? trimmed.toUpperCase() : trimmed;
}
