/**
 * Groups free-form items (place names, search results, pasted lists) into
 * the A–Z template by first letter.
 */

import { ALPHABET_KEYS } from '../models';
import { normalizeAnswer } from '../quiz/answer-matcher';

/**
 * A–Z keys to suggested values. Every letter is present; letters with no
 * suggestion map to an empty array.
 */
export type LetterSuggestions = Map<string, string[]>;

export function emptyLetterSuggestions(): LetterSuggestions {
  return new Map(ALPHABET_KEYS.map((key) => [key, []]));
}

/**
 * Files each item under the upper-cased first character. Items that do not
 * start with a letter A–Z are dropped, and repeats (after normalization) are
 * kept once, in first-seen order.
 *
 * @example
 * ```typescript
 * groupByInitial(['Blarney', 'Ballincollig', '3Arena', 'blarney']).get('B');
 * // → ['Blarney', 'Ballincollig']
 * ```
 */
export function groupByInitial(items: Iterable<string>): LetterSuggestions {
  const grouped = emptyLetterSuggestions();
  const seen = new Set<string>();

  for (const raw of items) {
    const item = raw.trim();
    if (item.length === 0) continue;

    const bucket = grouped.get(item[0].toUpperCase());
    if (!bucket) continue;

    const normalized = normalizeAnswer(item);
    if (seen.has(normalized)) continue;

    seen.add(normalized);
    bucket.push(item);
  }

  return grouped;
}
