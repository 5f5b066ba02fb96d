/**
 * Answer Matcher
 *
 * Normalizes learner input and compares it against the accepted values for
 * a key. Normalization trims the ends, collapses runs of internal whitespace
 * to a single space, and case-folds. Matching is exact equality of the
 * normalized forms: there is no fuzzy or partial matching.
 *
 * A candidate that is empty after trimming is not a wrong answer. Callers
 * must check {@link isBlankAnswer} first and report it as blank input.
 *
 * @example
 * ```typescript
 * const accepted = new Set(['apple', 'Apricot']);
 * matches('  APPLE ', accepted); // true
 * matches('apples', accepted);   // false
 * ```
 */

/**
 * Returns the normalized form used for all comparisons and for the
 * submitted-value bookkeeping.
 */
export function normalizeAnswer(value: string): string {
  return value.trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * True when the candidate has no content once surrounding whitespace is
 * removed.
 */
export function isBlankAnswer(candidate: string): boolean {
  return candidate.trim().length === 0;
}

/**
 * Finds the accepted value the candidate matches.
 *
 * @returns The normalized matching value, or null when nothing matches
 */
export function findMatch(candidate: string, accepted: Iterable<string>): string | null {
  const normalized = normalizeAnswer(candidate);
  if (normalized.length === 0) {
    return null;
  }

  for (const value of accepted) {
    if (normalizeAnswer(value) === normalized) {
      return normalized;
    }
  }

  return null;
}

export function matches(candidate: string, accepted: Iterable<string>): boolean {
  return findMatch(candidate, accepted) !== null;
}

/**
 * Number of distinct accepted values once normalization has merged
 * spellings that only differ in case or spacing.
 */
export function distinctValueCount(accepted: Iterable<string>): number {
  const distinct = new Set<string>();
  for (const value of accepted) {
    distinct.add(normalizeAnswer(value));
  }
  return distinct.size;
}
