/**
 * KnowledgeSet Domain Types
 *
 * A KnowledgeSet is the material a drill runs over: a mapping from short keys
 * (typically the letters A–Z) to one or more accepted values. For example, a
 * "Fruit" set might map `A` to `Apple, Apricot` and `B` to `Banana`.
 *
 * Sessions take an immutable snapshot of a set when they start; edits made to
 * the stored set afterwards never reach a running session.
 */

/**
 * The 26 template keys every new knowledge set starts with.
 */
export const ALPHABET_KEYS: readonly string[] = Array.from({ length: 26 }, (_, i) =>
  String.fromCharCode(65 + i)
);

/**
 * A single key with its accepted values, in display order.
 */
export interface KnowledgePair {
  key: string;
  values: string[];
}

/**
 * Immutable snapshot of a knowledge set handed to a quiz session.
 *
 * Every key in `entries` is a non-empty string and maps to a non-empty set
 * of accepted values. Order within a value set carries no meaning.
 */
export interface KnowledgeSet {
  /** Identifier of the stored set this snapshot was taken from (e.g. 'ks_abc123') */
  id: string;

  /** Human-readable name (e.g. "Coffee shops in Cork") */
  name: string;

  /** key → accepted values */
  entries: ReadonlyMap<string, ReadonlySet<string>>;
}

/**
 * Stored knowledge set metadata, as kept by the repository layer.
 */
export interface KnowledgeSetRecord {
  id: string;
  name: string;
  createdAt: Date;
  updatedAt: Date;
}

/**
 * A stored row for one key of a knowledge set. `values` may be empty: the
 * A–Z template keeps unpopulated letters around until they are filled in.
 */
export interface KnowledgeEntry {
  id: string;
  knowledgeSetId: string;
  key: string;
  values: string[];
  updatedAt: Date;
}

/**
 * Compares keys the way every listing and the final review orders them:
 * case-insensitively, with the raw string as a tie-breaker.
 */
export function compareKeys(a: string, b: string): number {
  const foldedA = a.toLowerCase();
  const foldedB = b.toLowerCase();
  if (foldedA !== foldedB) {
    return foldedA < foldedB ? -1 : 1;
  }
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

/**
 * Orders keys for editing views: the 26 template letters first, in
 * alphabetical order, then any other keys by `compareKeys`.
 */
export function compareTemplateKeys(a: string, b: string): number {
  const templateA = ALPHABET_KEYS.includes(a);
  const templateB = ALPHABET_KEYS.includes(b);
  if (templateA !== templateB) {
    return templateA ? -1 : 1;
  }
  return compareKeys(a, b);
}

/**
 * Returns the pairs of a knowledge set sorted alphabetically by key, with
 * each value list in insertion order.
 */
export function toSortedPairs(set: KnowledgeSet): KnowledgePair[] {
  return [...set.entries.entries()]
    .sort(([a], [b]) => compareKeys(a, b))
    .map(([key, values]) => ({ key, values: [...values] }));
}
