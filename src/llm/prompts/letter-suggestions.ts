/**
 * Letter Suggestions Prompt Builder
 *
 * Builds the request sent once per letter when filling an A–Z knowledge set
 * from a category, and parses the reply.
 *
 * The model is asked for a bare comma-separated list. Replies are still
 * treated as untrusted: numbering, bullets, quotes and trailing periods are
 * stripped, items that do not start with the requested letter are dropped,
 * and the list is cut to the requested length.
 */

/**
 * Parameters for a single letter's request.
 */
export interface LetterSuggestionPromptParams {
  /** What the examples should be, e.g. "Animals" or "Coffee shops in Cork" */
  category: string;

  /** Single upper-case letter the examples must start with */
  letter: string;

  /** How many examples to ask for */
  count: number;
}

/**
 * Builds the user message asking for `count` examples of `category`
 * starting with `letter`.
 *
 * @example
 * ```typescript
 * buildLetterSuggestionPrompt({ category: 'Fruit', letter: 'A', count: 3 });
 * // "Generate 3 examples of 'Fruit' that start with the letter 'A'. ..."
 * ```
 */
export function buildLetterSuggestionPrompt(params: LetterSuggestionPromptParams): string {
  const { category, letter, count } = params;

  return (
    `Generate ${count} examples of '${category}' that start with the letter '${letter}'. ` +
    'Return ONLY the examples as a comma-separated list, with NO explanations or numbering. ' +
    "Example format: 'Apple, Apricot, Avocado'"
  );
}

// Leading list markers the model sometimes adds despite instructions: "1.", "2)", "-", "*", "•"
const LIST_MARKER = /^(?:\d+[.)]|[-*•])\s*/;

// Quotes wrapping an item or the whole reply
const WRAPPING_QUOTES = /^["'`]+|["'`]+$/g;

function cleanItem(raw: string): string {
  return raw
    .trim()
    .replace(LIST_MARKER, '')
    .replace(WRAPPING_QUOTES, '')
    .replace(/\.$/, '')
    .trim();
}

/**
 * Parses a reply into at most `count` items starting with `letter`.
 *
 * Items are split on commas and newlines. Comparison with the letter
 * ignores case; items keep the model's spelling.
 *
 * @example
 * ```typescript
 * parseLetterSuggestionResponse('Apple, Banana, apricot, Avocado', 'A', 2);
 * // → ['Apple', 'apricot']
 * ```
 */
export function parseLetterSuggestionResponse(response: string, letter: string, count: number): string[] {
  const initial = letter.toUpperCase();
  const items: string[] = [];

  for (const part of response.split(/[,\n]/)) {
    const item = cleanItem(part);
    if (item.length === 0 || item[0].toUpperCase() !== initial) {
      continue;
    }
    items.push(item);
    if (items.length >= count) {
      break;
    }
  }

  return items;
}
