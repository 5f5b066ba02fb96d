/**
 * Suggestion Service
 *
 * Fills an A–Z knowledge set from a category by asking the LLM, one letter
 * at a time, for a few examples starting with that letter.
 *
 * Letters are requested one after another. A failed request leaves that
 * letter empty and is logged; the remaining letters still run. The only
 * failure that stops the whole run is a client that cannot be created,
 * typically because no API key is configured, and that happens before any
 * request is made.
 */

import { ALPHABET_KEYS } from '../models';
import type { LLMCompleter } from '../../llm/types';
import { buildLetterSuggestionPrompt, parseLetterSuggestionResponse } from '../../llm/prompts';
import { emptyLetterSuggestions, type LetterSuggestions } from './group-by-initial';

export const DEFAULT_SUGGESTIONS_PER_KEY = 3;

export interface SuggestOptions {
  /** Examples to keep per letter */
  perKey?: number;

  /** Letters to request; defaults to A–Z */
  letters?: readonly string[];
}

/**
 * @example
 * ```typescript
 * const service = new SuggestionService(() => new AnthropicClient());
 * const suggestions = await service.suggestForCategory('Animals', { perKey: 2 });
 * suggestions.get('Z'); // e.g. ['Zebra', 'Zebu']
 * ```
 */
export class SuggestionService {
  /**
   * @param createClient - Called once per run; may throw LLMError('authentication')
   */
  constructor(
    private readonly createClient: () => LLMCompleter,
    private readonly defaultPerKey: number = DEFAULT_SUGGESTIONS_PER_KEY
  ) {}

  async suggestForCategory(category: string, options: SuggestOptions = {}): Promise<LetterSuggestions> {
    const perKey = options.perKey ?? this.defaultPerKey;
    const letters = options.letters ?? ALPHABET_KEYS;
    const client = this.createClient();
    const results = emptyLetterSuggestions();

    for (const letter of letters) {
      const prompt = buildLetterSuggestionPrompt({ category, letter, count: perKey });

      try {
        const response = await client.complete(prompt);
        const items = parseLetterSuggestionResponse(response.text, letter, perKey);
        results.set(letter, items);
        console.log(`[Suggestions] ${letter}: ${items.length} item(s) for '${category}'`);
      } catch (error) {
        console.error(`[Suggestions] Failed to generate items for ${letter}:`, error);
        results.set(letter, []);
      }
    }

    return results;
  }
}
