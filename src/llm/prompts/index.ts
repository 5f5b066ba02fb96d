/**
 * LLM Prompts Module - Barrel Export
 *
 * @example
 * ```typescript
 * import { buildLetterSuggestionPrompt, parseLetterSuggestionResponse } from '@/llm/prompts';
 *
 * const prompt = buildLetterSuggestionPrompt({ category: 'Fruit', letter: 'B', count: 3 });
 * const response = await client.complete(prompt);
 * const items = parseLetterSuggestionResponse(response.text, 'B', 3);
 * ```
 */

export {
  buildLetterSuggestionPrompt,
  parseLetterSuggestionResponse,
  type LetterSuggestionPromptParams,
} from './letter-suggestions';
