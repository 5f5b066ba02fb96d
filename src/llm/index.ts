/**
 * LLM Module - Barrel Export
 *
 * An abstraction layer over the Anthropic SDK, used to suggest values for
 * knowledge sets.
 *
 * @example
 * ```typescript
 * import { AnthropicClient, buildLetterSuggestionPrompt } from '@/llm';
 *
 * const client = new AnthropicClient();
 * const response = await client.complete(
 *   buildLetterSuggestionPrompt({ category: 'Animals', letter: 'Z', count: 3 })
 * );
 * ```
 */

export { AnthropicClient, type AnthropicClientOptions } from './client';

export type {
  LLMMessage,
  LLMConfig,
  LLMResponse,
  LLMCompleter,
  LLMErrorType,
} from './types';

// Value export: callers use instanceof
export { LLMError } from './types';

export {
  buildLetterSuggestionPrompt,
  parseLetterSuggestionResponse,
  type LetterSuggestionPromptParams,
} from './prompts';
