/**
 * LLM Types and Interfaces
 *
 * A thin abstraction over the Anthropic SDK types so application code (and
 * its tests) never depends on the SDK directly.
 */

/**
 * A single message in a conversation.
 */
export interface LLMMessage {
  role: 'user' | 'assistant';
  content: string;
}

/**
 * Per-request options. Anything omitted falls back to the client defaults.
 */
export interface LLMConfig {
  model?: string;

  /** Maximum number of tokens to generate */
  maxTokens?: number;

  /** 0.0 (deterministic) to 1.0 (creative). Defaults to 0.7 */
  temperature?: number;
}

/**
 * Result of a complete (non-streaming) API call.
 */
export interface LLMResponse {
  text: string;

  /** Token usage, or null if the provider did not report it */
  usage: {
    inputTokens: number;
    outputTokens: number;
  } | null;

  stopReason: 'end_turn' | 'max_tokens' | 'stop_sequence' | 'tool_use' | null;
}

/**
 * The one capability the suggestion service needs from a client.
 * AnthropicClient implements it; tests pass a fake.
 */
export interface LLMCompleter {
  complete(messages: string | LLMMessage[], config?: LLMConfig): Promise<LLMResponse>;
}

/**
 * Error types that can occur when calling the LLM API.
 */
export type LLMErrorType =
  | 'authentication'   // Invalid or missing API key
  | 'rate_limit'       // Too many requests
  | 'invalid_request'  // Bad request parameters
  | 'server_error'     // Provider-side failure
  | 'network'          // Network/connection error
  | 'timeout'          // Request took too long
  | 'unknown';

/**
 * Custom error class for LLM-related errors.
 */
export class LLMError extends Error {
  readonly type: LLMErrorType;

  /**
   * @param cause - The original error that was caught, if any
   */
  constructor(message: string, type: LLMErrorType, cause?: Error) {
    super(message, cause ? { cause } : undefined);
    this.name = 'LLMError';
    this.type = type;
  }
}
