/**
 * Anthropic Client Wrapper
 *
 * An abstraction layer over the Anthropic SDK. It handles:
 * - API key configuration with clear error messages
 * - Non-streaming completions with an optional system prompt
 * - Error handling with typed errors
 *
 * Usage:
 * ```typescript
 * const client = new AnthropicClient();
 * const response = await client.complete('Name three fruits starting with B');
 * console.log(response.text);
 * ```
 */

import Anthropic, {
  APIError,
  APIConnectionError,
  APIConnectionTimeoutError,
  AuthenticationError,
  RateLimitError,
  BadRequestError,
  InternalServerError,
} from '@anthropic-ai/sdk';
import { config as appConfig } from '../config';
import { LLMError, type LLMCompleter, type LLMConfig, type LLMErrorType, type LLMMessage, type LLMResponse } from './types';

const DEFAULT_TEMPERATURE = 0.7;

export interface AnthropicClientOptions extends LLMConfig {
  /** Defaults to ANTHROPIC_API_KEY */
  apiKey?: string;
}

/**
 * Wrapper class for the Anthropic API client.
 */
export class AnthropicClient implements LLMCompleter {
  private client: Anthropic;

  private defaultConfig: Required<LLMConfig>;

  private systemPrompt: string | undefined;

  /**
   * @throws LLMError ('authentication') if no API key is configured
   *
   * @example
   * ```typescript
   * const client = new AnthropicClient({ maxTokens: 256, temperature: 0.5 });
   * ```
   */
  constructor(options: AnthropicClientOptions = {}) {
    const apiKey = options.apiKey ?? appConfig.anthropic.apiKey;
    if (!apiKey) {
      throw new LLMError(
        'ANTHROPIC_API_KEY environment variable is required.\n' +
          'Set it in .env or export ANTHROPIC_API_KEY=your-key-here',
        'authentication'
      );
    }

    this.client = new Anthropic({ apiKey });

    this.defaultConfig = {
      model: options.model ?? appConfig.anthropic.model,
      maxTokens: options.maxTokens ?? appConfig.anthropic.maxTokens,
      temperature: options.temperature ?? DEFAULT_TEMPERATURE,
    };
  }

  /**
   * Sets a system prompt included with all subsequent requests, or clears
   * it when passed undefined.
   */
  setSystemPrompt(prompt: string | undefined): void {
    this.systemPrompt = prompt;
  }

  getSystemPrompt(): string | undefined {
    return this.systemPrompt;
  }

  /**
   * Makes a non-streaming API call and returns the complete response.
   *
   * @param messages - A single user message, or a full conversation
   * @throws LLMError on API errors
   */
  async complete(messages: string | LLMMessage[], config: LLMConfig = {}): Promise<LLMResponse> {
    const formattedMessages = this.formatMessages(this.normalizeMessages(messages));
    const mergedConfig = this.mergeConfig(config);

    try {
      const response = await this.client.messages.create({
        model: mergedConfig.model,
        max_tokens: mergedConfig.maxTokens,
        temperature: mergedConfig.temperature,
        system: this.systemPrompt,
        messages: formattedMessages,
      });

      return {
        text: this.extractText(response.content),
        usage: {
          inputTokens: response.usage.input_tokens,
          outputTokens: response.usage.output_tokens,
        },
        stopReason: response.stop_reason,
      };
    } catch (error) {
      throw this.handleError(error);
    }
  }

  private normalizeMessages(input: string | LLMMessage[]): LLMMessage[] {
    if (typeof input === 'string') {
      return [{ role: 'user', content: input }];
    }
    return input;
  }

  private formatMessages(messages: LLMMessage[]): Anthropic.Messages.MessageParam[] {
    return messages.map((msg) => ({
      role: msg.role,
      content: msg.content,
    }));
  }

  private mergeConfig(config: LLMConfig): Required<LLMConfig> {
    return {
      model: config.model ?? this.defaultConfig.model,
      maxTokens: config.maxTokens ?? this.defaultConfig.maxTokens,
      temperature: config.temperature ?? this.defaultConfig.temperature,
    };
  }

  /**
   * Concatenates the text blocks of a response, skipping any others.
   */
  private extractText(content: Anthropic.Messages.ContentBlock[]): string {
    return content
      .filter((block): block is Anthropic.Messages.TextBlock => block.type === 'text')
      .map((block) => block.text)
      .join('');
  }

  /**
   * Converts an SDK error to a typed LLMError.
   */
  private handleError(error: unknown): LLMError {
    // APIConnectionTimeoutError extends APIConnectionError, so check it first
    if (error instanceof APIConnectionTimeoutError) {
      return new LLMError('Request to Anthropic API timed out. Please try again.', 'timeout', error);
    }

    if (error instanceof APIConnectionError) {
      return new LLMError(
        'Failed to connect to Anthropic API. Please check your network connection.',
        'network',
        error
      );
    }

    if (error instanceof APIError) {
      return new LLMError(error.message, this.mapErrorType(error), error);
    }

    const message = error instanceof Error ? error.message : 'Unknown error occurred';
    return new LLMError(message, 'unknown', error instanceof Error ? error : undefined);
  }

  private mapErrorType(error: APIError): LLMErrorType {
    if (error instanceof AuthenticationError) {
      return 'authentication';
    }
    if (error instanceof RateLimitError) {
      return 'rate_limit';
    }
    if (error instanceof BadRequestError) {
      return 'invalid_request';
    }
    if (error instanceof InternalServerError) {
      return 'server_error';
    }
    return 'unknown';
  }
}
