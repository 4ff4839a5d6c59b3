/**
 * LLM Provider Abstraction
 *
 * Provides a unified interface for the language-model providers (OpenAI,
 * Anthropic and the local Claude Code CLI) so the suggestion generator can
 * switch between them without caring about SDKs.
 */

export interface LLMProvider {
  /**
   * Generate a completion from the LLM
   * @param messages Array of messages (system, user, assistant)
   * @param options Optional configuration (temperature, max_tokens, abort signal)
   * @returns LLM response with content and metadata
   * @throws ServiceRateLimitError | ServiceAuthenticationError | ServiceConnectionError | ServiceConfigurationError
   */
  generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse>;

  /**
   * Get provider name
   */
  getName(): string;
}

export interface LLMMessage {
  role: 'system' | 'user' | 'assistant';
  content: string;
}

export interface LLMGenerateOptions {
  temperature?: number;
  max_tokens?: number;
  model?: string;
  /** Ask the provider for a JSON object where it supports it */
  jsonMode?: boolean;
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
}

export interface LLMResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
}

export type LLMProviderType = 'openai' | 'anthropic' | 'claude-code';
