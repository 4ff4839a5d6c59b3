/**
 * OpenAI LLM Provider
 *
 * Implements LLMProvider interface for OpenAI API
 */

import OpenAI from 'openai';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ServiceConfigurationError } from '../../utils/serviceErrors.js';
import { toServiceError } from './providerErrors.js';

export interface OpenAIProviderConfig {
  apiKey?: string;
  defaultModel?: string;
  baseURL?: string;
}

export class OpenAIProvider implements LLMProvider {
  private config: OpenAIProviderConfig;
  private client: OpenAI | null = null;

  constructor(config: OpenAIProviderConfig = {}) {
    this.config = {
      defaultModel: 'gpt-4o-mini',
      ...config,
    };
  }

  getName(): string {
    return 'openai';
  }

  private getClient(): OpenAI {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceConfigurationError('OpenAI', ['OPENAI_API_KEY']);
      }
      // Retries are owned by the suggestion generator
      this.client = new OpenAI({ apiKey: this.config.apiKey, baseURL: this.config.baseURL, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(
    messages: LLMMessage[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options?.model || this.config.defaultModel || 'gpt-4o-mini';
    const temperature = options?.temperature ?? 0.7;
    const max_tokens = options?.max_tokens;

    try {
      const response = await client.chat.completions.create(
        {
          model,
          messages: messages.map((msg) => ({
            role: msg.role,
            content: msg.content,
          })),
          temperature,
          ...(max_tokens ? { max_tokens } : {}),
          ...(options?.jsonMode ? { response_format: { type: 'json_object' as const } } : {}),
        },
        { signal: options?.signal }
      );

      return {
        content: response.choices[0]?.message?.content?.trim() ?? '',
        model: response.model,
        usage: response.usage
          ? {
              promptTokens: response.usage.prompt_tokens,
              completionTokens: response.usage.completion_tokens,
              totalTokens: response.usage.total_tokens,
            }
          : undefined,
      };
    } catch (error) {
      logger.error({ error, model }, 'Error calling OpenAI');
      throw toServiceError('OpenAI', error);
    }
  }
}
