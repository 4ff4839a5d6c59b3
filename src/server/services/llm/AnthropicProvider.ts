/**
 * Anthropic LLM Provider
 *
 * Implements LLMProvider interface for the Anthropic Messages API.
 * System messages are folded into the request's `system` field.
 */

import Anthropic from '@anthropic-ai/sdk';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ServiceConfigurationError } from '../../utils/serviceErrors.js';
import { toServiceError } from './providerErrors.js';

export interface AnthropicProviderConfig {
  apiKey?: string;
  defaultModel?: string;
}

const DEFAULT_MAX_TOKENS = 4096;

export class AnthropicProvider implements LLMProvider {
  private config: AnthropicProviderConfig;
  private client: Anthropic | null = null;

  constructor(config: AnthropicProviderConfig = {}) {
    this.config = {
      defaultModel: 'claude-3-5-sonnet-latest',
      ...config,
    };
  }

  getName(): string {
    return 'anthropic';
  }

  private getClient(): Anthropic {
    if (!this.client) {
      if (!this.config.apiKey) {
        throw new ServiceConfigurationError('Anthropic', ['ANTHROPIC_API_KEY']);
      }
      this.client = new Anthropic({ apiKey: this.config.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async generate(
    messages: LLMMessage[],
    options?: LLMGenerateOptions
  ): Promise<LLMResponse> {
    const client = this.getClient();
    const model = options?.model || this.config.defaultModel || 'claude-3-5-sonnet-latest';

    const system = messages
      .filter((msg) => msg.role === 'system')
      .map((msg) => msg.content)
      .join('\n\n');
    const conversation = messages.flatMap((msg) =>
      msg.role === 'system' ? [] : [{ role: msg.role, content: msg.content }]
    );

    try {
      const response = await client.messages.create(
        {
          model,
          max_tokens: options?.max_tokens ?? DEFAULT_MAX_TOKENS,
          ...(options?.temperature !== undefined ? { temperature: options.temperature } : {}),
          ...(system ? { system } : {}),
          messages: conversation,
        },
        { signal: options?.signal }
      );

      const content = response.content
        .map((block) => (block.type === 'text' ? block.text : ''))
        .join('')
        .trim();

      return {
        content,
        model: response.model,
        usage: {
          promptTokens: response.usage.input_tokens,
          completionTokens: response.usage.output_tokens,
          totalTokens: response.usage.input_tokens + response.usage.output_tokens,
        },
      };
    } catch (error) {
      logger.error({ error, model }, 'Error calling Anthropic');
      throw toServiceError('Anthropic', error);
    }
  }
}
