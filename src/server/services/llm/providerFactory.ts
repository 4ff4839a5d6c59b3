import type { Env } from '../../config/env.js';
import type { LLMProvider } from './LLMProvider.js';
import { OpenAIProvider } from './OpenAIProvider.js';
import { AnthropicProvider } from './AnthropicProvider.js';
import { ClaudeCodeProvider } from './ClaudeCodeProvider.js';

/**
 * Build the provider selected by LLM_PROVIDER.
 * Missing credentials surface on the first call as a ServiceConfigurationError.
 */
export function createLLMProvider(env: Env): LLMProvider {
  switch (env.LLM_PROVIDER) {
    case 'anthropic':
      return new AnthropicProvider({ apiKey: env.ANTHROPIC_API_KEY, defaultModel: env.LLM_MODEL });
    case 'claude-code':
      return new ClaudeCodeProvider({
        command: env.CLAUDE_CODE_COMMAND,
        defaultModel: env.LLM_MODEL,
        timeoutMs: env.LLM_TIMEOUT_MS,
      });
    case 'openai':
      return new OpenAIProvider({ apiKey: env.OPENAI_API_KEY, defaultModel: env.LLM_MODEL });
  }
}
