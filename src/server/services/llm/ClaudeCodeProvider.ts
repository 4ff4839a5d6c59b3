/**
 * Claude Code LLM Provider
 *
 * Runs the locally installed `claude` CLI in non-interactive mode instead of
 * calling an HTTP API. Authentication is whatever the CLI is logged in with,
 * so no API key is configured here. The prompt goes in on stdin and the
 * answer comes back as the CLI's JSON result envelope.
 */

import { spawn } from 'child_process';
import type { SpawnOptionsWithoutStdio } from 'child_process';
import { z } from 'zod';
import type { LLMProvider, LLMMessage, LLMGenerateOptions, LLMResponse } from './LLMProvider.js';
import { logger } from '../../utils/logger.js';
import { ServiceConfigurationError, ServiceConnectionError } from '../../utils/serviceErrors.js';
import { OperationTimeoutError } from '../../utils/withTimeout.js';

const SERVICE_NAME = 'Claude Code';

/**
 * The parts of a child process the provider touches
 */
export interface CliProcess {
  stdin: {
    on(event: 'error', listener: (error: Error) => void): unknown;
    end(chunk: string): unknown;
  };
  stdout: { on(event: 'data', listener: (chunk: Buffer | string) => void): unknown };
  stderr: { on(event: 'data', listener: (chunk: Buffer | string) => void): unknown };
  on(event: 'close', listener: (code: number | null) => void): unknown;
  on(event: 'error', listener: (error: Error) => void): unknown;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnFunction = (
  command: string,
  args: readonly string[],
  options: SpawnOptionsWithoutStdio
) => CliProcess;

export interface ClaudeCodeProviderConfig {
  /** @default 'claude' */
  command?: string;
  defaultModel?: string;
  /** Agentic turns per invocation; one is a single completion */
  maxTurns?: number;
  /** @default 120000 */
  timeoutMs?: number;
  spawn?: SpawnFunction;
}

const resultEnvelopeSchema = z.object({
  result: z.string(),
  is_error: z.boolean().optional(),
  usage: z
    .object({
      input_tokens: z.number(),
      output_tokens: z.number(),
    })
    .optional(),
});

function isMissingExecutable(error: Error): boolean {
  return 'code' in error && error.code === 'ENOENT';
}

/**
 * The CLI takes one prompt; system instructions go first
 */
export function renderPrompt(messages: readonly LLMMessage[]): string {
  const system = messages.filter((msg) => msg.role === 'system').map((msg) => msg.content);
  const conversation = messages
    .filter((msg) => msg.role !== 'system')
    .map((msg) => (msg.role === 'assistant' ? `Assistant: ${msg.content}` : msg.content));
  return [...system, ...conversation].join('\n\n');
}

export class ClaudeCodeProvider implements LLMProvider {
  private readonly config: Required<Omit<ClaudeCodeProviderConfig, 'defaultModel'>> &
    Pick<ClaudeCodeProviderConfig, 'defaultModel'>;

  constructor(config: ClaudeCodeProviderConfig = {}) {
    this.config = {
      command: config.command ?? 'claude',
      defaultModel: config.defaultModel,
      maxTurns: config.maxTurns ?? 1,
      timeoutMs: config.timeoutMs ?? 120000,
      spawn: config.spawn ?? spawn,
    };
  }

  getName(): string {
    return 'claude-code';
  }

  async generate(messages: LLMMessage[], options?: LLMGenerateOptions): Promise<LLMResponse> {
    const model = options?.model || this.config.defaultModel;
    const args = ['--print', '--output-format', 'json', '--max-turns', String(this.config.maxTurns)];
    if (model) {
      args.push('--model', model);
    }

    const stdout = await this.run(args, renderPrompt(messages), options?.signal);
    if (!stdout) {
      throw new ServiceConnectionError(SERVICE_NAME, undefined, 'claude CLI returned empty output');
    }

    let decoded: unknown;
    try {
      decoded = JSON.parse(stdout);
    } catch {
      // Older CLI builds print plain text even when asked for JSON
      logger.debug('Claude Code output was not JSON, using raw text');
      return { content: stdout, model: model ?? 'claude-code' };
    }

    const envelope = resultEnvelopeSchema.safeParse(decoded);
    if (!envelope.success) {
      return { content: stdout, model: model ?? 'claude-code' };
    }
    if (envelope.data.is_error) {
      throw new ServiceConnectionError(SERVICE_NAME, undefined, envelope.data.result || 'claude CLI reported an error');
    }

    const usage = envelope.data.usage;
    return {
      content: envelope.data.result.trim(),
      model: model ?? 'claude-code',
      ...(usage
        ? {
            usage: {
              promptTokens: usage.input_tokens,
              completionTokens: usage.output_tokens,
              totalTokens: usage.input_tokens + usage.output_tokens,
            },
          }
        : {}),
    };
  }

  /**
   * Run the CLI once and resolve with its trimmed stdout
   */
  private run(args: readonly string[], prompt: string, signal?: AbortSignal): Promise<string> {
    const { command, timeoutMs } = this.config;

    return new Promise<string>((resolve, reject) => {
      if (signal?.aborted) {
        reject(signal.reason);
        return;
      }

      logger.debug({ command, args }, 'Invoking Claude Code CLI');
      const child = this.config.spawn(command, args, { stdio: 'pipe' });
      let stdout = '';
      let stderr = '';
      let settled = false;

      const timer = setTimeout(() => {
        child.kill('SIGTERM');
        finish(new OperationTimeoutError('claude CLI', timeoutMs));
      }, timeoutMs);

      const onAbort = () => {
        child.kill('SIGTERM');
        finish(signal?.reason);
      };
      signal?.addEventListener('abort', onAbort, { once: true });

      function finish(error: unknown, output?: string): void {
        if (settled) {
          return;
        }
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener('abort', onAbort);
        if (error === undefined) {
          resolve(output ?? '');
        } else {
          reject(error);
        }
      }

      child.stdout.on('data', (chunk) => {
        stdout += chunk.toString();
      });
      child.stderr.on('data', (chunk) => {
        stderr += chunk.toString();
      });

      child.on('error', (error) => {
        if (isMissingExecutable(error)) {
          finish(new ServiceConfigurationError(SERVICE_NAME, [`'${command}' executable on PATH`]));
          return;
        }
        finish(new ServiceConnectionError(SERVICE_NAME, undefined, error.message));
      });

      child.on('close', (code) => {
        if (code !== 0) {
          const detail = stderr.trim() || 'Unknown error';
          const exit = code ?? 'signal';
          finish(new ServiceConnectionError(SERVICE_NAME, undefined, `claude CLI failed (exit ${exit}): ${detail}`));
          return;
        }
        finish(undefined, stdout.trim());
      });

      // A process that never started reports through 'error'; the broken pipe adds nothing
      child.stdin.on('error', (error) => {
        logger.debug({ error }, 'Claude Code CLI stdin closed early');
      });
      child.stdin.end(prompt);
    });
  }
}
