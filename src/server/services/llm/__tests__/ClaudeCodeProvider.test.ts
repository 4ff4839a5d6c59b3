import { EventEmitter } from 'events';
import { afterEach, describe, it, expect, vi } from 'vitest';
import { ClaudeCodeProvider, renderPrompt } from '../ClaudeCodeProvider.js';
import type { ClaudeCodeProviderConfig } from '../ClaudeCodeProvider.js';
import { createLLMProvider } from '../providerFactory.js';
import { isFatalProviderError, isTransientProviderError } from '../providerErrors.js';
import type { LLMMessage } from '../LLMProvider.js';
import { resetEnv, validateEnv } from '../../../config/env.js';
import { ServiceConfigurationError, ServiceConnectionError } from '../../../utils/serviceErrors.js';
import { OperationTimeoutError } from '../../../utils/withTimeout.js';

/**
 * Stand-in for the CLI process; `script` runs once the prompt has been written
 */
class FakeCliProcess extends EventEmitter {
  readonly stdout = new EventEmitter();
  readonly stderr = new EventEmitter();
  readonly stdin = Object.assign(new EventEmitter(), {
    end: (chunk: string) => {
      this.prompt = chunk;
      this.script(this);
    },
  });
  prompt = '';
  killedWith: NodeJS.Signals | undefined;

  constructor(private readonly script: (child: FakeCliProcess) => void) {
    super();
  }

  kill(signal?: NodeJS.Signals): boolean {
    this.killedWith = signal;
    return true;
  }
}

function providerFor(script: (child: FakeCliProcess) => void, config: ClaudeCodeProviderConfig = {}) {
  const spawned: { command: string; args: readonly string[] }[] = [];
  const children: FakeCliProcess[] = [];
  const provider = new ClaudeCodeProvider({
    spawn: (command, args) => {
      spawned.push({ command, args });
      const child = new FakeCliProcess(script);
      children.push(child);
      return child;
    },
    ...config,
  });
  return { provider, spawned, children };
}

const exitWith =
  (code: number, stdout = '', stderr = '') =>
  (child: FakeCliProcess) => {
    if (stdout) {
      child.stdout.emit('data', Buffer.from(stdout));
    }
    if (stderr) {
      child.stderr.emit('data', Buffer.from(stderr));
    }
    child.emit('close', code);
  };

const hang = () => undefined;

const messages: LLMMessage[] = [
  { role: 'system', content: 'You label columns.' },
  { role: 'user', content: 'Schema: orders' },
];

describe('renderPrompt', () => {
  it('puts system instructions ahead of the conversation', () => {
    expect(
      renderPrompt([
        { role: 'user', content: 'first' },
        { role: 'system', content: 'rules' },
        { role: 'assistant', content: 'ok' },
      ])
    ).toBe('rules\n\nfirst\n\nAssistant: ok');
  });
});

describe('ClaudeCodeProvider', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    resetEnv();
  });

  it('runs the CLI in print mode and returns the result of its JSON envelope', async () => {
    const envelope = JSON.stringify({
      type: 'result',
      is_error: false,
      result: ' {"suggestions": []}\n',
      usage: { input_tokens: 12, output_tokens: 5 },
    });
    const { provider, spawned, children } = providerFor(exitWith(0, envelope), { defaultModel: 'sonnet' });

    const response = await provider.generate(messages);

    expect(spawned).toEqual([
      { command: 'claude', args: ['--print', '--output-format', 'json', '--max-turns', '1', '--model', 'sonnet'] },
    ]);
    expect(children[0]?.prompt).toBe('You label columns.\n\nSchema: orders');
    expect(response).toEqual({
      content: '{"suggestions": []}',
      model: 'sonnet',
      usage: { promptTokens: 12, completionTokens: 5, totalTokens: 17 },
    });
  });

  it('uses the raw output when the CLI does not print JSON', async () => {
    const { provider, spawned } = providerFor(exitWith(0, 'plain answer\n'), { command: 'claude-dev' });

    const response = await provider.generate(messages);

    expect(spawned[0]).toEqual({ command: 'claude-dev', args: ['--print', '--output-format', 'json', '--max-turns', '1'] });
    expect(response).toEqual({ content: 'plain answer', model: 'claude-code' });
  });

  it('lets the per-call model override the default', async () => {
    const { provider, spawned } = providerFor(exitWith(0, '{"result": "ok"}'), { defaultModel: 'sonnet' });

    await provider.generate(messages, { model: 'opus' });

    expect(spawned[0]?.args.slice(-2)).toEqual(['--model', 'opus']);
  });

  it('reports a non-zero exit as a transient connection failure', async () => {
    const { provider } = providerFor(exitWith(1, '', 'not logged in\n'));

    const error = await provider.generate(messages).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ServiceConnectionError);
    expect(error).toHaveProperty('message', 'Claude Code connection failed: claude CLI failed (exit 1): not logged in');
    expect(isTransientProviderError(error)).toBe(true);
  });

  it('reports an error envelope as a connection failure', async () => {
    const { provider } = providerFor(exitWith(0, '{"is_error": true, "result": "Credit balance is too low"}'));

    await expect(provider.generate(messages)).rejects.toThrow(
      new ServiceConnectionError('Claude Code', undefined, 'Credit balance is too low')
    );
  });

  it('rejects empty output', async () => {
    const { provider } = providerFor(exitWith(0, '  \n'));

    await expect(provider.generate(messages)).rejects.toThrow(
      'Claude Code connection failed: claude CLI returned empty output'
    );
  });

  it('reports a missing executable as a configuration error', async () => {
    const { provider } = providerFor((child) => {
      child.emit('error', Object.assign(new Error('spawn claude ENOENT'), { code: 'ENOENT' }));
    });

    const error = await provider.generate(messages).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(ServiceConfigurationError);
    expect(error).toHaveProperty('message', "Claude Code not configured. Missing: 'claude' executable on PATH");
    expect(isFatalProviderError(error)).toBe(true);
  });

  it('kills a CLI that runs past the timeout', async () => {
    const { provider, children } = providerFor(hang, { timeoutMs: 5 });

    const error = await provider.generate(messages).catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(OperationTimeoutError);
    expect(error).toHaveProperty('message', 'claude CLI timed out after 5ms');
    expect(children[0]?.killedWith).toBe('SIGTERM');
  });

  it('kills the CLI when the caller aborts', async () => {
    const { provider, children } = providerFor(hang);
    const controller = new AbortController();

    const pending = provider.generate(messages, { signal: controller.signal });
    controller.abort(new Error('batch cancelled'));

    await expect(pending).rejects.toThrow('batch cancelled');
    expect(children[0]?.killedWith).toBe('SIGTERM');
  });

  it('is what the factory builds for LLM_PROVIDER=claude-code', () => {
    vi.stubEnv('LLM_PROVIDER', 'claude-code');
    resetEnv();

    expect(createLLMProvider(validateEnv()).getName()).toBe('claude-code');
  });
});
