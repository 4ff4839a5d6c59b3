import { describe, it, expect } from 'vitest';
import { SuggestionGenerator } from '../SuggestionGenerator.js';
import type { SuggestionGeneratorOptions } from '../SuggestionGenerator.js';
import {
  CircuitOpenError,
  EnrichmentCancelledError,
  GenerationFatalError,
  GenerationTransientError,
} from '../../../types/errors.js';
import { ServiceAuthenticationError, ServiceConnectionError, ServiceRateLimitError } from '../../../utils/serviceErrors.js';
import { CircuitState } from '../../../utils/circuitBreaker.js';
import { ScriptedLLMProvider, makeSchema, noSleep, suggestionsJson } from '../../../__tests__/helpers/fakes.js';

const schema = makeSchema('urn:a', ['id', 'email']);

const validReply = suggestionsJson([
  { column: 'email', kind: 'pii_tag', value: 'email', confidence: 0.9 },
  { column: 'id', kind: 'description', value: 'Surrogate key', confidence: 0.6 },
]);

const unavailable = () => new ServiceConnectionError('scripted', 503, 'unavailable');

function createGenerator(provider: ScriptedLLMProvider, options: Partial<SuggestionGeneratorOptions> = {}) {
  return new SuggestionGenerator({
    provider,
    model: 'test-model',
    maxTokens: 500,
    temperature: 0.2,
    maxAttempts: 3,
    sleep: noSleep,
    random: () => 0,
    ...options,
  });
}

describe('SuggestionGenerator', () => {
  it('retries transient provider failures and succeeds on the third call', async () => {
    const provider = ScriptedLLMProvider.sequence([unavailable(), new ServiceRateLimitError('scripted'), validReply]);
    const generator = createGenerator(provider);

    const result = await generator.generate(schema);

    expect(provider.calls).toHaveLength(3);
    expect(result.attempts).toBe(3);
    expect(result.dropped).toBe(0);
    expect(result.model).toBe('test-model');
    expect(result.candidates.map((candidate) => [candidate.column, candidate.kind])).toEqual([
      ['email', 'pii_tag'],
      ['id', 'description'],
    ]);
  });

  it('asks the provider for JSON with the configured sampling options', async () => {
    const provider = ScriptedLLMProvider.sequence([validReply]);
    await createGenerator(provider).generate(schema);

    const options = provider.calls[0]?.options;
    expect(options).toMatchObject({ model: 'test-model', max_tokens: 500, temperature: 0.2, jsonMode: true });
    expect(options?.signal).toBeInstanceOf(AbortSignal);
    expect(provider.calls[0]?.prompt).toContain('- email (VARCHAR, nullable)');
  });

  it('gives up after the retry ceiling with a transient error', async () => {
    const provider = ScriptedLLMProvider.sequence([unavailable()]);
    const generator = createGenerator(provider);

    const promise = generator.generate(schema);

    await expect(promise).rejects.toBeInstanceOf(GenerationTransientError);
    await expect(promise).rejects.toMatchObject({
      attempts: 3,
      message: "Suggestion generation failed for 'urn:a' after 3 attempt(s): scripted connection failed (HTTP 503): unavailable",
    });
    expect(provider.calls).toHaveLength(3);
  });

  it('does not retry an authentication failure', async () => {
    const provider = ScriptedLLMProvider.sequence([new ServiceAuthenticationError('scripted', 401, 'invalid key')]);
    const generator = createGenerator(provider);

    await expect(generator.generate(schema)).rejects.toBeInstanceOf(GenerationFatalError);
    expect(provider.calls).toHaveLength(1);
    expect(generator.getBreakerStatus().consecutiveFailures).toBe(0);
  });

  it('reports an unclassified provider error once, without retrying', async () => {
    const provider = ScriptedLLMProvider.sequence([new Error('unexpected payload')]);

    const promise = createGenerator(provider).generate(schema);

    await expect(promise).rejects.toBeInstanceOf(GenerationTransientError);
    await expect(promise).rejects.toMatchObject({ attempts: 1 });
    expect(provider.calls).toHaveLength(1);
  });

  it('times out each attempt and retries it', async () => {
    const provider = new ScriptedLLMProvider(() => new Promise<string>(() => undefined));
    const generator = createGenerator(provider, { timeoutMs: 10, maxAttempts: 2 });

    const promise = generator.generate(schema);

    await expect(promise).rejects.toBeInstanceOf(GenerationTransientError);
    await expect(promise).rejects.toMatchObject({ attempts: 2 });
    expect(provider.calls).toHaveLength(2);
  });

  it('opens the shared breaker after repeated failures across schemas', async () => {
    const provider = ScriptedLLMProvider.sequence([unavailable()]);
    const generator = createGenerator(provider, { maxAttempts: 1, circuitFailureThreshold: 2 });

    await expect(generator.generate(schema)).rejects.toBeInstanceOf(GenerationTransientError);
    await expect(generator.generate(makeSchema('urn:b', ['id']))).rejects.toBeInstanceOf(GenerationTransientError);
    await expect(generator.generate(makeSchema('urn:c', ['id']))).rejects.toBeInstanceOf(CircuitOpenError);

    expect(provider.calls).toHaveLength(2);
    expect(generator.getBreakerStatus().state).toBe(CircuitState.OPEN);
  });

  it('reports cancellation without calling the provider', async () => {
    const provider = ScriptedLLMProvider.sequence([validReply]);
    const controller = new AbortController();
    controller.abort();

    await expect(createGenerator(provider).generate(schema, controller.signal)).rejects.toBeInstanceOf(
      EnrichmentCancelledError
    );
    expect(provider.calls).toHaveLength(0);
  });

  it('counts an unparseable completion as one dropped candidate', async () => {
    const provider = ScriptedLLMProvider.sequence(['']);

    const result = await createGenerator(provider).generate(schema);

    expect(result.candidates).toEqual([]);
    expect(result.dropped).toBe(1);
  });

  it('only asks for enabled kinds', async () => {
    const provider = ScriptedLLMProvider.sequence([validReply]);
    const generator = createGenerator(provider, { enabledKinds: ['pii_tag'] });

    const result = await generator.generate(schema);

    expect(generator.getEnabledKinds()).toEqual(['pii_tag']);
    expect(provider.calls[0]?.prompt).toContain('"kind": "pii_tag"');
    expect(result.candidates.map((candidate) => candidate.kind)).toEqual(['pii_tag']);
    expect(result.dropped).toBe(1);
  });
});
