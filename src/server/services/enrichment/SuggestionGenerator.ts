/**
 * Suggestion Generator
 *
 * Boundary to the language-model provider. One completion per schema, wrapped
 * (outermost first) in retry with full-jitter backoff, the engine-wide circuit
 * breaker and a per-attempt timeout. The completion is decoded and validated
 * here so the engine only ever sees well-formed candidates.
 */

import type { LLMProvider } from '../llm/LLMProvider.js';
import { isFatalProviderError, isTransientProviderError } from '../llm/providerErrors.js';
import { CircuitBreaker } from '../../utils/circuitBreaker.js';
import type { CircuitBreakerStatus } from '../../utils/circuitBreaker.js';
import { RetryAbortedError, retryWithBackoff } from '../../utils/retry.js';
import { withTimeout, DEFAULT_TIMEOUTS } from '../../utils/withTimeout.js';
import { createChildLogger } from '../../utils/logger.js';
import {
  CircuitOpenError,
  EnrichmentCancelledError,
  GenerationFatalError,
  GenerationTransientError,
} from '../../types/errors.js';
import { SUGGESTION_KINDS } from '../../types/enrichment.js';
import type { SchemaSnapshot, SuggestionKind } from '../../types/enrichment.js';
import type { CandidateSuggestion } from '../../validation/enrichmentSchemas.js';
import { buildEnrichmentMessages } from './prompts.js';
import { parseSuggestionResponse } from './responseParser.js';

export interface SuggestionGeneratorOptions {
  provider: LLMProvider;
  model?: string;
  maxTokens?: number;
  temperature?: number;
  /** Per-attempt timeout */
  timeoutMs?: number;
  /** Total attempts per schema */
  maxAttempts?: number;
  baseDelayMs?: number;
  maxDelayMs?: number;
  circuitFailureThreshold?: number;
  circuitCooldownMs?: number;
  enabledKinds?: readonly SuggestionKind[];
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
  random?: () => number;
  now?: () => number;
}

export interface GenerationResult {
  candidates: CandidateSuggestion[];
  dropped: number;
  model: string;
  attempts: number;
}

export class SuggestionGenerator {
  private readonly provider: LLMProvider;
  private readonly breaker: CircuitBreaker;
  private readonly options: SuggestionGeneratorOptions;
  private readonly enabledKinds: readonly SuggestionKind[];
  private readonly log = createChildLogger({ component: 'SuggestionGenerator' });

  constructor(options: SuggestionGeneratorOptions) {
    this.options = options;
    this.provider = options.provider;
    this.enabledKinds = options.enabledKinds ?? SUGGESTION_KINDS;
    // Only transient failures trip the breaker; bad credentials are not a degraded service
    this.breaker = new CircuitBreaker({
      name: `llm:${options.provider.getName()}`,
      failureThreshold: options.circuitFailureThreshold,
      cooldownMs: options.circuitCooldownMs,
      isFailure: isTransientProviderError,
      now: options.now,
    });
  }

  getEnabledKinds(): readonly SuggestionKind[] {
    return this.enabledKinds;
  }

  getBreakerStatus(): CircuitBreakerStatus {
    return this.breaker.getStatus();
  }

  /**
   * @throws GenerationTransientError | GenerationFatalError | CircuitOpenError | EnrichmentCancelledError
   */
  async generate(schema: SchemaSnapshot, signal?: AbortSignal): Promise<GenerationResult> {
    const { datasetId } = schema;
    const messages = buildEnrichmentMessages(schema, this.enabledKinds);
    const timeoutMs = this.options.timeoutMs ?? DEFAULT_TIMEOUTS.LLM_COMPLETION;
    let attempts = 0;

    try {
      const response = await retryWithBackoff(
        (attempt) => {
          attempts = attempt;
          return this.breaker.execute(async () => {
            try {
              return await withTimeout(
                (attemptSignal) =>
                  this.provider.generate(messages, {
                    model: this.options.model,
                    max_tokens: this.options.maxTokens,
                    temperature: this.options.temperature,
                    jsonMode: true,
                    signal: attemptSignal,
                  }),
                timeoutMs,
                `${this.provider.getName()} completion`,
                signal
              );
            } catch (error) {
              // An aborted request is not evidence of a degraded provider
              if (signal?.aborted) {
                throw new EnrichmentCancelledError(datasetId);
              }
              throw error;
            }
          });
        },
        {
          maxAttempts: this.options.maxAttempts ?? 3,
          initialDelay: this.options.baseDelayMs ?? 1000,
          maxDelay: this.options.maxDelayMs ?? 30000,
          jitter: 'full',
          isRetryable: (error) => !(error instanceof CircuitOpenError) && isTransientProviderError(error),
          signal,
          sleep: this.options.sleep,
          random: this.options.random,
        },
        `generate ${datasetId}`
      );

      const parsed = parseSuggestionResponse(response.content, schema, this.enabledKinds);
      if (parsed.dropped > 0) {
        this.log.debug({ datasetId, dropped: parsed.dropped, rejections: parsed.rejections }, 'Dropped invalid candidates');
      }

      return {
        candidates: parsed.accepted,
        dropped: parsed.dropped,
        model: response.model,
        attempts,
      };
    } catch (error) {
      throw this.classify(error, datasetId, attempts, signal);
    }
  }

  private classify(error: unknown, datasetId: string, attempts: number, signal?: AbortSignal): Error {
    if (error instanceof EnrichmentCancelledError || error instanceof CircuitOpenError) {
      return error;
    }
    if (error instanceof RetryAbortedError || signal?.aborted) {
      return new EnrichmentCancelledError(datasetId);
    }
    if (isFatalProviderError(error)) {
      this.log.error({ datasetId, error }, 'Language model rejected the request');
      return new GenerationFatalError(datasetId, error);
    }
    this.log.warn({ datasetId, attempts, error }, 'Suggestion generation failed');
    return new GenerationTransientError(datasetId, attempts, error);
  }
}
