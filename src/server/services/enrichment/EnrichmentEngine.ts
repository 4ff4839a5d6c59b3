/**
 * Enrichment Orchestration Engine
 *
 * Drives one pipeline per dataset (fetch, fingerprint, cache lookup, generate,
 * validate, persist) and fans batches out over a bounded pool. Per-dataset and
 * per-suggestion failures end up in the result; only a fatal generation error
 * stops a batch early.
 *
 * Suggestions are never written to the catalog from here except through an
 * explicit apply call.
 */

import { randomUUID } from 'crypto';
import type { CatalogClient } from '../catalog/CatalogClient.js';
import type { SuggestionGenerator, GenerationResult } from './SuggestionGenerator.js';
import { rewriteBatchForDataset } from './FingerprintCache.js';
import type { FingerprintCache, FingerprintCacheStats } from './FingerprintCache.js';
import type { SuggestionStore } from './SuggestionStore.js';
import { createColumnResolver } from './responseParser.js';
import type { CircuitBreakerStatus } from '../../utils/circuitBreaker.js';
import { computeSchemaFingerprint } from '../../utils/fingerprints.js';
import { pLimit } from '../../utils/concurrency.js';
import type { Logger } from 'pino';
import { createChildLogger, getRunContext, runContext } from '../../utils/logger.js';
import { toErrorInfo } from '../../utils/errorHandling.js';
import type { ErrorInfo } from '../../utils/errorHandling.js';
import {
  CircuitOpenError,
  EnrichmentCancelledError,
  FetchError,
  GenerationFatalError,
  GenerationTransientError,
  NotFoundError,
} from '../../types/errors.js';
import type { EnrichmentError } from '../../types/errors.js';
import { KIND_PRIORITY } from '../../types/enrichment.js';
import type {
  ApplyOptions,
  ApplyOutcome,
  ApplyResult,
  SchemaSnapshot,
  Suggestion,
  SuggestionBatch,
} from '../../types/enrichment.js';

export type DatasetResult = { ok: true; batch: SuggestionBatch } | { ok: false; error: EnrichmentError };

export type BatchEntryStatus = 'succeeded' | 'failed' | 'cancelled';

export interface BatchEntry {
  datasetId: string;
  status: BatchEntryStatus;
  batch?: SuggestionBatch;
  error?: ErrorInfo;
}

export interface BatchSummary {
  total: number;
  succeeded: number;
  failed: number;
  cancelled: number;
  cacheHits: number;
  suggestions: number;
  dropped: number;
  /** Set when the batch stopped before every dataset ran */
  aborted?: { reason: 'fatal_error' | 'cancelled'; error?: ErrorInfo };
}

export interface BatchResult {
  batchId: string;
  startedAt: string;
  finishedAt: string;
  /** One entry per distinct dataset, in submission order */
  entries: BatchEntry[];
  summary: BatchSummary;
}

export interface EnrichDatasetOptions {
  signal?: AbortSignal;
}

export interface EnrichBatchOptions {
  concurrency?: number;
  signal?: AbortSignal;
}

export interface ApplyReport {
  outcomes: ApplyOutcome[];
  notFound: string[];
  summary: Record<ApplyResult, number>;
}

export interface SuggestionView {
  suggestion: Suggestion;
  outcome?: ApplyOutcome;
}

export interface EngineStatus {
  breaker: CircuitBreakerStatus;
  cache: FingerprintCacheStats;
}

export interface EnrichmentEngineDeps {
  catalog: CatalogClient;
  generator: SuggestionGenerator;
  cache: FingerprintCache;
  store: SuggestionStore;
  /** Default pool size for batches (default 5) */
  concurrency?: number;
  now?: () => number;
}

/** Fingerprint used for a dataset that no longer exists; never matches a suggestion */
const MISSING_DATASET_FINGERPRINT = 'missing';

/**
 * Column order of the schema, then kind priority within a column; dataset-level
 * suggestions go last. The sort is stable, so ties keep model order.
 */
export function orderSuggestions(suggestions: readonly Suggestion[], schema: SchemaSnapshot): Suggestion[] {
  const columnIndex = new Map(schema.columns.map((column, index) => [column.name, index] as const));
  const datasetLevel = schema.columns.length;
  const position = (suggestion: Suggestion): number =>
    suggestion.columnName === undefined ? datasetLevel : columnIndex.get(suggestion.columnName) ?? datasetLevel;

  return [...suggestions].sort(
    (a, b) => position(a) - position(b) || KIND_PRIORITY[a.kind] - KIND_PRIORITY[b.kind]
  );
}

function isEnrichmentError(error: unknown): error is EnrichmentError {
  return (
    error instanceof FetchError ||
    error instanceof GenerationTransientError ||
    error instanceof GenerationFatalError ||
    error instanceof CircuitOpenError ||
    error instanceof EnrichmentCancelledError
  );
}

/** A response where every candidate was dropped is not worth replaying to other datasets */
function isReplayable(batch: SuggestionBatch): boolean {
  return batch.suggestions.length > 0 || batch.droppedCount === 0;
}

function emptyApplySummary(): Record<ApplyResult, number> {
  return { applied: 0, skipped_stale: 0, skipped_low_confidence: 0, failed: 0 };
}

export class EnrichmentEngine {
  private readonly catalog: CatalogClient;
  private readonly generator: SuggestionGenerator;
  private readonly cache: FingerprintCache;
  private readonly store: SuggestionStore;
  private readonly concurrency: number;
  private readonly now: () => number;
  /** Generations under way, by fingerprint; concurrent misses wait on these instead of calling the model */
  private readonly generations = new Map<string, Promise<SuggestionBatch>>();

  constructor(deps: EnrichmentEngineDeps) {
    this.catalog = deps.catalog;
    this.generator = deps.generator;
    this.cache = deps.cache;
    this.store = deps.store;
    this.concurrency = deps.concurrency ?? 5;
    this.now = deps.now ?? Date.now;
  }

  /**
   * Run the pipeline for one dataset. Expected failures come back as `{ ok: false }`.
   */
  async enrichDataset(datasetId: string, options: EnrichDatasetOptions = {}): Promise<DatasetResult> {
    const { signal } = options;
    const log = createChildLogger({ component: 'EnrichmentEngine', datasetId });

    if (signal?.aborted) {
      return { ok: false, error: new EnrichmentCancelledError(datasetId) };
    }

    let schema: SchemaSnapshot;
    try {
      schema = await this.catalog.fetchSchema(datasetId, signal);
    } catch (error) {
      if (signal?.aborted) {
        return { ok: false, error: new EnrichmentCancelledError(datasetId) };
      }
      const reason = error instanceof NotFoundError ? 'not_found' : 'unavailable';
      log.warn({ reason, error }, 'Schema fetch failed');
      return { ok: false, error: new FetchError(datasetId, reason, error) };
    }

    const fingerprint = computeSchemaFingerprint(schema);

    let batch = await this.cache.get(fingerprint, datasetId);
    if (!batch) {
      const pending = this.generations.get(fingerprint);
      batch = pending ? await this.joinGeneration(pending, datasetId, log) : undefined;
    }

    if (batch) {
      batch = this.alignColumnNames(batch, schema);
      log.debug({ fingerprint }, 'Fingerprint cache hit');
    } else {
      try {
        batch = await this.generate(schema, fingerprint, signal);
      } catch (error) {
        const enrichmentError = isEnrichmentError(error) ? error : new GenerationTransientError(datasetId, 0, error);
        return { ok: false, error: enrichmentError };
      }
    }

    await this.store.save(batch);

    log.info(
      { fingerprint, suggestions: batch.suggestions.length, dropped: batch.droppedCount, cacheHit: batch.cacheHit },
      'Dataset enriched'
    );
    return { ok: true, batch };
  }

  /**
   * Enrich many datasets over a bounded pool. Entries follow submission order;
   * repeated identifiers are enriched once.
   */
  async enrichBatch(datasetIds: readonly string[], options: EnrichBatchOptions = {}): Promise<BatchResult> {
    const batchId = randomUUID();
    return runContext.run({ ...getRunContext(), batchId }, () => this.runBatch(batchId, datasetIds, options));
  }

  private async runBatch(
    batchId: string,
    datasetIds: readonly string[],
    options: EnrichBatchOptions
  ): Promise<BatchResult> {
    const log = createChildLogger({ component: 'EnrichmentEngine' });
    const startedAt = new Date(this.now()).toISOString();
    const uniqueIds = [...new Set(datasetIds)];
    const concurrency = options.concurrency ?? this.concurrency;
    const limit = pLimit(concurrency);

    // Internal controller: aborted by the caller's signal or by a fatal error
    const controller = new AbortController();
    const onCallerAbort = () => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      controller.abort(options.signal.reason);
    } else {
      options.signal?.addEventListener('abort', onCallerAbort, { once: true });
    }

    let fatal: GenerationFatalError | undefined;
    const entries = new Map<string, BatchEntry>();

    log.info({ datasets: uniqueIds.length, concurrency }, 'Batch started');

    try {
      await Promise.all(
        uniqueIds.map((datasetId) =>
          limit(async () => {
            if (controller.signal.aborted) {
              entries.set(datasetId, { datasetId, status: 'cancelled' });
              return;
            }

            let result: DatasetResult;
            try {
              result = await this.enrichDataset(datasetId, { signal: controller.signal });
            } catch (error) {
              log.error({ datasetId, error }, 'Unexpected pipeline failure');
              entries.set(datasetId, { datasetId, status: 'failed', error: toErrorInfo(error) });
              return;
            }

            if (result.ok) {
              entries.set(datasetId, { datasetId, status: 'succeeded', batch: result.batch });
              return;
            }

            const { error } = result;
            if (error instanceof EnrichmentCancelledError) {
              entries.set(datasetId, { datasetId, status: 'cancelled', error: toErrorInfo(error) });
              return;
            }

            entries.set(datasetId, { datasetId, status: 'failed', error: toErrorInfo(error) });
            if (error instanceof GenerationFatalError && !fatal) {
              fatal = error;
              log.error({ datasetId, error }, 'Fatal generation error, aborting batch');
              controller.abort(error);
            }
          })
        )
      );
    } finally {
      options.signal?.removeEventListener('abort', onCallerAbort);
    }

    const orderedEntries = uniqueIds.map(
      (datasetId): BatchEntry => entries.get(datasetId) ?? { datasetId, status: 'cancelled' }
    );
    const summary = this.summarize(orderedEntries);
    if (fatal) {
      summary.aborted = { reason: 'fatal_error', error: toErrorInfo(fatal) };
    } else if (options.signal?.aborted) {
      summary.aborted = { reason: 'cancelled' };
    }

    log.info({ ...summary }, 'Batch finished');

    return {
      batchId,
      startedAt,
      finishedAt: new Date(this.now()).toISOString(),
      entries: orderedEntries,
      summary,
    };
  }

  /**
   * Apply one suggestion against the dataset's current schema
   *
   * @throws NotFoundError for an unknown suggestion id
   */
  async applySuggestion(suggestionId: string, options: ApplyOptions = {}): Promise<ApplyOutcome> {
    const suggestion = await this.store.get(suggestionId);
    if (!suggestion) {
      throw new NotFoundError('Suggestion', suggestionId);
    }
    const recorded = await this.store.getOutcome(suggestionId);
    if (recorded) {
      return recorded;
    }

    const fingerprint = await this.currentFingerprint(suggestion.datasetId);
    if (fingerprint instanceof FetchError) {
      return this.unrecordedFailure(suggestionId, fingerprint);
    }
    const outcome = await this.store.apply(suggestionId, fingerprint, options);
    if (outcome.result === 'applied') {
      await this.recordWriteBack(suggestion.datasetId, fingerprint);
    }
    return outcome;
  }

  /**
   * Apply several suggestions, fetching each dataset's schema once.
   * Unknown ids are reported in `notFound`; outcomes follow request order.
   */
  async applySuggestions(suggestionIds: readonly string[], options: ApplyOptions = {}): Promise<ApplyReport> {
    const uniqueIds = [...new Set(suggestionIds)];
    const notFound: string[] = [];
    const byDataset = new Map<string, Suggestion[]>();

    for (const id of uniqueIds) {
      const suggestion = await this.store.get(id);
      if (!suggestion) {
        notFound.push(id);
        continue;
      }
      const group = byDataset.get(suggestion.datasetId) ?? [];
      group.push(suggestion);
      byDataset.set(suggestion.datasetId, group);
    }

    const outcomes = new Map<string, ApplyOutcome>();
    for (const [datasetId, suggestions] of byDataset) {
      const pending: Suggestion[] = [];
      for (const suggestion of suggestions) {
        const recorded = await this.store.getOutcome(suggestion.id);
        if (recorded) {
          outcomes.set(suggestion.id, recorded);
        } else {
          pending.push(suggestion);
        }
      }
      if (pending.length === 0) {
        continue;
      }

      const fingerprint = await this.currentFingerprint(datasetId);
      let wrote = false;
      for (const suggestion of pending) {
        const outcome =
          fingerprint instanceof FetchError
            ? this.unrecordedFailure(suggestion.id, fingerprint)
            : await this.store.apply(suggestion.id, fingerprint, options);
        outcomes.set(suggestion.id, outcome);
        wrote ||= outcome.result === 'applied';
      }
      if (wrote && typeof fingerprint === 'string') {
        await this.recordWriteBack(datasetId, fingerprint);
      }
    }

    const ordered = uniqueIds.flatMap((id) => {
      const outcome = outcomes.get(id);
      return outcome ? [outcome] : [];
    });
    const summary = emptyApplySummary();
    for (const outcome of ordered) {
      summary[outcome.result]++;
    }

    return { outcomes: ordered, notFound, summary };
  }

  async getSuggestion(suggestionId: string): Promise<SuggestionView | undefined> {
    const suggestion = await this.store.get(suggestionId);
    if (!suggestion) {
      return undefined;
    }
    const outcome = await this.store.getOutcome(suggestionId);
    return outcome ? { suggestion, outcome } : { suggestion };
  }

  async listSuggestions(datasetId: string): Promise<SuggestionView[]> {
    const suggestions = await this.store.listByDataset(datasetId);
    return Promise.all(
      suggestions.map(async (suggestion): Promise<SuggestionView> => {
        const outcome = await this.store.getOutcome(suggestion.id);
        return outcome ? { suggestion, outcome } : { suggestion };
      })
    );
  }

  /**
   * Drop suggestions past the store's max age
   * @returns number of suggestions removed
   */
  async purgeExpiredSuggestions(): Promise<number> {
    return this.store.purgeExpired(this.now());
  }

  getStatus(): EngineStatus {
    return {
      breaker: this.generator.getBreakerStatus(),
      cache: this.cache.stats(),
    };
  }

  /**
   * Call the model for a cache miss. The pending generation is visible to
   * concurrent misses on the same fingerprint until the cache holds the result.
   */
  private async generate(schema: SchemaSnapshot, fingerprint: string, signal?: AbortSignal): Promise<SuggestionBatch> {
    const pending = this.generator
      .generate(schema, signal)
      .then((generation) => this.buildBatch(schema, fingerprint, generation));
    this.generations.set(fingerprint, pending);
    try {
      const batch = await pending;
      if (isReplayable(batch)) {
        await this.cache.put(fingerprint, batch);
      }
      return batch;
    } finally {
      if (this.generations.get(fingerprint) === pending) {
        this.generations.delete(fingerprint);
      }
    }
  }

  /**
   * Wait for another dataset's generation of the same fingerprint and take a
   * copy of it. A failed or unreplayable generation is not shared: the caller
   * generates its own.
   */
  private async joinGeneration(
    pending: Promise<SuggestionBatch>,
    datasetId: string,
    log: Logger
  ): Promise<SuggestionBatch | undefined> {
    let template: SuggestionBatch;
    try {
      template = await pending;
    } catch (error) {
      log.debug({ error }, 'Shared generation failed, generating separately');
      return undefined;
    }
    return isReplayable(template) ? rewriteBatchForDataset(template, datasetId, new Date(this.now())) : undefined;
  }

  /**
   * Fingerprint of the dataset as the catalog has it now. A dataset that has
   * disappeared gets a fingerprint no suggestion can match.
   */
  private async currentFingerprint(datasetId: string): Promise<string | FetchError> {
    try {
      const schema = await this.catalog.fetchSchema(datasetId);
      return computeSchemaFingerprint(schema);
    } catch (error) {
      if (error instanceof NotFoundError) {
        return MISSING_DATASET_FINGERPRINT;
      }
      return new FetchError(datasetId, 'unavailable', error);
    }
  }

  /**
   * Our own writes change the dataset's fingerprint. Tell the store which
   * fingerprint they produced so the other suggestions of the same
   * generation still count as fresh.
   */
  private async recordWriteBack(datasetId: string, before: string): Promise<void> {
    const after = await this.currentFingerprint(datasetId);
    if (after instanceof FetchError || after === MISSING_DATASET_FINGERPRINT) {
      createChildLogger({ component: 'EnrichmentEngine', datasetId }).warn(
        { before },
        'Could not read the schema after write-back; later applies may be reported stale'
      );
      return;
    }
    if (after !== before) {
      await this.store.recordWriteBack(datasetId, before, after);
    }
  }

  /**
   * Outcome for an apply that could not be evaluated. Not recorded, so a
   * later apply can still succeed.
   */
  private unrecordedFailure(suggestionId: string, error: FetchError): ApplyOutcome {
    return {
      suggestionId,
      result: 'failed',
      timestamp: new Date(this.now()).toISOString(),
      detail: error.message,
    };
  }

  private buildBatch(schema: SchemaSnapshot, fingerprint: string, generation: GenerationResult): SuggestionBatch {
    const createdAt = new Date(this.now()).toISOString();
    const suggestions = generation.candidates.map(
      (candidate): Suggestion =>
        Object.freeze({
          id: randomUUID(),
          datasetId: schema.datasetId,
          ...(candidate.column !== undefined ? { columnName: candidate.column } : {}),
          kind: candidate.kind,
          value: candidate.value,
          confidence: candidate.confidence,
          ...(candidate.rationale !== undefined ? { rationale: candidate.rationale } : {}),
          sourceFingerprint: fingerprint,
          createdAt,
        })
    );

    return Object.freeze({
      datasetId: schema.datasetId,
      fingerprint,
      suggestions: Object.freeze(orderSuggestions(suggestions, schema)),
      droppedCount: generation.dropped,
      cacheHit: false,
      generatedAt: createdAt,
    });
  }

  /**
   * Fingerprints ignore identifier casing, so a cached template may spell
   * columns differently from the dataset that hit it.
   */
  private alignColumnNames(batch: SuggestionBatch, schema: SchemaSnapshot): SuggestionBatch {
    const resolveColumn = createColumnResolver(schema);
    const spell = (name: string): string => {
      const match = resolveColumn(name);
      return match.status === 'found' ? match.name : name;
    };
    const needsRewrite = batch.suggestions.some(
      (suggestion) => suggestion.columnName !== undefined && spell(suggestion.columnName) !== suggestion.columnName
    );
    if (!needsRewrite) {
      return batch;
    }

    const suggestions = batch.suggestions.map((suggestion): Suggestion => {
      if (suggestion.columnName === undefined) {
        return suggestion;
      }
      return Object.freeze({ ...suggestion, columnName: spell(suggestion.columnName) });
    });
    return Object.freeze({ ...batch, suggestions: Object.freeze(suggestions) });
  }

  private summarize(entries: readonly BatchEntry[]): BatchSummary {
    const summary: BatchSummary = {
      total: entries.length,
      succeeded: 0,
      failed: 0,
      cancelled: 0,
      cacheHits: 0,
      suggestions: 0,
      dropped: 0,
    };
    for (const entry of entries) {
      summary[entry.status]++;
      if (entry.batch) {
        summary.suggestions += entry.batch.suggestions.length;
        summary.dropped += entry.batch.droppedCount;
        if (entry.batch.cacheHit) {
          summary.cacheHits++;
        }
      }
    }
    return summary;
  }
}
