/**
 * Suggestion Store
 *
 * Holds generated suggestions until someone asks for them to be applied, and
 * records the outcome of every apply. Suggestions are append-only; only the
 * age-based purge removes them.
 */

import type { CatalogClient } from '../catalog/CatalogClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { ApplyWriteError, CatalogConflictError, ConflictError, NotFoundError } from '../../types/errors.js';
import type {
  ApplyOptions,
  ApplyOutcome,
  ApplyResult,
  Suggestion,
  SuggestionBatch,
} from '../../types/enrichment.js';

export interface SuggestionStore {
  save(batch: SuggestionBatch): Promise<void>;
  get(suggestionId: string): Promise<Suggestion | undefined>;
  listByDataset(datasetId: string): Promise<Suggestion[]>;
  getOutcome(suggestionId: string): Promise<ApplyOutcome | undefined>;
  /**
   * Apply a suggestion if it is still fresh and confident enough.
   * Idempotent: once an outcome is recorded it is returned unchanged.
   *
   * @param currentFingerprint - fingerprint of the dataset's schema, recomputed just before the call
   * @throws NotFoundError for an unknown suggestion id
   */
  apply(suggestionId: string, currentFingerprint: string, options?: ApplyOptions): Promise<ApplyOutcome>;
  /**
   * Note that applied suggestions moved a dataset from fingerprint `before` to
   * `after`. Suggestions fresh at `before` stay fresh at `after`.
   */
  recordWriteBack(datasetId: string, before: string, after: string): Promise<void>;
  /**
   * Remove suggestions (and their outcomes) older than the configured max age
   * @returns number of suggestions removed
   */
  purgeExpired(now?: number): Promise<number>;
}

export interface InMemorySuggestionStoreOptions {
  /** Minimum confidence for an apply without override (default 0.8) */
  confidenceThreshold?: number;
  /** Suggestion lifetime (default 7 days) */
  maxAgeMs?: number;
  now?: () => number;
}

/**
 * Catalog tag for a PII suggestion: `pii:<value>` with the value lowercased
 * and whitespace runs replaced by underscores
 */
export function toPiiTag(value: string): string {
  return `pii:${value.trim().toLowerCase().replace(/\s+/g, '_')}`;
}

function shortFingerprint(fingerprint: string): string {
  return fingerprint.slice(0, 12);
}

export class InMemorySuggestionStore implements SuggestionStore {
  private readonly suggestions = new Map<string, Suggestion>();
  private readonly idsByDataset = new Map<string, string[]>();
  private readonly outcomes = new Map<string, ApplyOutcome>();
  private readonly inFlight = new Map<string, Promise<ApplyOutcome>>();
  /** datasetId -> fingerprint produced by our writes -> fingerprints it stands in for */
  private readonly writeBacks = new Map<string, Map<string, Set<string>>>();

  private readonly confidenceThreshold: number;
  private readonly maxAgeMs: number;
  private readonly now: () => number;
  private readonly log = createChildLogger({ component: 'SuggestionStore' });

  constructor(
    private readonly catalog: CatalogClient,
    options: InMemorySuggestionStoreOptions = {}
  ) {
    this.confidenceThreshold = options.confidenceThreshold ?? 0.8;
    this.maxAgeMs = options.maxAgeMs ?? 7 * 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  async save(batch: SuggestionBatch): Promise<void> {
    const duplicate = batch.suggestions.find((suggestion) => this.suggestions.has(suggestion.id));
    if (duplicate) {
      throw new ConflictError(`Suggestion '${duplicate.id}' is already stored`, { suggestionId: duplicate.id });
    }

    const ids = this.idsByDataset.get(batch.datasetId) ?? [];
    for (const suggestion of batch.suggestions) {
      this.suggestions.set(suggestion.id, suggestion);
      ids.push(suggestion.id);
    }
    this.idsByDataset.set(batch.datasetId, ids);

    this.log.debug(
      { datasetId: batch.datasetId, fingerprint: batch.fingerprint, count: batch.suggestions.length },
      'Stored suggestion batch'
    );
  }

  async get(suggestionId: string): Promise<Suggestion | undefined> {
    return this.suggestions.get(suggestionId);
  }

  async listByDataset(datasetId: string): Promise<Suggestion[]> {
    return (this.idsByDataset.get(datasetId) ?? []).flatMap((id) => {
      const suggestion = this.suggestions.get(id);
      return suggestion ? [suggestion] : [];
    });
  }

  async getOutcome(suggestionId: string): Promise<ApplyOutcome | undefined> {
    return this.outcomes.get(suggestionId);
  }

  async apply(suggestionId: string, currentFingerprint: string, options: ApplyOptions = {}): Promise<ApplyOutcome> {
    const suggestion = this.suggestions.get(suggestionId);
    if (!suggestion) {
      throw new NotFoundError('Suggestion', suggestionId);
    }

    const recorded = this.outcomes.get(suggestionId);
    if (recorded) {
      return recorded;
    }

    // A concurrent apply of the same id shares the write already under way
    const pending = this.inFlight.get(suggestionId);
    if (pending) {
      return pending;
    }

    const promise = this.evaluate(suggestion, currentFingerprint, options)
      .then((outcome) => {
        this.outcomes.set(suggestionId, outcome);
        this.log.info(
          { suggestionId, datasetId: suggestion.datasetId, result: outcome.result, detail: outcome.detail },
          'Recorded apply outcome'
        );
        return outcome;
      })
      .finally(() => {
        this.inFlight.delete(suggestionId);
      });
    this.inFlight.set(suggestionId, promise);
    return promise;
  }

  async recordWriteBack(datasetId: string, before: string, after: string): Promise<void> {
    const aliases = this.writeBacks.get(datasetId) ?? new Map<string, Set<string>>();
    const inherited = aliases.get(after) ?? new Set<string>();
    inherited.add(before);
    for (const fingerprint of aliases.get(before) ?? []) {
      inherited.add(fingerprint);
    }
    aliases.set(after, inherited);
    this.writeBacks.set(datasetId, aliases);
  }

  async purgeExpired(now: number = this.now()): Promise<number> {
    let removed = 0;
    for (const [id, suggestion] of this.suggestions) {
      if (this.inFlight.has(id) || now - Date.parse(suggestion.createdAt) <= this.maxAgeMs) {
        continue;
      }
      this.suggestions.delete(id);
      this.outcomes.delete(id);
      removed++;
    }

    if (removed > 0) {
      for (const [datasetId, ids] of this.idsByDataset) {
        const remaining = ids.filter((id) => this.suggestions.has(id));
        if (remaining.length > 0) {
          this.idsByDataset.set(datasetId, remaining);
        } else {
          this.idsByDataset.delete(datasetId);
          this.writeBacks.delete(datasetId);
        }
      }
      this.log.info({ removed }, 'Purged expired suggestions');
    }
    return removed;
  }

  private async evaluate(
    suggestion: Suggestion,
    currentFingerprint: string,
    options: ApplyOptions
  ): Promise<ApplyOutcome> {
    if (!this.isFresh(suggestion, currentFingerprint)) {
      return this.outcome(
        suggestion,
        'skipped_stale',
        `Schema changed since generation (was ${shortFingerprint(suggestion.sourceFingerprint)}, now ${shortFingerprint(currentFingerprint)})`
      );
    }

    if (suggestion.confidence < this.confidenceThreshold && !options.override) {
      return this.outcome(
        suggestion,
        'skipped_low_confidence',
        `Confidence ${suggestion.confidence} is below threshold ${this.confidenceThreshold}`
      );
    }

    try {
      await this.write(suggestion);
    } catch (error) {
      if (error instanceof CatalogConflictError) {
        return this.outcome(suggestion, 'skipped_stale', error.message);
      }
      const writeError = new ApplyWriteError(suggestion.id, error);
      this.log.warn({ suggestionId: suggestion.id, datasetId: suggestion.datasetId, error }, writeError.message);
      return this.outcome(suggestion, 'failed', writeError.message);
    }

    const target = suggestion.columnName ?? suggestion.datasetId;
    return this.outcome(
      suggestion,
      'applied',
      `${suggestion.kind} written to ${target}${options.override && suggestion.confidence < this.confidenceThreshold ? ' (confidence override)' : ''}`
    );
  }

  private isFresh(suggestion: Suggestion, currentFingerprint: string): boolean {
    return (
      currentFingerprint === suggestion.sourceFingerprint ||
      (this.writeBacks.get(suggestion.datasetId)?.get(currentFingerprint)?.has(suggestion.sourceFingerprint) ?? false)
    );
  }

  private async write(suggestion: Suggestion): Promise<void> {
    switch (suggestion.kind) {
      case 'description':
        if (!suggestion.columnName) {
          throw new Error('Description suggestion has no column');
        }
        await this.catalog.writeDescription(suggestion.datasetId, suggestion.columnName, suggestion.value);
        return;
      case 'pii_tag':
        await this.catalog.addTag(suggestion.datasetId, suggestion.columnName, toPiiTag(suggestion.value));
        return;
      case 'tag':
        await this.catalog.addTag(suggestion.datasetId, suggestion.columnName, suggestion.value);
        return;
    }
  }

  private outcome(suggestion: Suggestion, result: ApplyResult, detail: string): ApplyOutcome {
    return Object.freeze({
      suggestionId: suggestion.id,
      result,
      timestamp: new Date(this.now()).toISOString(),
      detail,
    });
  }
}
