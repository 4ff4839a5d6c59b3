/**
 * Catalog enrichment domain types
 */

export const SUGGESTION_KINDS = ['description', 'pii_tag', 'tag'] as const;

export type SuggestionKind = (typeof SUGGESTION_KINDS)[number];

/** Ordering of suggestions that target the same column */
export const KIND_PRIORITY: Record<SuggestionKind, number> = {
  description: 0,
  pii_tag: 1,
  tag: 2,
};

export interface Column {
  readonly name: string;
  readonly nativeType: string;
  readonly nullable: boolean;
  readonly description?: string;
  readonly tags: readonly string[];
}

/**
 * Schema of one dataset as fetched from the catalog.
 * Frozen by the catalog client; never persisted.
 */
export interface SchemaSnapshot {
  readonly datasetId: string;
  readonly platform: string;
  readonly name?: string;
  readonly description?: string;
  readonly columns: readonly Column[];
  readonly tags: readonly string[];
}

export interface Suggestion {
  readonly id: string;
  readonly datasetId: string;
  /** Absent for dataset-level suggestions */
  readonly columnName?: string;
  readonly kind: SuggestionKind;
  readonly value: string;
  /** Opaque model-supplied score in [0, 1] */
  readonly confidence: number;
  readonly rationale?: string;
  readonly sourceFingerprint: string;
  readonly createdAt: string;
}

export interface SuggestionBatch {
  readonly datasetId: string;
  readonly fingerprint: string;
  readonly suggestions: readonly Suggestion[];
  /** Candidates rejected by validation */
  readonly droppedCount: number;
  readonly cacheHit: boolean;
  readonly generatedAt: string;
}

export type ApplyResult = 'applied' | 'skipped_stale' | 'skipped_low_confidence' | 'failed';

export interface ApplyOutcome {
  readonly suggestionId: string;
  readonly result: ApplyResult;
  readonly timestamp: string;
  readonly detail: string;
}

export interface ApplyOptions {
  /** Bypass the confidence gate */
  override?: boolean;
}

export interface DatasetSummary {
  datasetId: string;
  name?: string;
  platform?: string;
}
