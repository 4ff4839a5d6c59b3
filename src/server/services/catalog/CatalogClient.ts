import type { DatasetSummary, SchemaSnapshot } from '../../types/enrichment.js';

export interface ListDatasetsOptions {
  /** Platform name (e.g. snowflake) or data platform urn */
  platform?: string;
  limit?: number;
}

/**
 * Metadata catalog consumed by the enrichment engine.
 *
 * Implementations retry their own transient failures; whatever they throw
 * has already exhausted that policy.
 */
export interface CatalogClient {
  /**
   * @throws DatasetNotFoundError when the catalog has no such dataset
   */
  fetchSchema(datasetId: string, signal?: AbortSignal): Promise<SchemaSnapshot>;

  /**
   * @throws CatalogConflictError when catalog-side metadata changed since the fetch
   */
  writeDescription(datasetId: string, columnName: string, text: string): Promise<void>;

  /**
   * Tags the column, or the dataset itself when `columnName` is undefined
   */
  addTag(datasetId: string, columnName: string | undefined, tag: string): Promise<void>;

  listDatasets(options?: ListDatasetsOptions): Promise<DatasetSummary[]>;

  /**
   * Resolves when the catalog answers an authenticated query
   */
  checkConnection(): Promise<void>;
}
