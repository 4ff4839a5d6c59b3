/**
 * Catalog client for the DataHub GMS GraphQL API
 *
 * Reads dataset schemas (including edits made in the DataHub UI, which live in
 * the editable aspects) and writes accepted suggestions back as description
 * updates and tag associations.
 *
 * Every request runs under a per-attempt timeout and is retried with
 * exponential backoff on network errors, 429 and 5xx responses.
 */

import axios from 'axios';
import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { createHttpClient, HTTP_TIMEOUTS } from '../../config/httpClient.js';
import { createChildLogger } from '../../utils/logger.js';
import { isRetryableError, retryWithBackoff } from '../../utils/retry.js';
import { ServiceAuthenticationError, ServiceConnectionError } from '../../utils/serviceErrors.js';
import { AppError, CatalogConflictError, DatasetNotFoundError, ExternalServiceError } from '../../types/errors.js';
import type { Column, DatasetSummary, SchemaSnapshot } from '../../types/enrichment.js';
import type { CatalogClient, ListDatasetsOptions } from './CatalogClient.js';

export interface DataHubCatalogClientConfig {
  gmsUrl: string;
  token?: string;
  /** Per-attempt request timeout */
  timeoutMs?: number;
  /** Total attempts per request */
  maxAttempts?: number;
  retryBaseDelayMs?: number;
  retryMaxDelayMs?: number;
  /** Pre-built axios instance (tests pass one with a custom adapter) */
  httpClient?: AxiosInstance;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const DATASET_QUERY = `
  query getDataset($urn: String!) {
    dataset(urn: $urn) {
      urn
      name
      platform { name }
      properties { name description }
      editableProperties { description }
      schemaMetadata {
        fields {
          fieldPath
          nativeDataType
          description
          nullable
          globalTags { tags { tag { urn name } } }
        }
      }
      editableSchemaMetadata {
        editableSchemaFieldInfo {
          fieldPath
          description
          globalTags { tags { tag { urn name } } }
        }
      }
      tags { tags { tag { urn name } } }
    }
  }
`;

const SEARCH_QUERY = `
  query searchDatasets($input: SearchInput!) {
    search(input: $input) {
      total
      searchResults {
        entity {
          ... on Dataset {
            urn
            name
            platform { name }
          }
        }
      }
    }
  }
`;

const UPDATE_DESCRIPTION_MUTATION = `
  mutation updateDescription($input: DescriptionUpdateInput!) {
    updateDescription(input: $input)
  }
`;

const ADD_TAG_MUTATION = `
  mutation addTag($input: TagAssociationInput!) {
    addTag(input: $input)
  }
`;

const CONNECTION_QUERY = `
  query me {
    me { corpUser { urn } }
  }
`;

const tagsSchema = z
  .object({
    tags: z
      .array(
        z.object({
          tag: z.object({ urn: z.string(), name: z.string().nullish() }),
        })
      )
      .nullish(),
  })
  .nullish();

const datasetSchema = z.object({
  urn: z.string(),
  name: z.string().nullish(),
  platform: z.object({ name: z.string() }).nullish(),
  properties: z.object({ name: z.string().nullish(), description: z.string().nullish() }).nullish(),
  editableProperties: z.object({ description: z.string().nullish() }).nullish(),
  schemaMetadata: z
    .object({
      fields: z.array(
        z.object({
          fieldPath: z.string(),
          nativeDataType: z.string().nullish(),
          description: z.string().nullish(),
          nullable: z.boolean().nullish(),
          globalTags: tagsSchema,
        })
      ),
    })
    .nullish(),
  editableSchemaMetadata: z
    .object({
      editableSchemaFieldInfo: z.array(
        z.object({
          fieldPath: z.string(),
          description: z.string().nullish(),
          globalTags: tagsSchema,
        })
      ),
    })
    .nullish(),
  tags: tagsSchema,
});

const datasetResponseSchema = z.object({ dataset: datasetSchema.nullish() });

const searchResponseSchema = z.object({
  search: z
    .object({
      searchResults: z.array(
        z.object({
          entity: z.object({
            urn: z.string().optional(),
            name: z.string().nullish(),
            platform: z.object({ name: z.string() }).nullish(),
          }),
        })
      ),
    })
    .nullish(),
});

const graphQLEnvelopeSchema = z.object({
  data: z.unknown().optional(),
  errors: z
    .array(
      z.object({
        message: z.string(),
        extensions: z.object({ code: z.union([z.string(), z.number()]).optional() }).passthrough().optional(),
      })
    )
    .nullish(),
});

type GraphQLErrors = NonNullable<z.infer<typeof graphQLEnvelopeSchema>['errors']>;

function tagNames(tags: z.infer<typeof tagsSchema>): string[] {
  return (tags?.tags ?? []).map(({ tag }) => tag.name ?? tag.urn.replace(/^urn:li:tag:/, ''));
}

function parsePlatformFromUrn(urn: string): string | undefined {
  return /urn:li:dataPlatform:([^,)]+)/.exec(urn)?.[1];
}

/**
 * Where a write is aimed: the dataset and, for column writes, the field path
 */
interface RequestScope {
  datasetId?: string;
  subResource?: string;
  signal?: AbortSignal;
}

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * A mutation conflicts when DataHub says so, or when the thing reported
 * missing is the dataset or field being written. A missing tag is not a
 * conflict.
 */
function isConflict(errors: GraphQLErrors, scope: RequestScope): boolean {
  const targets = [scope.datasetId, scope.subResource].flatMap((target) =>
    target ? [new RegExp(`(^|[\\s'"\`(])${escapeRegExp(target.toLowerCase())}($|[\\s'"\`).,;:])`)] : []
  );
  return errors.some((error) => {
    const code = error.extensions?.code;
    if (code === 'CONFLICT' || code === 409) {
      return true;
    }
    const message = error.message.toLowerCase().replace(/urn:li:tag:\S+/g, '');
    return message.includes('does not exist') && targets.some((target) => target.test(message));
  });
}

/**
 * The retry loop only sees raw transport errors; anything already translated
 * into an AppError (not found, conflict, GraphQL error) is final.
 */
function isRetryableCatalogError(error: unknown): boolean {
  if (error instanceof AppError) {
    return false;
  }
  return isRetryableError(error);
}

export class DataHubCatalogClient implements CatalogClient {
  private readonly client: AxiosInstance;
  private readonly config: DataHubCatalogClientConfig;
  private readonly log = createChildLogger({ component: 'DataHubCatalogClient' });

  constructor(config: DataHubCatalogClientConfig) {
    this.config = config;
    this.client =
      config.httpClient ??
      createHttpClient({
        baseURL: config.gmsUrl.replace(/\/+$/, ''),
        timeout: config.timeoutMs ?? HTTP_TIMEOUTS.STANDARD,
        headers: {
          'Content-Type': 'application/json',
          'X-RestLi-Protocol-Version': '2.0.0',
          ...(config.token ? { Authorization: `Bearer ${config.token}` } : {}),
        },
      });
  }

  async fetchSchema(datasetId: string, signal?: AbortSignal): Promise<SchemaSnapshot> {
    const data = await this.execute('getDataset', DATASET_QUERY, { urn: datasetId }, { datasetId, signal });
    const parsed = datasetResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalServiceError('DataHub', 'Unexpected dataset response shape', {
        datasetId,
        issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
      });
    }

    const dataset = parsed.data.dataset;
    if (!dataset) {
      throw new DatasetNotFoundError(datasetId);
    }

    const editable = new Map(
      (dataset.editableSchemaMetadata?.editableSchemaFieldInfo ?? []).map((info) => [info.fieldPath, info] as const)
    );

    const columns: Column[] = (dataset.schemaMetadata?.fields ?? []).map((field) => {
      const edit = editable.get(field.fieldPath);
      const description = edit?.description || field.description || undefined;
      return Object.freeze({
        name: field.fieldPath,
        nativeType: field.nativeDataType ?? 'UNKNOWN',
        nullable: field.nullable ?? false,
        ...(description ? { description } : {}),
        tags: Object.freeze([...new Set([...tagNames(field.globalTags), ...tagNames(edit?.globalTags)])]),
      });
    });

    const name = dataset.properties?.name ?? dataset.name ?? undefined;
    const description = dataset.editableProperties?.description || dataset.properties?.description || undefined;

    return Object.freeze({
      datasetId,
      platform: dataset.platform?.name ?? parsePlatformFromUrn(datasetId) ?? 'unknown',
      ...(name ? { name } : {}),
      ...(description ? { description } : {}),
      columns: Object.freeze(columns),
      tags: Object.freeze(tagNames(dataset.tags)),
    });
  }

  async writeDescription(datasetId: string, columnName: string, text: string): Promise<void> {
    await this.execute(
      'updateDescription',
      UPDATE_DESCRIPTION_MUTATION,
      {
        input: {
          description: text,
          resourceUrn: datasetId,
          subResourceType: 'DATASET_FIELD',
          subResource: columnName,
        },
      },
      { datasetId, subResource: columnName }
    );
    this.log.info({ datasetId, column: columnName }, 'Updated column description');
  }

  async addTag(datasetId: string, columnName: string | undefined, tag: string): Promise<void> {
    const tagUrn = tag.startsWith('urn:li:tag:') ? tag : `urn:li:tag:${tag}`;
    await this.execute(
      'addTag',
      ADD_TAG_MUTATION,
      {
        input: {
          tagUrn,
          resourceUrn: datasetId,
          ...(columnName ? { subResourceType: 'DATASET_FIELD', subResource: columnName } : {}),
        },
      },
      { datasetId, subResource: columnName }
    );
    this.log.info({ datasetId, column: columnName, tagUrn }, 'Added tag');
  }

  async listDatasets(options: ListDatasetsOptions = {}): Promise<DatasetSummary[]> {
    const { platform, limit = 100 } = options;
    const input: Record<string, unknown> = {
      type: 'DATASET',
      query: '*',
      start: 0,
      count: limit,
    };
    if (platform) {
      const platformUrn = platform.startsWith('urn:') ? platform : `urn:li:dataPlatform:${platform}`;
      input.filters = [{ field: 'platform', value: platformUrn }];
    }

    const data = await this.execute('searchDatasets', SEARCH_QUERY, { input });
    const parsed = searchResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new ExternalServiceError('DataHub', 'Unexpected search response shape');
    }

    return (parsed.data.search?.searchResults ?? []).flatMap(({ entity }) =>
      entity.urn
        ? [
            {
              datasetId: entity.urn,
              ...(entity.name ? { name: entity.name } : {}),
              ...(entity.platform?.name ? { platform: entity.platform.name } : {}),
            },
          ]
        : []
    );
  }

  async checkConnection(): Promise<void> {
    await this.execute('me', CONNECTION_QUERY, {});
  }

  /**
   * POST a GraphQL document with retries and return its `data`.
   * `scope.datasetId` marks requests whose GraphQL errors may be write conflicts.
   */
  private async execute(
    operation: string,
    query: string,
    variables: Record<string, unknown>,
    scope: RequestScope = {}
  ): Promise<unknown> {
    const { datasetId, signal } = scope;
    const isMutation = query.trimStart().startsWith('mutation');

    const response = await retryWithBackoff(
      async () => {
        try {
          return await this.client.post<unknown>(
            '/api/graphql',
            { query, variables },
            { signal, timeout: this.config.timeoutMs ?? HTTP_TIMEOUTS.STANDARD }
          );
        } catch (error) {
          throw this.translateHttpError(error, operation, datasetId);
        }
      },
      {
        maxAttempts: this.config.maxAttempts ?? 3,
        initialDelay: this.config.retryBaseDelayMs ?? 1000,
        maxDelay: this.config.retryMaxDelayMs ?? 10000,
        isRetryable: isRetryableCatalogError,
        signal,
        sleep: this.config.sleep,
      },
      `DataHub ${operation}`
    );

    const envelope = graphQLEnvelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new ExternalServiceError('DataHub', `Malformed GraphQL response for ${operation}`);
    }

    const errors = envelope.data.errors;
    if (errors && errors.length > 0) {
      const detail = errors.map((error) => error.message).join('; ');
      if (isMutation && datasetId && isConflict(errors, scope)) {
        throw new CatalogConflictError(datasetId, detail);
      }
      this.log.warn({ operation, datasetId, errors: detail }, 'DataHub GraphQL errors');
      throw new ExternalServiceError('DataHub', detail, { operation, datasetId });
    }

    return envelope.data.data;
  }

  /**
   * Map HTTP failures onto the catalog taxonomy. Transport errors and
   * retryable statuses are passed through untouched so the retry loop can
   * classify them.
   */
  private translateHttpError(error: unknown, operation: string, datasetId?: string): unknown {
    if (!axios.isAxiosError(error) || !error.response) {
      return error;
    }
    const status = error.response.status;
    if (status === 409 && datasetId) {
      return new CatalogConflictError(datasetId, `HTTP 409 on ${operation}`);
    }
    if (status === 401 || status === 403) {
      return new ServiceAuthenticationError('DataHub', status, error.message);
    }
    if (status === 404 && datasetId && operation === 'getDataset') {
      return new DatasetNotFoundError(datasetId);
    }
    if (status === 429 || status >= 500) {
      return error;
    }
    return new ServiceConnectionError('DataHub', status, error.message);
  }
}
