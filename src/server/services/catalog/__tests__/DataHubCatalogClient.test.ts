import { describe, it, expect } from 'vitest';
import { AxiosError } from 'axios';
import type { AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import { z } from 'zod';
import { DataHubCatalogClient } from '../DataHubCatalogClient.js';
import { createHttpClient } from '../../../config/httpClient.js';
import { CatalogConflictError, DatasetNotFoundError, ExternalServiceError } from '../../../types/errors.js';
import { ServiceAuthenticationError } from '../../../utils/serviceErrors.js';
import { noSleep } from '../../../__tests__/helpers/fakes.js';

const ORDERS_URN = 'urn:li:dataset:(urn:li:dataPlatform:snowflake,shop.orders,PROD)';

const graphQLRequestSchema = z.object({
  query: z.string(),
  variables: z.record(z.unknown()),
});

type GraphQLRequest = z.infer<typeof graphQLRequestSchema>;

type Reply = { status?: number; data?: unknown } | Error;

/**
 * DataHub stand-in: an axios adapter answering each GraphQL POST from `handler`
 */
function createClient(handler: (request: GraphQLRequest, call: number) => Reply) {
  const requests: GraphQLRequest[] = [];

  const adapter = async (config: InternalAxiosRequestConfig): Promise<AxiosResponse> => {
    const request = graphQLRequestSchema.parse(JSON.parse(String(config.data)));
    requests.push(request);
    const reply = handler(request, requests.length);
    if (reply instanceof Error) {
      throw reply;
    }
    const response: AxiosResponse = {
      data: reply.data,
      status: reply.status ?? 200,
      statusText: '',
      headers: {},
      config,
    };
    if (response.status >= 400) {
      throw new AxiosError(
        `Request failed with status code ${response.status}`,
        AxiosError.ERR_BAD_RESPONSE,
        config,
        undefined,
        response
      );
    }
    return response;
  };

  const client = new DataHubCatalogClient({
    gmsUrl: 'http://datahub.test',
    token: 'test-secret',
    maxAttempts: 3,
    httpClient: createHttpClient({ baseURL: 'http://datahub.test', adapter }),
    sleep: noSleep,
  });
  return { client, requests };
}

const ordersDataset = {
  urn: ORDERS_URN,
  name: 'shop.orders',
  platform: { name: 'snowflake' },
  properties: { name: 'orders', description: 'Raw orders' },
  editableProperties: { description: 'Curated orders' },
  schemaMetadata: {
    fields: [
      { fieldPath: 'order_id', nativeDataType: 'NUMBER(38,0)', description: null, nullable: false, globalTags: null },
      {
        fieldPath: 'email',
        nativeDataType: 'VARCHAR',
        description: 'Buyer email',
        nullable: true,
        globalTags: { tags: [{ tag: { urn: 'urn:li:tag:pii', name: 'pii' } }] },
      },
    ],
  },
  editableSchemaMetadata: {
    editableSchemaFieldInfo: [
      { fieldPath: 'order_id', description: 'Order key', globalTags: { tags: [{ tag: { urn: 'urn:li:tag:key' } }] } },
    ],
  },
  tags: { tags: [{ tag: { urn: 'urn:li:tag:sales', name: 'sales' } }] },
};

describe('DataHubCatalogClient.fetchSchema', () => {
  it('merges editable metadata into the snapshot', async () => {
    const { client, requests } = createClient(() => ({ data: { data: { dataset: ordersDataset } } }));

    const schema = await client.fetchSchema(ORDERS_URN);

    expect(schema).toEqual({
      datasetId: ORDERS_URN,
      platform: 'snowflake',
      name: 'orders',
      description: 'Curated orders',
      columns: [
        { name: 'order_id', nativeType: 'NUMBER(38,0)', nullable: false, description: 'Order key', tags: ['key'] },
        { name: 'email', nativeType: 'VARCHAR', nullable: true, description: 'Buyer email', tags: ['pii'] },
      ],
      tags: ['sales'],
    });
    expect(Object.isFrozen(schema)).toBe(true);
    expect(Object.isFrozen(schema.columns[0])).toBe(true);
    expect(requests[0]?.variables).toEqual({ urn: ORDERS_URN });
    expect(requests[0]?.query).toContain('query getDataset');
  });

  it('falls back to the platform in the urn', async () => {
    const urn = 'urn:li:dataset:(urn:li:dataPlatform:hive,db.events,PROD)';
    const { client } = createClient(() => ({ data: { data: { dataset: { urn, schemaMetadata: { fields: [] } } } } }));

    const schema = await client.fetchSchema(urn);

    expect(schema.platform).toBe('hive');
    expect(schema.columns).toEqual([]);
  });

  it('raises DatasetNotFoundError when the catalog has no such dataset', async () => {
    const { client } = createClient(() => ({ data: { data: { dataset: null } } }));
    await expect(client.fetchSchema(ORDERS_URN)).rejects.toBeInstanceOf(DatasetNotFoundError);
  });

  it('treats an HTTP 404 as a missing dataset', async () => {
    const { client, requests } = createClient(() => ({ status: 404, data: {} }));
    await expect(client.fetchSchema(ORDERS_URN)).rejects.toBeInstanceOf(DatasetNotFoundError);
    expect(requests).toHaveLength(1);
  });

  it('retries a 503 and then succeeds', async () => {
    const { client, requests } = createClient((_request, call) =>
      call === 1 ? { status: 503, data: 'unavailable' } : { data: { data: { dataset: ordersDataset } } }
    );

    const schema = await client.fetchSchema(ORDERS_URN);

    expect(schema.columns).toHaveLength(2);
    expect(requests).toHaveLength(2);
  });

  it('gives up on network errors after the configured attempts', async () => {
    const refused = Object.assign(new Error('connect ECONNREFUSED 127.0.0.1:8080'), { code: 'ECONNREFUSED' });
    const { client, requests } = createClient(() => refused);

    await expect(client.fetchSchema(ORDERS_URN)).rejects.toBe(refused);
    expect(requests).toHaveLength(3);
  });

  it('does not retry rejected credentials', async () => {
    const { client, requests } = createClient(() => ({ status: 401, data: {} }));

    await expect(client.fetchSchema(ORDERS_URN)).rejects.toBeInstanceOf(ServiceAuthenticationError);
    expect(requests).toHaveLength(1);
  });

  it('surfaces GraphQL errors on queries without retrying', async () => {
    const { client, requests } = createClient(() => ({
      data: { data: null, errors: [{ message: 'Unauthorized to view dataset' }] },
    }));

    const promise = client.fetchSchema(ORDERS_URN);

    await expect(promise).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(promise).rejects.toThrow('External service error (DataHub): Unauthorized to view dataset');
    expect(requests).toHaveLength(1);
  });
});

describe('DataHubCatalogClient writes', () => {
  it('updates a column description', async () => {
    const { client, requests } = createClient(() => ({ data: { data: { updateDescription: true } } }));

    await client.writeDescription(ORDERS_URN, 'email', 'Email address of the buyer');

    expect(requests[0]?.query).toContain('mutation updateDescription');
    expect(requests[0]?.variables).toEqual({
      input: {
        description: 'Email address of the buyer',
        resourceUrn: ORDERS_URN,
        subResourceType: 'DATASET_FIELD',
        subResource: 'email',
      },
    });
  });

  it('adds a tag to a column or to the dataset', async () => {
    const { client, requests } = createClient(() => ({ data: { data: { addTag: true } } }));

    await client.addTag(ORDERS_URN, 'email', 'pii:email');
    await client.addTag(ORDERS_URN, undefined, 'urn:li:tag:sales');

    expect(requests.map((request) => request.variables)).toEqual([
      {
        input: {
          tagUrn: 'urn:li:tag:pii:email',
          resourceUrn: ORDERS_URN,
          subResourceType: 'DATASET_FIELD',
          subResource: 'email',
        },
      },
      { input: { tagUrn: 'urn:li:tag:sales', resourceUrn: ORDERS_URN } },
    ]);
  });

  it('reports a write against a field that no longer exists as a conflict', async () => {
    const { client } = createClient(() => ({
      data: { data: null, errors: [{ message: 'Failed to update description: field email does not exist' }] },
    }));

    const promise = client.writeDescription(ORDERS_URN, 'email', 'Email');

    await expect(promise).rejects.toBeInstanceOf(CatalogConflictError);
    await expect(promise).rejects.toThrow(
      `Catalog rejected write for '${ORDERS_URN}': Failed to update description: field email does not exist`
    );
  });

  it('reports a write against a dataset that no longer exists as a conflict', async () => {
    const { client } = createClient(() => ({
      data: { data: null, errors: [{ message: `Dataset ${ORDERS_URN} does not exist` }] },
    }));

    await expect(client.addTag(ORDERS_URN, undefined, 'sales')).rejects.toBeInstanceOf(CatalogConflictError);
  });

  it('reports a missing tag as a catalog error rather than a conflict', async () => {
    const { client, requests } = createClient(() => ({
      data: { data: null, errors: [{ message: 'urn:li:tag:pii:email does not exist.' }] },
    }));

    const promise = client.addTag(ORDERS_URN, 'email', 'pii:email');

    await expect(promise).rejects.toBeInstanceOf(ExternalServiceError);
    await expect(promise).rejects.not.toBeInstanceOf(CatalogConflictError);
    expect(requests).toHaveLength(1);
  });

  it('treats a conflict code as a conflict whatever the message', async () => {
    const { client } = createClient(() => ({
      data: { data: null, errors: [{ message: 'Aspect version mismatch', extensions: { code: 'CONFLICT' } }] },
    }));

    await expect(client.writeDescription(ORDERS_URN, 'email', 'Email')).rejects.toBeInstanceOf(CatalogConflictError);
  });

  it('maps HTTP 409 to a conflict', async () => {
    const { client } = createClient(() => ({ status: 409, data: {} }));
    await expect(client.addTag(ORDERS_URN, 'email', 'pii:email')).rejects.toBeInstanceOf(CatalogConflictError);
  });
});

describe('DataHubCatalogClient.listDatasets', () => {
  it('searches datasets, optionally filtered by platform', async () => {
    const { client, requests } = createClient(() => ({
      data: {
        data: {
          search: {
            total: 3,
            searchResults: [
              { entity: { urn: ORDERS_URN, name: 'shop.orders', platform: { name: 'snowflake' } } },
              { entity: {} },
              { entity: { urn: 'urn:li:dataset:(urn:li:dataPlatform:snowflake,shop.users,PROD)' } },
            ],
          },
        },
      },
    }));

    const datasets = await client.listDatasets({ platform: 'snowflake', limit: 10 });

    expect(datasets).toEqual([
      { datasetId: ORDERS_URN, name: 'shop.orders', platform: 'snowflake' },
      { datasetId: 'urn:li:dataset:(urn:li:dataPlatform:snowflake,shop.users,PROD)' },
    ]);
    expect(requests[0]?.variables).toEqual({
      input: {
        type: 'DATASET',
        query: '*',
        start: 0,
        count: 10,
        filters: [{ field: 'platform', value: 'urn:li:dataPlatform:snowflake' }],
      },
    });
  });
});

describe('DataHubCatalogClient.checkConnection', () => {
  it('resolves when the authenticated query succeeds', async () => {
    const { client } = createClient(() => ({ data: { data: { me: { corpUser: { urn: 'urn:li:corpuser:datahub' } } } } }));
    await expect(client.checkConnection()).resolves.toBeUndefined();
  });
});
