/**
 * Tests for the SDK transport: option mapping and calls made through an
 * injected SDK client.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import type { ContainerDefinition, DatabaseRequest, RequestOptions } from '@azure/cosmos';
import { CosmosClient } from '../client/index.js';
import { CosmosConfigBuilder } from '../config/index.js';
import {
  CosmosHttpResponseError,
  CosmosResourceNotFoundError,
  translateError,
} from '../errors/index.js';
import { NoopLogger } from '../observability/index.js';
import {
  AzureCosmosTransport,
  requestOptions,
  toClientOptions,
  type SdkClient,
  type SdkContainer,
  type SdkDatabase,
  type SdkFeed,
  type SdkResponse,
} from '../transport/index.js';

const ENDPOINT = 'https://localhost:8081/';

interface SentCall {
  call: string;
  args: unknown[];
}

function feed(resources: unknown[]): SdkFeed {
  return { fetchAll: async () => ({ resources }) };
}

/**
 * Stands in for the SDK client and records what the transport sends.
 */
class FakeSdkClient implements SdkClient {
  readonly sent: SentCall[] = [];
  definition: ContainerDefinition = { id: 'orders', partitionKey: { paths: ['/customerId'] } };
  pointRead: SdkResponse = { statusCode: 200, resource: { id: 'o-1', customerId: 'c-1' } };
  matches: unknown[] = [];

  readonly databases = {
    create: async (body: DatabaseRequest, options?: RequestOptions): Promise<SdkResponse> =>
      this.record('createDatabase', body, options),
    readAll: (): SdkFeed => feed([]),
  };

  database(databaseId: string): SdkDatabase {
    return {
      containers: {
        create: async (body, options) => this.record('createContainer', databaseId, body, options),
        readAll: () => feed([]),
      },
      container: (containerId) => this.container(databaseId, containerId),
      read: async (options) => this.record('readDatabase', databaseId, options),
      delete: async (options) => this.record('deleteDatabase', databaseId, options),
    };
  }

  dispose(): void {
    this.record('dispose');
  }

  calls(call: string): SentCall[] {
    return this.sent.filter((entry) => entry.call === call);
  }

  private container(databaseId: string, containerId: string): SdkContainer {
    return {
      items: {
        create: async (body, options) => this.record('createItem', body, options),
        upsert: async (body, options) => this.record('upsertItem', body, options),
        query: (query, options) => {
          this.record('queryItems', query, options);
          return feed(this.matches);
        },
      },
      item: (id, partitionKey) => ({
        read: async (options) => {
          this.record('readItem', id, partitionKey, options);
          return this.pointRead;
        },
        replace: async (body, options) => this.record('replaceItem', id, partitionKey, body, options),
        delete: async (options) => this.record('deleteItem', id, partitionKey, options),
      }),
      read: async (options) => {
        this.record('readContainer', databaseId, containerId, options);
        return { resource: this.definition };
      },
      delete: async (options) => this.record('deleteContainer', databaseId, containerId, options),
    };
  }

  private record(call: string, ...args: unknown[]): SdkResponse {
    this.sent.push({ call, args });
    return { statusCode: 200, resource: args[0] };
  }
}

function buildConfig() {
  return new CosmosConfigBuilder().withEndpoint(ENDPOINT).withKey('test-secret').build();
}

async function captureRejection(pending: Promise<unknown>): Promise<unknown> {
  try {
    await pending;
  } catch (error) {
    return error;
  }
  throw new Error('expected the call to reject');
}

describe('toClientOptions', () => {
  it('should pass the account key and timeouts to the SDK', () => {
    const config = new CosmosConfigBuilder()
      .withEndpoint(ENDPOINT)
      .withKey('test-secret')
      .withRequestTimeout(5000)
      .withUserAgentSuffix('example/1.0')
      .build();

    expect(toClientOptions(config)).toEqual({
      endpoint: ENDPOINT,
      key: 'test-secret',
      userAgentSuffix: 'example/1.0',
      connectionPolicy: { requestTimeout: 5000 },
    });
  });

  it('should expose resource tokens', () => {
    const config = new CosmosConfigBuilder()
      .withEndpoint(ENDPOINT)
      .withResourceTokens({ 'dbs/shop/colls/products': 'test-token' })
      .build();

    const options = toClientOptions(config);

    expect(options.resourceTokens).toEqual({ 'dbs/shop/colls/products': 'test-token' });
    expect(options.key).toBeUndefined();
  });
});

describe('requestOptions', () => {
  it('should map ifMatch to an access condition', () => {
    expect(requestOptions(undefined, '"etag-1"')).toEqual({
      accessCondition: { type: 'IfMatch', condition: '"etag-1"' },
    });
  });

  it('should forward the abort signal', () => {
    const controller = new AbortController();
    expect(requestOptions(controller.signal).abortSignal).toBe(controller.signal);
    expect(requestOptions()).toEqual({});
  });
});

describe('AzureCosmosTransport', () => {
  let sdk: FakeSdkClient;
  let transport: AzureCosmosTransport;

  beforeEach(() => {
    sdk = new FakeSdkClient();
    transport = new AzureCosmosTransport(buildConfig(), sdk);
  });

  describe('createItem and upsertItem', () => {
    it('should send the body once the key matches the container path', async () => {
      const created = await transport.createItem({
        databaseId: 'shop',
        containerId: 'orders',
        partitionKey: 'c-1',
        body: { id: 'o-1', customerId: 'c-1' },
      });

      expect(created).toEqual({ id: 'o-1', customerId: 'c-1' });
      expect(sdk.calls('readContainer')).toHaveLength(1);
      expect(sdk.calls('createItem')[0]?.args).toEqual([{ id: 'o-1', customerId: 'c-1' }, {}]);
    });

    it('should reject a key that differs from the body value with a 400', async () => {
      const error = await captureRejection(
        transport.createItem({
          databaseId: 'shop',
          containerId: 'orders',
          partitionKey: 'online',
          body: { id: 'o-1', customerId: 'c-1', type: 'online' },
        })
      );

      expect(error).toMatchObject({ code: 400 });
      expect(translateError(error)).toMatchObject({ statusCode: 400 });
      expect(sdk.calls('createItem')).toHaveLength(0);
    });

    it('should read the container definition once per container', async () => {
      const request = { databaseId: 'shop', containerId: 'orders', partitionKey: 'c-1' };

      await transport.upsertItem({ ...request, body: { id: 'o-1', customerId: 'c-1' } });
      await transport.upsertItem({ ...request, body: { id: 'o-2', customerId: 'c-1' } });

      expect(sdk.calls('readContainer')).toHaveLength(1);
      expect(sdk.calls('upsertItem')).toHaveLength(2);
    });

    it('should reuse the definition of a container it created', async () => {
      await transport.createContainer('shop', {
        id: 'orders',
        partitionKey: { paths: ['/customerId'], kind: 'Hash' },
      });

      await transport.createItem({
        databaseId: 'shop',
        containerId: 'orders',
        partitionKey: 'c-1',
        body: { id: 'o-1', customerId: 'c-1' },
      });

      expect(sdk.calls('readContainer')).toHaveLength(0);
    });

    it('should read the definition again after the container is deleted', async () => {
      const request = { databaseId: 'shop', containerId: 'orders', partitionKey: 'c-1' };
      await transport.createItem({ ...request, body: { id: 'o-1', customerId: 'c-1' } });

      await transport.deleteContainer('shop', 'orders');
      await transport.createItem({ ...request, body: { id: 'o-1', customerId: 'c-1' } });

      expect(sdk.calls('readContainer')).toHaveLength(2);
    });

    it('should check the first path of a hierarchical key', async () => {
      sdk.definition = { id: 'tenants', partitionKey: { paths: ['/tenantId', '/region'] } };

      await transport.createItem({
        databaseId: 'shop',
        containerId: 'tenants',
        partitionKey: 'acme',
        body: { id: 't-1', tenantId: 'acme', region: 'eu' },
      });

      expect(sdk.calls('createItem')).toHaveLength(1);
    });
  });

  describe('replaceItem', () => {
    it('should address the item by id and key with an access condition', async () => {
      await transport.replaceItem({
        databaseId: 'shop',
        containerId: 'orders',
        itemId: 'o-1',
        partitionKey: 'c-1',
        body: { id: 'o-1', customerId: 'c-1', total: 12 },
        ifMatch: '"etag-1"',
      });

      expect(sdk.calls('replaceItem')[0]?.args).toEqual([
        'o-1',
        'c-1',
        { id: 'o-1', customerId: 'c-1', total: 12 },
        { accessCondition: { type: 'IfMatch', condition: '"etag-1"' } },
      ]);
    });
  });

  describe('readItem', () => {
    const address = { databaseId: 'shop', containerId: 'orders', itemId: 'o-1', partitionKey: 'c-1' };

    it('should return the stored resource', async () => {
      await expect(transport.readItem(address)).resolves.toEqual({ id: 'o-1', customerId: 'c-1' });
      expect(sdk.calls('readItem')[0]?.args).toEqual(['o-1', 'c-1', {}]);
    });

    it('should throw a 404 that translates to ResourceNotFound', async () => {
      sdk.pointRead = { statusCode: 404, resource: undefined };

      const error = await captureRejection(transport.readItem(address));

      expect(error).toMatchObject({ code: 404, message: 'Item o-1 does not exist in shop/orders' });
      expect(translateError(error)).toBeInstanceOf(CosmosResourceNotFoundError);
    });
  });

  describe('queryItems', () => {
    it('should pass the partition key, page size and signal as feed options', async () => {
      sdk.matches = [{ id: 'o-1' }, { id: 'o-2' }];
      const controller = new AbortController();

      const items = await transport.queryItems(
        {
          databaseId: 'shop',
          containerId: 'orders',
          partitionKey: 'c-1',
          query: 'SELECT * FROM c WHERE c.total = @total',
          parameters: [{ name: '@total', value: 12 }],
          maxItemCount: 1,
        },
        controller.signal
      );

      expect(items).toEqual([{ id: 'o-1' }, { id: 'o-2' }]);
      expect(sdk.calls('queryItems')[0]?.args).toEqual([
        { query: 'SELECT * FROM c WHERE c.total = @total', parameters: [{ name: '@total', value: 12 }] },
        { partitionKey: 'c-1', maxItemCount: 1, abortSignal: controller.signal },
      ]);
    });
  });

  it('should dispose the SDK client on close', async () => {
    await transport.close();
    expect(sdk.calls('dispose')).toHaveLength(1);
  });
});

describe('CosmosClient over the SDK transport', () => {
  it('should reject a write whose candidate field is not the container key', async () => {
    const sdk = new FakeSdkClient();
    const client = new CosmosClient(ENDPOINT, 'test-secret', {
      transport: new AzureCosmosTransport(buildConfig(), sdk),
      logger: new NoopLogger(),
    });
    const orders = client.getDatabaseClient('shop').getContainerClient('orders');

    const error = await captureRejection(orders.createItem({ id: 'o-1', customerId: 'c-1', type: 'online' }));

    expect(error).toBeInstanceOf(CosmosHttpResponseError);
    expect(error).toMatchObject({ statusCode: 400 });
    expect(sdk.calls('createItem')).toHaveLength(0);
    await client.close();
  });
});
