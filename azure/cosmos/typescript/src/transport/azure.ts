/**
 * Transport backed by the `@azure/cosmos` SDK.
 *
 * Connection management, request signing, retries and timeouts are the SDK's
 * concern; this adapter only maps the transport contract onto SDK calls.
 */

import {
  CosmosClient as AzureCosmosClient,
  ErrorResponse,
  PartitionKeyKind,
  type ContainerDefinition,
  type ContainerRequest,
  type CosmosClientOptions,
  type DatabaseRequest,
  type FeedOptions,
  type ItemDefinition,
  type RequestOptions,
  type SqlQuerySpec,
} from '@azure/cosmos';

import type { CosmosConfig } from '../config/index.js';
import { readPath } from '../partition-key/index.js';
import type { JsonObject, PartitionKeyValue } from '../types/index.js';
import { partitionKeyMismatch } from './errors.js';
import type {
  ContainerDefinitionInput,
  CosmosTransport,
  ItemAddress,
  QueryRequest,
  WriteItemRequest,
} from './types.js';

// ============================================================================
// SDK Surface
// ============================================================================

// The parts of the `@azure/cosmos` client this adapter calls. The SDK's
// `CosmosClient` satisfies them; tests hand in a fake.

export interface SdkResponse {
  statusCode?: number;
  resource?: unknown;
}

export interface SdkFeed {
  fetchAll(): Promise<{ resources: unknown[] }>;
}

export interface SdkItem {
  read(options?: RequestOptions): Promise<SdkResponse>;
  replace(body: ItemDefinition, options?: RequestOptions): Promise<SdkResponse>;
  delete(options?: RequestOptions): Promise<unknown>;
}

export interface SdkItems {
  create(body: ItemDefinition, options?: RequestOptions): Promise<SdkResponse>;
  upsert(body: ItemDefinition, options?: RequestOptions): Promise<SdkResponse>;
  query(query: SqlQuerySpec, options?: FeedOptions): SdkFeed;
}

export interface SdkContainer {
  readonly items: SdkItems;
  item(id: string, partitionKey?: PartitionKeyValue): SdkItem;
  read(options?: RequestOptions): Promise<{ resource?: ContainerDefinition }>;
  delete(options?: RequestOptions): Promise<unknown>;
}

export interface SdkDatabase {
  readonly containers: {
    create(body: ContainerRequest, options?: RequestOptions): Promise<SdkResponse>;
    readAll(options?: FeedOptions): SdkFeed;
  };
  container(id: string): SdkContainer;
  read(options?: RequestOptions): Promise<SdkResponse>;
  delete(options?: RequestOptions): Promise<unknown>;
}

export interface SdkClient {
  readonly databases: {
    create(body: DatabaseRequest, options?: RequestOptions): Promise<SdkResponse>;
    readAll(options?: FeedOptions): SdkFeed;
  };
  database(id: string): SdkDatabase;
  dispose(): void;
}

// ============================================================================
// Option Mapping
// ============================================================================

export function toClientOptions(config: CosmosConfig): CosmosClientOptions {
  const options: CosmosClientOptions = {
    endpoint: config.endpoint,
    userAgentSuffix: config.userAgentSuffix,
    connectionPolicy: {
      requestTimeout: config.requestTimeoutMs,
    },
  };

  switch (config.credentials.type) {
    case 'key':
      options.key = config.credentials.key.expose();
      break;
    case 'resourceTokens': {
      const tokens: Record<string, string> = {};
      for (const [path, token] of Object.entries(config.credentials.tokens)) {
        tokens[path] = token.expose();
      }
      options.resourceTokens = tokens;
      break;
    }
  }

  return options;
}

export function requestOptions(signal?: AbortSignal, ifMatch?: string): RequestOptions {
  const options: RequestOptions = {};
  if (signal) {
    options.abortSignal = signal;
  }
  if (ifMatch !== undefined) {
    options.accessCondition = { type: 'IfMatch', condition: ifMatch };
  }
  return options;
}

function toItemDefinition(body: JsonObject): ItemDefinition {
  const item: ItemDefinition = {};
  return Object.assign(item, body);
}

/**
 * The SDK reports a missing item on point reads as a 404 response instead of
 * throwing; raise it like every other non-success status.
 */
function notFound(address: ItemAddress): ErrorResponse {
  const error = new ErrorResponse(
    `Item ${address.itemId} does not exist in ${address.databaseId}/${address.containerId}`
  );
  error.code = 404;
  return error;
}

export class AzureCosmosTransport implements CosmosTransport {
  private readonly client: SdkClient;
  private readonly partitionKeyPaths: Map<string, string | undefined> = new Map();

  constructor(config: CosmosConfig, client?: SdkClient) {
    this.client = client ?? new AzureCosmosClient(toClientOptions(config));
  }

  async createDatabase(databaseId: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.client.databases.create({ id: databaseId }, requestOptions(signal));
    return response.resource;
  }

  async readDatabase(databaseId: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.client.database(databaseId).read(requestOptions(signal));
    return response.resource;
  }

  async deleteDatabase(databaseId: string, signal?: AbortSignal): Promise<void> {
    await this.client.database(databaseId).delete(requestOptions(signal));
    const prefix = `${databaseId}/`;
    for (const key of [...this.partitionKeyPaths.keys()]) {
      if (key.startsWith(prefix)) {
        this.partitionKeyPaths.delete(key);
      }
    }
  }

  async listDatabases(signal?: AbortSignal): Promise<unknown[]> {
    const feedOptions: FeedOptions = signal ? { abortSignal: signal } : {};
    const { resources } = await this.client.databases.readAll(feedOptions).fetchAll();
    return resources;
  }

  async createContainer(
    databaseId: string,
    definition: ContainerDefinitionInput,
    signal?: AbortSignal
  ): Promise<unknown> {
    const kind =
      definition.partitionKey.kind === 'MultiHash' ? PartitionKeyKind.MultiHash : PartitionKeyKind.Hash;
    const response = await this.client.database(databaseId).containers.create(
      {
        id: definition.id,
        partitionKey: {
          paths: definition.partitionKey.paths,
          kind,
          version: definition.partitionKey.version,
        },
      },
      requestOptions(signal)
    );
    this.partitionKeyPaths.set(`${databaseId}/${definition.id}`, definition.partitionKey.paths[0]);
    return response.resource;
  }

  async readContainer(databaseId: string, containerId: string, signal?: AbortSignal): Promise<unknown> {
    const response = await this.client
      .database(databaseId)
      .container(containerId)
      .read(requestOptions(signal));
    this.partitionKeyPaths.set(`${databaseId}/${containerId}`, response.resource?.partitionKey?.paths[0]);
    return response.resource;
  }

  async deleteContainer(databaseId: string, containerId: string, signal?: AbortSignal): Promise<void> {
    await this.client.database(databaseId).container(containerId).delete(requestOptions(signal));
    this.partitionKeyPaths.delete(`${databaseId}/${containerId}`);
  }

  async listContainers(databaseId: string, signal?: AbortSignal): Promise<unknown[]> {
    const feedOptions: FeedOptions = signal ? { abortSignal: signal } : {};
    const { resources } = await this.client
      .database(databaseId)
      .containers.readAll(feedOptions)
      .fetchAll();
    return resources;
  }

  /**
   * The SDK routes creates by the body's own partition key field, so the
   * resolved key is checked against that field before the request is sent.
   */
  async createItem(request: WriteItemRequest, signal?: AbortSignal): Promise<unknown> {
    await this.checkPartitionKey(request, signal);
    const response = await this.items(request).create(
      toItemDefinition(request.body),
      requestOptions(signal, request.ifMatch)
    );
    return response.resource;
  }

  async upsertItem(request: WriteItemRequest, signal?: AbortSignal): Promise<unknown> {
    await this.checkPartitionKey(request, signal);
    const response = await this.items(request).upsert(
      toItemDefinition(request.body),
      requestOptions(signal, request.ifMatch)
    );
    return response.resource;
  }

  async replaceItem(
    request: WriteItemRequest & { itemId: string },
    signal?: AbortSignal
  ): Promise<unknown> {
    const response = await this.container(request)
      .item(request.itemId, request.partitionKey)
      .replace(toItemDefinition(request.body), requestOptions(signal, request.ifMatch));
    return response.resource;
  }

  async readItem(address: ItemAddress, signal?: AbortSignal): Promise<unknown> {
    const response = await this.container(address)
      .item(address.itemId, address.partitionKey)
      .read(requestOptions(signal));
    if (response.statusCode === 404 || response.resource === undefined) {
      throw notFound(address);
    }
    return response.resource;
  }

  async deleteItem(address: ItemAddress, signal?: AbortSignal): Promise<void> {
    await this.container(address)
      .item(address.itemId, address.partitionKey)
      .delete(requestOptions(signal, address.ifMatch));
  }

  async queryItems(request: QueryRequest, signal?: AbortSignal): Promise<unknown[]> {
    const feedOptions: FeedOptions = { partitionKey: request.partitionKey };
    if (request.maxItemCount !== undefined) {
      feedOptions.maxItemCount = request.maxItemCount;
    }
    if (signal) {
      feedOptions.abortSignal = signal;
    }
    const { resources } = await this.container(request)
      .items.query({ query: request.query, parameters: request.parameters }, feedOptions)
      .fetchAll();
    return resources;
  }

  async close(): Promise<void> {
    this.client.dispose();
  }

  /**
   * @throws {ErrorResponse} with status 400 when the body's value at the
   * container's first key path is not the resolved key
   */
  private async checkPartitionKey(request: WriteItemRequest, signal?: AbortSignal): Promise<void> {
    const key = `${request.databaseId}/${request.containerId}`;
    if (!this.partitionKeyPaths.has(key)) {
      await this.readContainer(request.databaseId, request.containerId, signal);
    }
    const path = this.partitionKeyPaths.get(key);
    if (path === undefined || readPath(request.body, path) !== request.partitionKey) {
      throw partitionKeyMismatch();
    }
  }

  private container(address: { databaseId: string; containerId: string }): SdkContainer {
    return this.client.database(address.databaseId).container(address.containerId);
  }

  private items(address: { databaseId: string; containerId: string }): SdkItems {
    return this.container(address).items;
  }
}
