/**
 * Contract of the network client that performs Cosmos DB requests.
 *
 * Implementations return values the way the service delivered them, already
 * deserialized, and throw their own errors; translation and decoding happen in
 * the handles. Resources stay `unknown` until decoded.
 */

import type { JsonObject, PartitionKeyValue, QueryParameter } from '../types/index.js';

export interface ContainerDefinitionInput {
  id: string;
  partitionKey: {
    paths: string[];
    kind: 'Hash' | 'MultiHash';
    version?: number;
  };
}

export interface WriteItemRequest {
  databaseId: string;
  containerId: string;
  partitionKey: PartitionKeyValue;
  body: JsonObject;
  ifMatch?: string;
}

export interface ItemAddress {
  databaseId: string;
  containerId: string;
  itemId: string;
  partitionKey: PartitionKeyValue;
  ifMatch?: string;
}

export interface QueryRequest {
  databaseId: string;
  containerId: string;
  partitionKey: PartitionKeyValue;
  query: string;
  parameters: QueryParameter[];
  maxItemCount?: number;
}

export interface CosmosTransport {
  createDatabase(databaseId: string, signal?: AbortSignal): Promise<unknown>;
  readDatabase(databaseId: string, signal?: AbortSignal): Promise<unknown>;
  deleteDatabase(databaseId: string, signal?: AbortSignal): Promise<void>;
  listDatabases(signal?: AbortSignal): Promise<unknown[]>;

  createContainer(
    databaseId: string,
    definition: ContainerDefinitionInput,
    signal?: AbortSignal
  ): Promise<unknown>;
  readContainer(databaseId: string, containerId: string, signal?: AbortSignal): Promise<unknown>;
  deleteContainer(databaseId: string, containerId: string, signal?: AbortSignal): Promise<void>;
  listContainers(databaseId: string, signal?: AbortSignal): Promise<unknown[]>;

  createItem(request: WriteItemRequest, signal?: AbortSignal): Promise<unknown>;
  upsertItem(request: WriteItemRequest, signal?: AbortSignal): Promise<unknown>;
  replaceItem(request: WriteItemRequest & { itemId: string }, signal?: AbortSignal): Promise<unknown>;
  readItem(address: ItemAddress, signal?: AbortSignal): Promise<unknown>;
  deleteItem(address: ItemAddress, signal?: AbortSignal): Promise<void>;
  queryItems(request: QueryRequest, signal?: AbortSignal): Promise<unknown[]>;

  /** Releases connections; called once by the owning client */
  close(): Promise<void>;
}
