/**
 * Operation builders shared by the promise and future facades.
 *
 * Each method validates and prepares its inputs, then returns a
 * {@link BridgeOperation} for the caller's execution path. Marshaling and
 * partition key resolution happen inside the operation, before the transport
 * is called, so a rejected body or missing key never reaches the network.
 *
 * @module client/operations
 */

import type { BridgeOperation } from '../bridge/index.js';
import { CosmosResourceExistsError } from '../errors/index.js';
import { decodeDocument, decodeDocuments, encodePayload } from '../marshal/index.js';
import { resolvePartitionKey, type ItemOperation } from '../partition-key/index.js';
import type {
  ContainerProperties,
  DatabaseProperties,
  ItemAccessOptions,
  ItemBody,
  ItemDocument,
  ItemRequestOptions,
  JsonObject,
  PartitionKeySpec,
  PartitionKeyValue,
  QueryItemsOptions,
} from '../types/index.js';
import type { WriteItemRequest } from '../transport/index.js';
import type { ClientContext } from './context.js';
import {
  partitionKeyPathOf,
  toContainerProperties,
  toDatabaseProperties,
  toPartitionKeyDefinition,
} from './resources.js';

function databaseResource(databaseId: string): string {
  return `dbs/${databaseId}`;
}

function containerResource(databaseId: string, containerId: string): string {
  return `dbs/${databaseId}/colls/${containerId}`;
}

function decodeItem(response: unknown, sent: JsonObject): ItemDocument {
  return response === undefined ? sent : decodeDocument(response);
}

// ============================================================================
// Account and Database Operations
// ============================================================================

export class AccountOperations {
  private readonly context: ClientContext;

  constructor(context: ClientContext) {
    this.context = context;
  }

  createDatabase(databaseId: string): BridgeOperation<DatabaseProperties> {
    return async (signal) => {
      const response = await this.context.call('createDatabase', databaseResource(databaseId), signal, () =>
        this.context.transport.createDatabase(databaseId, signal)
      );
      return toDatabaseProperties(response);
    };
  }

  /**
   * Creates the database, or reads it when it already exists.
   */
  createDatabaseIfNotExists(databaseId: string): BridgeOperation<DatabaseProperties> {
    return async (signal) => {
      try {
        return await this.createDatabase(databaseId)(signal);
      } catch (error) {
        if (!(error instanceof CosmosResourceExistsError)) {
          throw error;
        }
      }
      return this.readDatabase(databaseId)(signal);
    };
  }

  readDatabase(databaseId: string): BridgeOperation<DatabaseProperties> {
    return async (signal) => {
      const response = await this.context.call('readDatabase', databaseResource(databaseId), signal, () =>
        this.context.transport.readDatabase(databaseId, signal)
      );
      return toDatabaseProperties(response);
    };
  }

  listDatabases(): BridgeOperation<DatabaseProperties[]> {
    return async (signal) => {
      const response = await this.context.call('listDatabases', 'dbs', signal, () =>
        this.context.transport.listDatabases(signal)
      );
      return response.map((entry) => toDatabaseProperties(entry));
    };
  }

  deleteDatabase(databaseId: string): BridgeOperation<void> {
    return async (signal) => {
      await this.context.call('deleteDatabase', databaseResource(databaseId), signal, () =>
        this.context.transport.deleteDatabase(databaseId, signal)
      );
      this.context.forgetDatabase(databaseId);
    };
  }

  createContainer(
    databaseId: string,
    containerId: string,
    partitionKey: PartitionKeySpec | string
  ): BridgeOperation<ContainerProperties> {
    return async (signal) => {
      const definition = { id: containerId, partitionKey: toPartitionKeyDefinition(partitionKey) };
      const response = await this.context.call(
        'createContainer',
        containerResource(databaseId, containerId),
        signal,
        () => this.context.transport.createContainer(databaseId, definition, signal)
      );
      return this.remember(databaseId, containerId, toContainerProperties(response));
    };
  }

  /**
   * Creates the container, or reads it when it already exists. An existing
   * container keeps its own partition key definition.
   */
  createContainerIfNotExists(
    databaseId: string,
    containerId: string,
    partitionKey: PartitionKeySpec | string
  ): BridgeOperation<ContainerProperties> {
    return async (signal) => {
      try {
        return await this.createContainer(databaseId, containerId, partitionKey)(signal);
      } catch (error) {
        if (!(error instanceof CosmosResourceExistsError)) {
          throw error;
        }
      }
      return this.readContainer(databaseId, containerId)(signal);
    };
  }

  readContainer(databaseId: string, containerId: string): BridgeOperation<ContainerProperties> {
    return async (signal) => {
      const response = await this.context.call(
        'readContainer',
        containerResource(databaseId, containerId),
        signal,
        () => this.context.transport.readContainer(databaseId, containerId, signal)
      );
      return this.remember(databaseId, containerId, toContainerProperties(response));
    };
  }

  listContainers(databaseId: string): BridgeOperation<ContainerProperties[]> {
    return async (signal) => {
      const response = await this.context.call(
        'listContainers',
        `${databaseResource(databaseId)}/colls`,
        signal,
        () => this.context.transport.listContainers(databaseId, signal)
      );
      return response.map((entry) => toContainerProperties(entry));
    };
  }

  deleteContainer(databaseId: string, containerId: string): BridgeOperation<void> {
    return async (signal) => {
      await this.context.call('deleteContainer', containerResource(databaseId, containerId), signal, () =>
        this.context.transport.deleteContainer(databaseId, containerId, signal)
      );
      this.context.forgetContainer(databaseId, containerId);
    };
  }

  private remember(
    databaseId: string,
    containerId: string,
    properties: ContainerProperties
  ): ContainerProperties {
    this.context.rememberPartitionKeyPath(databaseId, containerId, partitionKeyPathOf(properties));
    return properties;
  }
}

// ============================================================================
// Item Operations
// ============================================================================

export class ItemOperations {
  private readonly context: ClientContext;
  private readonly account: AccountOperations;
  private readonly databaseId: string;
  private readonly containerId: string;

  constructor(context: ClientContext, databaseId: string, containerId: string) {
    this.context = context;
    this.account = new AccountOperations(context);
    this.databaseId = databaseId;
    this.containerId = containerId;
  }

  private get resource(): string {
    return `${containerResource(this.databaseId, this.containerId)}/docs`;
  }

  createItem(body: ItemBody, options: ItemRequestOptions = {}): BridgeOperation<ItemDocument> {
    return this.write('create', body, options, (request, signal) =>
      this.context.transport.createItem(request, signal)
    );
  }

  upsertItem(body: ItemBody, options: ItemRequestOptions = {}): BridgeOperation<ItemDocument> {
    return this.write('upsert', body, options, (request, signal) =>
      this.context.transport.upsertItem(request, signal)
    );
  }

  replaceItem(
    itemId: string,
    body: ItemBody,
    options: ItemRequestOptions = {}
  ): BridgeOperation<ItemDocument> {
    return this.write('replace', body, options, (request, signal) =>
      this.context.transport.replaceItem({ ...request, itemId }, signal)
    );
  }

  readItem(itemId: string, partitionKey: PartitionKeyValue): BridgeOperation<ItemDocument> {
    return async (signal) => {
      this.context.assertOpen('readItem');
      const resolved = resolvePartitionKey({ operation: 'read', explicit: partitionKey });
      const response = await this.context.call('readItem', `${this.resource}/${itemId}`, signal, () =>
        this.context.transport.readItem(
          {
            databaseId: this.databaseId,
            containerId: this.containerId,
            itemId,
            partitionKey: resolved,
          },
          signal
        )
      );
      return decodeDocument(response);
    };
  }

  deleteItem(
    itemId: string,
    partitionKey: PartitionKeyValue,
    options: ItemAccessOptions = {}
  ): BridgeOperation<void> {
    return async (signal) => {
      this.context.assertOpen('deleteItem');
      const resolved = resolvePartitionKey({ operation: 'delete', explicit: partitionKey });
      await this.context.call('deleteItem', `${this.resource}/${itemId}`, signal, () =>
        this.context.transport.deleteItem(
          {
            databaseId: this.databaseId,
            containerId: this.containerId,
            itemId,
            partitionKey: resolved,
            ifMatch: options.ifMatch,
          },
          signal
        )
      );
    };
  }

  /**
   * Queries one logical partition. Cross-partition queries are not issued.
   */
  queryItems(query: string, options: QueryItemsOptions): BridgeOperation<ItemDocument[]> {
    return async (signal) => {
      this.context.assertOpen('queryItems');
      const partitionKey = resolvePartitionKey({ operation: 'query', explicit: options.partitionKey });
      const response = await this.context.call('queryItems', this.resource, signal, () =>
        this.context.transport.queryItems(
          {
            databaseId: this.databaseId,
            containerId: this.containerId,
            partitionKey,
            query,
            parameters: options.parameters ?? [],
            maxItemCount: options.maxItemCount,
          },
          signal
        )
      );
      return decodeDocuments(response);
    };
  }

  readContainer(): BridgeOperation<ContainerProperties> {
    return this.account.readContainer(this.databaseId, this.containerId);
  }

  deleteContainer(): BridgeOperation<void> {
    return this.account.deleteContainer(this.databaseId, this.containerId);
  }

  private write(
    operation: ItemOperation,
    body: ItemBody,
    options: ItemRequestOptions,
    send: (request: WriteItemRequest, signal: AbortSignal) => Promise<unknown>
  ): BridgeOperation<ItemDocument> {
    const name = `${operation}Item`;
    return async (signal) => {
      this.context.assertOpen(name);
      const encoded = encodePayload(body);
      const partitionKey = await this.writePartitionKey(operation, encoded, options.partitionKey, signal);
      const response = await this.context.call(name, this.resource, signal, () =>
        send(
          {
            databaseId: this.databaseId,
            containerId: this.containerId,
            partitionKey,
            body: encoded,
            ifMatch: options.ifMatch,
          },
          signal
        )
      );
      return decodeItem(response, encoded);
    };
  }

  private async writePartitionKey(
    operation: ItemOperation,
    body: JsonObject,
    explicit: PartitionKeyValue | undefined,
    signal: AbortSignal
  ): Promise<PartitionKeyValue> {
    if (explicit !== undefined || (operation !== 'create' && operation !== 'upsert')) {
      return resolvePartitionKey({ operation, explicit });
    }

    if (
      this.context.config.partitionKeyPathResolution === 'fetch' &&
      !this.context.knowsPartitionKeyPath(this.databaseId, this.containerId)
    ) {
      // remembers the path, or its absence
      await this.readContainer()(signal);
    }

    return resolvePartitionKey({
      operation,
      body,
      declaredPath: this.context.partitionKeyPath(this.databaseId, this.containerId),
      candidates: this.context.config.partitionKeyCandidates,
    });
  }
}
