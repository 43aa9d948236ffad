/**
 * In-memory resource store for the simulated Cosmos DB account.
 *
 * Mirrors the service's observable rules: ids are unique per database, per
 * account and per logical partition; writes stamp `_rid`, `_etag` and `_ts`;
 * failures are raised as `ErrorResponse` objects carrying the HTTP status.
 */

import { v4 as uuidv4 } from 'uuid';

import type { JsonObject, JsonValue, PartitionKeyValue } from '../types/index.js';
import { readPath } from '../partition-key/index.js';
import { partitionKeyMismatch, serviceError } from '../transport/errors.js';

export interface StoredContainer {
  resource: JsonObject & { id: string };
  partitionKeyPath: string;
  items: Map<string, JsonObject>;
}

export interface StoredDatabase {
  resource: JsonObject & { id: string };
  containers: Map<string, StoredContainer>;
}

function stamp(id: string): { _rid: string; _etag: string; _ts: number; _self: string } {
  const rid = uuidv4().replace(/-/g, '').slice(0, 16);
  return {
    _rid: rid,
    _etag: `"${uuidv4()}"`,
    _ts: Math.floor(Date.now() / 1000),
    _self: `${id}/${rid}/`,
  };
}

function itemKey(partitionKey: PartitionKeyValue, id: string): string {
  return JSON.stringify([partitionKey, id]);
}

function clone(document: JsonObject): JsonObject {
  return structuredClone(document);
}

export class MockCosmosStore {
  private readonly databases: Map<string, StoredDatabase> = new Map();

  // ==========================================================================
  // Databases
  // ==========================================================================

  createDatabase(id: string): JsonObject {
    if (this.databases.has(id)) {
      throw serviceError(409, 'Conflict', `Database ${id} already exists`);
    }
    const resource = { id, ...stamp(`dbs/${id}`) };
    this.databases.set(id, { resource, containers: new Map() });
    return clone(resource);
  }

  readDatabase(id: string): JsonObject {
    return clone(this.database(id).resource);
  }

  deleteDatabase(id: string): void {
    this.database(id);
    this.databases.delete(id);
  }

  listDatabases(): JsonObject[] {
    return [...this.databases.values()].map((db) => clone(db.resource));
  }

  // ==========================================================================
  // Containers
  // ==========================================================================

  createContainer(databaseId: string, id: string, partitionKey: { paths: string[]; kind: string }): JsonObject {
    const database = this.database(databaseId);
    if (database.containers.has(id)) {
      throw serviceError(409, 'Conflict', `Container ${id} already exists in ${databaseId}`);
    }
    const [path] = partitionKey.paths;
    if (path === undefined || !path.startsWith('/')) {
      throw serviceError(400, 'BadRequest', 'Partition key paths must start with "/"');
    }
    const resource = {
      id,
      partitionKey: { paths: [...partitionKey.paths], kind: partitionKey.kind },
      ...stamp(`dbs/${databaseId}/colls/${id}`),
    };
    database.containers.set(id, { resource, partitionKeyPath: path, items: new Map() });
    return clone(resource);
  }

  readContainer(databaseId: string, id: string): JsonObject {
    return clone(this.container(databaseId, id).resource);
  }

  deleteContainer(databaseId: string, id: string): void {
    this.container(databaseId, id);
    this.database(databaseId).containers.delete(id);
  }

  listContainers(databaseId: string): JsonObject[] {
    return [...this.database(databaseId).containers.values()].map((c) => clone(c.resource));
  }

  // ==========================================================================
  // Items
  // ==========================================================================

  createItem(databaseId: string, containerId: string, partitionKey: PartitionKeyValue, body: JsonObject): JsonObject {
    const container = this.container(databaseId, containerId);
    const id = this.itemId(body);
    this.checkPartitionKey(container, partitionKey, body);
    const key = itemKey(partitionKey, id);
    if (container.items.has(key)) {
      throw serviceError(409, 'Conflict', `Entity with the specified id already exists in the system.`);
    }
    return this.write(container, key, id, body);
  }

  upsertItem(
    databaseId: string,
    containerId: string,
    partitionKey: PartitionKeyValue,
    body: JsonObject,
    ifMatch?: string
  ): JsonObject {
    const container = this.container(databaseId, containerId);
    const id = this.itemId(body);
    this.checkPartitionKey(container, partitionKey, body);
    const key = itemKey(partitionKey, id);
    const existing = container.items.get(key);
    if (existing && ifMatch !== undefined) {
      this.checkEtag(existing, ifMatch);
    }
    return this.write(container, key, id, body);
  }

  replaceItem(
    databaseId: string,
    containerId: string,
    itemId: string,
    partitionKey: PartitionKeyValue,
    body: JsonObject,
    ifMatch?: string
  ): JsonObject {
    const container = this.container(databaseId, containerId);
    const key = itemKey(partitionKey, itemId);
    const existing = container.items.get(key);
    if (!existing) {
      throw serviceError(404, 'NotFound', 'Entity with the specified id does not exist in the system.');
    }
    if (ifMatch !== undefined) {
      this.checkEtag(existing, ifMatch);
    }
    if (this.itemId(body) !== itemId) {
      throw serviceError(400, 'BadRequest', 'The id in the body does not match the item being replaced');
    }
    this.checkPartitionKey(container, partitionKey, body);
    return this.write(container, key, itemId, body);
  }

  readItem(databaseId: string, containerId: string, itemId: string, partitionKey: PartitionKeyValue): JsonObject {
    const existing = this.container(databaseId, containerId).items.get(itemKey(partitionKey, itemId));
    if (!existing) {
      throw serviceError(404, 'NotFound', 'Entity with the specified id does not exist in the system.');
    }
    return clone(existing);
  }

  deleteItem(
    databaseId: string,
    containerId: string,
    itemId: string,
    partitionKey: PartitionKeyValue,
    ifMatch?: string
  ): void {
    const container = this.container(databaseId, containerId);
    const key = itemKey(partitionKey, itemId);
    const existing = container.items.get(key);
    if (!existing) {
      throw serviceError(404, 'NotFound', 'Entity with the specified id does not exist in the system.');
    }
    if (ifMatch !== undefined) {
      this.checkEtag(existing, ifMatch);
    }
    container.items.delete(key);
  }

  /**
   * Items of one logical partition, in insertion order.
   */
  partitionItems(databaseId: string, containerId: string, partitionKey: PartitionKeyValue): JsonObject[] {
    const container = this.container(databaseId, containerId);
    const result: JsonObject[] = [];
    for (const item of container.items.values()) {
      if (readPath(item, container.partitionKeyPath) === partitionKey) {
        result.push(clone(item));
      }
    }
    return result;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private database(id: string): StoredDatabase {
    const database = this.databases.get(id);
    if (!database) {
      throw serviceError(404, 'NotFound', `Database ${id} does not exist`);
    }
    return database;
  }

  private container(databaseId: string, id: string): StoredContainer {
    const container = this.database(databaseId).containers.get(id);
    if (!container) {
      throw serviceError(404, 'NotFound', `Container ${id} does not exist in ${databaseId}`);
    }
    return container;
  }

  private itemId(body: JsonObject): string {
    const id: JsonValue | undefined = body.id;
    if (typeof id !== 'string' || id.length === 0) {
      throw serviceError(400, 'BadRequest', 'The input content is invalid because the required property, id, is missing.');
    }
    return id;
  }

  private checkPartitionKey(container: StoredContainer, partitionKey: PartitionKeyValue, body: JsonObject): void {
    const fromBody = readPath(body, container.partitionKeyPath);
    if (fromBody !== partitionKey) {
      throw partitionKeyMismatch();
    }
  }

  private checkEtag(existing: JsonObject, ifMatch: string): void {
    if (existing._etag !== ifMatch) {
      throw serviceError(412, 'PreconditionFailed', 'Operation cannot be performed because one of the specified precondition is not met.');
    }
  }

  private write(container: StoredContainer, key: string, id: string, body: JsonObject): JsonObject {
    const { _rid, _etag, _ts, _self } = stamp(`${String(container.resource._self)}docs/${id}`);
    const stored: JsonObject = { ...clone(body), _rid, _self, _etag, _attachments: 'attachments/', _ts };
    container.items.set(key, stored);
    return clone(stored);
  }
}
