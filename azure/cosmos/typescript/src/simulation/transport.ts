/**
 * In-process transport that simulates a Cosmos DB account.
 *
 * Records every call, can delay responses and inject failures, and answers a
 * small SQL subset: `SELECT * FROM c [WHERE c.field = value [AND ...]]`, where
 * a value is a string, number, boolean, null or `@parameter`.
 */

import type { JsonObject, JsonValue, QueryParameter } from '../types/index.js';
import type {
  ContainerDefinitionInput,
  CosmosTransport,
  ItemAddress,
  QueryRequest,
  WriteItemRequest,
} from '../transport/index.js';
import { readPath } from '../partition-key/index.js';
import { serviceError } from '../transport/errors.js';
import { MockCosmosStore } from './store.js';

export type TransportMethod = Exclude<keyof CosmosTransport, 'close'>;

export interface RecordedCall {
  method: TransportMethod;
  args: unknown[];
}

export interface InMemoryTransportOptions {
  /** Delay applied to every call (ms). Default: 0 */
  latencyMs?: number;
  store?: MockCosmosStore;
}

interface WhereClause {
  path: string;
  value: string;
}

const SELECT_PATTERN = /^\s*SELECT\s+\*\s+FROM\s+(\w+)(?:\s+WHERE\s+(.+?))?\s*$/i;
const CONDITION_PATTERN = /^\s*(\w+)((?:\.\w+)+)\s*=\s*(.+?)\s*$/;

function abortError(): Error {
  const error = new Error('The operation was aborted');
  error.name = 'AbortError';
  return error;
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError());
      return;
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(abortError());
    };
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

function parseLiteral(token: string, parameters: QueryParameter[]): JsonValue {
  if (token.startsWith('@')) {
    const parameter = parameters.find((p) => p.name === token);
    if (!parameter) {
      throw serviceError(400, 'BadRequest', `Parameter ${token} is not defined`);
    }
    return parameter.value;
  }
  const quoted = /^'(.*)'$/.exec(token) ?? /^"(.*)"$/.exec(token);
  if (quoted) {
    return quoted[1] ?? '';
  }
  if (token === 'true') return true;
  if (token === 'false') return false;
  if (token === 'null') return null;
  const numeric = Number(token);
  if (token.length > 0 && Number.isFinite(numeric)) {
    return numeric;
  }
  throw serviceError(400, 'BadRequest', `Syntax error near "${token}"`);
}

function parseQuery(query: string): { alias: string; conditions: WhereClause[] } {
  const match = SELECT_PATTERN.exec(query);
  if (!match) {
    throw serviceError(400, 'BadRequest', `Unsupported query: ${query}`);
  }
  const alias = match[1] ?? 'c';
  const where = match[2];
  if (where === undefined) {
    return { alias, conditions: [] };
  }

  const conditions = where.split(/\s+AND\s+/i).map((clause) => {
    const condition = CONDITION_PATTERN.exec(clause);
    if (!condition || condition[1] !== alias) {
      throw serviceError(400, 'BadRequest', `Unsupported condition: ${clause}`);
    }
    return { path: (condition[2] ?? '').replace(/\./g, '/'), value: condition[3] ?? '' };
  });
  return { alias, conditions };
}

export class InMemoryCosmosTransport implements CosmosTransport {
  readonly store: MockCosmosStore;
  readonly calls: RecordedCall[] = [];
  latencyMs: number;
  closed = false;
  private readonly failures: unknown[] = [];

  constructor(options: InMemoryTransportOptions = {}) {
    this.store = options.store ?? new MockCosmosStore();
    this.latencyMs = options.latencyMs ?? 0;
  }

  /** Number of calls received, optionally for one method */
  callCount(method?: TransportMethod): number {
    return method === undefined ? this.calls.length : this.calls.filter((c) => c.method === method).length;
  }

  /**
   * Queues an error to throw from the next call instead of running it.
   * Queued errors are consumed in order.
   */
  failNext(error: unknown): this {
    this.failures.push(error);
    return this;
  }

  reset(): void {
    this.calls.length = 0;
    this.failures.length = 0;
  }

  createDatabase(databaseId: string, signal?: AbortSignal): Promise<unknown> {
    return this.handle('createDatabase', [databaseId], signal, () => this.store.createDatabase(databaseId));
  }

  readDatabase(databaseId: string, signal?: AbortSignal): Promise<unknown> {
    return this.handle('readDatabase', [databaseId], signal, () => this.store.readDatabase(databaseId));
  }

  async deleteDatabase(databaseId: string, signal?: AbortSignal): Promise<void> {
    await this.handle('deleteDatabase', [databaseId], signal, () => this.store.deleteDatabase(databaseId));
  }

  listDatabases(signal?: AbortSignal): Promise<unknown[]> {
    return this.handle('listDatabases', [], signal, () => this.store.listDatabases());
  }

  createContainer(databaseId: string, definition: ContainerDefinitionInput, signal?: AbortSignal): Promise<unknown> {
    return this.handle('createContainer', [databaseId, definition], signal, () =>
      this.store.createContainer(databaseId, definition.id, definition.partitionKey)
    );
  }

  readContainer(databaseId: string, containerId: string, signal?: AbortSignal): Promise<unknown> {
    return this.handle('readContainer', [databaseId, containerId], signal, () =>
      this.store.readContainer(databaseId, containerId)
    );
  }

  async deleteContainer(databaseId: string, containerId: string, signal?: AbortSignal): Promise<void> {
    await this.handle('deleteContainer', [databaseId, containerId], signal, () =>
      this.store.deleteContainer(databaseId, containerId)
    );
  }

  listContainers(databaseId: string, signal?: AbortSignal): Promise<unknown[]> {
    return this.handle('listContainers', [databaseId], signal, () => this.store.listContainers(databaseId));
  }

  createItem(request: WriteItemRequest, signal?: AbortSignal): Promise<unknown> {
    return this.handle('createItem', [request], signal, () =>
      this.store.createItem(request.databaseId, request.containerId, request.partitionKey, request.body)
    );
  }

  upsertItem(request: WriteItemRequest, signal?: AbortSignal): Promise<unknown> {
    return this.handle('upsertItem', [request], signal, () =>
      this.store.upsertItem(request.databaseId, request.containerId, request.partitionKey, request.body, request.ifMatch)
    );
  }

  replaceItem(request: WriteItemRequest & { itemId: string }, signal?: AbortSignal): Promise<unknown> {
    return this.handle('replaceItem', [request], signal, () =>
      this.store.replaceItem(
        request.databaseId,
        request.containerId,
        request.itemId,
        request.partitionKey,
        request.body,
        request.ifMatch
      )
    );
  }

  readItem(address: ItemAddress, signal?: AbortSignal): Promise<unknown> {
    return this.handle('readItem', [address], signal, () =>
      this.store.readItem(address.databaseId, address.containerId, address.itemId, address.partitionKey)
    );
  }

  async deleteItem(address: ItemAddress, signal?: AbortSignal): Promise<void> {
    await this.handle('deleteItem', [address], signal, () =>
      this.store.deleteItem(address.databaseId, address.containerId, address.itemId, address.partitionKey, address.ifMatch)
    );
  }

  queryItems(request: QueryRequest, signal?: AbortSignal): Promise<unknown[]> {
    return this.handle('queryItems', [request], signal, () => this.query(request));
  }

  async close(): Promise<void> {
    this.closed = true;
  }

  private query(request: QueryRequest): JsonObject[] {
    const { conditions } = parseQuery(request.query);
    const expected = conditions.map((c) => ({ path: c.path, value: parseLiteral(c.value, request.parameters) }));
    return this.store
      .partitionItems(request.databaseId, request.containerId, request.partitionKey)
      .filter((item) => expected.every((c) => readPath(item, c.path) === c.value));
  }

  private async handle<T>(
    method: TransportMethod,
    args: unknown[],
    signal: AbortSignal | undefined,
    run: () => T
  ): Promise<T> {
    this.calls.push({ method, args });

    if (this.latencyMs > 0) {
      await sleep(this.latencyMs, signal);
    } else if (signal?.aborted) {
      throw abortError();
    }

    if (this.failures.length > 0) {
      throw this.failures.shift();
    }

    return run();
  }
}
