/**
 * Container handle of the future API.
 */

import type { BridgeFuture } from '../bridge/index.js';
import type { ClientContext } from '../client/context.js';
import { ItemOperations } from '../client/operations.js';
import type {
  ContainerProperties,
  ItemAccessOptions,
  ItemBody,
  ItemDocument,
  ItemRequestOptions,
  PartitionKeyValue,
  QueryItemsOptions,
} from '../types/index.js';

/**
 * Same surface as {@link ContainerProxy}; every operation is queued on the
 * bridge's worker dispatcher and returns a cancellable future.
 *
 * @example
 * ```typescript
 * const pending = container.readItem('1', 'electronics');
 * setTimeout(() => pending.cancel('took too long'), 500);
 * const item = await pending;
 * ```
 */
export class AsyncContainerProxy {
  readonly databaseId: string;
  readonly id: string;
  private readonly context: ClientContext;
  private readonly operations: ItemOperations;

  constructor(context: ClientContext, databaseId: string, containerId: string) {
    this.context = context;
    this.databaseId = databaseId;
    this.id = containerId;
    this.operations = new ItemOperations(context, databaseId, containerId);
  }

  createItem(body: ItemBody, options?: ItemRequestOptions): BridgeFuture<ItemDocument> {
    return this.context.bridge().submit(this.operations.createItem(body, options));
  }

  upsertItem(body: ItemBody, options?: ItemRequestOptions): BridgeFuture<ItemDocument> {
    return this.context.bridge().submit(this.operations.upsertItem(body, options));
  }

  replaceItem(itemId: string, body: ItemBody, options?: ItemRequestOptions): BridgeFuture<ItemDocument> {
    return this.context.bridge().submit(this.operations.replaceItem(itemId, body, options));
  }

  readItem(itemId: string, partitionKey: PartitionKeyValue): BridgeFuture<ItemDocument> {
    return this.context.bridge().submit(this.operations.readItem(itemId, partitionKey));
  }

  deleteItem(
    itemId: string,
    partitionKey: PartitionKeyValue,
    options?: ItemAccessOptions
  ): BridgeFuture<void> {
    return this.context.bridge().submit(this.operations.deleteItem(itemId, partitionKey, options));
  }

  queryItems(query: string, options: QueryItemsOptions): BridgeFuture<ItemDocument[]> {
    return this.context.bridge().submit(this.operations.queryItems(query, options));
  }

  read(): BridgeFuture<ContainerProperties> {
    return this.context.bridge().submit(this.operations.readContainer());
  }

  delete(): BridgeFuture<void> {
    return this.context.bridge().submit(this.operations.deleteContainer());
  }
}
