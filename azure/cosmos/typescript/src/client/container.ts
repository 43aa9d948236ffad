/**
 * Container handle of the promise API.
 */

import type {
  ContainerProperties,
  ItemAccessOptions,
  ItemBody,
  ItemDocument,
  ItemRequestOptions,
  PartitionKeyValue,
  QueryItemsOptions,
} from '../types/index.js';
import type { ClientContext } from './context.js';
import { ItemOperations } from './operations.js';

/**
 * Item operations scoped to one container. Creating a proxy issues no
 * network call; the container is only contacted by its operations.
 *
 * @example
 * ```typescript
 * const products = client.getDatabaseClient('shop').getContainerClient('products');
 * await products.createItem({ id: '1', category: 'electronics', name: 'Laptop' });
 * const item = await products.readItem('1', 'electronics');
 * ```
 */
export class ContainerProxy {
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

  /**
   * Creates an item. Without a `partitionKey` option the key is read from the
   * body at the container's declared path, or from the first candidate field.
   */
  createItem(body: ItemBody, options?: ItemRequestOptions): Promise<ItemDocument> {
    return this.context.bridge().run(this.operations.createItem(body, options));
  }

  upsertItem(body: ItemBody, options?: ItemRequestOptions): Promise<ItemDocument> {
    return this.context.bridge().run(this.operations.upsertItem(body, options));
  }

  /**
   * Replaces an existing item. `options.partitionKey` is required.
   */
  replaceItem(itemId: string, body: ItemBody, options?: ItemRequestOptions): Promise<ItemDocument> {
    return this.context.bridge().run(this.operations.replaceItem(itemId, body, options));
  }

  readItem(itemId: string, partitionKey: PartitionKeyValue): Promise<ItemDocument> {
    return this.context.bridge().run(this.operations.readItem(itemId, partitionKey));
  }

  deleteItem(itemId: string, partitionKey: PartitionKeyValue, options?: ItemAccessOptions): Promise<void> {
    return this.context.bridge().run(this.operations.deleteItem(itemId, partitionKey, options));
  }

  queryItems(query: string, options: QueryItemsOptions): Promise<ItemDocument[]> {
    return this.context.bridge().run(this.operations.queryItems(query, options));
  }

  /** Reads the container's properties and caches its partition key path */
  read(): Promise<ContainerProperties> {
    return this.context.bridge().run(this.operations.readContainer());
  }

  delete(): Promise<void> {
    return this.context.bridge().run(this.operations.deleteContainer());
  }
}
