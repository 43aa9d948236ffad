/**
 * Database handle of the future API.
 */

import type { BridgeFuture } from '../bridge/index.js';
import type { ClientContext } from '../client/context.js';
import { AccountOperations } from '../client/operations.js';
import type {
  ContainerProperties,
  DatabaseProperties,
  GetContainerClientOptions,
  PartitionKeySpec,
} from '../types/index.js';
import { AsyncContainerProxy } from './container.js';

export class AsyncDatabaseProxy {
  readonly id: string;
  private readonly context: ClientContext;
  private readonly operations: AccountOperations;

  constructor(context: ClientContext, databaseId: string) {
    this.context = context;
    this.id = databaseId;
    this.operations = new AccountOperations(context);
  }

  createContainer(containerId: string, partitionKey: PartitionKeySpec | string): BridgeFuture<ContainerProperties> {
    return this.context.bridge().submit(this.operations.createContainer(this.id, containerId, partitionKey));
  }

  createContainerIfNotExists(
    containerId: string,
    partitionKey: PartitionKeySpec | string
  ): BridgeFuture<ContainerProperties> {
    return this.context
      .bridge()
      .submit(this.operations.createContainerIfNotExists(this.id, containerId, partitionKey));
  }

  getContainerClient(containerId: string, options: GetContainerClientOptions = {}): AsyncContainerProxy {
    this.context.assertOpen('getContainerClient');
    if (options.partitionKeyPath !== undefined) {
      this.context.rememberPartitionKeyPath(this.id, containerId, options.partitionKeyPath);
    }
    return new AsyncContainerProxy(this.context, this.id, containerId);
  }

  listContainers(): BridgeFuture<ContainerProperties[]> {
    return this.context.bridge().submit(this.operations.listContainers(this.id));
  }

  deleteContainer(containerId: string): BridgeFuture<void> {
    return this.context.bridge().submit(this.operations.deleteContainer(this.id, containerId));
  }

  read(): BridgeFuture<DatabaseProperties> {
    return this.context.bridge().submit(this.operations.readDatabase(this.id));
  }

  delete(): BridgeFuture<void> {
    return this.context.bridge().submit(this.operations.deleteDatabase(this.id));
  }
}
