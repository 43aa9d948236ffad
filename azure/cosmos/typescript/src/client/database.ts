/**
 * Database handle of the promise API.
 */

import type {
  ContainerProperties,
  DatabaseProperties,
  GetContainerClientOptions,
  PartitionKeySpec,
} from '../types/index.js';
import { ContainerProxy } from './container.js';
import type { ClientContext } from './context.js';
import { AccountOperations } from './operations.js';

export class DatabaseProxy {
  readonly id: string;
  private readonly context: ClientContext;
  private readonly operations: AccountOperations;

  constructor(context: ClientContext, databaseId: string) {
    this.context = context;
    this.id = databaseId;
    this.operations = new AccountOperations(context);
  }

  /**
   * Creates a container.
   *
   * @param partitionKey - a definition, or a single path such as `/category`
   */
  createContainer(containerId: string, partitionKey: PartitionKeySpec | string): Promise<ContainerProperties> {
    return this.context.bridge().run(this.operations.createContainer(this.id, containerId, partitionKey));
  }

  createContainerIfNotExists(
    containerId: string,
    partitionKey: PartitionKeySpec | string
  ): Promise<ContainerProperties> {
    return this.context
      .bridge()
      .run(this.operations.createContainerIfNotExists(this.id, containerId, partitionKey));
  }

  /**
   * Returns a handle without contacting the service.
   */
  getContainerClient(containerId: string, options: GetContainerClientOptions = {}): ContainerProxy {
    this.context.assertOpen('getContainerClient');
    if (options.partitionKeyPath !== undefined) {
      this.context.rememberPartitionKeyPath(this.id, containerId, options.partitionKeyPath);
    }
    return new ContainerProxy(this.context, this.id, containerId);
  }

  listContainers(): Promise<ContainerProperties[]> {
    return this.context.bridge().run(this.operations.listContainers(this.id));
  }

  deleteContainer(containerId: string): Promise<void> {
    return this.context.bridge().run(this.operations.deleteContainer(this.id, containerId));
  }

  read(): Promise<DatabaseProperties> {
    return this.context.bridge().run(this.operations.readDatabase(this.id));
  }

  delete(): Promise<void> {
    return this.context.bridge().run(this.operations.deleteDatabase(this.id));
  }
}
