/**
 * Account client of the future API.
 */

import type { BridgeFuture } from '../bridge/index.js';
import type { CosmosConfig, CosmosCredential } from '../config/index.js';
import { CosmosConfigBuilder } from '../config/index.js';
import type { ClientContext } from '../client/context.js';
import {
  contextFromConfig,
  createClientContext,
  type CosmosClientOptions,
} from '../client/cosmos-client.js';
import { AccountOperations } from '../client/operations.js';
import type { DatabaseProperties } from '../types/index.js';
import { AsyncDatabaseProxy } from './database.js';

/**
 * Entry point of the future API. Network operations return a
 * {@link BridgeFuture} queued on the bridge's bounded worker dispatcher.
 */
export class AsyncCosmosClient {
  private readonly context: ClientContext;
  private readonly operations: AccountOperations;

  constructor(endpoint: string, credential: CosmosCredential, options?: CosmosClientOptions);
  constructor(context: ClientContext);
  constructor(
    endpointOrContext: string | ClientContext,
    credential?: CosmosCredential,
    options: CosmosClientOptions = {}
  ) {
    if (typeof endpointOrContext === 'string') {
      this.context = createClientContext(endpointOrContext, credential ?? '', options);
    } else {
      this.context = endpointOrContext;
    }
    this.operations = new AccountOperations(this.context);
  }

  static fromConfig(
    config: CosmosConfig,
    options: Pick<CosmosClientOptions, 'transport' | 'logger'> = {}
  ): AsyncCosmosClient {
    return new AsyncCosmosClient(contextFromConfig(config, options));
  }

  static fromEnv(options: Pick<CosmosClientOptions, 'transport' | 'logger'> = {}): AsyncCosmosClient {
    return AsyncCosmosClient.fromConfig(CosmosConfigBuilder.fromEnv().build(), options);
  }

  get endpoint(): string {
    return this.context.config.endpoint;
  }

  get isClosed(): boolean {
    return this.context.isClosed;
  }

  createDatabase(databaseId: string): BridgeFuture<DatabaseProperties> {
    return this.context.bridge().submit(this.operations.createDatabase(databaseId));
  }

  createDatabaseIfNotExists(databaseId: string): BridgeFuture<DatabaseProperties> {
    return this.context.bridge().submit(this.operations.createDatabaseIfNotExists(databaseId));
  }

  getDatabaseClient(databaseId: string): AsyncDatabaseProxy {
    this.context.assertOpen('getDatabaseClient');
    return new AsyncDatabaseProxy(this.context, databaseId);
  }

  listDatabases(): BridgeFuture<DatabaseProperties[]> {
    return this.context.bridge().submit(this.operations.listDatabases());
  }

  deleteDatabase(databaseId: string): BridgeFuture<void> {
    return this.context.bridge().submit(this.operations.deleteDatabase(databaseId));
  }

  close(): Promise<void> {
    return this.context.close();
  }
}

/**
 * Runs `fn` with an asynchronous client that is closed however `fn` exits.
 */
export async function withAsyncCosmosClient<T>(
  endpoint: string,
  credential: CosmosCredential,
  options: CosmosClientOptions,
  fn: (client: AsyncCosmosClient) => Promise<T>
): Promise<T> {
  const client = new AsyncCosmosClient(endpoint, credential, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
