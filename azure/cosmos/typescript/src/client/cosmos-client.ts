/**
 * Account client of the promise API.
 */

import {
  CosmosConfigBuilder,
  type CosmosConfig,
  type CosmosCredential,
  type PartitionKeyPathResolution,
} from '../config/index.js';
import { ConsoleLogger, type Logger, type LogLevel } from '../observability/index.js';
import { AzureCosmosTransport, type CosmosTransport } from '../transport/index.js';
import type { DatabaseProperties } from '../types/index.js';
import { ClientContext } from './context.js';
import { DatabaseProxy } from './database.js';
import { AccountOperations } from './operations.js';

export interface CosmosClientOptions {
  /** Replaces the `@azure/cosmos` transport, e.g. with the in-memory simulator */
  transport?: CosmosTransport;
  /** Defaults to a console logger at the configured level */
  logger?: Logger;
  userAgentSuffix?: string;
  requestTimeoutMs?: number;
  maxWorkers?: number;
  partitionKeyCandidates?: readonly string[];
  partitionKeyPathResolution?: PartitionKeyPathResolution;
  logLevel?: LogLevel;
}

function applyOptions(builder: CosmosConfigBuilder, options: CosmosClientOptions): CosmosConfigBuilder {
  if (options.userAgentSuffix !== undefined) builder.withUserAgentSuffix(options.userAgentSuffix);
  if (options.requestTimeoutMs !== undefined) builder.withRequestTimeout(options.requestTimeoutMs);
  if (options.maxWorkers !== undefined) builder.withMaxWorkers(options.maxWorkers);
  if (options.partitionKeyCandidates !== undefined) {
    builder.withPartitionKeyCandidates(options.partitionKeyCandidates);
  }
  if (options.partitionKeyPathResolution !== undefined) {
    builder.withPartitionKeyPathResolution(options.partitionKeyPathResolution);
  }
  if (options.logLevel !== undefined) builder.withLogLevel(options.logLevel);
  return builder;
}

/**
 * Validates settings and assembles the state shared by a client's handles.
 *
 * @throws {ConfigurationError} when the endpoint, credential or options are invalid
 */
export function createClientContext(
  endpoint: string,
  credential: CosmosCredential,
  options: CosmosClientOptions = {}
): ClientContext {
  const builder = new CosmosConfigBuilder().withEndpoint(endpoint).withCredential(credential);
  return contextFromConfig(applyOptions(builder, options).build(), options);
}

export function contextFromConfig(
  config: CosmosConfig,
  options: Pick<CosmosClientOptions, 'transport' | 'logger'> = {}
): ClientContext {
  const logger = options.logger ?? new ConsoleLogger(config.logLevel);
  const transport = options.transport ?? new AzureCosmosTransport(config);
  logger.debug('Cosmos client created', {
    endpoint: config.endpoint,
    credential: config.credentials.type,
    maxWorkers: config.maxWorkers,
  });
  return new ClientContext(config, transport, logger);
}

/**
 * Entry point of the promise API. Owns the transport; database and container
 * handles derived from it share its state and are released by {@link close}.
 *
 * @example
 * ```typescript
 * const client = new CosmosClient('https://myaccount.documents.azure.com:443/', accountKey);
 * try {
 *   await client.createDatabaseIfNotExists('shop');
 * } finally {
 *   await client.close();
 * }
 * ```
 */
export class CosmosClient {
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

  /**
   * Builds a client from a validated configuration.
   */
  static fromConfig(
    config: CosmosConfig,
    options: Pick<CosmosClientOptions, 'transport' | 'logger'> = {}
  ): CosmosClient {
    return new CosmosClient(contextFromConfig(config, options));
  }

  /**
   * Builds a client from `COSMOS_*` environment variables.
   */
  static fromEnv(options: Pick<CosmosClientOptions, 'transport' | 'logger'> = {}): CosmosClient {
    return CosmosClient.fromConfig(CosmosConfigBuilder.fromEnv().build(), options);
  }

  get endpoint(): string {
    return this.context.config.endpoint;
  }

  get isClosed(): boolean {
    return this.context.isClosed;
  }

  createDatabase(databaseId: string): Promise<DatabaseProperties> {
    return this.context.bridge().run(this.operations.createDatabase(databaseId));
  }

  createDatabaseIfNotExists(databaseId: string): Promise<DatabaseProperties> {
    return this.context.bridge().run(this.operations.createDatabaseIfNotExists(databaseId));
  }

  /**
   * Returns a handle without contacting the service.
   */
  getDatabaseClient(databaseId: string): DatabaseProxy {
    this.context.assertOpen('getDatabaseClient');
    return new DatabaseProxy(this.context, databaseId);
  }

  listDatabases(): Promise<DatabaseProperties[]> {
    return this.context.bridge().run(this.operations.listDatabases());
  }

  deleteDatabase(databaseId: string): Promise<void> {
    return this.context.bridge().run(this.operations.deleteDatabase(databaseId));
  }

  /**
   * Releases the transport. Handles derived from this client stop working.
   */
  close(): Promise<void> {
    return this.context.close();
  }
}

/**
 * Runs `fn` with a client that is closed however `fn` exits.
 */
export async function withCosmosClient<T>(
  endpoint: string,
  credential: CosmosCredential,
  options: CosmosClientOptions,
  fn: (client: CosmosClient) => Promise<T>
): Promise<T> {
  const client = new CosmosClient(endpoint, credential, options);
  try {
    return await fn(client);
  } finally {
    await client.close();
  }
}
