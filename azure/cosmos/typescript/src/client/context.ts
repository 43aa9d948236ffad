/**
 * State shared by a client and every handle derived from it.
 */

import type { CosmosConfig } from '../config/index.js';
import { ClientClosedError, OperationCancelledError, translateError } from '../errors/index.js';
import { getExecutionBridge, type ExecutionBridge } from '../bridge/index.js';
import { logCancellation, logFailure, logOperation, type Logger } from '../observability/index.js';
import type { CosmosTransport } from '../transport/index.js';

export type ClientState = 'open' | 'closed';

export class ClientContext {
  readonly config: CosmosConfig;
  readonly transport: CosmosTransport;
  readonly logger: Logger;
  private state: ClientState = 'open';
  // an entry whose path is undefined: the container has no single key path
  private readonly partitionKeyPaths: Map<string, { path: string | undefined }> = new Map();

  constructor(config: CosmosConfig, transport: CosmosTransport, logger: Logger) {
    this.config = config;
    this.transport = transport;
    this.logger = logger;
  }

  get isClosed(): boolean {
    return this.state === 'closed';
  }

  /**
   * @throws {ClientClosedError} once the client has been closed
   */
  assertOpen(operation: string): void {
    if (this.state === 'closed') {
      throw new ClientClosedError(operation);
    }
  }

  bridge(): ExecutionBridge {
    return getExecutionBridge({ maxWorkers: this.config.maxWorkers, logger: this.logger });
  }

  /**
   * Calls the transport and translates any failure. Every transport call made
   * by a handle goes through here. A failure after the caller aborted
   * `signal` is reported as a cancellation.
   */
  async call<T>(
    operation: string,
    resource: string,
    signal: AbortSignal,
    invoke: () => Promise<T>
  ): Promise<T> {
    this.assertOpen(operation);
    const started = Date.now();
    try {
      const result = await invoke();
      logOperation(this.logger, operation, resource, Date.now() - started);
      return result;
    } catch (error) {
      if (signal.aborted) {
        const cancelled =
          signal.reason instanceof OperationCancelledError ? signal.reason : new OperationCancelledError();
        logCancellation(this.logger, operation, resource);
        throw cancelled;
      }
      const translated = translateError(error);
      logFailure(this.logger, operation, resource, translated);
      throw translated;
    }
  }

  /**
   * Releases the transport. Later calls are no-ops.
   */
  async close(): Promise<void> {
    if (this.state === 'closed') {
      return;
    }
    this.state = 'closed';
    this.partitionKeyPaths.clear();
    await this.transport.close();
    this.logger.debug('Cosmos client closed', { endpoint: this.config.endpoint });
  }

  // ==========================================================================
  // Partition key path cache
  // ==========================================================================

  partitionKeyPath(databaseId: string, containerId: string): string | undefined {
    return this.partitionKeyPaths.get(cacheKey(databaseId, containerId))?.path;
  }

  /** Whether the container's definition has been seen, even without a single path */
  knowsPartitionKeyPath(databaseId: string, containerId: string): boolean {
    return this.partitionKeyPaths.has(cacheKey(databaseId, containerId));
  }

  rememberPartitionKeyPath(databaseId: string, containerId: string, path: string | undefined): void {
    this.partitionKeyPaths.set(cacheKey(databaseId, containerId), { path });
  }

  forgetContainer(databaseId: string, containerId: string): void {
    this.partitionKeyPaths.delete(cacheKey(databaseId, containerId));
  }

  forgetDatabase(databaseId: string): void {
    const prefix = cacheKey(databaseId, '');
    for (const key of [...this.partitionKeyPaths.keys()]) {
      if (key.startsWith(prefix)) {
        this.partitionKeyPaths.delete(key);
      }
    }
  }
}

function cacheKey(databaseId: string, containerId: string): string {
  return `dbs/${databaseId}/colls/${containerId}`;
}
