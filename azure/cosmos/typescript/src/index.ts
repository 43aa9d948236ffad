/**
 * Azure Cosmos DB bindings.
 *
 * Provides:
 * - Promise and future-returning client, database and container handles
 * - Item bodies as plain objects or JSON text
 * - Partition key derivation from item bodies
 * - A closed error taxonomy over service and transport failures
 * - A process-wide execution bridge with a bounded worker dispatcher
 *
 * @module @cosmos-bindings/azure-cosmos
 */

// ============================================================================
// Clients
// ============================================================================

export {
  CosmosClient,
  DatabaseProxy,
  ContainerProxy,
  withCosmosClient,
  type CosmosClientOptions,
} from './client/index.js';

export {
  AsyncCosmosClient,
  AsyncDatabaseProxy,
  AsyncContainerProxy,
  withAsyncCosmosClient,
} from './aio/index.js';

// ============================================================================
// Configuration
// ============================================================================

export {
  CosmosConfigBuilder,
  SecretString,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT_SUFFIX,
  DEFAULT_LOG_LEVEL,
  type CosmosConfig,
  type CosmosCredential,
  type CredentialsConfig,
  type PartitionKeyPathResolution,
} from './config/index.js';

// ============================================================================
// Types
// ============================================================================

export type {
  JsonPrimitive,
  JsonValue,
  JsonArray,
  JsonObject,
  ItemBody,
  ItemDocument,
  PartitionKeyValue,
  PartitionKeySpec,
  DatabaseProperties,
  ContainerProperties,
  ItemRequestOptions,
  ItemAccessOptions,
  QueryParameter,
  QueryItemsOptions,
  GetContainerClientOptions,
} from './types/index.js';

// ============================================================================
// Errors
// ============================================================================

export * from './errors/index.js';

// ============================================================================
// Marshaling and Partition Keys
// ============================================================================

export {
  classifyPayload,
  encodePayload,
  encodeValue,
  decodeValue,
  decodeDocument,
  type PayloadClassification,
} from './marshal/index.js';

export {
  DEFAULT_PARTITION_KEY_CANDIDATES,
  resolvePartitionKey,
  type ItemOperation,
  type ResolvePartitionKeyInput,
} from './partition-key/index.js';

// ============================================================================
// Execution Bridge
// ============================================================================

export {
  BridgeFuture,
  ExecutionBridge,
  getExecutionBridge,
  DEFAULT_MAX_WORKERS,
  type BridgeOperation,
  type BridgeStats,
  type ExecutionBridgeOptions,
} from './bridge/index.js';

// ============================================================================
// Transport and Observability
// ============================================================================

export { AzureCosmosTransport, type CosmosTransport, type SdkClient } from './transport/index.js';
export { InMemoryCosmosTransport, MockCosmosStore, serviceError } from './simulation/index.js';
export { ConsoleLogger, NoopLogger, type Logger, type LogLevel, type LogContext } from './observability/index.js';
