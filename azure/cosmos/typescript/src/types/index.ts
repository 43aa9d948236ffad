/**
 * Shared types for the Cosmos DB binding.
 * @module types
 */

// ============================================================================
// Wire Values
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonArray | JsonObject;

export type JsonArray = JsonValue[];

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * An item as supplied by callers: a plain object, or JSON text that is
 * parsed directly without an intermediate object graph.
 */
export type ItemBody = JsonObject | string;

/**
 * An item as returned by the service, including system properties
 * such as `_etag` and `_ts`.
 */
export type ItemDocument = JsonObject;

// ============================================================================
// Partition Keys
// ============================================================================

/**
 * Routing key of a logical partition.
 */
export type PartitionKeyValue = string | number | boolean;

/**
 * Partition key definition used when creating a container.
 * @example { paths: ['/category'], kind: 'Hash' }
 */
export interface PartitionKeySpec {
  paths: string[];
  kind?: 'Hash' | 'MultiHash';
  version?: number;
}

// ============================================================================
// Resource Properties
// ============================================================================

export interface DatabaseProperties extends JsonObject {
  id: string;
}

export interface ContainerProperties extends JsonObject {
  id: string;
}

// ============================================================================
// Per-call Options
// ============================================================================

/**
 * Options accepted by item write operations.
 */
export interface ItemRequestOptions {
  /** Explicit partition key; derived from the body for create and upsert when omitted */
  partitionKey?: PartitionKeyValue;
  /** Only apply the write if the stored item still has this `_etag` */
  ifMatch?: string;
}

/**
 * Options accepted by point reads and deletes.
 */
export interface ItemAccessOptions {
  /** Only apply the operation if the stored item still has this `_etag` */
  ifMatch?: string;
}

export interface QueryParameter {
  name: string;
  value: JsonValue;
}

/**
 * Options accepted by {@link ContainerProxy.queryItems}.
 */
export interface QueryItemsOptions {
  /** Required: queries never fan out across partitions */
  partitionKey?: PartitionKeyValue;
  /** Values bound to `@name` placeholders in the query text */
  parameters?: QueryParameter[];
  /** Page size requested from the service */
  maxItemCount?: number;
}

export interface GetContainerClientOptions {
  /** Declared partition key path, e.g. `/category`, when already known */
  partitionKeyPath?: string;
}
