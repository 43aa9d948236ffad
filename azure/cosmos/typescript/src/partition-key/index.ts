/**
 * Partition key resolution for item operations.
 *
 * @module partition-key
 */

import { MissingPartitionKeyError, TypeMismatchError } from '../errors/index.js';
import { describeType } from '../marshal/index.js';
import type { JsonObject, JsonValue, PartitionKeyValue } from '../types/index.js';

/**
 * Body fields tried, in order, when neither an explicit partition key nor the
 * container's declared path is available. The first field present wins.
 */
export const DEFAULT_PARTITION_KEY_CANDIDATES: readonly string[] = [
  'category',
  'partitionKey',
  'pk',
  'type',
  'tenantId',
];

export type ItemOperation = 'create' | 'upsert' | 'read' | 'replace' | 'delete' | 'query';

/**
 * Operations that may derive their partition key from the body.
 */
const DERIVING_OPERATIONS: ReadonlySet<ItemOperation> = new Set(['create', 'upsert']);

export interface ResolvePartitionKeyInput {
  operation: ItemOperation;
  /** Caller-supplied value; `undefined` and `null` count as absent */
  explicit?: unknown;
  /** Encoded item body, for operations that carry one */
  body?: JsonObject;
  /** Declared partition key path of the container, e.g. `/category` */
  declaredPath?: string;
  /** Candidate field names, defaults to {@link DEFAULT_PARTITION_KEY_CANDIDATES} */
  candidates?: readonly string[];
}

/**
 * Checks that a value can serve as a partition key.
 *
 * @throws {TypeMismatchError} when the value is not a string, finite number or boolean
 */
export function toPartitionKeyValue(value: unknown, source: string): PartitionKeyValue {
  if (typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value;
  }
  const received = describeType(value);
  throw new TypeMismatchError(
    `Partition key from ${source} must be a string, number or boolean, received ${received}`,
    'string | number | boolean',
    received
  );
}

/**
 * Splits a partition key path such as `/address/city` into its segments.
 */
export function parsePartitionKeyPath(path: string): string[] {
  return path
    .split('/')
    .filter((segment) => segment.length > 0)
    .map((segment) => segment.replace(/^"(.*)"$/, '$1'));
}

/**
 * Reads the value at a partition key path, or `undefined` when any segment
 * is missing.
 */
export function readPath(body: JsonObject, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = body;
  for (const segment of parsePartitionKeyPath(path)) {
    if (current === null || typeof current !== 'object' || Array.isArray(current)) {
      return undefined;
    }
    if (!Object.prototype.hasOwnProperty.call(current, segment)) {
      return undefined;
    }
    current = current[segment];
  }
  return current;
}

/**
 * Resolves the partition key for an item operation.
 *
 * Precedence: explicit value, then the declared path (create/upsert only),
 * then the first candidate field present in the body (create/upsert only).
 *
 * @throws {MissingPartitionKeyError} when nothing resolves
 * @throws {TypeMismatchError} when the resolved value is not a scalar
 *
 * @example
 * ```typescript
 * resolvePartitionKey({
 *   operation: 'create',
 *   body: { id: '1', category: 'electronics', name: 'Laptop' },
 * }); // 'electronics'
 * ```
 */
export function resolvePartitionKey(input: ResolvePartitionKeyInput): PartitionKeyValue {
  const { operation, explicit, body, declaredPath } = input;

  if (explicit !== undefined && explicit !== null) {
    return toPartitionKeyValue(explicit, 'the partitionKey option');
  }

  if (!DERIVING_OPERATIONS.has(operation)) {
    throw new MissingPartitionKeyError(
      operation,
      `A partition key must be provided for ${operation} operations`
    );
  }

  if (body !== undefined) {
    if (declaredPath !== undefined) {
      const value = readPath(body, declaredPath);
      if (value !== undefined) {
        return toPartitionKeyValue(value, `body path ${declaredPath}`);
      }
      throw new MissingPartitionKeyError(
        operation,
        `Partition key not found at ${declaredPath} in the item body and no partitionKey option was given`
      );
    }

    const candidates = input.candidates ?? DEFAULT_PARTITION_KEY_CANDIDATES;
    for (const field of candidates) {
      if (Object.prototype.hasOwnProperty.call(body, field)) {
        return toPartitionKeyValue(body[field], `body field "${field}"`);
      }
    }
  }

  throw new MissingPartitionKeyError(
    operation,
    'Partition key not found in the item body or options'
  );
}
