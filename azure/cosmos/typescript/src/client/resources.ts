/**
 * Decoding of database and container resources returned by the transport.
 */

import { TypeMismatchError } from '../errors/index.js';
import { decodeDocument, describeType } from '../marshal/index.js';
import type { ContainerDefinitionInput } from '../transport/index.js';
import type {
  ContainerProperties,
  DatabaseProperties,
  JsonObject,
  JsonValue,
  PartitionKeySpec,
} from '../types/index.js';

function withId(wire: unknown, resource: string): JsonObject & { id: string } {
  const document = decodeDocument(wire);
  const id: JsonValue | undefined = document.id;
  if (typeof id !== 'string') {
    const received = describeType(id);
    throw new TypeMismatchError(
      `Expected ${resource} properties with a string id, received ${received}`,
      'string',
      received
    );
  }
  return { ...document, id };
}

export function toDatabaseProperties(wire: unknown): DatabaseProperties {
  return withId(wire, 'database');
}

export function toContainerProperties(wire: unknown): ContainerProperties {
  return withId(wire, 'container');
}

/**
 * Single declared partition key path of a container, or `undefined` for
 * hierarchical keys and definitions without one.
 */
export function partitionKeyPathOf(properties: JsonObject): string | undefined {
  const definition = properties.partitionKey;
  if (definition === null || typeof definition !== 'object' || Array.isArray(definition)) {
    return undefined;
  }
  const paths = definition.paths;
  if (!Array.isArray(paths) || paths.length !== 1) {
    return undefined;
  }
  const [path] = paths;
  return typeof path === 'string' ? path : undefined;
}

/**
 * Accepts a bare path such as `/category` as shorthand for a hash definition.
 */
export function toPartitionKeyDefinition(
  partitionKey: PartitionKeySpec | string
): ContainerDefinitionInput['partitionKey'] {
  if (typeof partitionKey === 'string') {
    return { paths: [partitionKey], kind: 'Hash' };
  }
  const definition: ContainerDefinitionInput['partitionKey'] = {
    paths: [...partitionKey.paths],
    kind: partitionKey.kind ?? (partitionKey.paths.length > 1 ? 'MultiHash' : 'Hash'),
  };
  if (partitionKey.version !== undefined) {
    definition.version = partitionKey.version;
  }
  return definition;
}
