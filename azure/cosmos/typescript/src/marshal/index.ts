/**
 * Payload marshaling between caller values and wire values.
 *
 * Item bodies are classified once at the boundary. JSON text is parsed
 * directly; plain objects are walked into a fresh wire tree without being
 * stringified first. Responses always decode to plain objects, whichever path
 * produced the request.
 *
 * @module marshal
 */

import { InvalidPayloadError, TypeMismatchError } from '../errors/index.js';
import type { JsonArray, JsonObject, JsonValue } from '../types/index.js';

/**
 * Result of classifying an item body.
 */
export type PayloadClassification =
  | { kind: 'text'; text: string }
  | { kind: 'structural'; value: Record<string, unknown> }
  | { kind: 'unsupported'; received: string };

/**
 * Describes a value for error messages.
 */
export function describeType(value: unknown): string {
  if (value === null) return 'null';
  if (Array.isArray(value)) return 'array';
  if (typeof value === 'object') {
    const proto: unknown = Object.getPrototypeOf(value);
    if (proto === Object.prototype || proto === null) return 'object';
    const ctor = value.constructor;
    return typeof ctor === 'function' && ctor.name ? ctor.name : 'object';
  }
  if (typeof value === 'number' && !Number.isFinite(value)) return String(value);
  return typeof value;
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== 'object' || value === null || Array.isArray(value)) {
    return false;
  }
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

/**
 * Classifies an item body. Only the root is inspected here; leaves are
 * checked during the structural walk.
 */
export function classifyPayload(input: unknown): PayloadClassification {
  if (typeof input === 'string') {
    return { kind: 'text', text: input };
  }
  if (isPlainObject(input)) {
    return { kind: 'structural', value: input };
  }
  return { kind: 'unsupported', received: describeType(input) };
}

/**
 * Encodes an item body into a wire object.
 *
 * @throws {InvalidPayloadError} when text is not valid JSON, does not hold an
 *   object, or when a structural body contains a value with no JSON form
 * @throws {TypeMismatchError} when the body is neither text nor a plain object
 *
 * @example
 * ```typescript
 * encodePayload({ id: '1', tags: ['a'] });        // structural walk
 * encodePayload('{"id":"1","tags":["a"]}');      // parsed directly
 * ```
 */
export function encodePayload(input: unknown): JsonObject {
  const classified = classifyPayload(input);

  switch (classified.kind) {
    case 'text':
      return parseText(classified.text);
    case 'structural':
      return walkObject(classified.value, '$', new Set());
    case 'unsupported':
      throw new TypeMismatchError(
        `Item body must be a JSON string or a plain object, received ${classified.received}`,
        'string | object',
        classified.received
      );
  }
}

/**
 * Walks any JSON-shaped value into a wire value.
 *
 * @throws {InvalidPayloadError} for values with no JSON form
 */
export function encodeValue(input: unknown): JsonValue {
  return walk(input, '$', new Set());
}

/**
 * Decodes a wire value returned by the transport into plain host values.
 */
export function decodeValue(wire: unknown): JsonValue {
  return walk(wire, '$', new Set());
}

/**
 * Decodes a wire value that must be a document.
 *
 * @throws {TypeMismatchError} when the value is not an object
 */
export function decodeDocument(wire: unknown): JsonObject {
  if (!isPlainObject(wire)) {
    throw new TypeMismatchError(
      `Expected a document in the response, received ${describeType(wire)}`,
      'object',
      describeType(wire)
    );
  }
  return walkObject(wire, '$', new Set());
}

export function decodeDocuments(wire: readonly unknown[]): JsonObject[] {
  return wire.map((entry) => decodeDocument(entry));
}

// ============================================================================
// Internals
// ============================================================================

function parseText(text: string): JsonObject {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidPayloadError(`Item body is not valid JSON: ${reason}`, {
      path: '$',
      cause: error,
    });
  }

  if (!isPlainObject(parsed)) {
    throw new InvalidPayloadError(
      `Item body must be a JSON object, received ${describeType(parsed)}`,
      { path: '$' }
    );
  }
  return walkObject(parsed, '$', new Set());
}

function walk(value: unknown, path: string, seen: Set<object>): JsonValue {
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return value;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new InvalidPayloadError(`Value at ${path} is ${String(value)}, which has no JSON form`, {
          path,
        });
      }
      return value;
    case 'object':
      if (value === null) {
        return null;
      }
      if (Array.isArray(value)) {
        return walkArray(value, path, seen);
      }
      if (isPlainObject(value)) {
        return walkObject(value, path, seen);
      }
      break;
    default:
      break;
  }

  throw new InvalidPayloadError(`Unsupported value of type ${describeType(value)} at ${path}`, {
    path,
  });
}

function walkArray(values: readonly unknown[], path: string, seen: Set<object>): JsonArray {
  enter(values, path, seen);
  const result: JsonArray = values.map((entry, index) => walk(entry, `${path}[${index}]`, seen));
  seen.delete(values);
  return result;
}

function walkObject(source: Record<string, unknown>, path: string, seen: Set<object>): JsonObject {
  enter(source, path, seen);
  const result: JsonObject = {};
  for (const key of Object.keys(source)) {
    // absent and undefined properties are equivalent on the wire
    if (source[key] === undefined) {
      continue;
    }
    const encoded = walk(source[key], `${path}.${key}`, seen);
    if (key === '__proto__') {
      Object.defineProperty(result, key, { value: encoded, enumerable: true, writable: true, configurable: true });
    } else {
      result[key] = encoded;
    }
  }
  seen.delete(source);
  return result;
}

function enter(container: object, path: string, seen: Set<object>): void {
  if (seen.has(container)) {
    throw new InvalidPayloadError(`Circular reference at ${path}`, { path });
  }
  seen.add(container);
}
