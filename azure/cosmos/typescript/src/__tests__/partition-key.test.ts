/**
 * Tests for partition key resolution.
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_PARTITION_KEY_CANDIDATES,
  parsePartitionKeyPath,
  readPath,
  resolvePartitionKey,
  toPartitionKeyValue,
} from '../partition-key/index.js';
import { MissingPartitionKeyError, TypeMismatchError } from '../errors/index.js';

describe('resolvePartitionKey', () => {
  describe('explicit values', () => {
    it('should prefer the explicit value over the body', () => {
      expect(
        resolvePartitionKey({
          operation: 'create',
          explicit: 'override',
          body: { id: '1', category: 'electronics' },
        })
      ).toBe('override');
    });

    it('should accept numbers and booleans', () => {
      expect(resolvePartitionKey({ operation: 'read', explicit: 7 })).toBe(7);
      expect(resolvePartitionKey({ operation: 'delete', explicit: false })).toBe(false);
    });

    it('should treat null as absent', () => {
      expect(() => resolvePartitionKey({ operation: 'read', explicit: null })).toThrow(MissingPartitionKeyError);
    });

    it('should reject non-scalar values', () => {
      expect(() => resolvePartitionKey({ operation: 'query', explicit: { a: 1 } })).toThrow(TypeMismatchError);
    });
  });

  describe('derivation from the body', () => {
    it('should use the first candidate present in the body', () => {
      expect(
        resolvePartitionKey({
          operation: 'create',
          body: { id: '1', category: 'electronics', name: 'Laptop' },
        })
      ).toBe('electronics');
    });

    it('should follow candidate order, not body order', () => {
      expect(
        resolvePartitionKey({
          operation: 'upsert',
          body: { id: '1', tenantId: 't-1', pk: 'p-1' },
        })
      ).toBe('p-1');
    });

    it('should never treat id as a partition key', () => {
      expect(() => resolvePartitionKey({ operation: 'create', body: { id: '1', name: 'x' } })).toThrow(
        'Partition key not found in the item body or options'
      );
    });

    it('should read the declared path instead of the candidates', () => {
      expect(
        resolvePartitionKey({
          operation: 'create',
          body: { id: '1', category: 'electronics', address: { city: 'Lisbon' } },
          declaredPath: '/address/city',
        })
      ).toBe('Lisbon');
    });

    it('should fail when the declared path is missing from the body', () => {
      expect(() =>
        resolvePartitionKey({
          operation: 'create',
          body: { id: '1', category: 'electronics' },
          declaredPath: '/tenant',
        })
      ).toThrow('Partition key not found at /tenant in the item body and no partitionKey option was given');
    });

    it('should honor custom candidates', () => {
      expect(
        resolvePartitionKey({
          operation: 'create',
          body: { id: '1', category: 'electronics', region: 'eu' },
          candidates: ['region'],
        })
      ).toBe('eu');
    });

    it('should reject a candidate whose value is not a scalar', () => {
      expect(() =>
        resolvePartitionKey({ operation: 'create', body: { id: '1', category: null } })
      ).toThrow('Partition key from body field "category" must be a string, number or boolean, received null');
    });
  });

  describe('operations that require an explicit key', () => {
    it.each(['read', 'replace', 'delete', 'query'] as const)('should fail %s without one', (operation) => {
      let caught: unknown;
      try {
        resolvePartitionKey({ operation, body: { id: '1', category: 'electronics' } });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(MissingPartitionKeyError);
      expect(caught).toMatchObject({
        operation,
        message: `A partition key must be provided for ${operation} operations`,
      });
    });
  });
});

describe('toPartitionKeyValue', () => {
  it('should reject non-finite numbers', () => {
    expect(() => toPartitionKeyValue(Number.NaN, 'test')).toThrow(
      'Partition key from test must be a string, number or boolean, received NaN'
    );
  });
});

describe('partition key paths', () => {
  it('should split nested and quoted segments', () => {
    expect(parsePartitionKeyPath('/address/city')).toEqual(['address', 'city']);
    expect(parsePartitionKeyPath('/"first name"')).toEqual(['first name']);
  });

  it('should return undefined when a segment is missing', () => {
    expect(readPath({ a: { b: 1 } }, '/a/c')).toBeUndefined();
    expect(readPath({ a: [1] }, '/a/0')).toBeUndefined();
    expect(readPath({ a: { b: 1 } }, '/a/b')).toBe(1);
  });

  it('should list the default candidates in order', () => {
    expect(DEFAULT_PARTITION_KEY_CANDIDATES).toEqual(['category', 'partitionKey', 'pk', 'type', 'tenantId']);
  });
});
