/**
 * Tests for configuration.
 */

import { describe, it, expect } from 'vitest';
import {
  CosmosConfigBuilder,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_USER_AGENT_SUFFIX,
  SecretString,
} from '../config/index.js';
import { ConfigurationError } from '../errors/index.js';

const ENDPOINT = 'https://localhost:8081/';

describe('CosmosConfigBuilder', () => {
  it('should build a configuration with defaults', () => {
    const config = new CosmosConfigBuilder().withEndpoint(` ${ENDPOINT} `).withKey('test-secret').build();

    expect(config).toMatchObject({
      endpoint: ENDPOINT,
      userAgentSuffix: DEFAULT_USER_AGENT_SUFFIX,
      requestTimeoutMs: DEFAULT_REQUEST_TIMEOUT_MS,
      maxWorkers: 32,
      partitionKeyCandidates: ['category', 'partitionKey', 'pk', 'type', 'tenantId'],
      partitionKeyPathResolution: 'cached',
      logLevel: 'warn',
    });
    expect(config.credentials.type).toBe('key');
  });

  it('should treat a bare string credential as an account key', () => {
    const config = new CosmosConfigBuilder().withEndpoint(ENDPOINT).withCredential('test-secret').build();

    expect(config.credentials.type === 'key' && config.credentials.key.expose()).toBe('test-secret');
  });

  it('should accept resource tokens', () => {
    const config = new CosmosConfigBuilder()
      .withEndpoint(ENDPOINT)
      .withResourceTokens({ 'dbs/shop/colls/products': 'test-token' })
      .build();

    expect(config.credentials.type).toBe('resourceTokens');
  });

  it('should redact secrets when serialized', () => {
    const config = new CosmosConfigBuilder().withEndpoint(ENDPOINT).withKey('test-secret').build();

    expect(JSON.stringify(config.credentials)).toBe('{"type":"key","key":"[REDACTED]"}');
    expect(String(new SecretString('test-secret'))).toBe('[REDACTED]');
  });

  describe('validation', () => {
    it('should require an endpoint', () => {
      expect(() => new CosmosConfigBuilder().withKey('test-secret').build()).toThrow(
        'Configuration error: An account endpoint is required'
      );
    });

    it('should require a credential', () => {
      expect(() => new CosmosConfigBuilder().withEndpoint(ENDPOINT).build()).toThrow(
        'Configuration error: A credential is required'
      );
    });

    it('should reject an empty key', () => {
      expect(() => new CosmosConfigBuilder().withEndpoint(ENDPOINT).withKey('  ').build()).toThrow(
        'Configuration error: Account key cannot be empty'
      );
    });

    it('should reject an empty token set', () => {
      expect(() => new CosmosConfigBuilder().withEndpoint(ENDPOINT).withResourceTokens({}).build()).toThrow(
        'Configuration error: At least one resource token is required'
      );
    });

    it('should reject an endpoint that is not a URL', () => {
      expect(() => new CosmosConfigBuilder().withEndpoint('not a url').withKey('test-secret').build()).toThrow(
        ConfigurationError
      );
    });

    it('should name the invalid field', () => {
      expect(() =>
        new CosmosConfigBuilder().withEndpoint(ENDPOINT).withKey('test-secret').withMaxWorkers(0).build()
      ).toThrow(/^Configuration error: maxWorkers: /);
    });
  });

  describe('fromEnv', () => {
    it('should read COSMOS_* variables', () => {
      const config = CosmosConfigBuilder.fromEnv({
        COSMOS_ENDPOINT: ENDPOINT,
        COSMOS_KEY: 'test-secret',
        COSMOS_REQUEST_TIMEOUT_MS: '5000',
        COSMOS_MAX_WORKERS: '8',
        COSMOS_LOG_LEVEL: 'DEBUG',
      }).build();

      expect(config).toMatchObject({
        endpoint: ENDPOINT,
        requestTimeoutMs: 5000,
        maxWorkers: 8,
        logLevel: 'debug',
      });
    });

    it('should reject non-numeric integers', () => {
      expect(() => CosmosConfigBuilder.fromEnv({ COSMOS_MAX_WORKERS: 'many' })).toThrow(
        'Configuration error: COSMOS_MAX_WORKERS must be an integer, received "many"'
      );
    });

    it('should reject unknown log levels', () => {
      expect(() => CosmosConfigBuilder.fromEnv({ COSMOS_LOG_LEVEL: 'loud' })).toThrow(
        'Configuration error: Unknown log level "loud"'
      );
    });
  });
});
