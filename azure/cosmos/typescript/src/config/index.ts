/**
 * Cosmos DB client configuration and builder.
 * @module config
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/index.js';
import { DEFAULT_MAX_WORKERS } from '../bridge/index.js';
import { LOG_LEVELS, type LogLevel } from '../observability/index.js';
import { DEFAULT_PARTITION_KEY_CANDIDATES } from '../partition-key/index.js';

// ============================================================================
// SecretString
// ============================================================================

/**
 * SecretString wrapper to prevent accidental logging of sensitive values.
 * The value is only accessible via the expose() method.
 */
export class SecretString {
  private readonly value: string;

  constructor(value: string) {
    this.value = value;
  }

  /**
   * Exposes the secret value. Use with caution.
   */
  expose(): string {
    return this.value;
  }

  toString(): string {
    return '[REDACTED]';
  }

  toJSON(): string {
    return '[REDACTED]';
  }
}

// ============================================================================
// Credentials
// ============================================================================

/**
 * Credential forms accepted by the client. A bare string is an account key.
 */
export type CosmosCredential =
  | string
  | { type: 'key'; key: string }
  | { type: 'resourceTokens'; tokens: Record<string, string> };

/**
 * Normalized credential held by a validated configuration.
 */
export type CredentialsConfig =
  | { type: 'key'; key: SecretString }
  | { type: 'resourceTokens'; tokens: Record<string, SecretString> };

/**
 * How a container learns its declared partition key path.
 * - `cached`: only from paths already known (container create/read, or given explicitly)
 * - `fetch`: additionally reads the container definition on first need
 */
export type PartitionKeyPathResolution = 'cached' | 'fetch';

// ============================================================================
// Main Configuration Interface
// ============================================================================

export interface CosmosConfig {
  /** Account endpoint, e.g. `https://myaccount.documents.azure.com:443/` */
  endpoint: string;
  credentials: CredentialsConfig;
  /** Appended to the transport's user agent */
  userAgentSuffix: string;
  /** Per-request timeout enforced by the transport (ms). Default: 60000 */
  requestTimeoutMs: number;
  /** Worker slots of the asynchronous dispatcher. Default: 32 */
  maxWorkers: number;
  /** Body fields tried in order when deriving a partition key */
  partitionKeyCandidates: readonly string[];
  partitionKeyPathResolution: PartitionKeyPathResolution;
  logLevel: LogLevel;
}

// ============================================================================
// Defaults
// ============================================================================

export const DEFAULT_REQUEST_TIMEOUT_MS = 60000;
export const DEFAULT_USER_AGENT_SUFFIX = 'cosmos-bindings/0.1.0';
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

// ============================================================================
// Validation
// ============================================================================

const configSchema = z.object({
  endpoint: z.string().url(),
  userAgentSuffix: z.string(),
  requestTimeoutMs: z.number().int().positive(),
  maxWorkers: z.number().int().positive().max(1024),
  partitionKeyCandidates: z.array(z.string().min(1)),
  partitionKeyPathResolution: z.enum(['cached', 'fetch']),
  logLevel: z.enum(['error', 'warn', 'info', 'debug', 'trace']),
});

function validateConfig(config: Omit<CosmosConfig, 'credentials'>): void {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
    throw new ConfigurationError(issues.join(', '));
  }
}

function normalizeCredential(credential: CosmosCredential): CredentialsConfig {
  if (typeof credential === 'string') {
    return normalizeCredential({ type: 'key', key: credential });
  }
  switch (credential.type) {
    case 'key':
      if (credential.key.trim().length === 0) {
        throw new ConfigurationError('Account key cannot be empty');
      }
      return { type: 'key', key: new SecretString(credential.key) };
    case 'resourceTokens': {
      const entries = Object.entries(credential.tokens);
      if (entries.length === 0) {
        throw new ConfigurationError('At least one resource token is required');
      }
      const tokens: Record<string, SecretString> = {};
      for (const [path, token] of entries) {
        tokens[path] = new SecretString(token);
      }
      return { type: 'resourceTokens', tokens };
    }
  }
}

function parseLogLevel(value: string): LogLevel {
  const match = LOG_LEVELS.find((level) => level === value.toLowerCase());
  if (!match) {
    throw new ConfigurationError(`Unknown log level "${value}"`);
  }
  return match;
}

function parseInteger(name: string, value: string): number {
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed)) {
    throw new ConfigurationError(`${name} must be an integer, received "${value}"`);
  }
  return parsed;
}

// ============================================================================
// Builder
// ============================================================================

/**
 * Fluent builder for {@link CosmosConfig}.
 *
 * @example
 * ```typescript
 * const config = new CosmosConfigBuilder()
 *   .withEndpoint('https://myaccount.documents.azure.com:443/')
 *   .withKey(process.env.COSMOS_KEY ?? '')
 *   .withMaxWorkers(16)
 *   .build();
 * ```
 */
export class CosmosConfigBuilder {
  private endpoint?: string;
  private credential?: CosmosCredential;
  private userAgentSuffix: string = DEFAULT_USER_AGENT_SUFFIX;
  private requestTimeoutMs: number = DEFAULT_REQUEST_TIMEOUT_MS;
  private maxWorkers: number = DEFAULT_MAX_WORKERS;
  private partitionKeyCandidates: readonly string[] = DEFAULT_PARTITION_KEY_CANDIDATES;
  private partitionKeyPathResolution: PartitionKeyPathResolution = 'cached';
  private logLevel: LogLevel = DEFAULT_LOG_LEVEL;

  withEndpoint(endpoint: string): this {
    this.endpoint = endpoint.trim();
    return this;
  }

  withCredential(credential: CosmosCredential): this {
    this.credential = credential;
    return this;
  }

  withKey(key: string): this {
    this.credential = { type: 'key', key };
    return this;
  }

  withResourceTokens(tokens: Record<string, string>): this {
    this.credential = { type: 'resourceTokens', tokens: { ...tokens } };
    return this;
  }

  withUserAgentSuffix(suffix: string): this {
    this.userAgentSuffix = suffix;
    return this;
  }

  withRequestTimeout(timeoutMs: number): this {
    this.requestTimeoutMs = timeoutMs;
    return this;
  }

  withMaxWorkers(maxWorkers: number): this {
    this.maxWorkers = maxWorkers;
    return this;
  }

  withPartitionKeyCandidates(candidates: readonly string[]): this {
    this.partitionKeyCandidates = [...candidates];
    return this;
  }

  withPartitionKeyPathResolution(mode: PartitionKeyPathResolution): this {
    this.partitionKeyPathResolution = mode;
    return this;
  }

  withLogLevel(level: LogLevel): this {
    this.logLevel = level;
    return this;
  }

  /**
   * Loads settings from environment variables.
   *
   * - COSMOS_ENDPOINT: account endpoint
   * - COSMOS_KEY: account key
   * - COSMOS_REQUEST_TIMEOUT_MS: per-request timeout
   * - COSMOS_MAX_WORKERS: asynchronous dispatcher size
   * - COSMOS_LOG_LEVEL: error | warn | info | debug | trace
   */
  static fromEnv(env: NodeJS.ProcessEnv = process.env): CosmosConfigBuilder {
    const builder = new CosmosConfigBuilder();

    const endpoint = env.COSMOS_ENDPOINT;
    if (endpoint) {
      builder.withEndpoint(endpoint);
    }

    const key = env.COSMOS_KEY;
    if (key) {
      builder.withKey(key);
    }

    const timeout = env.COSMOS_REQUEST_TIMEOUT_MS;
    if (timeout) {
      builder.withRequestTimeout(parseInteger('COSMOS_REQUEST_TIMEOUT_MS', timeout));
    }

    const maxWorkers = env.COSMOS_MAX_WORKERS;
    if (maxWorkers) {
      builder.withMaxWorkers(parseInteger('COSMOS_MAX_WORKERS', maxWorkers));
    }

    const logLevel = env.COSMOS_LOG_LEVEL;
    if (logLevel) {
      builder.withLogLevel(parseLogLevel(logLevel));
    }

    return builder;
  }

  /**
   * Builds the configuration.
   * @throws {ConfigurationError} if required fields are missing or invalid
   */
  build(): CosmosConfig {
    if (!this.endpoint) {
      throw new ConfigurationError('An account endpoint is required');
    }
    if (this.credential === undefined) {
      throw new ConfigurationError('A credential is required');
    }

    const settings = {
      endpoint: this.endpoint,
      userAgentSuffix: this.userAgentSuffix,
      requestTimeoutMs: this.requestTimeoutMs,
      maxWorkers: this.maxWorkers,
      partitionKeyCandidates: [...this.partitionKeyCandidates],
      partitionKeyPathResolution: this.partitionKeyPathResolution,
      logLevel: this.logLevel,
    };
    validateConfig(settings);

    return {
      ...settings,
      credentials: normalizeCredential(this.credential),
    };
  }
}
