/**
 * Cosmos DB error types.
 *
 * Every failure that crosses the public surface is one of a closed set of
 * kinds. HTTP outcomes share the `CosmosHttpResponseError` root so callers can
 * catch them uniformly; payload and partition key failures sit outside that
 * branch because they are raised before any request is sent.
 */

/**
 * Closed failure taxonomy surfaced to callers.
 */
export enum ErrorKind {
  ResourceNotFound = 'ResourceNotFound',
  ResourceExists = 'ResourceExists',
  PreconditionFailed = 'PreconditionFailed',
  GenericHttpError = 'GenericHttpError',
  TransportError = 'TransportError',
  InvalidPayload = 'InvalidPayload',
  TypeMismatch = 'TypeMismatch',
  MissingPartitionKey = 'MissingPartitionKey',
}

/**
 * Codes for local errors that never map to an {@link ErrorKind}.
 */
export enum LocalErrorCode {
  ClientClosed = 'CLIENT_CLOSED',
  Configuration = 'CONFIGURATION_ERROR',
  Cancelled = 'OPERATION_CANCELLED',
}

export interface CosmosErrorOptions {
  message: string;
  cause?: unknown;
  details?: Record<string, unknown>;
}

/**
 * Base class for every error raised by this package.
 */
export abstract class CosmosError extends Error {
  /** Failure classification */
  abstract readonly kind: ErrorKind;
  /** Additional error details */
  readonly details?: Record<string, unknown>;
  override readonly cause?: unknown;

  protected constructor(options: CosmosErrorOptions) {
    super(options.message);
    this.name = new.target.name;
    this.details = options.details;
    this.cause = options.cause;

    Error.captureStackTrace?.(this, new.target);
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      kind: this.kind,
      message: this.message,
      details: this.details,
    };
  }
}

// ============================================================================
// HTTP Branch
// ============================================================================

export interface HttpResponseErrorOptions extends CosmosErrorOptions {
  /** HTTP status code, absent when the failure could not be classified */
  statusCode?: number;
  subStatusCode?: number;
  activityId?: string;
}

/**
 * Root of the HTTP error branch: any non-success response from the service.
 * Also used when a failure cannot be classified more precisely.
 */
export class CosmosHttpResponseError extends CosmosError {
  readonly kind: ErrorKind = ErrorKind.GenericHttpError;
  readonly statusCode?: number;
  readonly subStatusCode?: number;
  readonly activityId?: string;

  constructor(options: HttpResponseErrorOptions) {
    super(options);
    this.statusCode = options.statusCode;
    this.subStatusCode = options.subStatusCode;
    this.activityId = options.activityId;
  }

  override toJSON(): Record<string, unknown> {
    return {
      ...super.toJSON(),
      statusCode: this.statusCode,
      subStatusCode: this.subStatusCode,
      activityId: this.activityId,
    };
  }
}

/**
 * The addressed database, container or item does not exist (404).
 */
export class CosmosResourceNotFoundError extends CosmosHttpResponseError {
  override readonly kind = ErrorKind.ResourceNotFound;
}

/**
 * A resource with the same id already exists (409).
 */
export class CosmosResourceExistsError extends CosmosHttpResponseError {
  override readonly kind = ErrorKind.ResourceExists;
}

/**
 * An access condition such as `ifMatch` did not hold (412).
 */
export class CosmosAccessConditionFailedError extends CosmosHttpResponseError {
  override readonly kind = ErrorKind.PreconditionFailed;
}

// ============================================================================
// Non-HTTP Kinds
// ============================================================================

/**
 * No response was obtained: connection refused, DNS failure, socket reset or
 * a timeout inside the transport.
 */
export class CosmosTransportError extends CosmosError {
  readonly kind = ErrorKind.TransportError;
  /** Low-level error code reported by the transport, e.g. `ECONNREFUSED` */
  readonly code?: string;

  constructor(options: CosmosErrorOptions & { code?: string }) {
    super(options);
    this.code = options.code;
  }

  override toJSON(): Record<string, unknown> {
    return { ...super.toJSON(), code: this.code };
  }
}

/**
 * The payload could not be parsed or contains a value with no JSON form.
 */
export class InvalidPayloadError extends CosmosError {
  readonly kind = ErrorKind.InvalidPayload;
  /** JSON path of the offending value, `$` for the root */
  readonly path?: string;

  constructor(message: string, options: { path?: string; cause?: unknown } = {}) {
    super({ message, cause: options.cause, details: options.path ? { path: options.path } : undefined });
    this.path = options.path;
  }
}

/**
 * A value has the wrong shape: the body is neither text nor an object, or a
 * partition key is not a scalar.
 */
export class TypeMismatchError extends CosmosError {
  readonly kind = ErrorKind.TypeMismatch;
  readonly expected: string;
  readonly received: string;

  constructor(message: string, expected: string, received: string) {
    super({ message, details: { expected, received } });
    this.expected = expected;
    this.received = received;
  }
}

/**
 * No partition key was supplied and none could be derived from the body.
 */
export class MissingPartitionKeyError extends CosmosError {
  readonly kind = ErrorKind.MissingPartitionKey;
  readonly operation: string;

  constructor(operation: string, message: string) {
    super({ message, details: { operation } });
    this.operation = operation;
  }
}

// ============================================================================
// Local Errors
// ============================================================================

/**
 * Raised locally, never by the service: closed client, bad configuration,
 * cancelled future.
 */
export class CosmosClientError extends Error {
  readonly code: LocalErrorCode;
  override readonly cause?: unknown;

  constructor(code: LocalErrorCode, message: string, cause?: unknown) {
    super(message);
    this.name = new.target.name;
    this.code = code;
    this.cause = cause;

    Error.captureStackTrace?.(this, new.target);
  }
}

export class ClientClosedError extends CosmosClientError {
  constructor(operation: string) {
    super(LocalErrorCode.ClientClosed, `Cannot run ${operation}: the client has been closed`);
  }
}

export class ConfigurationError extends CosmosClientError {
  constructor(message: string) {
    super(LocalErrorCode.Configuration, `Configuration error: ${message}`);
  }
}

export class OperationCancelledError extends CosmosClientError {
  constructor(reason?: string) {
    super(LocalErrorCode.Cancelled, reason ? `Operation cancelled: ${reason}` : 'Operation cancelled');
  }
}

// ============================================================================
// Guards
// ============================================================================

export function isCosmosError(error: unknown): error is CosmosError {
  return error instanceof CosmosError;
}

export function isHttpResponseError(error: unknown): error is CosmosHttpResponseError {
  return error instanceof CosmosHttpResponseError;
}

/**
 * Returns the kind of a translated error, or `undefined` for anything else.
 */
export function errorKindOf(error: unknown): ErrorKind | undefined {
  return error instanceof CosmosError ? error.kind : undefined;
}
