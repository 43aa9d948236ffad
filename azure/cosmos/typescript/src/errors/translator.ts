/**
 * Maps failures raised by the Cosmos transport onto the closed error taxonomy.
 *
 * This is the single point where foreign errors are inspected. Callers get a
 * {@link CosmosError}; the original object survives only as `cause`.
 */

import {
  CosmosError,
  CosmosHttpResponseError,
  CosmosResourceNotFoundError,
  CosmosResourceExistsError,
  CosmosAccessConditionFailedError,
  CosmosTransportError,
} from './error.js';

/**
 * Error codes reported when no response was received.
 */
const TRANSPORT_ERROR_CODES: ReadonlySet<string> = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ENOTFOUND',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'EPIPE',
  'UND_ERR_CONNECT_TIMEOUT',
  'UND_ERR_SOCKET',
  'REQUEST_SEND_ERROR',
  'TimeoutError',
]);

const TRANSPORT_ERROR_NAMES: ReadonlySet<string> = new Set(['TimeoutError', 'AbortError']);

/**
 * Shape of the errors thrown by `@azure/cosmos` and the HTTP stack under it.
 */
interface CollaboratorError {
  name?: string;
  message?: string;
  code?: number | string;
  statusCode?: number;
  substatus?: number;
  activityId?: string;
  body?: { code?: string; message?: string };
  cause?: unknown;
}

function isCollaboratorError(value: unknown): value is CollaboratorError {
  return typeof value === 'object' && value !== null;
}

/**
 * Extracts the HTTP status, if the failure carries one.
 */
function statusOf(error: CollaboratorError): number | undefined {
  if (typeof error.code === 'number') {
    return error.code;
  }
  if (typeof error.statusCode === 'number') {
    return error.statusCode;
  }
  return undefined;
}

function messageOf(error: CollaboratorError): string {
  const bodyMessage = error.body?.message;
  if (typeof bodyMessage === 'string' && bodyMessage.length > 0) {
    return bodyMessage;
  }
  return typeof error.message === 'string' && error.message.length > 0
    ? error.message
    : 'Request failed';
}

/**
 * Returns the transport-level code when the failure happened before any
 * response was obtained, looking one level into `cause` for fetch failures.
 */
export function transportFailureCode(error: unknown): string | undefined {
  if (!isCollaboratorError(error)) {
    return undefined;
  }
  if (typeof error.code === 'string' && TRANSPORT_ERROR_CODES.has(error.code)) {
    return error.code;
  }
  if (typeof error.name === 'string' && TRANSPORT_ERROR_NAMES.has(error.name)) {
    return error.name;
  }
  if (statusOf(error) === undefined && isCollaboratorError(error.cause)) {
    const causeCode = error.cause.code;
    if (typeof causeCode === 'string' && TRANSPORT_ERROR_CODES.has(causeCode)) {
      return causeCode;
    }
  }
  return undefined;
}

/**
 * Translates any collaborator failure into exactly one {@link CosmosError}.
 *
 * @example
 * ```typescript
 * try {
 *   await transport.readItem(db, container, id, pk);
 * } catch (error) {
 *   throw translateError(error);
 * }
 * ```
 */
export function translateError(error: unknown): CosmosError {
  if (error instanceof CosmosError) {
    return error;
  }

  if (!isCollaboratorError(error)) {
    return new CosmosHttpResponseError({
      message: String(error),
      cause: error,
    });
  }

  const status = statusOf(error);
  const message = messageOf(error);

  if (status === undefined) {
    const transportCode = transportFailureCode(error);
    if (transportCode !== undefined) {
      return new CosmosTransportError({ message, code: transportCode, cause: error });
    }
  }

  const options = {
    message,
    statusCode: status,
    subStatusCode: error.substatus,
    activityId: error.activityId,
    cause: error,
  };

  switch (status) {
    case 404:
      return new CosmosResourceNotFoundError(options);
    case 409:
      return new CosmosResourceExistsError(options);
    case 412:
      return new CosmosAccessConditionFailedError(options);
    default:
      return new CosmosHttpResponseError(options);
  }
}
