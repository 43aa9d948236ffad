/**
 * Error taxonomy and translation.
 *
 * @module errors
 */

export {
  ErrorKind,
  LocalErrorCode,
  CosmosError,
  CosmosHttpResponseError,
  CosmosResourceNotFoundError,
  CosmosResourceExistsError,
  CosmosAccessConditionFailedError,
  CosmosTransportError,
  InvalidPayloadError,
  TypeMismatchError,
  MissingPartitionKeyError,
  CosmosClientError,
  ClientClosedError,
  ConfigurationError,
  OperationCancelledError,
  isCosmosError,
  isHttpResponseError,
  errorKindOf,
} from './error.js';
export type { CosmosErrorOptions, HttpResponseErrorOptions } from './error.js';

export { translateError, transportFailureCode } from './translator.js';
