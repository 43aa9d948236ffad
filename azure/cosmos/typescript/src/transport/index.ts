/**
 * Network transports.
 * @module transport
 */

export type {
  CosmosTransport,
  ContainerDefinitionInput,
  WriteItemRequest,
  ItemAddress,
  QueryRequest,
} from './types.js';
export { AzureCosmosTransport, toClientOptions, requestOptions } from './azure.js';
export type {
  SdkClient,
  SdkContainer,
  SdkDatabase,
  SdkFeed,
  SdkItem,
  SdkItems,
  SdkResponse,
} from './azure.js';
export { serviceError, partitionKeyMismatch } from './errors.js';
