export {
  CosmosClient,
  withCosmosClient,
  createClientContext,
  contextFromConfig,
  type CosmosClientOptions,
} from './cosmos-client.js';
export { DatabaseProxy } from './database.js';
export { ContainerProxy } from './container.js';
export { ClientContext, type ClientState } from './context.js';
export { AccountOperations, ItemOperations } from './operations.js';
