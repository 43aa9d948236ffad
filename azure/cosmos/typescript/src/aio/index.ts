/**
 * Future-returning variants of the client, database and container handles.
 * @module aio
 */

export { AsyncCosmosClient, withAsyncCosmosClient } from './cosmos-client.js';
export { AsyncDatabaseProxy } from './database.js';
export { AsyncContainerProxy } from './container.js';
