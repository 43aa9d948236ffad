/**
 * In-process simulation of a Cosmos DB account for tests and local runs.
 * @module simulation
 */

export { MockCosmosStore } from './store.js';
export { serviceError } from '../transport/errors.js';
export type { StoredContainer, StoredDatabase } from './store.js';
export { InMemoryCosmosTransport } from './transport.js';
export type { InMemoryTransportOptions, RecordedCall, TransportMethod } from './transport.js';
