/**
 * Example: items, partition keys and typed errors
 *
 * Runs against the account named by COSMOS_ENDPOINT and COSMOS_KEY, or
 * against the in-memory simulator when they are not set.
 */

import {
  AsyncCosmosClient,
  CosmosClient,
  CosmosResourceNotFoundError,
  InMemoryCosmosTransport,
  MissingPartitionKeyError,
  withCosmosClient,
} from '../src/index.js';

const endpoint = process.env.COSMOS_ENDPOINT ?? 'https://localhost:8081/';
const key = process.env.COSMOS_KEY ?? 'test-secret';
const transport = process.env.COSMOS_ENDPOINT ? undefined : new InMemoryCosmosTransport();

async function promiseApiExample(): Promise<void> {
  await withCosmosClient(endpoint, key, { transport, logLevel: 'info' }, async (client: CosmosClient) => {
    await client.createDatabaseIfNotExists('shop');
    const database = client.getDatabaseClient('shop');
    await database.createContainerIfNotExists('products', '/category');
    const products = database.getContainerClient('products');

    // Partition key taken from the body's `category` field
    await products.upsertItem({ id: '1', category: 'electronics', name: 'Laptop', price: 999.99 });

    // JSON text is parsed directly
    await products.upsertItem('{"id":"2","category":"electronics","name":"Phone","price":599}');

    const laptop = await products.readItem('1', 'electronics');
    console.log('Read item:', laptop.name);

    const cheap = await products.queryItems('SELECT * FROM c WHERE c.price = @price', {
      partitionKey: 'electronics',
      parameters: [{ name: '@price', value: 599 }],
    });
    console.log('Query returned', cheap.length, 'item(s)');

    try {
      await products.createItem({ id: '3', name: 'Unfiled' });
    } catch (error) {
      if (error instanceof MissingPartitionKeyError) {
        console.log('Rejected before sending:', error.message);
      } else {
        throw error;
      }
    }

    try {
      await products.readItem('missing', 'electronics');
    } catch (error) {
      if (error instanceof CosmosResourceNotFoundError) {
        console.log('Not found, status', error.statusCode);
      } else {
        throw error;
      }
    }
  });
}

async function futureApiExample(): Promise<void> {
  const client = new AsyncCosmosClient(endpoint, key, {
    transport,
    maxWorkers: 8,
  });
  try {
    await client.createDatabaseIfNotExists('shop');
    const products = client.getDatabaseClient('shop').getContainerClient('products', {
      partitionKeyPath: '/category',
    });

    const pending = products.readItem('1', 'electronics');
    const item = await pending;
    console.log('Future resolved:', item.id);
  } finally {
    await client.close();
  }
}

async function main(): Promise<void> {
  await promiseApiExample();
  await futureApiExample();
}

main().catch((error: unknown) => {
  console.error(error);
  process.exitCode = 1;
});
