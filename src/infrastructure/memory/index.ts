export { InMemoryStreamBroker, compareEntryIds } from './in-memory-stream-broker.js';
export type { BrokerConnection } from './in-memory-stream-broker.js';
export { InMemoryStreamClient, createInMemoryClientFactory } from './in-memory-stream-client.js';
