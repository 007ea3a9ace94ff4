export { IoredisConnection, RedisStreamClient, createRedisClientFactory } from './redis-stream-client.js';
export type { RedisConnection } from './redis-stream-client.js';
