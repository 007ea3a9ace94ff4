import { Redis } from 'ioredis';
import { z } from 'zod';
import { BrokerReplyError, TransportError } from '../../domain/index.js';
import type {
  ClaimIdleRequest,
  ClientEvent,
  ClientOptions,
  MoveEntryRequest,
  PublishOnceReply,
  PublishOnceRequest,
  ReadGroupRequest,
  StreamClient,
  StreamClientFactory,
  StreamEntry,
} from '../stream/stream-client.js';

/**
 * Dedup check, append and dedup record in one round trip.
 *
 * KEYS[1] stream, KEYS[2] dedup key
 * ARGV[1] retention ms, ARGV[2] max length (0 = untrimmed), ARGV[3..] fields
 * Reply: {1, id} enqueued, {0, id} duplicate, {2, ''} stream missing
 */
const PUBLISH_ONCE_SCRIPT = `
local existing = redis.call('GET', KEYS[2])
if existing then
  return {0, existing}
end
local args = {KEYS[1], 'NOMKSTREAM'}
if tonumber(ARGV[2]) > 0 then
  table.insert(args, 'MAXLEN')
  table.insert(args, '~')
  table.insert(args, ARGV[2])
end
table.insert(args, '*')
for i = 3, #ARGV do
  table.insert(args, ARGV[i])
end
local id = redis.call('XADD', unpack(args))
if not id then
  return {2, ''}
end
redis.call('SET', KEYS[2], id, 'PX', ARGV[1])
return {1, id}
`;

/**
 * Append to another stream and acknowledge the source entry.
 *
 * KEYS[1] source stream, KEYS[2] target stream
 * ARGV[1] group, ARGV[2] entry id, ARGV[3] max length, ARGV[4..] fields
 */
const MOVE_ENTRY_SCRIPT = `
local args = {KEYS[2]}
if tonumber(ARGV[3]) > 0 then
  table.insert(args, 'MAXLEN')
  table.insert(args, '~')
  table.insert(args, ARGV[3])
end
table.insert(args, '*')
for i = 4, #ARGV do
  table.insert(args, ARGV[i])
end
local id = redis.call('XADD', unpack(args))
redis.call('XACK', KEYS[1], ARGV[1], ARGV[2])
return id
`;

const publishReplySchema = z.tuple([z.number(), z.string()]);

const entriesSchema = z.array(z.tuple([z.string(), z.array(z.string()).nullable()]));

const readReplySchema = z.array(z.tuple([z.string(), entriesSchema])).nullable();

// Redis 7 appends a third element (ids deleted from the PEL)
const autoclaimReplySchema = z.tuple([z.string(), entriesSchema]).rest(z.unknown());

const pendingReplySchema = z.array(z.tuple([z.string(), z.string(), z.number(), z.number()]));

function toEntries(raw: z.infer<typeof entriesSchema>): StreamEntry[] {
  return raw.map(([id, fields]) => ({ id, fields: fields ?? [] }));
}

/**
 * Maps ioredis failures onto the port contract: error replies become
 * `BrokerReplyError`, everything else `TransportError`.
 */
function translate(err: unknown): never {
  if (err instanceof BrokerReplyError || err instanceof TransportError) throw err;
  if (err instanceof Error && err.name === 'ReplyError') {
    throw new BrokerReplyError(err.message, { cause: err });
  }
  const message = err instanceof Error ? err.message : String(err);
  throw new TransportError(message, { cause: err });
}

function parseReply<T>(schema: z.ZodType<T>, reply: unknown, command: string): T {
  const parsed = schema.safeParse(reply);
  if (!parsed.success) {
    throw new BrokerReplyError(`Unexpected ${command} reply: ${parsed.error.message}`);
  }
  return parsed.data;
}

/**
 * The slice of an ioredis connection the stream client uses. Commands go
 * through `call` and come back as raw replies.
 */
export interface RedisConnection {
  connect(): Promise<void>;
  quit(): Promise<void>;
  disconnect(reconnect: boolean): void;
  duplicate(name: string): RedisConnection;
  on(event: ClientEvent, listener: (err?: Error) => void): void;
  call(command: string, args: (string | number)[]): Promise<unknown>;
}

/** `RedisConnection` over an ioredis client. */
export class IoredisConnection implements RedisConnection {
  constructor(private readonly redis: Redis) {}

  async connect(): Promise<void> {
    await this.redis.connect();
  }

  async quit(): Promise<void> {
    await this.redis.quit();
  }

  disconnect(reconnect: boolean): void {
    this.redis.disconnect(reconnect);
  }

  duplicate(name: string): RedisConnection {
    return new IoredisConnection(this.redis.duplicate({ connectionName: name }));
  }

  on(event: ClientEvent, listener: (err?: Error) => void): void {
    if (event === 'error') {
      this.redis.on('error', (err: Error) => listener(err));
      return;
    }
    this.redis.on(event, () => listener());
  }

  call(command: string, args: (string | number)[]): Promise<unknown> {
    return this.redis.call(command, args);
  }
}

/**
 * `StreamClient` over a single Redis connection.
 *
 * The offline queue is disabled and `maxRetriesPerRequest` is 0 so a
 * command issued while the socket is down fails at once instead of
 * waiting for the reconnect; retrying is the caller's decision.
 */
export class RedisStreamClient implements StreamClient {
  constructor(private readonly redis: RedisConnection) {}

  static create(url: string, options: ClientOptions): RedisStreamClient {
    const redis = new Redis(url, {
      connectionName: options.name,
      lazyConnect: true,
      enableReadyCheck: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 0,
      connectTimeout: options.connect_timeout_ms,
      retryStrategy: (times: number) => options.retry_strategy(times),
    });
    return new RedisStreamClient(new IoredisConnection(redis));
  }

  async connect(): Promise<void> {
    await this.redis.connect().catch(translate);
  }

  async quit(): Promise<void> {
    try {
      await this.redis.quit();
    } catch {
      // socket already gone; make sure no reconnect is scheduled
      this.redis.disconnect(false);
    }
  }

  disconnect(reconnect = false): void {
    this.redis.disconnect(reconnect);
  }

  duplicate(name: string): StreamClient {
    return new RedisStreamClient(this.redis.duplicate(name));
  }

  on(event: ClientEvent, listener: (err?: Error) => void): void {
    this.redis.on(event, listener);
  }

  async ping(): Promise<string> {
    const reply = await this.redis.call('PING', []).catch(translate);
    return parseReply(z.string(), reply, 'PING');
  }

  async ensureGroup(stream: string, group: string, start: '0' | '$'): Promise<boolean> {
    try {
      await this.redis.call('XGROUP', ['CREATE', stream, group, start, 'MKSTREAM']);
      return true;
    } catch (err: unknown) {
      // BUSYGROUP = group already exists
      if (err instanceof Error && err.message.includes('BUSYGROUP')) return false;
      return translate(err);
    }
  }

  async publishOnce(request: PublishOnceRequest): Promise<PublishOnceReply> {
    const reply = await this.redis
      .call('EVAL', [
        PUBLISH_ONCE_SCRIPT,
        2,
        request.stream,
        request.dedup_key,
        String(request.retention_ms),
        String(request.max_length),
        ...request.fields,
      ])
      .catch(translate);

    const [status, entryId] = parseReply(publishReplySchema, reply, 'publish');
    if (status === 0) return { status: 'duplicate', entry_id: entryId };
    if (status === 2) return { status: 'unroutable' };
    return { status: 'enqueued', entry_id: entryId };
  }

  async readGroup(request: ReadGroupRequest): Promise<StreamEntry[]> {
    const { stream, group, consumer, count, cursor, block_ms } = request;
    const block = block_ms === undefined ? [] : ['BLOCK', block_ms];
    const reply = await this.redis
      .call('XREADGROUP', ['GROUP', group, consumer, 'COUNT', count, ...block, 'STREAMS', stream, cursor])
      .catch(translate);

    // null = BLOCK timed out with no new messages
    const streams = parseReply(readReplySchema, reply, 'XREADGROUP');
    if (streams === null) return [];
    return streams.flatMap(([, entries]) => toEntries(entries));
  }

  async ack(stream: string, group: string, ids: string[]): Promise<number> {
    if (ids.length === 0) return 0;
    const reply = await this.redis.call('XACK', [stream, group, ...ids]).catch(translate);
    return parseReply(z.number(), reply, 'XACK');
  }

  /**
   * Entries trimmed from the stream while pending come back with no
   * fields (Redis 6.2). They are returned as is so the reader can ack
   * them out of the pending list.
   */
  async claimIdle(request: ClaimIdleRequest): Promise<StreamEntry[]> {
    const reply = await this.redis
      .call('XAUTOCLAIM', [
        request.stream,
        request.group,
        request.consumer,
        request.min_idle_ms,
        '0-0',
        'COUNT',
        request.count,
      ])
      .catch(translate);

    const [, entries] = parseReply(autoclaimReplySchema, reply, 'XAUTOCLAIM');
    return toEntries(entries);
  }

  async deliveryCount(stream: string, group: string, id: string): Promise<number> {
    const reply = await this.redis.call('XPENDING', [stream, group, id, id, 1]).catch(translate);
    const [first] = parseReply(pendingReplySchema, reply, 'XPENDING');
    return first ? first[3] : 0;
  }

  async moveEntry(request: MoveEntryRequest): Promise<string> {
    const reply = await this.redis
      .call('EVAL', [
        MOVE_ENTRY_SCRIPT,
        2,
        request.from_stream,
        request.to_stream,
        request.group,
        request.entry_id,
        String(request.max_length),
        ...request.fields,
      ])
      .catch(translate);

    return parseReply(z.string(), reply, 'move');
  }
}

export function createRedisClientFactory(url: string): StreamClientFactory {
  return (options) => RedisStreamClient.create(url, options);
}
