/**
 * Broker port used by the relay register.
 *
 * Everything the register needs from the broker goes through this
 * interface. `RedisStreamClient` implements it over ioredis;
 * `InMemoryStreamClient` implements it in-process.
 *
 * Contract for failures: an error reply from the broker rejects with
 * `BrokerReplyError`; any other rejection means the broker could not be
 * reached.
 */

export interface StreamEntry {
  id: string;
  /** Flat [field, value, field, value, ...] list. Empty when the entry was trimmed. */
  fields: string[];
}

export type ClientEvent = 'ready' | 'close' | 'reconnecting' | 'end' | 'error';

export interface ClientOptions {
  name: string;
  connect_timeout_ms: number;
  /** Delay before reconnect attempt `times` (1-based), or null to give up. */
  retry_strategy: (times: number) => number | null;
}

export interface PublishOnceRequest {
  stream: string;
  dedup_key: string;
  retention_ms: number;
  /** Approximate cap on stream length. 0 = untrimmed. */
  max_length: number;
  fields: string[];
}

export type PublishOnceReply =
  | { status: 'enqueued'; entry_id: string }
  | { status: 'duplicate'; entry_id: string }
  | { status: 'unroutable' };

export interface ReadGroupRequest {
  stream: string;
  group: string;
  consumer: string;
  count: number;
  /** '>' = never-delivered entries, '0' = this consumer's pending entries. */
  cursor: '>' | '0';
  block_ms?: number;
}

export interface ClaimIdleRequest {
  stream: string;
  group: string;
  consumer: string;
  min_idle_ms: number;
  count: number;
}

export interface MoveEntryRequest {
  from_stream: string;
  group: string;
  entry_id: string;
  to_stream: string;
  fields: string[];
  max_length: number;
}

export interface StreamClient {
  connect(): Promise<void>;
  /** Graceful close. Never rejects. */
  quit(): Promise<void>;
  disconnect(reconnect?: boolean): void;
  /** New connection with the same options. */
  duplicate(name: string): StreamClient;
  ping(): Promise<string>;

  /** Creates stream and group when missing. Resolves true when the group was created. */
  ensureGroup(stream: string, group: string, start: '0' | '$'): Promise<boolean>;
  /** Atomic: dedup-key check, append, dedup-key write. */
  publishOnce(request: PublishOnceRequest): Promise<PublishOnceReply>;
  readGroup(request: ReadGroupRequest): Promise<StreamEntry[]>;
  ack(stream: string, group: string, ids: string[]): Promise<number>;
  claimIdle(request: ClaimIdleRequest): Promise<StreamEntry[]>;
  /** Delivery count of a pending entry, 0 when not pending. */
  deliveryCount(stream: string, group: string, id: string): Promise<number>;
  /** Atomic: append `fields` to `to_stream`, acknowledge `entry_id`. Resolves the new entry id. */
  moveEntry(request: MoveEntryRequest): Promise<string>;

  /** `error` listeners receive the error; the other events pass nothing. */
  on(event: ClientEvent, listener: (err?: Error) => void): void;
}

export type StreamClientFactory = (options: ClientOptions) => StreamClient;

/** Millisecond timestamp encoded in a stream entry id (`<ms>-<seq>`). */
export function entryTimestamp(entryId: string): number {
  const [ms] = entryId.split('-');
  const value = Number(ms);
  return Number.isFinite(value) ? value : 0;
}
