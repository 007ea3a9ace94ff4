import type { Logger } from 'pino';
import type { EventCallback, EventInput, EventRegister, PublishAck, Subscription } from '../../domain/index.js';
import type { RelayConfig } from '../config.js';
import { InMemoryStreamBroker } from '../memory/in-memory-stream-broker.js';
import { createInMemoryClientFactory } from '../memory/in-memory-stream-client.js';
import { createRedisClientFactory } from '../redis/redis-stream-client.js';
import { ChannelPool } from './channel-pool.js';
import { ConnectionManager } from './connection-manager.js';
import type { ConnectionState } from './connection-manager.js';
import { EventPublisher } from './event-publisher.js';
import type { PublisherDeps } from './event-publisher.js';
import { EventReader } from './event-reader.js';
import type { StreamClientFactory } from './stream-client.js';

export interface RelayRegisterDeps {
  factory: StreamClientFactory;
  log: Logger;
  random?: () => number;
  sleep?: PublisherDeps['sleep'];
}

/**
 * Event register backed by a stream broker.
 *
 * Owns one connection manager, one channel pool, one publisher and one
 * reader. Call `connect()` before use.
 */
export class StreamRelayRegister implements EventRegister {
  readonly connection: ConnectionManager;
  private readonly pool: ChannelPool;
  private readonly publisher: EventPublisher;
  private readonly reader: EventReader;
  private readonly log: Logger;

  constructor(
    private readonly config: RelayConfig,
    deps: RelayRegisterDeps,
  ) {
    this.log = deps.log.child({ component: 'relay-register' });
    this.connection = new ConnectionManager(
      deps.factory,
      {
        name: `relay:${config.consumer}`,
        connect_timeout_ms: config.connect_timeout_ms,
        heartbeat_interval_ms: config.heartbeat_interval_ms,
        reconnect: config.reconnect,
      },
      this.log,
      deps.random,
    );
    this.pool = new ChannelPool(this.connection, { max_channels: config.max_channels }, this.log);
    this.publisher = new EventPublisher(
      {
        stream: config.stream,
        dedup_prefix: config.dedup_prefix,
        dedup_retention_ms: config.dedup_retention_ms,
        max_stream_length: config.max_stream_length,
        publish_timeout_ms: config.publish_timeout_ms,
        retry: config.publish_retry,
      },
      { connection: this.connection, pool: this.pool, log: this.log, sleep: deps.sleep },
    );
    this.reader = new EventReader(
      {
        stream: config.stream,
        group: config.group,
        consumer: config.consumer,
        dead_letter_stream: config.dead_letter_stream,
        max_stream_length: config.max_stream_length,
        max_attempts: config.max_attempts,
        block_ms: config.block_ms,
        batch_size: config.batch_size,
        visibility_timeout_ms: config.visibility_timeout_ms,
      },
      { connection: this.connection, pool: this.pool, log: this.log },
    );
  }

  get connectionState(): ConnectionState {
    return this.connection.state;
  }

  /**
   * Connects and declares the topology: the stream and its consumer group,
   * read from the beginning so events published before the first
   * subscription are still delivered.
   */
  async connect(): Promise<void> {
    await this.connection.connect();
    const created = await this.connection.client.ensureGroup(this.config.stream, this.config.group, '0');
    this.log.info(
      { stream: this.config.stream, group: this.config.group, created },
      'Relay topology ready',
    );
  }

  registerEvent(input: EventInput): Promise<PublishAck> {
    return this.publisher.registerEvent(input);
  }

  readEvents(callback: EventCallback): Subscription {
    return this.reader.readEvents(callback);
  }

  /**
   * Cancels subscriptions, then closes the connection, which fails
   * in-flight publishes as unreachable, then drains the pool. Idempotent.
   */
  async close(): Promise<void> {
    if (this.connection.isClosed) return;
    await this.reader.cancelAll();
    await this.connection.close();
    await this.pool.drain();
  }
}

export interface CreateRelayRegisterOptions {
  /** Overrides the transport picked from `config.transport`. */
  clientFactory?: StreamClientFactory;
  /** Broker used by the `memory` transport; a fresh one when omitted. */
  broker?: InMemoryStreamBroker;
  random?: () => number;
  sleep?: PublisherDeps['sleep'];
}

export function createRelayRegister(
  config: RelayConfig,
  log: Logger,
  options: CreateRelayRegisterOptions = {},
): StreamRelayRegister {
  const factory =
    options.clientFactory ??
    (config.transport === 'memory'
      ? createInMemoryClientFactory(options.broker ?? new InMemoryStreamBroker())
      : createRedisClientFactory(config.redis_url));

  return new StreamRelayRegister(config, {
    factory,
    log,
    random: options.random,
    sleep: options.sleep,
  });
}
