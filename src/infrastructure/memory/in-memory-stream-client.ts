import { TransportError } from '../../domain/index.js';
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
import type { BrokerConnection, InMemoryStreamBroker } from './in-memory-stream-broker.js';

type ClientStatus = 'wait' | 'connecting' | 'ready' | 'reconnecting' | 'end';

/**
 * One connection to an `InMemoryStreamBroker`.
 *
 * Mirrors the ioredis lifecycle the register relies on: `lazyConnect`,
 * `close`/`reconnecting`/`ready` events after a drop, reconnect delays
 * taken from `retry_strategy`, commands rejected while not ready
 * (offline queue disabled).
 */
export class InMemoryStreamClient implements StreamClient, BrokerConnection {
  private status: ClientStatus = 'wait';
  private readonly listeners = new Map<ClientEvent, Set<(err?: Error) => void>>();
  private readonly blocked = new Set<(err: Error) => void>();
  private reconnectTimer: NodeJS.Timeout | null = null;

  constructor(
    private readonly broker: InMemoryStreamBroker,
    readonly options: ClientOptions,
  ) {}

  async connect(): Promise<void> {
    if (this.status === 'ready') return;
    this.status = 'connecting';
    if (!this.broker.isAvailable()) {
      this.status = 'end';
      const err = new TransportError('connect ECONNREFUSED');
      this.emit('error', err);
      throw err;
    }
    this.broker.register(this);
    this.status = 'ready';
    this.emit('ready');
  }

  async quit(): Promise<void> {
    this.disconnect(false);
  }

  disconnect(reconnect = false): void {
    if (reconnect) {
      this.drop();
      return;
    }
    if (this.status === 'end' || this.status === 'wait') {
      this.clearReconnect();
      this.status = 'end';
      return;
    }
    this.clearReconnect();
    this.broker.unregister(this);
    this.failBlocked(new TransportError('Connection is closed.'));
    this.status = 'end';
    this.emit('close');
    this.emit('end');
  }

  /** Broker-initiated connection loss. */
  drop(): void {
    if (this.status !== 'ready') return;
    this.status = 'reconnecting';
    this.failBlocked(new TransportError('Connection is closed.'));
    this.emit('close');
    this.scheduleReconnect(1);
  }

  duplicate(name: string): StreamClient {
    return new InMemoryStreamClient(this.broker, { ...this.options, name });
  }

  on(event: ClientEvent, listener: (err?: Error) => void): void {
    const set = this.listeners.get(event) ?? new Set<(err?: Error) => void>();
    this.listeners.set(event, set);
    set.add(listener);
  }

  // ---------------------------------------------------------------
  // Commands
  // ---------------------------------------------------------------

  async ping(): Promise<string> {
    return this.execute(() => 'PONG');
  }

  async ensureGroup(stream: string, group: string, start: '0' | '$'): Promise<boolean> {
    return this.execute(() => this.broker.ensureGroup(stream, group, start));
  }

  async publishOnce(request: PublishOnceRequest): Promise<PublishOnceReply> {
    return this.execute((): PublishOnceReply => {
      const existing = this.broker.getKey(request.dedup_key);
      if (existing !== null) return { status: 'duplicate', entry_id: existing };

      const entryId = this.broker.appendIfExists(request.stream, request.fields, request.max_length);
      if (entryId === null) return { status: 'unroutable' };

      this.broker.setKey(request.dedup_key, entryId, request.retention_ms);
      return { status: 'enqueued', entry_id: entryId };
    });
  }

  async readGroup(request: ReadGroupRequest): Promise<StreamEntry[]> {
    const read = (): StreamEntry[] =>
      request.cursor === '0'
        ? this.broker.readPending(request.stream, request.group, request.consumer, request.count)
        : this.broker.readNew(request.stream, request.group, request.consumer, request.count);

    const blockMs = request.block_ms;
    // the wait is registered in the same step as the read, like a server-side BLOCK
    const first = await this.execute(() => {
      const entries = read();
      const wait =
        entries.length === 0 && blockMs !== undefined && request.cursor === '>'
          ? this.waitForAppend(request.stream, blockMs)
          : null;
      return { entries, wait };
    });
    if (!first.wait) return first.entries;

    await first.wait;
    return this.execute(read);
  }

  async ack(stream: string, group: string, ids: string[]): Promise<number> {
    return this.execute(() => this.broker.ack(stream, group, ids));
  }

  async claimIdle(request: ClaimIdleRequest): Promise<StreamEntry[]> {
    return this.execute(() =>
      this.broker.claimIdle(request.stream, request.group, request.consumer, request.min_idle_ms, request.count),
    );
  }

  async deliveryCount(stream: string, group: string, id: string): Promise<number> {
    return this.execute(() => this.broker.deliveryCount(stream, group, id));
  }

  async moveEntry(request: MoveEntryRequest): Promise<string> {
    return this.execute(() =>
      this.broker.move(
        request.from_stream,
        request.group,
        request.entry_id,
        request.to_stream,
        request.fields,
        request.max_length,
      ),
    );
  }

  // ---------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------

  private async execute<T>(command: () => T): Promise<T> {
    this.assertWritable();
    const latency = this.broker.latency;
    if (latency > 0) {
      await new Promise<void>((resolve) => setTimeout(resolve, latency));
      this.assertWritable();
    }
    const scripted = this.broker.takeScriptedFailure();
    if (scripted) throw scripted;
    return command();
  }

  private assertWritable(): void {
    if (this.status !== 'ready') {
      throw new TransportError("Stream isn't writeable and enableOfflineQueue options is false");
    }
  }

  private waitForAppend(stream: string, blockMs: number): Promise<void> {
    return new Promise((resolve, reject) => {
      let timer: NodeJS.Timeout | undefined;
      const finish = (): void => {
        if (timer) clearTimeout(timer);
        unsubscribe();
        this.blocked.delete(fail);
      };
      const fail = (err: Error): void => {
        finish();
        reject(err);
      };
      const unsubscribe = this.broker.onAppend(stream, () => {
        finish();
        resolve();
      });
      this.blocked.add(fail);
      // BLOCK 0 waits indefinitely
      if (blockMs > 0) {
        timer = setTimeout(() => {
          finish();
          resolve();
        }, blockMs);
      }
    });
  }

  private failBlocked(err: Error): void {
    for (const fail of [...this.blocked]) fail(err);
  }

  private scheduleReconnect(times: number): void {
    const delay = this.options.retry_strategy(times);
    if (delay === null) {
      this.broker.unregister(this);
      this.status = 'end';
      this.emit('end');
      return;
    }
    this.emit('reconnecting');
    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = null;
      if (this.status !== 'reconnecting') return;
      if (this.broker.isAvailable()) {
        this.status = 'ready';
        this.emit('ready');
      } else {
        this.scheduleReconnect(times + 1);
      }
    }, delay);
  }

  private clearReconnect(): void {
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }
  }

  private emit(event: ClientEvent, err?: Error): void {
    for (const listener of [...(this.listeners.get(event) ?? [])]) {
      listener(err);
    }
  }
}

/** Factory the connection manager uses to open connections to `broker`. */
export function createInMemoryClientFactory(broker: InMemoryStreamBroker): StreamClientFactory {
  return (options) => new InMemoryStreamClient(broker, options);
}
