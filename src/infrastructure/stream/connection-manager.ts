import type { Logger } from 'pino';
import { ConnectionError, errorMessage } from '../../domain/index.js';
import { backoffDelay, hasAttemptsLeft } from '../../application/retry-policy.js';
import type { BackoffPolicy } from '../../application/retry-policy.js';
import type { StreamClient, StreamClientFactory } from './stream-client.js';

export type ConnectionState = 'idle' | 'connecting' | 'ready' | 'reconnecting' | 'failed' | 'closed';

export interface ConnectionManagerOptions {
  name: string;
  connect_timeout_ms: number;
  heartbeat_interval_ms: number;
  reconnect: BackoffPolicy;
}

type StateListener = (next: ConnectionState, previous: ConnectionState) => void;

// Consecutive failed heartbeats before the connection is forcibly recycled
const HEARTBEAT_FAILURE_LIMIT = 2;

/**
 * Owns the register's single logical broker connection.
 *
 * Reconnects after an unexpected drop with capped exponential backoff and
 * full jitter (the client's retry strategy asks `reconnectDelay`). State
 * transitions are published through `onStateChange`; nothing here retries
 * business calls.
 *
 * Channels are extra connections derived from the primary one, opened
 * through `openChannel` so they share the retry strategy and are all
 * closed with the manager.
 */
export class ConnectionManager {
  private current: ConnectionState = 'idle';
  private primary: StreamClient | null = null;
  private readonly channels = new Set<StreamClient>();
  private readonly listeners = new Set<StateListener>();
  private readonly abort = new AbortController();
  private heartbeat: NodeJS.Timeout | null = null;
  private heartbeatFailures = 0;
  private channelSeq = 0;

  constructor(
    private readonly factory: StreamClientFactory,
    private readonly options: ConnectionManagerOptions,
    private readonly log: Logger,
    private readonly random: () => number = Math.random,
  ) {}

  get state(): ConnectionState {
    return this.current;
  }

  /** Aborted once `close()` has been called. */
  get signal(): AbortSignal {
    return this.abort.signal;
  }

  get isClosed(): boolean {
    return this.current === 'closed';
  }

  /** Primary connection, for topology commands and heartbeats. */
  get client(): StreamClient {
    if (!this.primary || this.current === 'closed') {
      throw new ConnectionError('Connection is not open');
    }
    return this.primary;
  }

  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /** Delay before reconnect attempt `times`, or null once the policy is spent. */
  reconnectDelay(times: number): number | null {
    if (this.current === 'closed') return null;
    if (!hasAttemptsLeft(this.options.reconnect, times - 1)) return null;
    return backoffDelay(this.options.reconnect, times, this.random);
  }

  /**
   * Opens the primary connection. Callable again after `failed` to
   * recreate it. Throws `ConnectionError` when the broker cannot be reached.
   */
  async connect(): Promise<void> {
    if (this.current === 'closed') throw new ConnectionError('Connection manager is closed');
    if (this.current === 'ready' || this.current === 'connecting' || this.current === 'reconnecting') return;

    this.transition('connecting');
    const client = this.factory({
      name: this.options.name,
      connect_timeout_ms: this.options.connect_timeout_ms,
      retry_strategy: (times) => this.reconnectDelay(times),
    });
    this.watch(client);
    this.primary = client;

    try {
      await client.connect();
    } catch (err: unknown) {
      this.primary = null;
      client.disconnect(false);
      this.transition('failed');
      this.log.error({ err, name: this.options.name }, 'Broker connection failed');
      throw new ConnectionError(`Unable to connect to broker: ${errorMessage(err)}`, { cause: err });
    }

    this.transition('ready');
    this.startHeartbeat();
    this.log.info({ name: this.options.name }, 'Broker connected');
  }

  /** Opens a dedicated connection sharing the primary's settings. */
  async openChannel(purpose: string): Promise<StreamClient> {
    const primary = this.client;
    this.channelSeq++;
    const channel = primary.duplicate(`${this.options.name}:${purpose}:${this.channelSeq}`);
    channel.on('error', (err) => {
      this.log.debug({ err, purpose }, 'Channel connection error');
    });
    this.channels.add(channel);

    try {
      await channel.connect();
    } catch (err: unknown) {
      this.channels.delete(channel);
      channel.disconnect(false);
      throw new ConnectionError(`Unable to open ${purpose} channel: ${errorMessage(err)}`, { cause: err });
    }
    return channel;
  }

  /** Closes a channel opened with `openChannel`. */
  async closeChannel(channel: StreamClient): Promise<void> {
    this.channels.delete(channel);
    await channel.quit();
  }

  /**
   * Resolves when the connection is ready. Rejects with `ConnectionError`
   * if it fails or closes first, or with the signal's reason on abort.
   */
  waitUntilReady(signal?: AbortSignal): Promise<void> {
    if (this.current === 'ready') return Promise.resolve();
    if (this.current === 'closed' || this.current === 'failed') {
      return Promise.reject(new ConnectionError(`Connection is ${this.current}`));
    }

    return new Promise((resolve, reject) => {
      const onAbort = (): void => {
        unsubscribe();
        reject(signal?.reason);
      };
      const unsubscribe = this.onStateChange((next) => {
        if (next === 'ready') {
          unsubscribe();
          signal?.removeEventListener('abort', onAbort);
          resolve();
        } else if (next === 'closed' || next === 'failed') {
          unsubscribe();
          signal?.removeEventListener('abort', onAbort);
          reject(new ConnectionError(`Connection is ${next}`));
        }
      });
      if (signal?.aborted) {
        onAbort();
        return;
      }
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Releases every connection. Idempotent. */
  async close(): Promise<void> {
    if (this.current === 'closed') return;
    this.stopHeartbeat();
    this.transition('closed');
    this.abort.abort(new ConnectionError('Connection manager closed'));

    const channels = [...this.channels];
    this.channels.clear();
    await Promise.all(channels.map((channel) => channel.quit()));

    const primary = this.primary;
    this.primary = null;
    if (primary) await primary.quit();
    this.log.info({ name: this.options.name }, 'Broker connection closed');
  }

  /** Sends one heartbeat. Exposed for tests; normally driven by the interval. */
  async beat(): Promise<void> {
    const primary = this.primary;
    if (this.current !== 'ready' || !primary) return;
    try {
      await primary.ping();
      this.heartbeatFailures = 0;
    } catch (err: unknown) {
      this.heartbeatFailures++;
      this.log.warn({ err, failures: this.heartbeatFailures }, 'Heartbeat failed');
      if (this.heartbeatFailures >= HEARTBEAT_FAILURE_LIMIT) {
        this.heartbeatFailures = 0;
        this.log.warn('Heartbeat limit reached, recycling broker connection');
        primary.disconnect(true);
      }
    }
  }

  private watch(client: StreamClient): void {
    client.on('error', (err) => {
      this.log.debug({ err }, 'Broker connection error');
    });
    client.on('close', () => {
      if (client !== this.primary) return;
      if (this.current === 'ready') {
        this.transition('reconnecting');
        this.log.warn({ name: this.options.name }, 'Broker connection lost, reconnecting');
      }
    });
    client.on('reconnecting', () => {
      if (client !== this.primary) return;
      if (this.current === 'ready') this.transition('reconnecting');
    });
    client.on('ready', () => {
      if (client !== this.primary) return;
      if (this.current === 'reconnecting') {
        this.transition('ready');
        this.log.info({ name: this.options.name }, 'Broker connection re-established');
      }
    });
    client.on('end', () => {
      if (client !== this.primary) return;
      if (this.current === 'closed') return;
      this.stopHeartbeat();
      this.primary = null;
      this.transition('failed');
      this.log.error({ name: this.options.name }, 'Broker reconnect attempts exhausted');
    });
  }

  private transition(next: ConnectionState): void {
    const previous = this.current;
    if (previous === next) return;
    this.current = next;
    for (const listener of [...this.listeners]) {
      listener(next, previous);
    }
  }

  private startHeartbeat(): void {
    this.stopHeartbeat();
    if (this.options.heartbeat_interval_ms <= 0) return;
    this.heartbeat = setInterval(() => {
      void this.beat();
    }, this.options.heartbeat_interval_ms);
    this.heartbeat.unref();
  }

  private stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
  }
}
