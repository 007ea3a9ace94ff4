import type { Logger } from 'pino';
import { PoolError, errorMessage } from '../../domain/index.js';
import type { ConnectionManager } from './connection-manager.js';
import type { StreamClient } from './stream-client.js';

export type ChannelPurpose = 'publish' | 'consume';

/**
 * A pooled connection, owned by exactly one operation between
 * `acquire` and `release`.
 */
export class Channel {
  private brokenFlag = false;

  constructor(
    readonly id: number,
    readonly purpose: ChannelPurpose,
    readonly client: StreamClient,
  ) {}

  get broken(): boolean {
    return this.brokenFlag;
  }

  /** Never reused once marked; released channels are discarded instead. */
  markBroken(): void {
    this.brokenFlag = true;
  }
}

interface Waiter {
  resolve: (channel: Channel) => void;
  reject: (err: unknown) => void;
}

export interface ChannelPoolOptions {
  max_channels: number;
}

/**
 * Multiplexes publish and consume operations over channels derived from
 * the connection manager.
 *
 * Publish channels are returned after each confirm and reused; a consume
 * channel is held for a subscription's lifetime. A failing channel is
 * discarded and, where asked, replaced without touching the primary
 * connection or other channels.
 */
export class ChannelPool {
  private readonly idle: Channel[] = [];
  private readonly inUse = new Set<Channel>();
  private readonly waiters: Waiter[] = [];
  private opening = 0;
  private seq = 0;
  private drained = false;

  constructor(
    private readonly connection: ConnectionManager,
    private readonly options: ChannelPoolOptions,
    private readonly log: Logger,
  ) {}

  get size(): number {
    return this.idle.length + this.inUse.size + this.opening;
  }

  get idleCount(): number {
    return this.idle.length;
  }

  async acquire(purpose: ChannelPurpose = 'publish'): Promise<Channel> {
    if (this.drained) throw new PoolError('Channel pool is drained');

    if (purpose === 'publish') {
      const reused = this.idle.shift();
      if (reused) {
        this.inUse.add(reused);
        return reused;
      }
    }

    if (this.size < this.options.max_channels) {
      return this.open(purpose);
    }

    if (purpose === 'consume') {
      // make room by retiring an idle publish channel
      const retired = this.idle.shift();
      if (retired) {
        await this.close(retired);
        return this.open(purpose);
      }
    }

    return new Promise<Channel>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    }).then((channel) => this.adopt(channel, purpose));
  }

  release(channel: Channel): void {
    if (!this.inUse.delete(channel)) return;

    if (channel.broken || this.drained || channel.purpose === 'consume') {
      void this.dispose(channel);
      return;
    }

    const waiter = this.waiters.shift();
    if (waiter) {
      this.inUse.add(channel);
      waiter.resolve(channel);
      return;
    }
    this.idle.push(channel);
  }

  /** Closes `channel` for good. */
  async discard(channel: Channel): Promise<void> {
    this.inUse.delete(channel);
    const idleIndex = this.idle.indexOf(channel);
    if (idleIndex >= 0) this.idle.splice(idleIndex, 1);
    await this.dispose(channel);
  }

  /**
   * Discards `channel` and opens a replacement for the same purpose.
   * Throws `PoolError` when the replacement cannot be opened.
   */
  async replace(channel: Channel): Promise<Channel> {
    channel.markBroken();
    await this.discard(channel);
    this.log.info({ channel: channel.id, purpose: channel.purpose }, 'Replacing channel');
    return this.open(channel.purpose);
  }

  /** Closes every channel and fails pending acquisitions. Idempotent. */
  async drain(): Promise<void> {
    if (this.drained) return;
    this.drained = true;
    const err = new PoolError('Channel pool is drained');
    for (const waiter of this.waiters.splice(0)) waiter.reject(err);

    const channels = [...this.idle.splice(0), ...this.inUse];
    this.inUse.clear();
    await Promise.all(channels.map((channel) => this.close(channel)));
  }

  private async open(purpose: ChannelPurpose): Promise<Channel> {
    this.opening++;
    try {
      const client = await this.connection.openChannel(purpose);
      this.seq++;
      const channel = new Channel(this.seq, purpose, client);
      this.inUse.add(channel);
      this.log.debug({ channel: channel.id, purpose }, 'Channel opened');
      return channel;
    } catch (err: unknown) {
      throw new PoolError(`Unable to open ${purpose} channel: ${errorMessage(err)}`, { cause: err });
    } finally {
      this.opening--;
    }
  }

  /** A waiter may receive a publish channel while it needs a consume one. */
  private async adopt(channel: Channel, purpose: ChannelPurpose): Promise<Channel> {
    if (channel.purpose === purpose) return channel;
    this.inUse.delete(channel);
    await this.close(channel);
    return this.open(purpose);
  }

  /** Frees a slot after a channel left the pool: a waiter gets a fresh channel. */
  private async dispose(channel: Channel): Promise<void> {
    await this.close(channel);
    const waiter = this.waiters.shift();
    if (!waiter) return;
    this.open('publish').then(waiter.resolve, waiter.reject);
  }

  private async close(channel: Channel): Promise<void> {
    try {
      await this.connection.closeChannel(channel.client);
    } catch (err: unknown) {
      this.log.debug({ err, channel: channel.id }, 'Channel close failed');
    }
  }
}
