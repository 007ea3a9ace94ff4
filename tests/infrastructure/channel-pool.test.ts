import { describe, it, expect, afterEach } from 'vitest';
import { ChannelPool } from '../../src/infrastructure/stream/channel-pool.js';
import { ConnectionManager } from '../../src/infrastructure/stream/connection-manager.js';
import { InMemoryStreamBroker, createInMemoryClientFactory } from '../../src/infrastructure/memory/index.js';
import { PoolError } from '../../src/domain/index.js';
import { silentLog } from '../helpers.js';

const managers: ConnectionManager[] = [];

async function createPool(maxChannels: number): Promise<{ broker: InMemoryStreamBroker; pool: ChannelPool }> {
  const broker = new InMemoryStreamBroker();
  const manager = new ConnectionManager(
    createInMemoryClientFactory(broker),
    {
      name: 'pool-test',
      connect_timeout_ms: 1_000,
      heartbeat_interval_ms: 0,
      reconnect: { base_delay_ms: 5, max_delay_ms: 20, max_attempts: 0, jitter: 'full' },
    },
    silentLog,
  );
  managers.push(manager);
  await manager.connect();
  return { broker, pool: new ChannelPool(manager, { max_channels: maxChannels }, silentLog) };
}

afterEach(async () => {
  await Promise.all(managers.splice(0).map((manager) => manager.close()));
});

describe('ChannelPool', () => {
  it('reuses released publish channels', async () => {
    const { pool } = await createPool(4);
    const first = await pool.acquire();
    const second = await pool.acquire();
    expect(first.id).not.toBe(second.id);

    pool.release(first);
    expect(pool.idleCount).toBe(1);
    expect(await pool.acquire()).toBe(first);
  });

  it('makes callers wait once the pool is full', async () => {
    const { pool } = await createPool(2);
    const first = await pool.acquire();
    await pool.acquire();

    let handed: unknown = null;
    const waiting = pool.acquire().then((channel) => {
      handed = channel;
      return channel;
    });
    await new Promise((resolve) => setTimeout(resolve, 5));
    expect(handed).toBeNull();

    pool.release(first);
    expect(await waiting).toBe(first);
  });

  it('retires an idle publish channel to make room for a consumer', async () => {
    const { pool } = await createPool(2);
    const first = await pool.acquire();
    await pool.acquire();
    pool.release(first);

    const consume = await pool.acquire('consume');
    expect(consume.purpose).toBe('consume');
    expect(pool.idleCount).toBe(0);
    expect(pool.size).toBe(2);
  });

  it('never hands out a broken channel again', async () => {
    const { pool } = await createPool(2);
    const channel = await pool.acquire();
    channel.markBroken();
    pool.release(channel);

    expect(pool.idleCount).toBe(0);
    expect(await pool.acquire()).not.toBe(channel);
  });

  it('replaces a channel for the same purpose', async () => {
    const { broker, pool } = await createPool(2);
    const channel = await pool.acquire('consume');
    const replacement = await pool.replace(channel);

    expect(replacement.id).not.toBe(channel.id);
    expect(replacement.purpose).toBe('consume');
    expect(channel.broken).toBe(true);
    expect(broker.connectionCount()).toBe(2);
  });

  it('fails a replacement while the broker is down', async () => {
    const { broker, pool } = await createPool(2);
    const channel = await pool.acquire('consume');
    broker.setAvailable(false);

    await expect(pool.replace(channel)).rejects.toBeInstanceOf(PoolError);
  });

  it('drains: waiters and later acquisitions fail', async () => {
    const { broker, pool } = await createPool(1);
    await pool.acquire();
    const waiting = expect(pool.acquire()).rejects.toThrow('Channel pool is drained');

    await pool.drain();

    await waiting;
    await expect(pool.acquire()).rejects.toBeInstanceOf(PoolError);
    expect(broker.connectionCount()).toBe(1);
  });
});
