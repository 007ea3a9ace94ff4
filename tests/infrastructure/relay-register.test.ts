import { describe, it, expect, afterEach } from 'vitest';
import { InMemoryStreamBroker } from '../../src/infrastructure/memory/index.js';
import { createRelayRegister } from '../../src/infrastructure/stream/relay-register.js';
import { ConnectionError, ConsumeOutcome } from '../../src/domain/index.js';
import { closeAll, createHarness, makeConfig, silentLog, waitFor } from '../helpers.js';

afterEach(closeAll);

describe('StreamRelayRegister', () => {
  it('declares the stream and group on connect', async () => {
    const { broker, register, config } = await createHarness();
    expect(register.connectionState).toBe('ready');
    expect(broker.hasStream(config.stream)).toBe(true);
    expect(broker.pendingCount(config.stream, config.group)).toBe(0);
  });

  it('keeps the group position when another register connects', async () => {
    const broker = new InMemoryStreamBroker();
    const first = await createHarness({}, { broker });
    await first.register.registerEvent({ id: 'a', source_tag: 'orders', payload: 'x' });
    const drained = first.register.readEvents(() => ConsumeOutcome.Ack);
    await waitFor(() => drained.stats().acked === 1);
    await drained.cancel();

    const second = await createHarness({ consumer: 'worker-2' }, { broker });
    const seen: string[] = [];
    const subscription = second.register.readEvents((event) => {
      seen.push(event.id);
      return ConsumeOutcome.Ack;
    });
    await second.register.registerEvent({ id: 'b', source_tag: 'orders', payload: 'y' });

    await waitFor(() => subscription.stats().acked === 1);
    expect(seen).toEqual(['b']);
  });

  it('fails to connect while the broker is down', async () => {
    const broker = new InMemoryStreamBroker();
    broker.setAvailable(false);
    const register = createRelayRegister(makeConfig(), silentLog, { broker });

    await expect(register.connect()).rejects.toBeInstanceOf(ConnectionError);
    expect(register.connectionState).toBe('failed');
    await register.close();
  });

  it('closes once and releases every connection', async () => {
    const { broker, register } = await createHarness();
    await register.registerEvent({ id: 'a', source_tag: 'orders', payload: 'x' });
    register.readEvents(() => ConsumeOutcome.Ack);

    await register.close();
    await register.close();

    expect(register.connectionState).toBe('closed');
    expect(broker.connectionCount()).toBe(0);
  });

  it('shares one broker between publishing and consuming registers', async () => {
    const broker = new InMemoryStreamBroker();
    const producer = await createHarness({ consumer: 'producer' }, { broker });
    const consumer = await createHarness({ consumer: 'consumer' }, { broker });

    const seen: string[] = [];
    const subscription = consumer.register.readEvents((event) => {
      seen.push(event.payload.toString('utf8'));
      return ConsumeOutcome.Ack;
    });
    await producer.register.registerEvent({ source_tag: 'orders', payload: 'across registers' });

    await waitFor(() => subscription.stats().acked === 1);
    expect(seen).toEqual(['across registers']);
  });
});
