import { describe, it, expect, afterEach } from 'vitest';
import { buildEvent } from '../../src/infrastructure/stream/event-publisher.js';
import { decodeEnvelope, deriveEventId } from '../../src/infrastructure/stream/envelope-codec.js';
import { BrokerReplyError, InvalidEventError, PublishError, TransportError } from '../../src/domain/index.js';
import { closeAll, createHarness } from '../helpers.js';

afterEach(closeAll);

async function publishError(promise: Promise<unknown>): Promise<PublishError> {
  try {
    await promise;
  } catch (err: unknown) {
    if (err instanceof PublishError) return err;
    throw err;
  }
  throw new Error('Expected the publish to fail');
}

describe('buildEvent', () => {
  const now = () => new Date('2026-03-01T10:00:00.000Z');

  it('fills in id and created_at', () => {
    const event = buildEvent({ source_tag: '  billing ', payload: 'hello' }, now);
    expect(event).toEqual({
      id: deriveEventId('billing', Buffer.from('hello')),
      payload: Buffer.from('hello'),
      source_tag: 'billing',
      created_at: '2026-03-01T10:00:00.000Z',
      attempt_count: 0,
    });
  });

  it('rejects invalid input', () => {
    expect(() => buildEvent({ source_tag: 'billing', payload: '' }, now)).toThrow(InvalidEventError);
    expect(() => buildEvent({ source_tag: '   ', payload: 'x' }, now)).toThrow('Event source_tag must not be blank');
    expect(() => buildEvent({ id: ' ', source_tag: 'billing', payload: 'x' }, now)).toThrow(InvalidEventError);
    expect(() => buildEvent({ source_tag: 'billing', payload: 'x', created_at: 'yesterday' }, now)).toThrow(
      'Event created_at must be an ISO-8601 datetime with offset',
    );
  });

  it.each(['2026-03-01', '2026-03-01T10:00:00', 'March 1, 2026'])(
    'rejects created_at %s, which has no offset',
    (createdAt) => {
      expect(() => buildEvent({ source_tag: 'billing', payload: 'x', created_at: createdAt }, now)).toThrow(
        InvalidEventError,
      );
    },
  );

  it('keeps a created_at that carries an offset', () => {
    const event = buildEvent({ source_tag: 'billing', payload: 'x', created_at: '2026-03-01T10:00:00+02:00' }, now);
    expect(event.created_at).toBe('2026-03-01T10:00:00+02:00');
  });
});

describe('EventPublisher', () => {
  it('resolves with the broker confirm once the event is enqueued', async () => {
    const { broker, register, config } = await createHarness();

    const ack = await register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' });

    const entries = broker.entries(config.stream);
    expect(entries).toHaveLength(1);
    expect(ack).toEqual({
      event_id: 'evt-1',
      entry_id: entries[0]?.id,
      stream: 'relay_events',
      enqueued_at: new Date(Number(ack.entry_id.split('-')[0])).toISOString(),
      duplicate: false,
    });

    const decoded = decodeEnvelope(entries[0]?.fields ?? []);
    expect(decoded.ok && decoded.event.payload.toString('utf8')).toBe('hello');
  });

  it('enqueues an id once and reports repeats as duplicates', async () => {
    const { broker, register, config } = await createHarness();

    const first = await register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' });
    const second = await register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello again' });

    expect(second).toEqual({ ...first, duplicate: true });
    expect(broker.entries(config.stream)).toHaveLength(1);
  });

  it('deduplicates content-derived ids', async () => {
    const { broker, register, config } = await createHarness();

    const first = await register.registerEvent({ source_tag: 'billing', payload: 'same bytes' });
    const second = await register.registerEvent({ source_tag: 'billing', payload: Buffer.from('same bytes') });

    expect(first.event_id).toBe(deriveEventId('billing', Buffer.from('same bytes')));
    expect(second.duplicate).toBe(true);
    expect(broker.entries(config.stream)).toHaveLength(1);
  });

  it('shares one attempt between concurrent publishes of an id', async () => {
    const { broker, register, config } = await createHarness();

    const acks = await Promise.all([
      register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'a' }),
      register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'a' }),
    ]);

    expect(acks.map((ack) => ack.duplicate)).toEqual([false, true]);
    expect(broker.entries(config.stream)).toHaveLength(1);
  });

  it('retries transport failures with strictly increasing delays', async () => {
    const { broker, register, config, sleeps } = await createHarness();
    broker.failNextCommands(2, new TransportError('read ECONNRESET'));

    const ack = await register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' });

    expect(ack.duplicate).toBe(false);
    expect(sleeps).toEqual([10, 20]);
    expect(broker.entries(config.stream)).toHaveLength(1);
  });

  it('fails as unreachable once the retry budget is spent', async () => {
    const { broker, register, config, sleeps } = await createHarness();
    broker.failNextCommands(4, new TransportError('read ECONNRESET'));

    const err = await publishError(register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' }));

    expect(err.kind).toBe('unreachable');
    expect(err.attempts).toBe(4);
    expect(err.message).toBe('Broker unreachable after 4 attempt(s): read ECONNRESET');
    expect(sleeps).toEqual([10, 20, 40]);
    expect(broker.entries(config.stream)).toHaveLength(0);
  });

  it('does not retry an error reply', async () => {
    const { broker, register, sleeps } = await createHarness();
    broker.failNextCommands(1, new BrokerReplyError('OOM command not allowed'));

    const err = await publishError(register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' }));

    expect(err.kind).toBe('rejected');
    expect(err.attempts).toBe(1);
    expect(err.message).toBe('Broker rejected event: OOM command not allowed');
    expect(sleeps).toEqual([]);
  });

  it('rejects events for a stream that no longer exists', async () => {
    const { broker, register, config } = await createHarness();
    broker.deleteStream(config.stream);

    const err = await publishError(register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' }));

    expect(err.kind).toBe('rejected');
    expect(err.message).toBe('Stream relay_events does not exist');
    expect(broker.hasStream(config.stream)).toBe(false);
  });

  it('times out when the confirm does not arrive', async () => {
    const { broker, register, sleeps } = await createHarness({ publish_timeout_ms: 20 });
    broker.setLatency(100);

    const err = await publishError(register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' }));

    expect(err.kind).toBe('timeout');
    expect(err.message).toBe('Publish not confirmed within 20ms');
    expect(sleeps).toEqual([]);
    broker.setLatency(0);
  });

  it('refuses to publish after close', async () => {
    const { register } = await createHarness();
    await register.close();

    const err = await publishError(register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' }));
    expect(err.kind).toBe('unreachable');
    expect(err.message).toBe('Register is closed');
  });

  it('fails an in-flight publish as unreachable when the register closes', async () => {
    const { broker, register, config } = await createHarness();
    broker.setLatency(100);

    const failure = publishError(register.registerEvent({ id: 'evt-1', source_tag: 'billing', payload: 'hello' }));
    await new Promise((resolve) => setTimeout(resolve, 20));
    await register.close();

    const err = await failure;
    expect(err.kind).toBe('unreachable');
    expect(err.message).toBe('Register closed while publishing');
    expect(broker.entries(config.stream)).toHaveLength(0);
  });

  it('rejects invalid input without touching the broker', async () => {
    const { broker, register, config } = await createHarness();
    await expect(register.registerEvent({ source_tag: 'billing', payload: '' })).rejects.toBeInstanceOf(
      InvalidEventError,
    );
    await expect(
      register.registerEvent({ source_tag: 'billing', payload: 'x', created_at: '2026-03-01T10:00:00' }),
    ).rejects.toBeInstanceOf(InvalidEventError);
    expect(broker.entries(config.stream)).toHaveLength(0);
  });
});
