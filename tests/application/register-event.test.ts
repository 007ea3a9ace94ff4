import { describe, it, expect } from 'vitest';
import { registerEvent } from '../../src/application/register-event.js';
import { eventSchema, toEventInput } from '../../src/application/event-schema.js';
import { InvalidEventError, PublishError } from '../../src/domain/index.js';
import type { EventInput, EventRegister, PublishAck, Subscription } from '../../src/domain/index.js';

/** Register whose publish outcome is fixed by the test. */
class StubRegister implements EventRegister {
  readonly published: EventInput[] = [];

  constructor(private readonly outcome: () => PublishAck) {}

  async registerEvent(input: EventInput): Promise<PublishAck> {
    this.published.push(input);
    return this.outcome();
  }

  readEvents(): Subscription {
    throw new Error('not used');
  }

  async close(): Promise<void> {}
}

const ack: PublishAck = {
  event_id: 'evt-1',
  entry_id: '1700000000000-0',
  stream: 'relay_events',
  enqueued_at: '2023-11-14T22:13:20.000Z',
  duplicate: false,
};

describe('registerEvent', () => {
  it('wraps the confirm', async () => {
    const register = new StubRegister(() => ack);
    expect(await registerEvent(register, { source_tag: 'billing', payload: 'x' })).toEqual({ ok: true, ack });
  });

  it('returns publish failures as results', async () => {
    const failure = new PublishError('unreachable', 'Broker unreachable', 5);
    const register = new StubRegister(() => {
      throw failure;
    });
    expect(await registerEvent(register, { source_tag: 'billing', payload: 'x' })).toEqual({ ok: false, error: failure });
  });

  it('returns invalid input as a result', async () => {
    const failure = new InvalidEventError('Event payload must not be empty');
    const register = new StubRegister(() => {
      throw failure;
    });
    expect(await registerEvent(register, { source_tag: 'billing', payload: '' })).toEqual({ ok: false, error: failure });
  });

  it('rethrows anything unexpected', async () => {
    const register = new StubRegister(() => {
      throw new TypeError('bug');
    });
    await expect(registerEvent(register, { source_tag: 'billing', payload: 'x' })).rejects.toThrow(TypeError);
  });
});

describe('eventSchema', () => {
  it('defaults to utf8 payloads', () => {
    const parsed = eventSchema.parse({ source_tag: 'billing', payload: 'hello' });
    expect(parsed.encoding).toBe('utf8');
    expect(toEventInput(parsed).payload).toBe('hello');
  });

  it('decodes base64 payloads', () => {
    const parsed = eventSchema.parse({ source_tag: 'billing', payload: 'aGVsbG8=', encoding: 'base64' });
    const payload = toEventInput(parsed).payload;
    expect(Buffer.isBuffer(payload) && payload.toString('utf8')).toBe('hello');
  });

  it('rejects bad input', () => {
    expect(eventSchema.safeParse({ source_tag: '', payload: 'x' }).success).toBe(false);
    expect(eventSchema.safeParse({ source_tag: 'billing', payload: '' }).success).toBe(false);
    expect(eventSchema.safeParse({ source_tag: 'billing', payload: 'a!', encoding: 'base64' }).success).toBe(false);
    expect(eventSchema.safeParse({ source_tag: 'billing', payload: 'x', created_at: 'noon' }).success).toBe(false);
  });
});
