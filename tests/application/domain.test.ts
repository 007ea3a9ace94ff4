import { describe, it, expect } from 'vitest';
import {
  BrokerReplyError,
  ConnectionError,
  ConsumeOutcome,
  DecodeError,
  Delivery,
  PublishError,
  TransportError,
  isConsumeOutcome,
  isTransportFailure,
} from '../../src/domain/index.js';

describe('Delivery', () => {
  it('settles exactly once', () => {
    const delivery = new Delivery('1-0', 0);
    expect(delivery.state).toBe('unacknowledged');
    delivery.settle('acknowledged');
    expect(delivery.settled).toBe(true);
    expect(() => delivery.settle('rejected_requeue')).toThrow('Delivery 1-0 already settled as acknowledged');
  });
});

describe('isConsumeOutcome', () => {
  it('accepts the three outcomes only', () => {
    expect(Object.values(ConsumeOutcome).every(isConsumeOutcome)).toBe(true);
    expect(isConsumeOutcome('ACK')).toBe(false);
    expect(isConsumeOutcome(undefined)).toBe(false);
  });
});

describe('isTransportFailure', () => {
  it('separates unreachable brokers from rejections', () => {
    expect(isTransportFailure(new TransportError('Connection is closed.'))).toBe(true);
    expect(isTransportFailure(new ConnectionError('Connection is failed'))).toBe(true);
    expect(isTransportFailure(new Error('read ECONNRESET'))).toBe(true);
    expect(isTransportFailure(new BrokerReplyError('OOM command not allowed'))).toBe(false);
    expect(isTransportFailure(new DecodeError('Malformed envelope'))).toBe(false);
    expect(isTransportFailure(new PublishError('timeout', 'late', 1))).toBe(false);
  });

  it('treats a redis ReplyError as a rejection', () => {
    const reply = new Error('NOSCRIPT No matching script');
    reply.name = 'ReplyError';
    expect(isTransportFailure(reply)).toBe(false);
  });

  it('names errors after their class', () => {
    const err = new PublishError('unreachable', 'down', 3);
    expect(err.name).toBe('PublishError');
    expect(err.code).toBe('PUBLISH_ERROR');
    expect(err.attempts).toBe(3);
  });
});
