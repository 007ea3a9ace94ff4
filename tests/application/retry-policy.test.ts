import { describe, it, expect } from 'vitest';
import {
  abortableSleep,
  backoffCeiling,
  backoffDelay,
  hasAttemptsLeft,
  retryWithBackoff,
} from '../../src/application/retry-policy.js';
import type { BackoffPolicy } from '../../src/application/retry-policy.js';
import { BrokerReplyError, TransportError, isTransportFailure } from '../../src/domain/index.js';

const policy: BackoffPolicy = { base_delay_ms: 100, max_delay_ms: 2_000, max_attempts: 3, jitter: 'none' };

describe('backoff', () => {
  it('doubles the ceiling per attempt up to the cap', () => {
    expect([1, 2, 3, 4, 5, 6].map((n) => backoffCeiling(policy, n))).toEqual([100, 200, 400, 800, 1600, 2000]);
  });

  it('uses the ceiling without jitter', () => {
    expect(backoffDelay(policy, 3)).toBe(400);
  });

  it('draws uniformly below the ceiling with full jitter', () => {
    const jittered: BackoffPolicy = { ...policy, jitter: 'full' };
    expect(backoffDelay(jittered, 3, () => 0.5)).toBe(200);
    expect(backoffDelay(jittered, 3, () => 0)).toBe(0);
  });

  it('never overflows for large attempt numbers', () => {
    expect(backoffCeiling(policy, 10_000)).toBe(2_000);
  });

  it('treats max_attempts 0 as unbounded', () => {
    expect(hasAttemptsLeft({ ...policy, max_attempts: 0 }, 1_000)).toBe(true);
    expect(hasAttemptsLeft(policy, 2)).toBe(true);
    expect(hasAttemptsLeft(policy, 3)).toBe(false);
  });
});

describe('retryWithBackoff', () => {
  it('retries retryable failures with increasing delays', async () => {
    const delays: number[] = [];
    let calls = 0;

    const result = await retryWithBackoff(
      async (attempt) => {
        calls++;
        if (attempt < 3) throw new TransportError('ECONNRESET');
        return 'done';
      },
      {
        policy,
        isRetryable: isTransportFailure,
        sleep: async (ms) => {
          delays.push(ms);
        },
      },
    );

    expect(result).toBe('done');
    expect(calls).toBe(3);
    expect(delays).toEqual([100, 200]);
  });

  it('rethrows a non-retryable failure at once', async () => {
    const rejection = new BrokerReplyError('WRONGTYPE Operation against a key holding the wrong kind of value');
    let calls = 0;

    await expect(
      retryWithBackoff(
        async () => {
          calls++;
          throw rejection;
        },
        { policy, isRetryable: isTransportFailure, sleep: async () => {} },
      ),
    ).rejects.toBe(rejection);
    expect(calls).toBe(1);
  });

  it('rethrows the last failure once the budget is spent', async () => {
    const errors = [new TransportError('first'), new TransportError('second'), new TransportError('third')];
    const delays: number[] = [];

    await expect(
      retryWithBackoff(
        async (attempt) => {
          throw errors[attempt - 1];
        },
        {
          policy,
          isRetryable: () => true,
          sleep: async (ms) => {
            delays.push(ms);
          },
        },
      ),
    ).rejects.toBe(errors[2]);
    expect(delays).toEqual([100, 200]);
  });

  it('reports each retry', async () => {
    const retries: number[] = [];
    await retryWithBackoff(
      async (attempt) => {
        if (attempt === 1) throw new TransportError('blip');
        return attempt;
      },
      {
        policy,
        isRetryable: () => true,
        onRetry: ({ attempt, delay_ms }) => retries.push(attempt, delay_ms),
        sleep: async () => {},
      },
    );
    expect(retries).toEqual([1, 100]);
  });
});

describe('abortableSleep', () => {
  it('rejects with the abort reason', async () => {
    const controller = new AbortController();
    const reason = new Error('stopped');
    const sleeping = abortableSleep(10_000, controller.signal);
    controller.abort(reason);
    await expect(sleeping).rejects.toBe(reason);
  });

  it('rejects at once when already aborted', async () => {
    const controller = new AbortController();
    controller.abort(new Error('gone'));
    await expect(abortableSleep(10, controller.signal)).rejects.toThrow('gone');
  });
});
