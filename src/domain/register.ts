import type { EventInput, PublishAck, RelayEvent } from './event.js';
import type { ConsumeOutcome } from './delivery.js';
import type { SubscriptionError } from './errors.js';

export type EventCallback = (event: RelayEvent) => ConsumeOutcome | Promise<ConsumeOutcome>;

export type SubscriptionState = 'active' | 'cancelling' | 'cancelled' | 'failed';

export interface SubscriptionStats {
  delivered: number;
  acked: number;
  requeued: number;
  quarantined: number;
  recovered: number;
}

/**
 * A running `readEvents` consumer.
 *
 * `closed` resolves once the receive loop has exited, whether through
 * `cancel()`, register shutdown, or a terminal error.
 */
export interface Subscription {
  readonly id: string;
  readonly state: SubscriptionState;
  /** Set when `state` is `failed`. The caller must subscribe again. */
  readonly error: SubscriptionError | null;
  readonly closed: Promise<void>;
  stats(): SubscriptionStats;
  /** Registers a terminal-error listener. Returns an unsubscribe function. */
  onError(listener: (err: SubscriptionError) => void): () => void;
  cancel(): Promise<void>;
}

/**
 * The two-operation contract business code depends on.
 *
 * Implementations differ only in transport; callers receive one by
 * injection and never construct a concrete variant themselves.
 */
export interface EventRegister {
  /** Resolves once the broker has durably accepted the event. Rejects with `PublishError` or `InvalidEventError`. */
  registerEvent(input: EventInput): Promise<PublishAck>;
  readEvents(callback: EventCallback): Subscription;
  close(): Promise<void>;
}
