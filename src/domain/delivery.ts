/** Decision a consumer callback returns for one delivered event. */
export const ConsumeOutcome = {
  Ack: 'ack',
  RetryLater: 'retry_later',
  Quarantine: 'quarantine',
} as const;

export type ConsumeOutcome = (typeof ConsumeOutcome)[keyof typeof ConsumeOutcome];

export type DeliveryState =
  | 'unacknowledged'
  | 'acknowledged'
  | 'rejected_requeue'
  | 'rejected_discard';

/** Why a delivery ended up in the dead-letter stream. */
export type QuarantineReason =
  | 'decode_error'
  | 'max_attempts_exceeded'
  | 'rejected_by_consumer';

const CONSUME_OUTCOMES: readonly string[] = Object.values(ConsumeOutcome);

export function isConsumeOutcome(value: unknown): value is ConsumeOutcome {
  return typeof value === 'string' && CONSUME_OUTCOMES.includes(value);
}

/**
 * One delivered message instance.
 *
 * A redelivery is a new `Delivery`; each instance settles exactly once.
 */
export class Delivery {
  private current: DeliveryState = 'unacknowledged';

  constructor(
    readonly entry_id: string,
    readonly attempt_count: number,
  ) {}

  get state(): DeliveryState {
    return this.current;
  }

  get settled(): boolean {
    return this.current !== 'unacknowledged';
  }

  settle(next: Exclude<DeliveryState, 'unacknowledged'>): void {
    if (this.settled) {
      throw new Error(`Delivery ${this.entry_id} already settled as ${this.current}`);
    }
    this.current = next;
  }
}
