import { randomUUID } from 'node:crypto';
import type { Logger } from 'pino';
import {
  BrokerReplyError,
  ConsumeOutcome,
  Delivery,
  SubscriptionError,
  errorMessage,
  isConsumeOutcome,
} from '../../domain/index.js';
import type {
  EventCallback,
  QuarantineReason,
  RelayEvent,
  Subscription,
  SubscriptionState,
  SubscriptionStats,
} from '../../domain/index.js';
import type { ConnectionManager } from './connection-manager.js';
import type { Channel, ChannelPool } from './channel-pool.js';
import { decodeEnvelope, encodeEnvelope, toDeadLetterFields, withAttempt } from './envelope-codec.js';
import type { StreamEntry } from './stream-client.js';

export interface ReaderOptions {
  stream: string;
  group: string;
  consumer: string;
  dead_letter_stream: string;
  max_stream_length: number;
  /** Highest attempt_count a delivery may carry before it is quarantined. */
  max_attempts: number;
  block_ms: number;
  batch_size: number;
  visibility_timeout_ms: number;
}

export interface ReaderDeps {
  connection: ConnectionManager;
  pool: ChannelPool;
  log: Logger;
}

// Pause after a channel replacement before reading again
const LOOP_ERROR_PAUSE_MS = 100;

/**
 * Consume path of the register: at most one active subscription per
 * reader instance.
 */
export class EventReader {
  private active: StreamSubscription | null = null;
  private readonly subscriptions = new Set<StreamSubscription>();

  constructor(
    private readonly options: ReaderOptions,
    private readonly deps: ReaderDeps,
  ) {}

  readEvents(callback: EventCallback): Subscription {
    if (this.active && this.active.state === 'active') {
      throw new SubscriptionError('Reader already has an active subscription');
    }
    if (this.deps.connection.isClosed) {
      throw new SubscriptionError('Register is closed');
    }

    const subscription = new StreamSubscription(this.options, this.deps, callback);
    this.active = subscription;
    this.subscriptions.add(subscription);
    void subscription.closed.then(() => {
      this.subscriptions.delete(subscription);
      if (this.active === subscription) this.active = null;
    });
    subscription.start();
    return subscription;
  }

  /** Cancels every running subscription. */
  async cancelAll(): Promise<void> {
    await Promise.all([...this.subscriptions].map((subscription) => subscription.cancel()));
  }
}

/**
 * One `readEvents` consumer loop.
 *
 * Entries are handled strictly one after another, so a single
 * subscription on a single stream sees broker order. An entry is
 * acknowledged only after the callback returned; if the process dies
 * mid-callback the entry stays pending and is redelivered once its idle
 * time passes the visibility timeout.
 */
export class StreamSubscription implements Subscription {
  readonly id = randomUUID();
  readonly closed: Promise<void>;

  private current: SubscriptionState = 'active';
  private failure: SubscriptionError | null = null;
  private channel: Channel | null = null;
  private reading = false;
  private started = false;
  private readonly abort = new AbortController();
  private readonly errorListeners = new Set<(err: SubscriptionError) => void>();
  private readonly counters: SubscriptionStats = {
    delivered: 0,
    acked: 0,
    requeued: 0,
    quarantined: 0,
    recovered: 0,
  };
  private resolveClosed: () => void = () => {};
  private readonly unsubscribeConnection: () => void;

  constructor(
    private readonly options: ReaderOptions,
    private readonly deps: ReaderDeps,
    private readonly callback: EventCallback,
  ) {
    this.closed = new Promise((resolve) => {
      this.resolveClosed = resolve;
    });
    this.unsubscribeConnection = deps.connection.onStateChange((next) => {
      if (next === 'closed') void this.cancel();
    });
  }

  get state(): SubscriptionState {
    return this.current;
  }

  get error(): SubscriptionError | null {
    return this.failure;
  }

  stats(): SubscriptionStats {
    return { ...this.counters };
  }

  onError(listener: (err: SubscriptionError) => void): () => void {
    this.errorListeners.add(listener);
    return () => {
      this.errorListeners.delete(listener);
    };
  }

  start(): void {
    if (this.started) return;
    this.started = true;
    void this.run()
      .catch((err: unknown) => this.fail(err))
      .finally(() => this.finish());
  }

  /**
   * Stops taking deliveries, lets the in-flight callback finish and
   * releases the channel. Calling it again is a no-op.
   */
  async cancel(): Promise<void> {
    if (this.current === 'active') {
      this.current = 'cancelling';
      this.abort.abort(new SubscriptionError('Subscription cancelled'));
      // a blocking read holds the channel until its timeout; cut it short
      if (this.reading && this.channel) {
        const channel = this.channel;
        this.channel = null;
        await this.deps.pool.discard(channel);
      }
      if (!this.started) this.finish();
    }
    await this.closed;
  }

  // ---------------------------------------------------------------
  // Loop
  // ---------------------------------------------------------------

  private async run(): Promise<void> {
    const { log } = this.deps;
    this.channel = await this.deps.pool.acquire('consume');
    log.info(
      { subscription: this.id, stream: this.options.stream, group: this.options.group, consumer: this.options.consumer },
      'Subscription started',
    );

    let recovered = false;
    while (!this.stopped) {
      try {
        if (!recovered) {
          await this.recoverPending();
          recovered = true;
        }
        await this.reclaimIdle();
        const entries = await this.read();
        for (const entry of entries) {
          if (this.stopped) break;
          await this.handle(entry, false);
        }
      } catch (err: unknown) {
        if (this.stopped) break;
        await this.recover(err);
        // entries delivered before the failure may still be pending for us
        recovered = false;
      }
    }
  }

  private get stopped(): boolean {
    return this.abort.signal.aborted;
  }

  private requireChannel(): Channel {
    if (!this.channel) throw new SubscriptionError('Subscription has no channel');
    return this.channel;
  }

  private async read(): Promise<StreamEntry[]> {
    const channel = this.requireChannel();
    this.reading = true;
    try {
      return await channel.client.readGroup({
        stream: this.options.stream,
        group: this.options.group,
        consumer: this.options.consumer,
        count: this.options.batch_size,
        cursor: '>',
        block_ms: this.options.block_ms,
      });
    } finally {
      this.reading = false;
    }
  }

  /** Entries this consumer received before a crash or restart and never acknowledged. */
  private async recoverPending(): Promise<void> {
    let count = 0;
    for (;;) {
      const entries = await this.requireChannel().client.readGroup({
        stream: this.options.stream,
        group: this.options.group,
        consumer: this.options.consumer,
        count: this.options.batch_size,
        cursor: '0',
      });
      for (const entry of entries) {
        if (this.stopped) return;
        await this.handle(entry, true);
        count++;
      }
      // every handled entry left the pending list, so the next read starts fresh
      if (entries.length < this.options.batch_size) break;
    }
    if (count > 0) {
      this.counters.recovered += count;
      this.deps.log.info({ subscription: this.id, count }, 'Recovered pending entries');
    }
  }

  /** Entries left pending by any consumer for longer than the visibility timeout. */
  private async reclaimIdle(): Promise<void> {
    if (this.options.visibility_timeout_ms <= 0) return;
    const channel = this.requireChannel();
    const entries = await channel.client.claimIdle({
      stream: this.options.stream,
      group: this.options.group,
      consumer: this.options.consumer,
      min_idle_ms: this.options.visibility_timeout_ms,
      count: this.options.batch_size,
    });

    for (const entry of entries) {
      if (this.stopped) return;
      await this.handle(entry, true);
    }
    if (entries.length > 0) {
      this.counters.recovered += entries.length;
      this.deps.log.info({ subscription: this.id, count: entries.length }, 'Reclaimed idle entries');
    }
  }

  /**
   * Keeps the subscription alive across channel failures: waits for the
   * connection, then swaps in a fresh channel. A failed replacement is
   * terminal.
   */
  private async recover(err: unknown): Promise<void> {
    const { log, pool, connection } = this.deps;

    // stream or group deleted underneath us: recreate and carry on
    if (err instanceof BrokerReplyError && err.message.includes('NOGROUP') && this.channel) {
      log.warn({ err, subscription: this.id }, 'Consumer group missing, recreating');
      await this.channel.client.ensureGroup(this.options.stream, this.options.group, '0');
      return;
    }

    log.warn({ err, subscription: this.id }, 'Consume loop error, replacing channel');

    if (connection.state !== 'ready') {
      try {
        await connection.waitUntilReady(this.abort.signal);
      } catch (waitErr: unknown) {
        if (this.stopped) return;
        throw new SubscriptionError(`Connection lost: ${errorMessage(waitErr)}`, { cause: waitErr });
      }
    }

    const broken = this.channel;
    this.channel = null;
    if (!broken) {
      this.channel = await pool.acquire('consume');
      return;
    }
    try {
      this.channel = await pool.replace(broken);
    } catch (replaceErr: unknown) {
      throw new SubscriptionError(`Channel replacement failed: ${errorMessage(replaceErr)}`, { cause: replaceErr });
    }
    await this.pause(LOOP_ERROR_PAUSE_MS);
  }

  /** Like a sleep, but resolves early on cancellation. */
  private pause(ms: number): Promise<void> {
    const signal = this.abort.signal;
    return new Promise((resolve) => {
      const done = (): void => {
        clearTimeout(timer);
        signal.removeEventListener('abort', done);
        resolve();
      };
      const timer = setTimeout(done, ms);
      signal.addEventListener('abort', done, { once: true });
    });
  }

  // ---------------------------------------------------------------
  // Delivery handling
  // ---------------------------------------------------------------

  /** Delivered → Processing → Ack | RetryLater | Quarantine. */
  private async handle(entry: StreamEntry, redelivered: boolean): Promise<void> {
    const { log } = this.deps;
    const channel = this.requireChannel();

    if (entry.fields.length === 0) {
      // trimmed from the stream while pending: nothing left to deliver
      await channel.client.ack(this.options.stream, this.options.group, [entry.id]);
      return;
    }

    this.counters.delivered++;
    const decoded = decodeEnvelope(entry.fields);
    if (!decoded.ok) {
      const delivery = new Delivery(entry.id, 0);
      log.warn({ err: decoded.error, entry_id: entry.id }, 'Undecodable entry');
      await this.quarantine(delivery, entry.fields, 'decode_error', decoded.error.message);
      return;
    }

    let event = decoded.event;
    if (redelivered) {
      const deliveries = await channel.client.deliveryCount(this.options.stream, this.options.group, entry.id);
      event = withAttempt(event, event.attempt_count + Math.max(0, deliveries - 1));
    }
    const delivery = new Delivery(entry.id, event.attempt_count);

    if (event.attempt_count > this.options.max_attempts) {
      await this.quarantine(delivery, entry.fields, 'max_attempts_exceeded', `attempt_count=${event.attempt_count}`);
      return;
    }

    const outcome = await this.invoke(event);
    switch (outcome) {
      case ConsumeOutcome.Ack:
        await channel.client.ack(this.options.stream, this.options.group, [entry.id]);
        delivery.settle('acknowledged');
        this.counters.acked++;
        log.debug({ event_id: event.id, entry_id: entry.id, attempt_count: event.attempt_count }, 'Event acknowledged');
        return;

      case ConsumeOutcome.RetryLater:
        if (event.attempt_count + 1 > this.options.max_attempts) {
          await this.quarantine(delivery, entry.fields, 'max_attempts_exceeded', `attempt_count=${event.attempt_count + 1}`);
          return;
        }
        await this.requeue(delivery, event, decoded.content_type);
        return;

      case ConsumeOutcome.Quarantine:
        await this.quarantine(delivery, entry.fields, 'rejected_by_consumer');
        return;
    }
  }

  private async invoke(event: RelayEvent): Promise<ConsumeOutcome> {
    try {
      const outcome: unknown = await this.callback(event);
      if (isConsumeOutcome(outcome)) return outcome;
      this.deps.log.warn({ event_id: event.id, outcome }, 'Callback returned an unknown outcome, retrying later');
    } catch (err: unknown) {
      this.deps.log.error({ err, event_id: event.id, attempt_count: event.attempt_count }, 'Callback failed, retrying later');
    }
    return ConsumeOutcome.RetryLater;
  }

  /** Negative-acknowledge with requeue: re-append with the next attempt count. */
  private async requeue(delivery: Delivery, event: RelayEvent, contentType: string): Promise<void> {
    const channel = this.requireChannel();
    const next = withAttempt(event, event.attempt_count + 1);
    const entryId = await channel.client.moveEntry({
      from_stream: this.options.stream,
      group: this.options.group,
      entry_id: delivery.entry_id,
      to_stream: this.options.stream,
      fields: encodeEnvelope(next, contentType),
      max_length: this.options.max_stream_length,
    });
    delivery.settle('rejected_requeue');
    this.counters.requeued++;
    this.deps.log.debug(
      { event_id: event.id, entry_id: delivery.entry_id, requeued_as: entryId, attempt_count: next.attempt_count },
      'Event requeued',
    );
  }

  /** Dead-letter the entry and acknowledge the original so it is not redelivered. */
  private async quarantine(
    delivery: Delivery,
    fields: string[],
    reason: QuarantineReason,
    detail?: string,
  ): Promise<void> {
    const channel = this.requireChannel();
    const deadLetterId = await channel.client.moveEntry({
      from_stream: this.options.stream,
      group: this.options.group,
      entry_id: delivery.entry_id,
      to_stream: this.options.dead_letter_stream,
      fields: toDeadLetterFields(fields, {
        reason,
        detail,
        original_stream: this.options.stream,
        original_entry_id: delivery.entry_id,
      }),
      max_length: 0,
    });
    delivery.settle('rejected_discard');
    this.counters.quarantined++;
    this.deps.log.warn(
      { entry_id: delivery.entry_id, dead_letter_id: deadLetterId, reason, attempt_count: delivery.attempt_count },
      'Event quarantined',
    );
  }

  // ---------------------------------------------------------------
  // Termination
  // ---------------------------------------------------------------

  private fail(err: unknown): void {
    // failures after cancel() are the channel being cut, not errors
    if (this.current !== 'active') return;
    const failure = err instanceof SubscriptionError
      ? err
      : new SubscriptionError(`Subscription failed: ${errorMessage(err)}`, { cause: err });

    this.current = 'failed';
    this.failure = failure;
    this.abort.abort(failure);
    this.deps.log.error({ err: failure, subscription: this.id }, 'Subscription failed');
    for (const listener of [...this.errorListeners]) {
      try {
        listener(failure);
      } catch (listenerErr: unknown) {
        this.deps.log.error({ err: listenerErr }, 'Subscription error listener threw');
      }
    }
  }

  private finish(): void {
    this.unsubscribeConnection();
    if (this.current !== 'failed') this.current = 'cancelled';

    const channel = this.channel;
    this.channel = null;
    const release = channel ? this.deps.pool.discard(channel) : Promise.resolve();
    void release.then(() => {
      this.deps.log.info({ subscription: this.id, state: this.current, ...this.counters }, 'Subscription closed');
      this.resolveClosed();
    });
  }
}
