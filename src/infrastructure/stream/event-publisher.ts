import type { Logger } from 'pino';
import {
  InvalidEventError,
  PublishError,
  errorMessage,
  isTransportFailure,
} from '../../domain/index.js';
import type { EventInput, PublishAck, RelayEvent } from '../../domain/index.js';
import { abortableSleep, retryWithBackoff } from '../../application/retry-policy.js';
import type { BackoffPolicy } from '../../application/retry-policy.js';
import type { ConnectionManager } from './connection-manager.js';
import type { ChannelPool } from './channel-pool.js';
import { createdAtSchema, deriveEventId, encodeEnvelope } from './envelope-codec.js';
import { entryTimestamp } from './stream-client.js';

export interface PublisherOptions {
  stream: string;
  dedup_prefix: string;
  dedup_retention_ms: number;
  max_stream_length: number;
  publish_timeout_ms: number;
  retry: BackoffPolicy;
}

export interface PublisherDeps {
  connection: ConnectionManager;
  pool: ChannelPool;
  log: Logger;
  /** Overridable for tests; defaults to a timer-based sleep. */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

/** Marks a publish that ran out of time; never retried. */
class PublishTimeout extends Error {}

/**
 * Validates an input and turns it into the immutable event that gets
 * enqueued. Throws `InvalidEventError`.
 */
export function buildEvent(input: EventInput, now: () => Date = () => new Date()): RelayEvent {
  const payload = typeof input.payload === 'string' ? Buffer.from(input.payload, 'utf8') : Buffer.from(input.payload);
  if (payload.length === 0) {
    throw new InvalidEventError('Event payload must not be empty');
  }
  const sourceTag = input.source_tag.trim();
  if (sourceTag === '') {
    throw new InvalidEventError('Event source_tag must not be blank');
  }
  if (input.id !== undefined && input.id.trim() === '') {
    throw new InvalidEventError('Event id must not be blank when supplied');
  }
  if (input.created_at !== undefined && !createdAtSchema.safeParse(input.created_at).success) {
    throw new InvalidEventError('Event created_at must be an ISO-8601 datetime with offset');
  }

  return {
    id: input.id ?? deriveEventId(sourceTag, payload),
    payload,
    source_tag: sourceTag,
    created_at: input.created_at ?? now().toISOString(),
    attempt_count: 0,
  };
}

/**
 * Publish path of the register.
 *
 * A call resolves only after the broker has appended the event (the
 * append reply is the confirm). Transport failures are retried with the
 * publish backoff policy; error replies and timeouts surface at once.
 * The dedup record is written in the same atomic step as the append, so
 * a caller-side retry of the same id never enqueues twice.
 */
export class EventPublisher {
  private readonly inFlight = new Map<string, Promise<PublishAck>>();

  constructor(
    private readonly options: PublisherOptions,
    private readonly deps: PublisherDeps,
  ) {}

  async registerEvent(input: EventInput): Promise<PublishAck> {
    const event = buildEvent(input);

    // concurrent publishes of one id inside this process share a single attempt
    const pending = this.inFlight.get(event.id);
    if (pending) {
      const ack = await pending;
      return { ...ack, duplicate: true };
    }

    const attempt = this.publish(event);
    this.inFlight.set(event.id, attempt);
    try {
      return await attempt;
    } finally {
      this.inFlight.delete(event.id);
    }
  }

  private async publish(event: RelayEvent): Promise<PublishAck> {
    const { connection, log } = this.deps;
    const fields = encodeEnvelope(event);
    let attempts = 0;

    if (connection.isClosed) {
      throw new PublishError('unreachable', 'Register is closed', 0);
    }

    try {
      const ack = await retryWithBackoff(
        (attempt) => {
          attempts = attempt;
          if (connection.isClosed) {
            throw new PublishError('unreachable', 'Register is closed', attempt);
          }
          return this.publishOnce(event, fields);
        },
        {
          policy: this.options.retry,
          isRetryable: (err) => !(err instanceof PublishTimeout) && !(err instanceof PublishError) && isTransportFailure(err),
          onRetry: ({ attempt, delay_ms, err }) => {
            log.warn({ err, event_id: event.id, attempt, delay_ms }, 'Publish failed, retrying');
          },
          signal: connection.signal,
          sleep: this.deps.sleep ?? abortableSleep,
        },
      );

      log.debug(
        { event_id: event.id, entry_id: ack.entry_id, duplicate: ack.duplicate, attempts },
        ack.duplicate ? 'Duplicate event skipped' : 'Event registered',
      );
      return ack;
    } catch (err: unknown) {
      const failure = this.classify(err, attempts);
      log.error({ err, event_id: event.id, kind: failure.kind, attempts }, 'Failed to register event');
      throw failure;
    }
  }

  private async publishOnce(event: RelayEvent, fields: string[]): Promise<PublishAck> {
    const { pool } = this.deps;
    const channel = await pool.acquire('publish');

    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => {
        reject(new PublishTimeout(`Publish not confirmed within ${this.options.publish_timeout_ms}ms`));
      }, this.options.publish_timeout_ms);
    });

    try {
      const reply = await Promise.race([
        channel.client.publishOnce({
          stream: this.options.stream,
          dedup_key: `${this.options.dedup_prefix}:${event.id}`,
          retention_ms: this.options.dedup_retention_ms,
          max_length: this.options.max_stream_length,
          fields,
        }),
        timeout,
      ]);

      if (reply.status === 'unroutable') {
        throw new PublishError('rejected', `Stream ${this.options.stream} does not exist`, 1);
      }

      return {
        event_id: event.id,
        entry_id: reply.entry_id,
        stream: this.options.stream,
        enqueued_at: new Date(entryTimestamp(reply.entry_id)).toISOString(),
        duplicate: reply.status === 'duplicate',
      };
    } catch (err: unknown) {
      // the connection state is unknown after a timeout or a transport failure
      if (err instanceof PublishTimeout || isTransportFailure(err)) {
        channel.markBroken();
      }
      throw err;
    } finally {
      clearTimeout(timer);
      pool.release(channel);
    }
  }

  private classify(err: unknown, attempts: number): PublishError {
    if (err instanceof PublishError) {
      return new PublishError(err.kind, err.message, Math.max(err.attempts, attempts), { cause: err.cause });
    }
    if (err instanceof PublishTimeout) {
      return new PublishError('timeout', err.message, attempts, { cause: err });
    }
    if (this.deps.connection.isClosed) {
      return new PublishError('unreachable', 'Register closed while publishing', attempts, { cause: err });
    }
    if (isTransportFailure(err)) {
      return new PublishError(
        'unreachable',
        `Broker unreachable after ${attempts} attempt(s): ${errorMessage(err)}`,
        attempts,
        { cause: err },
      );
    }
    return new PublishError('rejected', `Broker rejected event: ${errorMessage(err)}`, attempts, { cause: err });
  }
}
