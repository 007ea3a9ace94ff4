/**
 * Error taxonomy of the relay register.
 *
 * Every error raised by the register extends `RelayError` and carries a
 * stable `code` so callers can branch without string matching.
 */

export type RelayErrorCode =
  | 'CONNECTION_ERROR'
  | 'POOL_ERROR'
  | 'PUBLISH_ERROR'
  | 'DECODE_ERROR'
  | 'INVALID_EVENT'
  | 'SUBSCRIPTION_ERROR'
  | 'TRANSPORT_ERROR'
  | 'BROKER_REPLY_ERROR'
  | 'CONFIG_ERROR';

export class RelayError extends Error {
  constructor(
    readonly code: RelayErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Connecting failed, the connection was closed, or the reconnect budget ran out. */
export class ConnectionError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('CONNECTION_ERROR', message, options);
  }
}

export class PoolError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('POOL_ERROR', message, options);
  }
}

export type PublishErrorKind = 'unreachable' | 'rejected' | 'timeout';

export class PublishError extends RelayError {
  constructor(
    readonly kind: PublishErrorKind,
    message: string,
    readonly attempts: number,
    options?: { cause?: unknown },
  ) {
    super('PUBLISH_ERROR', message, options);
  }
}

/** Envelope could not be decoded. Poison, never a transport failure. */
export class DecodeError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('DECODE_ERROR', message, options);
  }
}

export class InvalidEventError extends RelayError {
  constructor(message: string) {
    super('INVALID_EVENT', message);
  }
}

export class SubscriptionError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SUBSCRIPTION_ERROR', message, options);
  }
}

/** The client could not talk to the broker (closed socket, not writable, ...). */
export class TransportError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('TRANSPORT_ERROR', message, options);
  }
}

/** The broker answered with an error reply (OOM, WRONGTYPE, NOGROUP, ...). */
export class BrokerReplyError extends RelayError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('BROKER_REPLY_ERROR', message, options);
  }
}

export class ConfigError extends RelayError {
  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super('CONFIG_ERROR', message);
  }
}

/**
 * True when `err` means the broker could not be reached.
 *
 * Error replies are rejections: the broker was reachable and said no.
 * ioredis surfaces those as `ReplyError` from redis-errors.
 */
export function isTransportFailure(err: unknown): boolean {
  if (err instanceof BrokerReplyError) return false;
  if (err instanceof TransportError || err instanceof PoolError || err instanceof ConnectionError) {
    return true;
  }
  if (err instanceof RelayError) return false;
  if (err instanceof Error && err.name === 'ReplyError') return false;
  return true;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
