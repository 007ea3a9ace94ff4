import { z } from 'zod';
import { ConfigError } from '../domain/index.js';
import type { BackoffPolicy } from '../application/retry-policy.js';

export type TransportKind = 'redis' | 'memory';

/**
 * Everything the relay register needs, resolved once at construction.
 */
export interface RelayConfig {
  transport: TransportKind;
  redis_url: string;
  stream: string;
  group: string;
  consumer: string;
  dead_letter_stream: string;
  dedup_prefix: string;
  dedup_retention_ms: number;
  /** Approximate stream length cap. 0 = untrimmed. */
  max_stream_length: number;
  max_attempts: number;
  publish_timeout_ms: number;
  publish_retry: BackoffPolicy;
  reconnect: BackoffPolicy;
  heartbeat_interval_ms: number;
  connect_timeout_ms: number;
  block_ms: number;
  batch_size: number;
  visibility_timeout_ms: number;
  max_channels: number;
}

const int = (fallback: number, min = 0) => z.coerce.number().int().min(min).default(fallback);
const name = (fallback: string) => z.string().trim().min(1).default(fallback);

const envSchema = z
  .object({
    RELAY_TRANSPORT: z.enum(['redis', 'memory']).default('redis'),
    REDIS_URL: z.string().url().default('redis://localhost:6379'),
    RELAY_STREAM: name('relay_events'),
    RELAY_GROUP: name('relay_consumers'),
    WORKER_ID: name('worker-1'),
    RELAY_DEAD_LETTER_STREAM: name('relay_events_dead_letter'),
    RELAY_DEDUP_PREFIX: name('relay:dedup'),
    RELAY_DEDUP_RETENTION_MS: int(86_400_000, 1),
    RELAY_MAX_STREAM_LENGTH: int(0),
    RELAY_MAX_ATTEMPTS: int(5),
    RELAY_PUBLISH_TIMEOUT_MS: int(5_000, 1),
    RELAY_PUBLISH_RETRY_BASE_MS: int(100, 1),
    RELAY_PUBLISH_RETRY_MAX_MS: int(2_000, 1),
    RELAY_PUBLISH_RETRY_ATTEMPTS: int(5, 1),
    RELAY_RECONNECT_BASE_MS: int(200, 1),
    RELAY_RECONNECT_MAX_MS: int(10_000, 1),
    RELAY_RECONNECT_ATTEMPTS: int(0),
    RELAY_HEARTBEAT_INTERVAL_MS: int(10_000),
    RELAY_CONNECT_TIMEOUT_MS: int(10_000, 1),
    RELAY_BLOCK_MS: int(5_000, 1),
    RELAY_BATCH_SIZE: int(10, 1),
    RELAY_VISIBILITY_TIMEOUT_MS: int(60_000),
    RELAY_MAX_CHANNELS: int(8, 2),
  })
  .refine((env) => env.RELAY_DEAD_LETTER_STREAM !== env.RELAY_STREAM, {
    message: 'Dead-letter stream must differ from the relay stream',
    path: ['RELAY_DEAD_LETTER_STREAM'],
  });

/**
 * Reads the relay configuration from environment variables.
 *
 * Unset or empty variables take their defaults. Throws `ConfigError`
 * listing every invalid variable.
 */
export function loadRelayConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  // empty strings count as unset
  const present = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== ''),
  );
  const parsed = envSchema.safeParse(present);

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid relay configuration: ${issues.join('; ')}`, issues);
  }

  const e = parsed.data;
  return {
    transport: e.RELAY_TRANSPORT,
    redis_url: e.REDIS_URL,
    stream: e.RELAY_STREAM,
    group: e.RELAY_GROUP,
    consumer: e.WORKER_ID,
    dead_letter_stream: e.RELAY_DEAD_LETTER_STREAM,
    dedup_prefix: e.RELAY_DEDUP_PREFIX,
    dedup_retention_ms: e.RELAY_DEDUP_RETENTION_MS,
    max_stream_length: e.RELAY_MAX_STREAM_LENGTH,
    max_attempts: e.RELAY_MAX_ATTEMPTS,
    publish_timeout_ms: e.RELAY_PUBLISH_TIMEOUT_MS,
    publish_retry: {
      base_delay_ms: e.RELAY_PUBLISH_RETRY_BASE_MS,
      max_delay_ms: Math.max(e.RELAY_PUBLISH_RETRY_MAX_MS, e.RELAY_PUBLISH_RETRY_BASE_MS),
      max_attempts: e.RELAY_PUBLISH_RETRY_ATTEMPTS,
      jitter: 'none',
    },
    reconnect: {
      base_delay_ms: e.RELAY_RECONNECT_BASE_MS,
      max_delay_ms: Math.max(e.RELAY_RECONNECT_MAX_MS, e.RELAY_RECONNECT_BASE_MS),
      max_attempts: e.RELAY_RECONNECT_ATTEMPTS,
      jitter: 'full',
    },
    heartbeat_interval_ms: e.RELAY_HEARTBEAT_INTERVAL_MS,
    connect_timeout_ms: e.RELAY_CONNECT_TIMEOUT_MS,
    block_ms: e.RELAY_BLOCK_MS,
    batch_size: e.RELAY_BATCH_SIZE,
    visibility_timeout_ms: e.RELAY_VISIBILITY_TIMEOUT_MS,
    max_channels: e.RELAY_MAX_CHANNELS,
  };
}
