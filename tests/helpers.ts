import pino from 'pino';
import type { Logger } from 'pino';
import type { RelayConfig } from '../src/infrastructure/config.js';
import { InMemoryStreamBroker } from '../src/infrastructure/memory/index.js';
import { createRelayRegister } from '../src/infrastructure/stream/index.js';
import type { CreateRelayRegisterOptions, StreamRelayRegister } from '../src/infrastructure/stream/index.js';

/** Logger that drops everything. */
export const silentLog: Logger = pino({ level: 'silent' });

/**
 * Config tuned for fast in-process tests: short blocking reads, tiny
 * backoffs, heartbeat and idle reclaim disabled.
 */
export function makeConfig(overrides: Partial<RelayConfig> = {}): RelayConfig {
  return {
    transport: 'memory',
    redis_url: 'redis://localhost:6379',
    stream: 'relay_events',
    group: 'relay_consumers',
    consumer: 'worker-1',
    dead_letter_stream: 'relay_events_dead_letter',
    dedup_prefix: 'relay:dedup',
    dedup_retention_ms: 60_000,
    max_stream_length: 0,
    max_attempts: 5,
    publish_timeout_ms: 500,
    publish_retry: { base_delay_ms: 10, max_delay_ms: 1_000, max_attempts: 4, jitter: 'none' },
    reconnect: { base_delay_ms: 5, max_delay_ms: 20, max_attempts: 0, jitter: 'full' },
    heartbeat_interval_ms: 0,
    connect_timeout_ms: 1_000,
    block_ms: 50,
    batch_size: 10,
    visibility_timeout_ms: 0,
    max_channels: 8,
    ...overrides,
  };
}

export interface Harness {
  broker: InMemoryStreamBroker;
  register: StreamRelayRegister;
  config: RelayConfig;
  /** Backoff delays the publisher asked for. */
  sleeps: number[];
}

const open: StreamRelayRegister[] = [];

/**
 * Connected register on a fresh in-memory broker. Publisher backoff
 * sleeps are recorded and skipped.
 */
export async function createHarness(
  overrides: Partial<RelayConfig> = {},
  options: CreateRelayRegisterOptions = {},
): Promise<Harness> {
  const broker = options.broker ?? new InMemoryStreamBroker();
  const config = makeConfig(overrides);
  const sleeps: number[] = [];
  const register = createRelayRegister(config, silentLog, {
    broker,
    sleep: async (ms) => {
      sleeps.push(ms);
    },
    ...options,
  });
  open.push(register);
  await register.connect();
  return { broker, register, config, sleeps };
}

/** Closes every register opened through `createHarness`. Use in `afterEach`. */
export async function closeAll(): Promise<void> {
  const registers = open.splice(0);
  await Promise.all(registers.map((register) => register.close()));
}

/** Polls `predicate` until it holds. */
export async function waitFor(predicate: () => boolean, timeoutMs = 2_000): Promise<void> {
  const deadline = Date.now() + timeoutMs;
  while (!predicate()) {
    if (Date.now() > deadline) {
      throw new Error(`Condition not met within ${timeoutMs}ms`);
    }
    await new Promise((resolve) => setTimeout(resolve, 5));
  }
}
