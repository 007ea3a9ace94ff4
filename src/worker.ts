import pino from 'pino';
import { ConsumeOutcome } from './domain/index.js';
import { createRelayRegister, loadRelayConfig } from './infrastructure/index.js';

/**
 * Standalone consumer process for the relay stream.
 *
 * Runs independently of the Fastify HTTP server. Several instances with
 * different WORKER_ID values share the consumer group; each event goes to
 * one of them.
 */
const log = pino({ level: process.env['LOG_LEVEL'] ?? 'info' });

async function main(): Promise<void> {
  const config = loadRelayConfig();
  const register = createRelayRegister(config, log);
  await register.connect();

  const subscription = register.readEvents((event) => {
    log.info(
      {
        event_id: event.id,
        source_tag: event.source_tag,
        attempt_count: event.attempt_count,
        bytes: event.payload.length,
      },
      'Event received',
    );
    return ConsumeOutcome.Ack;
  });

  subscription.onError((err) => {
    log.fatal({ err }, 'Subscription failed');
    register.close().then(
      () => process.exit(1),
      (closeErr: unknown) => {
        log.error({ err: closeErr }, 'Close after failure failed');
        process.exit(1);
      },
    );
  });

  // Graceful shutdown on SIGINT / SIGTERM
  const shutdown = (signal: string): void => {
    log.info({ signal }, 'Shutting down worker...');
    register.close().then(
      () => process.exit(0),
      (err: unknown) => {
        log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));
}

main().catch((err: unknown) => {
  log.fatal({ err }, 'Worker crashed');
  process.exit(1);
});
