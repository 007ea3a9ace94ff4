import Fastify from 'fastify';
import pino from 'pino';

import { createRelayRegister, loadRelayConfig, relayPlugin } from './infrastructure/index.js';
import { eventRoutes } from './interfaces/http/index.js';

/**
 * Bootstrap Fastify server.
 *
 * Order:
 * 1) Configuration
 * 2) Relay register plugin
 * 3) HTTP routes
 * 4) Shutdown signals
 * 5) listen()
 */
async function main(): Promise<void> {
  const level = process.env['LOG_LEVEL'] ?? 'info';
  const config = loadRelayConfig();

  const fastify = Fastify({
    logger: { level },
  });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  const register = createRelayRegister(config, pino({ level }));
  await fastify.register(relayPlugin, { register });

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(eventRoutes);

  // --------------------------------------------------
  // Start Server
  // --------------------------------------------------

  const shutdown = (signal: string): void => {
    fastify.log.info({ signal }, 'Shutting down server');
    fastify.close().then(
      () => process.exit(0),
      (err: unknown) => {
        fastify.log.error({ err }, 'Shutdown failed');
        process.exit(1);
      },
    );
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  const host = process.env['HOST'] ?? '0.0.0.0';
  const port = Number(process.env['PORT'] ?? 3000);

  await fastify.listen({ host, port });
}

main().catch((err: unknown) => {
  console.error('Fatal: failed to start server', err);
  process.exit(1);
});
