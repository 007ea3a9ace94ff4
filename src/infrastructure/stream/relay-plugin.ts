import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { StreamRelayRegister } from './relay-register.js';

export interface RelayPluginOptions {
  register: StreamRelayRegister;
}

/**
 * Fastify plugin that manages the relay register lifecycle.
 *
 * - Connects and declares the topology on server start, closes on server close.
 * - Decorates `fastify.relay` for use by downstream plugins/routes.
 */
async function relayPlugin(fastify: FastifyInstance, options: RelayPluginOptions): Promise<void> {
  const { register } = options;

  await register.connect();
  fastify.log.info('Relay register connected');

  fastify.decorate('relay', register);

  fastify.addHook('onClose', async () => {
    await register.close();
    fastify.log.info('Relay register closed');
  });
}

export default fp(relayPlugin, {
  name: 'relay',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.relay` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    relay: StreamRelayRegister;
  }
}
