import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { eventSchema, registerEvent, toEventInput } from '../../application/index.js';
import { InvalidEventError } from '../../domain/index.js';
import type { PublishErrorKind } from '../../domain/index.js';

const STATUS_BY_KIND: Record<PublishErrorKind, number> = {
  rejected: 422,
  unreachable: 503,
  timeout: 504,
};

/**
 * Registers the event relay routes.
 *
 * POST /api/v1/events         publish one event, answered after the broker confirm
 * GET  /api/v1/events/health  broker connection state
 */
async function eventRoutes(fastify: FastifyInstance): Promise<void> {

  /**
   * Single event publish.
   *
   * Validates → registers (waits for the confirm) → 201, or 200 when the
   * id was already enqueued.
   */
  fastify.post(
    '/api/v1/events',
    async (request: FastifyRequest<{ Body: unknown }>, reply: FastifyReply) => {
      const parsed = eventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const result = await registerEvent(fastify.relay, toEventInput(parsed.data));

      if (result.ok) {
        return reply.status(result.ack.duplicate ? 200 : 201).send(result.ack);
      }

      if (result.error instanceof InvalidEventError) {
        return reply.status(400).send({ error: 'Validation failed', message: result.error.message });
      }

      return reply.status(STATUS_BY_KIND[result.error.kind]).send({
        error: result.error.kind,
        message: result.error.message,
        attempts: result.error.attempts,
      });
    },
  );

  /** Reports the register's connection state. */
  fastify.get(
    '/api/v1/events/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const connection = fastify.relay.connectionState;
      if (connection === 'ready') {
        return reply.status(200).send({ status: 'ok', connection });
      }
      return reply.status(503).send({ status: 'degraded', connection });
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  dependencies: ['relay'],
  fastify: '5.x',
});
