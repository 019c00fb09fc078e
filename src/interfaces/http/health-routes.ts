import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import { StorageError } from '../../domain/index.js';

/**
 * Health check: verifies the event store answers a cheap query.
 * 503 when the store is unreachable.
 */
async function healthRoutes(fastify: FastifyInstance): Promise<void> {
  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      try {
        await fastify.eventLog.latestVersion('__health__', '__health__');
        return reply.status(200).send({ status: 'ok', store: 'ok' });
      } catch (err: unknown) {
        if (!(err instanceof StorageError)) throw err;
        fastify.log.error({ err }, 'Event store health check failed');
        return reply.status(503).send({ status: 'degraded', store: 'unreachable' });
      }
    },
  );
}

export default fp(healthRoutes, {
  name: 'health-routes',
  dependencies: ['event-log'],
  fastify: '5.x',
});
