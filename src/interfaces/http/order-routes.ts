import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import {
  orderEventRequestSchema,
  getOrder,
  getOrderHistory,
  listOrders,
  recordOrderEvent,
} from '../../application/index.js';
import { ConflictError, InvalidEventError, SerializationError } from '../../domain/index.js';

export interface OrderRoutesOptions {
  log: Logger;
  /** Attempts for appends without `expected_version`. */
  maxAppendAttempts: number;
}

type OrderParams = { Params: { order_id: string } };

/**
 * Order API routes.
 *
 * GET  /api/v1/orders                  every order, projected
 * GET  /api/v1/orders/:order_id        one order's current state
 * GET  /api/v1/orders/:order_id/events raw event history
 * POST /api/v1/orders/:order_id/events record an event at the next version
 */
async function orderRoutes(fastify: FastifyInstance, opts: OrderRoutesOptions): Promise<void> {

  fastify.get(
    '/api/v1/orders',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      const data = await listOrders(fastify.eventLog, opts.log);
      return reply.status(200).send({ data });
    },
  );

  fastify.get(
    '/api/v1/orders/:order_id',
    async (request: FastifyRequest<OrderParams>, reply: FastifyReply) => {
      const order = await getOrder(fastify.eventLog, request.params.order_id, opts.log);

      if (order === null) {
        return reply.status(404).send({ error: 'Order not found' });
      }

      return reply.status(200).send(order);
    },
  );

  fastify.get(
    '/api/v1/orders/:order_id/events',
    async (request: FastifyRequest<OrderParams>, reply: FastifyReply) => {
      const data = await getOrderHistory(fastify.eventLog, request.params.order_id);
      return reply.status(200).send({ data });
    },
  );

  /**
   * Validates → computes the version (or uses expected_version + 1) → appends.
   *
   * 409 on a version conflict so the client can re-read and retry.
   * Storage failures fall through to Fastify's 500 handler.
   */
  fastify.post(
    '/api/v1/orders/:order_id/events',
    async (request: FastifyRequest<OrderParams>, reply: FastifyReply) => {
      const parsed = orderEventRequestSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const orderId = request.params.order_id;

      try {
        const event = await recordOrderEvent(fastify.eventLog, orderId, parsed.data, opts.log, {
          expectedVersion: parsed.data.expected_version,
          maxAttempts: opts.maxAppendAttempts,
        });
        return reply.status(201).send({ event });
      } catch (err: unknown) {
        if (err instanceof ConflictError) {
          return reply.status(409).send({
            error: err.message,
            reason: err.reason,
            entity_id: err.entity_id,
            version: err.version,
          });
        }
        if (err instanceof SerializationError || err instanceof InvalidEventError) {
          return reply.status(422).send({ error: err.message, issues: err.issues });
        }
        throw err;
      }
    },
  );
}

export default fp(orderRoutes, {
  name: 'order-routes',
  dependencies: ['event-log'],
  fastify: '5.x',
});
