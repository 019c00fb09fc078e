import Fastify from 'fastify';
import type { FastifyBaseLogger, FastifyInstance, RawReplyDefaultExpression, RawRequestDefaultExpression, RawServerDefault } from 'fastify';
import type { Logger } from 'pino';
import type { AppConfig } from './infrastructure/config.js';
import { dbPlugin } from './infrastructure/db/index.js';
import { memoryPlugin } from './infrastructure/memory/index.js';
import type { InMemoryEventStore } from './infrastructure/memory/index.js';
import { orderRoutes, healthRoutes } from './interfaces/http/index.js';

export interface BuildAppOptions {
  /** Backing store when `config.store` is "memory". */
  memoryStore?: InMemoryEventStore;
}

/**
 * Builds the Fastify app without listening.
 *
 * Order:
 * 1) Event log plugin (Postgres or in-memory)
 * 2) HTTP routes
 */
export async function buildApp(
  config: AppConfig,
  log: Logger,
  options: BuildAppOptions = {},
): Promise<FastifyInstance> {
  // Entity ids may be up to 255 characters; longer ones reach the log and fail validation there
  const fastify = Fastify<RawServerDefault, RawRequestDefaultExpression, RawReplyDefaultExpression, FastifyBaseLogger>({ loggerInstance: log, maxParamLength: 512 });

  // --------------------------------------------------
  // Infrastructure
  // --------------------------------------------------

  if (config.store === 'memory') {
    await fastify.register(memoryPlugin, { config, log, store: options.memoryStore });
  } else {
    await fastify.register(dbPlugin, { config, log });
  }

  // --------------------------------------------------
  // HTTP Interface
  // --------------------------------------------------

  await fastify.register(healthRoutes);
  await fastify.register(orderRoutes, { log, maxAppendAttempts: config.orders.maxAppendAttempts });

  return fastify;
}
