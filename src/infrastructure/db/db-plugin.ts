import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import type { EventLog } from '../../application/index.js';
import type { AppConfig } from '../config.js';
import { openEventLog } from './event-log-handle.js';

export interface DbPluginOptions {
  config: Pick<AppConfig, 'database' | 'eventLog'>;
  /** Same pino instance the server was created with (`loggerInstance`). */
  log: Logger;
}

/**
 * Fastify plugin that manages the Postgres event log lifecycle.
 *
 * Provisions the schema, decorates `fastify.eventLog` for use by the
 * routes, and closes the connection pool on server shutdown.
 */
async function dbPlugin(fastify: FastifyInstance, opts: DbPluginOptions): Promise<void> {
  const handle = await openEventLog(opts.config, opts.log, { migrate: true });

  fastify.decorate('eventLog', handle.eventLog);

  fastify.addHook('onClose', async () => {
    await handle.close();
  });
}

export default fp(dbPlugin, {
  name: 'event-log',
  fastify: '5.x',
});

/** Extend Fastify's type system so `fastify.eventLog` is available everywhere. */
declare module 'fastify' {
  interface FastifyInstance {
    eventLog: EventLog;
  }
}
