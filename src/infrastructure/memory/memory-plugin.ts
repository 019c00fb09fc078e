import fp from 'fastify-plugin';
import type { FastifyInstance } from 'fastify';
import type { Logger } from 'pino';
import { EventLog } from '../../application/index.js';
import type { AppConfig } from '../config.js';
import { InMemoryEventStore } from './in-memory-event-store.js';

export interface MemoryPluginOptions {
  config: Pick<AppConfig, 'eventLog'>;
  log: Logger;
  /** Share a store across server instances; a fresh one is created otherwise. */
  store?: InMemoryEventStore;
}

/**
 * Fastify plugin that decorates `fastify.eventLog` with an in-process log.
 *
 * Registers under the same name as the Postgres plugin so routes depend
 * on "event-log" without caring which store is behind it. Nothing
 * survives a restart.
 */
async function memoryPlugin(fastify: FastifyInstance, opts: MemoryPluginOptions): Promise<void> {
  const store = opts.store ?? new InMemoryEventStore();
  fastify.decorate('eventLog', new EventLog(store, opts.log, opts.config.eventLog));
  opts.log.warn('Using in-memory event store; events are lost on shutdown');
}

export default fp(memoryPlugin, {
  name: 'event-log',
  fastify: '5.x',
});
