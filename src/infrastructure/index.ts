export { loadConfig, ConfigError, DEFAULT_DATABASE_URL } from './config.js';
export type { AppConfig, DatabaseConfig } from './config.js';
export { createLogger } from './logger.js';
export {
  events,
  createDbClient,
  insertEvent,
  findEventsByEntity,
  findLatestVersion,
  findEntityIds,
  PostgresEventStore,
  ensureSchema,
  openEventLog,
  withEventLog,
  dbPlugin,
} from './db/index.js';
export type { Database, DbClient, EventRow, NewEventRow, EventLogHandle, OpenOptions, DbPluginOptions } from './db/index.js';
export { InMemoryEventStore, memoryPlugin } from './memory/index.js';
export type { MemoryPluginOptions } from './memory/index.js';
