export { events } from './schema.js';
export type { EventRow } from './schema.js';
export { createDbClient } from './client.js';
export type { Database, DbClient } from './client.js';
export { insertEvent, findEventsByEntity, findLatestVersion, findEntityIds } from './event-repository.js';
export type { NewEventRow } from './event-repository.js';
export { PostgresEventStore } from './postgres-event-store.js';
export { ensureSchema } from './migrate.js';
export { openEventLog, withEventLog } from './event-log-handle.js';
export type { EventLogHandle, OpenOptions } from './event-log-handle.js';
export { default as dbPlugin } from './db-plugin.js';
export type { DbPluginOptions } from './db-plugin.js';
