import { drizzle } from 'drizzle-orm/postgres-js';
import postgres from 'postgres';
import type { DatabaseConfig } from '../config.js';
import * as schema from './schema.js';

/**
 * Creates a Drizzle client backed by postgres.js.
 *
 * Returns both the raw `sql` connection (for lifecycle management)
 * and the typed `db` instance (for queries). The caller owns the
 * handle and must call `sql.end()`; nothing here reconnects lazily.
 */
export function createDbClient(config: DatabaseConfig) {
  const sql = postgres(config.url, {
    max: config.poolMax,
    idle_timeout: 20,
    connect_timeout: config.connectTimeoutSeconds,
    connection: {
      statement_timeout: config.statementTimeoutMs,
    },
  });

  const db = drizzle(sql, { schema });

  return { sql, db };
}

export type DbClient = ReturnType<typeof createDbClient>;
export type Database = DbClient['db'];
