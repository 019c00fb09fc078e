import type { DbClient } from './client.js';

/**
 * Creates the `events` table and its indexes if they are missing.
 *
 * Mirrors schema.ts. drizzle-kit can generate real migrations from the
 * schema; this keeps a fresh database usable on first start.
 */
export async function ensureSchema(sql: DbClient['sql']): Promise<void> {
  await sql.unsafe(`
    CREATE TABLE IF NOT EXISTS events (
      event_id     UUID PRIMARY KEY,
      entity_type  VARCHAR(255) NOT NULL,
      entity_id    VARCHAR(255) NOT NULL,
      event_type   VARCHAR(255) NOT NULL,
      version      INTEGER      NOT NULL,
      payload      JSONB        NOT NULL DEFAULT '{}',
      occurred_at  TIMESTAMPTZ  NOT NULL,
      recorded_at  TIMESTAMPTZ  NOT NULL DEFAULT NOW()
    )
  `);

  await sql.unsafe(
    `CREATE UNIQUE INDEX IF NOT EXISTS uq_events_entity_version ON events (entity_type, entity_id, version)`,
  );
  await sql.unsafe(`CREATE INDEX IF NOT EXISTS idx_events_event_type ON events (event_type)`);
}
