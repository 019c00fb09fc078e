import { and, asc, eq, max, sql } from 'drizzle-orm';
import type { Database } from './client.js';
import { events } from './schema.js';
import type { EventRow } from './schema.js';

/** Column values for one new row. `recorded_at` is assigned by the database. */
export interface NewEventRow {
  event_id: string;
  entity_type: string;
  entity_id: string;
  event_type: string;
  version: number;
  payload: Record<string, unknown>;
  occurred_at: string; // ISO-8601
}

/**
 * Inserts an event with compare-and-insert semantics.
 *
 * A single `INSERT … SELECT … ON CONFLICT DO NOTHING` statement:
 * - the unique index on (entity_type, entity_id, version) and the
 *   event_id primary key make a duplicate insert a no-op;
 * - with `contiguous`, the WHERE clause also requires the current max
 *   version to be exactly version - 1, evaluated in the same statement.
 *
 * Returns true if a row was inserted, false if it was rejected.
 */
export async function insertEvent(
  db: Database,
  row: NewEventRow,
  options: { contiguous: boolean },
): Promise<boolean> {
  const guard = options.contiguous
    ? sql`WHERE (
        SELECT COALESCE(MAX(version), 0) FROM events
        WHERE entity_type = ${row.entity_type} AND entity_id = ${row.entity_id}
      ) = ${row.version - 1}`
    : sql``;

  const inserted = await db.execute<{ event_id: string }>(sql`
    INSERT INTO events (event_id, entity_type, entity_id, event_type, version, payload, occurred_at)
    SELECT
      ${row.event_id}::uuid,
      ${row.entity_type}::varchar,
      ${row.entity_id}::varchar,
      ${row.event_type}::varchar,
      ${row.version}::integer,
      ${JSON.stringify(row.payload)}::jsonb,
      ${row.occurred_at}::timestamptz
    ${guard}
    ON CONFLICT DO NOTHING
    RETURNING event_id
  `);

  return inserted.length > 0;
}

/**
 * Fetches every event of one entity in a single statement.
 * Default ordering: oldest first (version ASC).
 */
export async function findEventsByEntity(
  db: Database,
  entityType: string,
  entityId: string,
): Promise<EventRow[]> {
  return db
    .select()
    .from(events)
    .where(and(eq(events.entity_type, entityType), eq(events.entity_id, entityId)))
    .orderBy(asc(events.version));
}

/** Highest stored version for one entity, or null if it has none. */
export async function findLatestVersion(
  db: Database,
  entityType: string,
  entityId: string,
): Promise<number | null> {
  const rows = await db
    .select({ latest: max(events.version) })
    .from(events)
    .where(and(eq(events.entity_type, entityType), eq(events.entity_id, entityId)));

  return rows[0]?.latest ?? null;
}

/**
 * Distinct entity ids for one entity type.
 *
 * GROUP BY rather than DISTINCT so the ORDER BY may use the "C"
 * collation, which sorts byte-wise instead of by locale.
 */
export async function findEntityIds(db: Database, entityType: string): Promise<string[]> {
  const rows = await db
    .select({ entity_id: events.entity_id })
    .from(events)
    .where(eq(events.entity_type, entityType))
    .groupBy(events.entity_id)
    .orderBy(sql`${events.entity_id} COLLATE "C"`);

  return rows.map((r) => r.entity_id);
}
