import type { EventPayload } from '../../domain/index.js';
import type { EventRecord, EventStore, InsertOptions, InsertOutcome } from '../../application/index.js';
import type { Database } from './client.js';
import type { EventRow } from './schema.js';
import {
  insertEvent,
  findEventsByEntity,
  findLatestVersion,
  findEntityIds,
} from './event-repository.js';

function toRecord(row: EventRow): EventRecord {
  return {
    event_id: row.event_id,
    entity_type: row.entity_type,
    entity_id: row.entity_id,
    event_type: row.event_type,
    version: row.version,
    payload: row.payload,
    occurred_at: row.occurred_at.toISOString(),
  };
}

/**
 * EventStore backed by the PostgreSQL `events` table.
 *
 * Driver errors are thrown as-is; the event log wraps them.
 */
export class PostgresEventStore implements EventStore {
  constructor(private readonly db: Database) {}

  async insert(record: EventRecord<EventPayload>, options: InsertOptions): Promise<InsertOutcome> {
    const inserted = await insertEvent(this.db, record, options);
    if (inserted) return { status: 'inserted' };

    // Rejected rows leave no trace, so classify after the fact from a
    // second read. The write decision was atomic; this label is best-effort.
    const latest = (await findLatestVersion(this.db, record.entity_type, record.entity_id)) ?? 0;
    if (latest >= record.version) return { status: 'conflict', reason: 'version_taken' };
    if (options.contiguous && latest !== record.version - 1) return { status: 'conflict', reason: 'version_gap' };
    return { status: 'conflict', reason: 'duplicate_event_id' };
  }

  async findByEntity(entityType: string, entityId: string): Promise<EventRecord[]> {
    const rows = await findEventsByEntity(this.db, entityType, entityId);
    return rows.map(toRecord);
  }

  async findLatestVersion(entityType: string, entityId: string): Promise<number | null> {
    return findLatestVersion(this.db, entityType, entityId);
  }

  async findEntityIds(entityType: string): Promise<string[]> {
    return findEntityIds(this.db, entityType);
  }
}
