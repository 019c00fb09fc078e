import type { EventPayload } from '../../domain/index.js';
import type { EventRecord, EventStore, InsertOptions, InsertOutcome } from '../../application/index.js';

/** Stored form: payload kept as JSON text, like a document column. */
interface StoredRow extends Omit<EventRecord, 'payload'> {
  readonly payload: string;
}

function streamKey(entityType: string, entityId: string): string {
  return JSON.stringify([entityType, entityId]);
}

/**
 * In-process EventStore with the same contract as the Postgres store.
 *
 * Used by tests and local runs. `insert` checks and writes without
 * yielding to the event loop, so the compare-and-insert is atomic
 * with respect to every other caller in the process.
 */
export class InMemoryEventStore implements EventStore {
  private readonly streams: Map<string, StoredRow[]> = new Map();
  private readonly eventIds: Set<string> = new Set();

  async insert(record: EventRecord<EventPayload>, options: InsertOptions): Promise<InsertOutcome> {
    const key = streamKey(record.entity_type, record.entity_id);
    const stream = this.streams.get(key) ?? [];
    const latest = stream.at(-1)?.version ?? 0;

    if (stream.some((row) => row.version === record.version)) {
      return { status: 'conflict', reason: 'version_taken' };
    }
    if (options.contiguous && record.version !== latest + 1) {
      return { status: 'conflict', reason: 'version_gap' };
    }
    if (this.eventIds.has(record.event_id)) {
      return { status: 'conflict', reason: 'duplicate_event_id' };
    }

    const row: StoredRow = { ...record, payload: JSON.stringify(record.payload) };
    const insertAt = stream.findIndex((existing) => existing.version > record.version);
    if (insertAt === -1) stream.push(row);
    else stream.splice(insertAt, 0, row);

    this.streams.set(key, stream);
    this.eventIds.add(record.event_id);
    return { status: 'inserted' };
  }

  async findByEntity(entityType: string, entityId: string): Promise<EventRecord[]> {
    const stream = this.streams.get(streamKey(entityType, entityId)) ?? [];
    return stream.map((row) => {
      const payload: unknown = JSON.parse(row.payload);
      return { ...row, payload };
    });
  }

  async findLatestVersion(entityType: string, entityId: string): Promise<number | null> {
    return this.streams.get(streamKey(entityType, entityId))?.at(-1)?.version ?? null;
  }

  async findEntityIds(entityType: string): Promise<string[]> {
    const ids: string[] = [];
    for (const stream of this.streams.values()) {
      const first = stream[0];
      if (first !== undefined && first.entity_type === entityType) ids.push(first.entity_id);
    }
    // UTF-8 byte order, as COLLATE "C" sorts
    return ids.sort((a, b) => Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8')));
  }

  /** Total events held across all entities. */
  get size(): number {
    let total = 0;
    for (const stream of this.streams.values()) {
      total += stream.length;
    }
    return total;
  }
}
