import type { ConflictReason, EventPayload } from '../domain/index.js';

/**
 * One persisted event as the store holds it.
 *
 * On the way in `payload` is a checked JSON object. On the way out it
 * is whatever the store hands back after its own serialization round
 * trip, and the event log validates it again.
 */
export interface EventRecord<TPayload = unknown> {
  readonly event_id: string;
  readonly entity_type: string;
  readonly entity_id: string;
  readonly event_type: string;
  readonly version: number;
  readonly payload: TPayload;
  readonly occurred_at: string; // ISO-8601
}

export interface InsertOptions {
  /** Also require, in the same atomic step, that version === latest + 1. */
  readonly contiguous: boolean;
}

export type InsertOutcome =
  | { readonly status: 'inserted' }
  | { readonly status: 'conflict'; readonly reason: ConflictReason };

/**
 * Durable ordered store the event log is built on.
 *
 * Implementations must make `insert` an atomic compare-and-insert over
 * (entity_type, entity_id, version): of two concurrent inserts at the
 * same key exactly one reports `inserted`. Any other failure is thrown.
 */
export interface EventStore {
  insert(record: EventRecord<EventPayload>, options: InsertOptions): Promise<InsertOutcome>;
  /** All events of one entity, ascending by version, read in a single query. */
  findByEntity(entityType: string, entityId: string): Promise<EventRecord[]>;
  /** Max stored version, or null when the entity has no events. */
  findLatestVersion(entityType: string, entityId: string): Promise<number | null>;
  /** Distinct entity ids of one type, in byte-wise lexicographic order. */
  findEntityIds(entityType: string): Promise<string[]>;
}
