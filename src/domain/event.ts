import { randomUUID } from 'node:crypto';

/**
 * Core domain types for the event log.
 *
 * These types define the canonical shape of an event as it is appended,
 * stored and replayed. They carry no framework dependencies.
 */

/** Any value that survives a JSON round trip unchanged. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Structured payload attached to every event. Interpreted only by projections. */
export type EventPayload = { [key: string]: JsonValue };

/**
 * Canonical Event entity: an immutable fact about one entity.
 *
 * `version` is authoritative for ordering. `occurred_at` is the
 * creation-time clock and is never used for conflict resolution.
 */
export interface Event<
  TType extends string = string,
  TPayload extends EventPayload = EventPayload,
> {
  readonly event_id: string;
  readonly entity_type: string;
  readonly entity_id: string;
  readonly event_type: TType;
  readonly version: number;
  readonly payload: TPayload;
  readonly occurred_at: string; // ISO-8601
}

/** Fields the caller supplies; identity and timestamp are stamped by `createEvent`. */
export interface EventDraft<
  TType extends string = string,
  TPayload extends EventPayload = EventPayload,
> {
  readonly entity_type: string;
  readonly entity_id: string;
  readonly event_type: TType;
  readonly version: number;
  readonly payload: TPayload;
}

/**
 * Builds a new event from a draft.
 * Generates a UUID for event_id and stamps occurred_at with the current time.
 */
export function createEvent<TType extends string, TPayload extends EventPayload>(
  draft: EventDraft<TType, TPayload>,
  now: Date = new Date(),
): Event<TType, TPayload> {
  return {
    event_id: randomUUID(),
    entity_type: draft.entity_type,
    entity_id: draft.entity_id,
    event_type: draft.event_type,
    version: draft.version,
    payload: draft.payload,
    occurred_at: now.toISOString(),
  };
}

/** Short human-readable identity used in error messages and log lines. */
export function describeEntity(entityType: string, entityId: string): string {
  return `${entityType}/${entityId}`;
}
