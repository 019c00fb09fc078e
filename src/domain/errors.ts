import { describeEntity } from './event.js';
import type { Event } from './event.js';

/** Identity of the entity an operation touched, plus the attempted version if any. */
export interface EventLocator {
  readonly entity_type: string;
  readonly entity_id: string;
  readonly version?: number;
}

/** Base class for every error the event log surfaces. */
export class EventLogError extends Error {
  constructor(
    message: string,
    public readonly locator: EventLocator | null,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'EventLogError';
  }
}

/**
 * Why an append was rejected at the storage boundary.
 *
 * - `version_taken`: another event already holds (entity_type, entity_id, version)
 * - `version_gap`: the contiguity guard is on and version !== latest + 1
 * - `duplicate_event_id`: the event_id was already appended
 *
 * The rejection itself is atomic; the label is not. The Postgres store
 * derives it from a read after the rejected insert, so a writer landing
 * in between can turn `version_gap` into `version_taken`. Branch on
 * `ConflictError`, not on the reason.
 */
export type ConflictReason = 'version_taken' | 'version_gap' | 'duplicate_event_id';

/**
 * Optimistic concurrency violation.
 *
 * Recoverable: re-read the latest version and retry with a fresh event.
 */
export class ConflictError extends EventLogError {
  constructor(
    public readonly entity_type: string,
    public readonly entity_id: string,
    public readonly version: number,
    public readonly reason: ConflictReason,
  ) {
    super(
      `Version conflict for ${describeEntity(entity_type, entity_id)} version ${version} (${reason})`,
      { entity_type, entity_id, version },
    );
    this.name = 'ConflictError';
  }
}

/** Operations the store port exposes, used to label storage failures. */
export type StorageOperation = 'append' | 'load' | 'latest_version' | 'list_entity_ids' | 'connect' | 'close';

/** Connectivity, timeout or other store-layer failure. Not retried by the log. */
export class StorageError extends EventLogError {
  constructor(
    public readonly operation: StorageOperation,
    locator: EventLocator | null,
    cause: unknown,
  ) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    const target = locator ? ` for ${describeEntity(locator.entity_type, locator.entity_id)}` : '';
    super(`Storage failure during ${operation}${target}: ${detail}`, locator, { cause });
    this.name = 'StorageError';
  }
}

/** A payload could not be encoded or decoded losslessly. */
export class SerializationError extends EventLogError {
  constructor(
    message: string,
    locator: EventLocator | null,
    public readonly issues: readonly string[] = [],
  ) {
    super(message, locator);
    this.name = 'SerializationError';
  }
}

/** The event envelope violates an append precondition (bad id, version < 1, empty type). */
export class InvalidEventError extends EventLogError {
  constructor(
    message: string,
    locator: EventLocator | null,
    public readonly issues: readonly string[] = [],
  ) {
    super(message, locator);
    this.name = 'InvalidEventError';
  }
}

/** Raised by a projection running with the `fail` policy on an unknown event type. */
export class UnrecognizedEventError extends EventLogError {
  constructor(public readonly event: Event) {
    super(
      `Unrecognized event type "${event.event_type}" for ${describeEntity(event.entity_type, event.entity_id)} version ${event.version}`,
      { entity_type: event.entity_type, entity_id: event.entity_id, version: event.version },
    );
    this.name = 'UnrecognizedEventError';
  }
}
