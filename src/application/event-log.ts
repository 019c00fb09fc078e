import type { Logger } from 'pino';
import {
  ConflictError,
  EventLogError,
  InvalidEventError,
  SerializationError,
  StorageError,
} from '../domain/index.js';
import type { Event, EventLocator, EventPayload, StorageOperation } from '../domain/index.js';
import type { EventRecord, EventStore } from './event-store.js';
import { eventEnvelopeSchema, eventPayloadSchema, formatIssues } from './event-schema.js';

export interface EventLogOptions {
  /**
   * Reject appends whose version is not exactly latest + 1.
   * Off, the store enforces uniqueness only and gaps are possible.
   */
  contiguousVersions: boolean;
}

export const DEFAULT_EVENT_LOG_OPTIONS: EventLogOptions = {
  contiguousVersions: true,
};

/**
 * Append-only, per-entity ordered event log.
 *
 * Concurrency control is optimistic and lives entirely in the store's
 * compare-and-insert: the log holds no locks and never retries. Every
 * failure surfaces as one of ConflictError, StorageError,
 * SerializationError or InvalidEventError, carrying the entity identity
 * and attempted version.
 */
export class EventLog {
  private readonly options: EventLogOptions;

  constructor(
    private readonly store: EventStore,
    private readonly log: Logger,
    options: Partial<EventLogOptions> = {},
  ) {
    this.options = { ...DEFAULT_EVENT_LOG_OPTIONS, ...options };
  }

  /**
   * Appends one event at the version the caller chose.
   *
   * Validates the envelope and payload before touching the store, so
   * nothing is written on any failure path.
   */
  async append(event: Event): Promise<void> {
    const locator: EventLocator = {
      entity_type: event.entity_type,
      entity_id: event.entity_id,
      version: event.version,
    };

    const envelope = eventEnvelopeSchema.safeParse(event);
    if (!envelope.success) {
      throw new InvalidEventError(
        `Invalid event envelope for ${event.entity_type}/${event.entity_id}`,
        locator,
        formatIssues(envelope.error),
      );
    }

    const payload = encodePayload(event.payload, locator);

    const record: EventRecord<EventPayload> = {
      event_id: envelope.data.event_id,
      entity_type: envelope.data.entity_type,
      entity_id: envelope.data.entity_id,
      event_type: envelope.data.event_type,
      version: envelope.data.version,
      payload,
      occurred_at: envelope.data.occurred_at,
    };

    const outcome = await this.call('append', locator, () =>
      this.store.insert(record, { contiguous: this.options.contiguousVersions }),
    );

    if (outcome.status === 'conflict') {
      this.log.warn(
        { ...locator, event_id: record.event_id, reason: outcome.reason },
        'Append rejected: version conflict',
      );
      throw new ConflictError(record.entity_type, record.entity_id, record.version, outcome.reason);
    }

    this.log.debug(
      { ...locator, event_id: record.event_id, event_type: record.event_type },
      'Event appended',
    );
  }

  /** All events of one entity, ascending by version. Empty if none exist. */
  async load(entityType: string, entityId: string): Promise<Event[]> {
    const locator: EventLocator = { entity_type: entityType, entity_id: entityId };
    const records = await this.call('load', locator, () => this.store.findByEntity(entityType, entityId));
    return records.map((record) => decodeRecord(record));
  }

  /**
   * Highest stored version, or 0 when the entity has no events.
   *
   * Racy by nature: treat it as a hint for the next version and handle
   * ConflictError on append.
   */
  async latestVersion(entityType: string, entityId: string): Promise<number> {
    const latest = await this.call('latest_version', { entity_type: entityType, entity_id: entityId }, () =>
      this.store.findLatestVersion(entityType, entityId),
    );
    return latest ?? 0;
  }

  async exists(entityType: string, entityId: string): Promise<boolean> {
    return (await this.latestVersion(entityType, entityId)) > 0;
  }

  /** Distinct ids of one entity type, sorted lexicographically. */
  async listEntityIds(entityType: string): Promise<string[]> {
    return this.call('list_entity_ids', null, () => this.store.findEntityIds(entityType));
  }

  /**
   * Runs one store call and maps anything outside the error taxonomy
   * to StorageError. Taxonomy errors pass through untouched.
   */
  private async call<T>(
    operation: StorageOperation,
    locator: EventLocator | null,
    fn: () => Promise<T>,
  ): Promise<T> {
    try {
      return await fn();
    } catch (err: unknown) {
      if (err instanceof EventLogError) throw err;
      this.log.error({ err, operation, ...locator }, 'Event store operation failed');
      throw new StorageError(operation, locator, err);
    }
  }
}

/** Checks that a payload is a plain JSON object; returns it typed. */
export function encodePayload(payload: unknown, locator: EventLocator | null): EventPayload {
  const parsed = eventPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new SerializationError(
      'Payload cannot be serialized losslessly',
      locator,
      formatIssues(parsed.error),
    );
  }
  return parsed.data;
}

/** Turns a stored record back into an Event, validating the payload on the way. */
export function decodeRecord(record: EventRecord): Event {
  const locator: EventLocator = {
    entity_type: record.entity_type,
    entity_id: record.entity_id,
    version: record.version,
  };
  const parsed = eventPayloadSchema.safeParse(record.payload);
  if (!parsed.success) {
    throw new SerializationError('Stored payload cannot be decoded', locator, formatIssues(parsed.error));
  }

  return {
    event_id: record.event_id,
    entity_type: record.entity_type,
    entity_id: record.entity_id,
    event_type: record.event_type,
    version: record.version,
    payload: parsed.data,
    occurred_at: record.occurred_at,
  };
}
