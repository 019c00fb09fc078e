export type { Event, EventDraft, EventPayload, JsonValue } from './event.js';
export { createEvent, describeEntity } from './event.js';
export {
  EventLogError,
  ConflictError,
  StorageError,
  SerializationError,
  InvalidEventError,
  UnrecognizedEventError,
} from './errors.js';
export type { ConflictReason, EventLocator, StorageOperation } from './errors.js';
export { project } from './projection.js';
export type { DecodedEvent, Projection, ProjectOptions, UnrecognizedPolicy, VersionedState } from './projection.js';
export * from './order/index.js';
