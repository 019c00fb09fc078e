import type { Event } from './event.js';
import { UnrecognizedEventError } from './errors.js';

/**
 * An event after decoding at the storage boundary.
 *
 * Known event kinds carry their typed payload. Anything else is kept
 * as the raw envelope so the projection can still advance its version.
 */
export type DecodedEvent<TEvent extends Event> =
  | { readonly kind: 'recognized'; readonly event: TEvent }
  | { readonly kind: 'unrecognized'; readonly event: Event };

/** Minimum shape of any projected state. */
export interface VersionedState {
  /** Version of the last event folded in; 0 before any event. */
  readonly version: number;
}

/**
 * Transition rules for one aggregate kind.
 *
 * `apply` must be pure: no I/O, no mutation of `state` or `event`.
 * It never touches `version`; the fold sets it after each event.
 */
export interface Projection<TState extends VersionedState, TEvent extends Event> {
  readonly entityType: string;
  initial(entityId: string): TState;
  apply(state: TState, event: TEvent): TState;
}

export type UnrecognizedPolicy = 'ignore' | 'fail';

export interface ProjectOptions {
  /** `ignore` (default) leaves state untouched; `fail` throws UnrecognizedEventError. */
  readonly unrecognized?: UnrecognizedPolicy;
  /** Called for every unrecognized event before the policy is applied. */
  readonly onUnrecognized?: (event: Event) => void;
}

/**
 * Folds an ordered event sequence into a fresh state.
 *
 * Deterministic and side-effect-free apart from `onUnrecognized`:
 * the same input always yields an equal snapshot, so it can be re-run
 * on every read.
 */
export function project<TState extends VersionedState, TEvent extends Event>(
  projection: Projection<TState, TEvent>,
  entityId: string,
  events: readonly DecodedEvent<TEvent>[],
  options: ProjectOptions = {},
): TState {
  const policy = options.unrecognized ?? 'ignore';
  let state = projection.initial(entityId);

  for (const decoded of events) {
    if (decoded.kind === 'recognized') {
      state = projection.apply(state, decoded.event);
    } else {
      options.onUnrecognized?.(decoded.event);
      if (policy === 'fail') {
        throw new UnrecognizedEventError(decoded.event);
      }
    }

    // Unconditional, so version tracking does not depend on which types are known
    state = { ...state, version: decoded.event.version };
  }

  return state;
}
