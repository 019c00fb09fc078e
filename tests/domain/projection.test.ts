import { describe, it, expect, vi } from 'vitest';
import { project } from '../../src/domain/projection.js';
import type { DecodedEvent, Projection } from '../../src/domain/projection.js';
import { UnrecognizedEventError } from '../../src/domain/errors.js';
import type { Event } from '../../src/domain/event.js';
import { makeEvent } from '../helpers.js';

type Incremented = Event<'Incremented', { by: number }>;

interface CounterState {
  readonly id: string;
  readonly count: number;
  readonly version: number;
}

const counter: Projection<CounterState, Incremented> = {
  entityType: 'Counter',
  initial: (id) => ({ id, count: 0, version: 0 }),
  apply: (state, event) => ({ ...state, count: state.count + event.payload.by }),
};

function incremented(by: number, version: number): DecodedEvent<Incremented> {
  return {
    kind: 'recognized',
    event: {
      ...makeEvent({ entity_type: 'Counter', entity_id: 'c-1', version }),
      event_type: 'Incremented',
      payload: { by },
    },
  };
}

function unrecognized(version: number): DecodedEvent<Incremented> {
  return {
    kind: 'unrecognized',
    event: makeEvent({ entity_type: 'Counter', entity_id: 'c-1', event_type: 'Renamed', version, payload: {} }),
  };
}

describe('project', () => {
  it('returns the initial state at version 0 for no events', () => {
    expect(project(counter, 'c-1', [])).toEqual({ id: 'c-1', count: 0, version: 0 });
  });

  it('applies events in order and tracks the last version', () => {
    const state = project(counter, 'c-1', [incremented(2, 1), incremented(5, 2)]);
    expect(state).toEqual({ id: 'c-1', count: 7, version: 2 });
  });

  it('ignores unrecognized events by default but advances the version', () => {
    const state = project(counter, 'c-1', [incremented(2, 1), unrecognized(2)]);
    expect(state).toEqual({ id: 'c-1', count: 2, version: 2 });
  });

  it('reports unrecognized events through onUnrecognized', () => {
    const onUnrecognized = vi.fn();
    project(counter, 'c-1', [unrecognized(1), incremented(1, 2)], { onUnrecognized });

    expect(onUnrecognized).toHaveBeenCalledTimes(1);
    expect(onUnrecognized.mock.calls[0]?.[0]).toMatchObject({ event_type: 'Renamed', version: 1 });
  });

  it('throws UnrecognizedEventError under the fail policy', () => {
    expect(() =>
      project(counter, 'c-1', [incremented(1, 1), unrecognized(2)], { unrecognized: 'fail' }),
    ).toThrow(UnrecognizedEventError);
  });

  it('is deterministic and does not mutate its input', () => {
    const events = [incremented(3, 1), unrecognized(2), incremented(4, 3)];
    const snapshot = JSON.stringify(events);

    const first = project(counter, 'c-1', events);
    const second = project(counter, 'c-1', events);

    expect(second).toEqual(first);
    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
    expect(JSON.stringify(events)).toBe(snapshot);
  });
});
