import type { z } from 'zod';
import { SerializationError, orderProjection, project } from '../domain/index.js';
import type { DecodedEvent, Event, OrderEvent, OrderSnapshot, ProjectOptions } from '../domain/index.js';
import {
  formatIssues,
  itemAddedPayloadSchema,
  itemRemovedPayloadSchema,
  orderCancelledPayloadSchema,
  orderCreatedPayloadSchema,
  orderPaidPayloadSchema,
} from './event-schema.js';

function parsePayload<T>(schema: z.ZodType<T>, event: Event): T {
  const parsed = schema.safeParse(event.payload);
  if (!parsed.success) {
    throw new SerializationError(
      `Malformed ${event.event_type} payload`,
      { entity_type: event.entity_type, entity_id: event.entity_id, version: event.version },
      formatIssues(parsed.error),
    );
  }
  return parsed.data;
}

/**
 * Classifies a stored event into the closed Order event union.
 *
 * Unknown event types come back as `unrecognized`. A known type whose
 * payload fails its schema raises SerializationError.
 */
export function decodeOrderEvent(event: Event): DecodedEvent<OrderEvent> {
  switch (event.event_type) {
    case 'OrderCreated':
      return {
        kind: 'recognized',
        event: { ...event, event_type: 'OrderCreated', payload: parsePayload(orderCreatedPayloadSchema, event) },
      };
    case 'ItemAdded':
      return {
        kind: 'recognized',
        event: { ...event, event_type: 'ItemAdded', payload: parsePayload(itemAddedPayloadSchema, event) },
      };
    case 'ItemRemoved':
      return {
        kind: 'recognized',
        event: { ...event, event_type: 'ItemRemoved', payload: parsePayload(itemRemovedPayloadSchema, event) },
      };
    case 'OrderPaid':
      return {
        kind: 'recognized',
        event: { ...event, event_type: 'OrderPaid', payload: parsePayload(orderPaidPayloadSchema, event) },
      };
    case 'OrderCancelled':
      return {
        kind: 'recognized',
        event: { ...event, event_type: 'OrderCancelled', payload: parsePayload(orderCancelledPayloadSchema, event) },
      };
    default:
      return { kind: 'unrecognized', event };
  }
}

/**
 * Folds an ordered Order event sequence into a snapshot.
 * Same input, same snapshot; safe to call any number of times.
 */
export function projectOrder(
  orderId: string,
  events: readonly Event[],
  options: ProjectOptions = {},
): OrderSnapshot {
  return project(orderProjection, orderId, events.map(decodeOrderEvent), options);
}
