import { z } from 'zod';
import type { JsonValue } from '../domain/index.js';

/** Largest value of the `integer` version column. */
export const MAX_VERSION = 2_147_483_647;

// NUL, or a surrogate without its pair
const UNSTORABLE_TEXT = /\u0000|[\uD800-\uDBFF](?![\uDC00-\uDFFF])|(?<![\uD800-\uDBFF])[\uDC00-\uDFFF]/;

/** True when varchar and jsonb columns store `value` unchanged. */
export function isStorableText(value: string): boolean {
  return !UNSTORABLE_TEXT.test(value);
}

const unstorableText = { message: 'Must not contain NUL or unpaired surrogate characters' };

const storableString = z.string().refine(isStorableText, unstorableText);

const identifier = z.string().min(1).max(255).refine(isStorableText, unstorableText);

/**
 * Zod schema for a JSON value that survives serialization unchanged.
 *
 * Rejects NaN and ±Infinity (serialized as null), `undefined`,
 * Dates, Maps, bigint and functions, and strings or keys that jsonb
 * cannot hold.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    storableString,
    z.number().finite(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(storableString, jsonValueSchema),
  ]),
);

/** Payloads are always JSON objects at the top level. */
export const eventPayloadSchema = z.record(storableString, jsonValueSchema);

/**
 * Zod schema for the event envelope checked before every append.
 * The payload is checked separately so its failures map to SerializationError.
 */
export const eventEnvelopeSchema = z.object({
  // Lowercase, the form the uuid column hands back
  event_id: z.string().uuid().regex(/^[0-9a-f-]+$/, { message: 'Must be a lowercase UUID' }),
  entity_type: identifier,
  entity_id: identifier,
  event_type: identifier,
  version: z.number().int().positive().max(MAX_VERSION),
  // Millisecond UTC form, as Date#toISOString writes it and timestamptz reads it back
  occurred_at: z.string().datetime({
    precision: 3,
    message: 'Must be an ISO-8601 UTC datetime with milliseconds',
  }),
});

// --------------------------------------------------
// Order payloads
// --------------------------------------------------

export const orderCreatedPayloadSchema = z.object({
  customer_id: z.string().min(1),
});

export const itemAddedPayloadSchema = z.object({
  item_id: z.string().min(1),
  quantity: z.number().int().positive(),
  price: z.number().finite().nonnegative(),
});

export const itemRemovedPayloadSchema = z.object({
  item_id: z.string().min(1),
});

export const orderPaidPayloadSchema = z.object({
  payment_method: z.string().min(1),
});

export const orderCancelledPayloadSchema = z.object({
  reason: z.string(),
});

/**
 * Request body for recording an Order event over HTTP.
 * `expected_version` pins the version the client last saw.
 */
export const orderEventRequestSchema = z.discriminatedUnion('event_type', [
  z.object({ event_type: z.literal('OrderCreated'), payload: orderCreatedPayloadSchema, expected_version: z.number().int().nonnegative().optional() }),
  z.object({ event_type: z.literal('ItemAdded'), payload: itemAddedPayloadSchema, expected_version: z.number().int().nonnegative().optional() }),
  z.object({ event_type: z.literal('ItemRemoved'), payload: itemRemovedPayloadSchema, expected_version: z.number().int().nonnegative().optional() }),
  z.object({ event_type: z.literal('OrderPaid'), payload: orderPaidPayloadSchema, expected_version: z.number().int().nonnegative().optional() }),
  z.object({ event_type: z.literal('OrderCancelled'), payload: orderCancelledPayloadSchema, expected_version: z.number().int().nonnegative().optional() }),
]);

export type OrderEventRequest = z.infer<typeof orderEventRequestSchema>;

/** Flattens zod issues into "path: message" lines for error payloads. */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message,
  );
}
