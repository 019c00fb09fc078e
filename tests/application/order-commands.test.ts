import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { Logger } from 'pino';
import { ConflictError, StorageError } from '../../src/domain/index.js';
import {
  addItem,
  cancelOrder,
  createOrder,
  payOrder,
  recordOrderEvent,
  removeItem,
  loadOrder,
} from '../../src/application/index.js';
import type { EventLog } from '../../src/application/index.js';
import type { InMemoryEventStore } from '../../src/infrastructure/memory/index.js';
import { createMemoryEventLog } from '../helpers.js';

describe('order commands', () => {
  let store: InMemoryEventStore;
  let eventLog: EventLog;
  let log: Logger;

  beforeEach(() => {
    ({ store, eventLog, log } = createMemoryEventLog());
  });

  it('records each event at the next version', async () => {
    const created = await createOrder(eventLog, 'order-1', 'customer-123', log);
    const added = await addItem(eventLog, 'order-1', { item_id: 'apple', quantity: 3, price: 1.5 }, log);
    const removed = await removeItem(eventLog, 'order-1', 'apple', log);
    const paid = await payOrder(eventLog, 'order-1', 'credit_card', log);

    expect([created, added, removed, paid].map((e) => e.version)).toEqual([1, 2, 3, 4]);
    expect(paid).toMatchObject({
      entity_type: 'Order',
      entity_id: 'order-1',
      event_type: 'OrderPaid',
      payload: { payment_method: 'credit_card' },
    });

    const order = await loadOrder(eventLog, 'order-1', log);
    expect(order.status).toBe('paid');
    expect(order.items).toEqual({});
    expect(order.version).toBe(4);
  });

  it('cancelOrder records the reason', async () => {
    await createOrder(eventLog, 'order-1', 'c1', log);
    const cancelled = await cancelOrder(eventLog, 'order-1', 'changed mind', log);

    expect(cancelled.event_type).toBe('OrderCancelled');
    expect(cancelled.payload).toEqual({ reason: 'changed mind' });
    expect(cancelled.version).toBe(2);
  });

  it('re-reads the latest version and retries after a conflict', async () => {
    await createOrder(eventLog, 'order-1', 'c1', log);
    const latestVersion = vi.spyOn(eventLog, 'latestVersion').mockResolvedValueOnce(0);
    const info = vi.spyOn(log, 'info');

    const event = await addItem(eventLog, 'order-1', { item_id: 'apple', quantity: 1, price: 2 }, log);

    expect(event.version).toBe(2);
    expect(latestVersion).toHaveBeenCalledTimes(2);
    expect(info).toHaveBeenCalledWith(
      { entity_id: 'order-1', version: 1, attempt: 1, reason: 'version_taken' },
      'Order append conflicted, re-reading latest version',
    );
    expect(store.size).toBe(2);
  });

  it('gives up after maxAttempts conflicts', async () => {
    await createOrder(eventLog, 'order-1', 'c1', log);
    vi.spyOn(eventLog, 'latestVersion').mockResolvedValueOnce(0);

    await expect(
      payOrder(eventLog, 'order-1', 'cash', log, { maxAttempts: 1 }),
    ).rejects.toBeInstanceOf(ConflictError);
    expect(store.size).toBe(1);
  });

  it('appends exactly once at expectedVersion + 1', async () => {
    await createOrder(eventLog, 'order-1', 'c1', log);
    const latestVersion = vi.spyOn(eventLog, 'latestVersion');

    const err: unknown = await payOrder(eventLog, 'order-1', 'cash', log, { expectedVersion: 0 }).catch(
      (e: unknown) => e,
    );

    expect(err).toBeInstanceOf(ConflictError);
    if (err instanceof ConflictError) {
      expect(err.version).toBe(1);
      expect(err.reason).toBe('version_taken');
    }
    expect(latestVersion).not.toHaveBeenCalled();

    const paid = await payOrder(eventLog, 'order-1', 'cash', log, { expectedVersion: 1 });
    expect(paid.version).toBe(2);
  });

  it('does not retry storage failures', async () => {
    const insert = vi.spyOn(store, 'insert').mockRejectedValue(new Error('connection reset'));

    await expect(createOrder(eventLog, 'order-1', 'c1', log)).rejects.toBeInstanceOf(StorageError);
    expect(insert).toHaveBeenCalledTimes(1);
  });

  it('builds a fresh event_id on every attempt', async () => {
    await createOrder(eventLog, 'order-1', 'c1', log);
    vi.spyOn(eventLog, 'latestVersion').mockResolvedValueOnce(0);
    const append = vi.spyOn(eventLog, 'append');

    await recordOrderEvent(eventLog, 'order-1', { event_type: 'ItemRemoved', payload: { item_id: 'x' } }, log);

    const ids = append.mock.calls.map(([event]) => event.event_id);
    expect(ids).toHaveLength(2);
    expect(ids[0]).not.toBe(ids[1]);
  });
});
