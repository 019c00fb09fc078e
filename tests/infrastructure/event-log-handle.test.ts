import { describe, it, expect, vi, beforeEach } from 'vitest';

/**
 * ESM-safe mock: vi.mock is hoisted above imports by Vitest.
 * The client factory and schema provisioning are stubbed so the handle
 * lifecycle runs without a database.
 */
vi.mock('../../src/infrastructure/db/client.js', () => ({
  createDbClient: vi.fn(),
}));
vi.mock('../../src/infrastructure/db/migrate.js', () => ({
  ensureSchema: vi.fn(),
}));

import { openEventLog, withEventLog } from '../../src/infrastructure/db/event-log-handle.js';
import { createDbClient } from '../../src/infrastructure/db/client.js';
import { ensureSchema } from '../../src/infrastructure/db/migrate.js';
import { loadConfig } from '../../src/infrastructure/config.js';
import { EventLog } from '../../src/application/index.js';
import { StorageError } from '../../src/domain/index.js';
import { silentLogger } from '../helpers.js';

const mockCreateDbClient = vi.mocked(createDbClient);
const mockEnsureSchema = vi.mocked(ensureSchema);

const config = loadConfig({});
const end = vi.fn<() => Promise<void>>();

/** Placeholder client; only `sql.end` is ever called here. */
const client = { sql: { end }, db: {} } as unknown as ReturnType<typeof createDbClient>;

beforeEach(() => {
  vi.clearAllMocks();
  end.mockResolvedValue(undefined);
  mockEnsureSchema.mockResolvedValue(undefined);
  mockCreateDbClient.mockReturnValue(client);
});

describe('openEventLog', () => {
  it('returns an event log and closes the pool once', async () => {
    const handle = await openEventLog(config, silentLogger());

    expect(handle.eventLog).toBeInstanceOf(EventLog);
    expect(mockCreateDbClient).toHaveBeenCalledWith(config.database);
    expect(mockEnsureSchema).not.toHaveBeenCalled();

    await handle.close();
    expect(end).toHaveBeenCalledTimes(1);
  });

  it('provisions the schema when asked', async () => {
    await openEventLog(config, silentLogger(), { migrate: true });

    expect(mockEnsureSchema).toHaveBeenCalledWith(client.sql);
  });

  it('closes the pool and raises StorageError when provisioning fails', async () => {
    const cause = new Error('connect ECONNREFUSED');
    mockEnsureSchema.mockRejectedValue(cause);

    const err: unknown = await openEventLog(config, silentLogger(), { migrate: true }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    if (err instanceof StorageError) {
      expect(err.operation).toBe('connect');
      expect(err.cause).toBe(cause);
    }
    expect(end).toHaveBeenCalledTimes(1);
  });

  it('wraps a failing close in StorageError', async () => {
    end.mockRejectedValue(new Error('already ended'));
    const handle = await openEventLog(config, silentLogger());

    const err: unknown = await handle.close().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(StorageError);
    if (err instanceof StorageError) expect(err.operation).toBe('close');
  });
});

describe('withEventLog', () => {
  it('returns the callback result and closes', async () => {
    const result = await withEventLog(config, silentLogger(), async (eventLog) => eventLog instanceof EventLog);

    expect(result).toBe(true);
    expect(end).toHaveBeenCalledTimes(1);
  });

  it('closes when the callback throws', async () => {
    await expect(
      withEventLog(config, silentLogger(), async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
    expect(end).toHaveBeenCalledTimes(1);
  });
});
