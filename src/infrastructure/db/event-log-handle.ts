import type { Logger } from 'pino';
import { EventLog } from '../../application/index.js';
import { StorageError } from '../../domain/index.js';
import type { AppConfig } from '../config.js';
import { createDbClient } from './client.js';
import { ensureSchema } from './migrate.js';
import { PostgresEventStore } from './postgres-event-store.js';

/** An open event log plus the function that releases its connection pool. */
export interface EventLogHandle {
  eventLog: EventLog;
  close(): Promise<void>;
}

export interface OpenOptions {
  /** Run ensureSchema() before handing out the log. */
  migrate?: boolean;
}

/**
 * Opens a Postgres-backed event log.
 *
 * The returned handle owns the pool; call `close()` exactly once when
 * done. If provisioning fails the pool is closed before rethrowing.
 */
export async function openEventLog(
  config: Pick<AppConfig, 'database' | 'eventLog'>,
  log: Logger,
  options: OpenOptions = {},
): Promise<EventLogHandle> {
  const { sql, db } = createDbClient(config.database);

  if (options.migrate === true) {
    try {
      await ensureSchema(sql);
    } catch (err: unknown) {
      await sql.end();
      throw new StorageError('connect', null, err);
    }
    log.info('Database schema ready');
  }

  const eventLog = new EventLog(new PostgresEventStore(db), log, config.eventLog);

  return {
    eventLog,
    close: async () => {
      try {
        await sql.end();
      } catch (err: unknown) {
        throw new StorageError('close', null, err);
      }
      log.info('Database disconnected');
    },
  };
}

/**
 * Scoped acquisition: opens a log, runs `fn`, and always closes it,
 * on the error path too.
 */
export async function withEventLog<T>(
  config: Pick<AppConfig, 'database' | 'eventLog'>,
  log: Logger,
  fn: (eventLog: EventLog) => Promise<T>,
  options: OpenOptions = {},
): Promise<T> {
  const handle = await openEventLog(config, log, options);
  try {
    return await fn(handle.eventLog);
  } finally {
    await handle.close();
  }
}
