import pino from 'pino';
import type { Logger } from 'pino';
import type { AppConfig } from './config.js';

/** Root logger for library use outside Fastify (scripts, tests, embedding apps). */
export function createLogger(config: Pick<AppConfig, 'log'>, name = 'orderlog'): Logger {
  return pino({ name, level: config.log.level });
}
