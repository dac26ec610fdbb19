/**
 * Root logger for the bridge core.
 *
 * The HTTP server builds its own pino instance from the same options, so
 * request logs and core logs share level and format.
 */

import { pino } from 'pino';
import type { Logger } from 'pino';

export type { Logger };

export interface LoggerOptions {
  level: string;
  transport?: { target: string; options: Record<string, unknown> };
}

export function loggerOptions(level: string, pretty: boolean): LoggerOptions {
  return {
    level,
    transport: pretty ? { target: 'pino-pretty', options: { colorize: true } } : undefined,
  };
}

export function createLogger(options: LoggerOptions): Logger {
  return pino(options);
}

/** Logger that drops everything. Used by tests and as a default. */
export function silentLogger(): Logger {
  return pino({ level: 'silent' });
}
