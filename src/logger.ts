import { pino } from 'pino';
import type { LevelWithSilent, Logger } from 'pino';

export type { Logger };

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export type LogLevel = LevelWithSilent;

export interface LoggerOptions {
  level?: LogLevel;
  name?: string;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    name: options.name ?? 'docdb-orm',
    level: options.level ?? 'info',
  });
}

/** Logger for code paths that were not handed one. */
export const silentLogger: Logger = pino({ level: 'silent' });
