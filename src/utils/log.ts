// =============================================================================
// RAMPART — Console logging
//
// Bracketed component tags on every line ("[Audit] ...") with a level gate
// read from LOG_LEVEL.
// =============================================================================

import { config } from '../config';

const LEVELS = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 } as const;

export type LogLevel = keyof typeof LEVELS;

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVELS, value);
}

const threshold: number = isLogLevel(config.logging.level)
  ? LEVELS[config.logging.level]
  : LEVELS.info;

function enabled(level: LogLevel): boolean {
  return LEVELS[level] >= threshold;
}

function line(tag: string, message: string): string {
  return `[${tag}] ${message}`;
}

export const log = {
  debug(tag: string, message: string, meta?: Record<string, unknown>): void {
    if (enabled('debug')) console.debug(line(tag, message), meta ?? '');
  },
  info(tag: string, message: string, meta?: Record<string, unknown>): void {
    if (enabled('info')) console.log(line(tag, message), meta ?? '');
  },
  warn(tag: string, message: string, meta?: Record<string, unknown>): void {
    if (enabled('warn')) console.warn(line(tag, message), meta ?? '');
  },
  error(tag: string, message: string, meta?: Record<string, unknown>): void {
    if (enabled('error')) console.error(line(tag, message), meta ?? '');
  },
};

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
