/**
 * Logger Module
 *
 * Structured JSON logging to the console. One line per event:
 * { level, module, message, ...context, timestamp }
 *
 * The threshold comes from CLEANER_LOG_LEVEL unless given explicitly.
 */

import type { Logger } from '../types/index.js';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Resolve the log level from an environment value, falling back to info
 */
export function resolveLogLevel(value: string | undefined): LogLevel {
  const candidate = value?.trim().toLowerCase();
  if (candidate && isLogLevel(candidate)) {
    return candidate;
  }
  return 'info';
}

/**
 * Create a console logger scoped to a module
 */
export function createLogger(
  module: string,
  level: LogLevel = resolveLogLevel(process.env['CLEANER_LOG_LEVEL'])
): Logger {
  const threshold = LEVEL_ORDER[level];

  const emit = (
    entryLevel: Exclude<LogLevel, 'silent'>,
    sink: (line: string) => void,
    message: string,
    context?: Record<string, unknown>
  ): void => {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    sink(JSON.stringify({ level: entryLevel, module, message, ...context, timestamp: new Date().toISOString() }));
  };

  return {
    debug: (message, context) => emit('debug', (line) => console.debug(line), message, context),
    info: (message, context) => emit('info', (line) => console.log(line), message, context),
    warn: (message, context) => emit('warn', (line) => console.warn(line), message, context),
    error: (message, context) => emit('error', (line) => console.error(line), message, context),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => { /* no-op */ },
  warn: () => { /* no-op */ },
  error: () => { /* no-op */ },
  debug: () => { /* no-op */ },
};
