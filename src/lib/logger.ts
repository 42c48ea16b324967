/**
 * Leveled console logger.
 *
 * Level comes from LOG_LEVEL at first use. `child(scope)` prefixes lines with a
 * scope tag, e.g. `[lending:service]`.
 */

import { getLogLevel, type LogLevel } from './config/runtime';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
  child(scope: string): Logger;
}

let cachedLevel: LogLevel | null = null;

function currentLevel(): LogLevel {
  if (cachedLevel === null) {
    cachedLevel = getLogLevel();
  }
  return cachedLevel;
}

/** Test hook; pass null to re-read LOG_LEVEL. */
export function setLogLevel(level: LogLevel | null): void {
  cachedLevel = level;
}

function formatContext(context: LogContext | undefined): string {
  if (!context || Object.keys(context).length === 0) {
    return '';
  }
  return ` ${JSON.stringify(context, (_key, value: unknown) => (typeof value === 'bigint' ? value.toString() : value))}`;
}

function write(level: LogLevel, scope: string, message: string, context?: LogContext): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel()]) {
    return;
  }

  const line = `${new Date().toISOString()} ${level.toUpperCase()} [${scope}] ${message}${formatContext(context)}`;
  if (level === 'error') {
    console.error(line);
  } else if (level === 'warn') {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function createLogger(scope: string): Logger {
  return {
    debug: (message, context) => write('debug', scope, message, context),
    info: (message, context) => write('info', scope, message, context),
    warn: (message, context) => write('warn', scope, message, context),
    error: (message, context) => write('error', scope, message, context),
    child: (childScope) => createLogger(`${scope}:${childScope}`),
  };
}

export const logger = createLogger('lending');
