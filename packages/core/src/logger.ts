/**
 * @warden/core - Logger factory
 *
 * Thin wrapper over pino so every package names its logger the same way
 * and honours WARDEN_LOG_LEVEL.
 */

import pino from 'pino';

export type Logger = pino.Logger;

export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

const LOG_LEVELS: ReadonlySet<string> = new Set([
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]);

export interface LoggerOptions {
  /** Explicit level. Falls back to WARDEN_LOG_LEVEL, then 'info'. */
  level?: LogLevel;
  /** Destination stream, mainly for tests. Defaults to stdout. */
  destination?: pino.DestinationStream;
}

/**
 * Resolve the effective log level from an explicit value or the environment.
 */
export function resolveLogLevel(level?: string): LogLevel {
  const candidate = level ?? process.env['WARDEN_LOG_LEVEL'];
  if (candidate && isLogLevel(candidate)) return candidate;
  return 'info';
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.has(value);
}

/**
 * Create a named pino logger, e.g. `createLogger('@warden/shield')`.
 */
export function createLogger(name: string, options: LoggerOptions = {}): Logger {
  const pinoOptions: pino.LoggerOptions = {
    name,
    level: resolveLogLevel(options.level),
  };
  return options.destination ? pino(pinoOptions, options.destination) : pino(pinoOptions);
}
