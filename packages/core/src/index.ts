/**
 * @warden/core - Core package for Warden
 *
 * Configuration, logging, error types and shared utilities used by the
 * shield pipeline.
 */

// Configuration
export * from './config/index.js';

// Errors
export {
  ShieldConfigError,
  PatternCompileError,
  compilePattern,
  type ConfigIssue,
} from './errors.js';

// Logging
export {
  createLogger,
  resolveLogLevel,
  type Logger,
  type LogLevel,
  type LoggerOptions,
} from './logger.js';

// Utilities
export {
  lazy,
  truncate,
  countChar,
  hash,
  isPlainObject,
  assertNever,
} from './utils/index.js';
