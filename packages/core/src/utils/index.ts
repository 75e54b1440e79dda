/**
 * @warden/core - Common utilities
 *
 * Shared helper functions used across the Warden packages.
 */

import { createHash } from 'node:crypto';

// ---------------------------------------------------------------------------
// Lazy initialisation
// ---------------------------------------------------------------------------

/**
 * Wrap a factory so it runs at most once, on first access.
 *
 * The returned getter caches the value for the lifetime of the process.
 * If the factory throws, nothing is cached and the error propagates to
 * the caller (and to every later caller).
 */
export function lazy<T>(factory: () => T): () => T {
  let cell: { value: T } | undefined;

  return () => {
    if (cell === undefined) {
      cell = { value: factory() };
    }
    return cell.value;
  };
}

// ---------------------------------------------------------------------------
// String helpers
// ---------------------------------------------------------------------------

/**
 * Truncate a string to a maximum length, appending an ellipsis if truncated.
 */
export function truncate(str: string, maxLength: number, suffix = '...'): string {
  if (str.length <= maxLength) return str;
  if (maxLength <= suffix.length) return suffix.slice(0, maxLength);
  return str.slice(0, maxLength - suffix.length) + suffix;
}

/**
 * Count occurrences of a single character in `str` before `end`.
 */
export function countChar(str: string, char: string, end = str.length): number {
  let count = 0;
  let idx = str.indexOf(char);
  while (idx !== -1 && idx < end) {
    count++;
    idx = str.indexOf(char, idx + 1);
  }
  return count;
}

// ---------------------------------------------------------------------------
// Hashing
// ---------------------------------------------------------------------------

/**
 * Compute a SHA-256 hash of the input string.
 *
 * @param input - The string to hash
 * @param encoding - The output encoding (default: hex)
 * @returns The hash string
 */
export function hash(input: string, encoding: 'hex' | 'base64' = 'hex'): string {
  return createHash('sha256').update(input, 'utf-8').digest(encoding);
}

// ---------------------------------------------------------------------------
// Object helpers
// ---------------------------------------------------------------------------

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Exhaustiveness guard for discriminated unions.
 */
export function assertNever(value: never, context = 'value'): never {
  throw new Error(`Unexpected ${context}: ${JSON.stringify(value)}`);
}
