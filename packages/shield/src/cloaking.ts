/**
 * @warden/shield - Cloaking codec
 *
 * Three formats for replacing detected PII:
 *   "placeholder" -> [EMAIL_1]
 *   "hash"        -> [EMAIL_1a2b3c4d]
 *   "redact"      -> **** (or one asterisk per original character)
 *
 * Replacements are applied in reverse position order to preserve string
 * indices. Placeholder and hash tokens are reversible through the cloak map;
 * redact tokens are only reversible when they are unambiguous.
 */

import { hash } from '@warden/core';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type CloakFormat = 'placeholder' | 'hash' | 'redact';

export interface CloakOptions {
  format: CloakFormat;
  /** Redact only: emit one asterisk per original character. */
  preserveFormat: boolean;
  /** Hash only: salt mixed into the digest. */
  hashSalt?: string;
}

/** Any span that can be substituted into a string. */
export interface Replacement {
  start: number;
  end: number;
  original: string;
  replacement: string;
}

// ---------------------------------------------------------------------------
// Token generation
// ---------------------------------------------------------------------------

const REDACT_TOKEN = '****';

/**
 * Build the replacement token for one match.
 *
 * @param label - Display label of the PII type, e.g. EMAIL
 * @param ordinal - 1-based count of this label seen so far, left to right
 */
export function buildReplacement(
  original: string,
  label: string,
  ordinal: number,
  options: CloakOptions,
): string {
  switch (options.format) {
    case 'placeholder':
      return `[${label}_${ordinal}]`;

    case 'hash':
      return `[${label}_${digest(original, options.hashSalt)}]`;

    case 'redact':
      return options.preserveFormat ? '*'.repeat(original.length) : REDACT_TOKEN;
  }
}

/**
 * First 8 hex characters of SHA-256 over the (optionally salted) value.
 */
function digest(value: string, salt?: string): string {
  const input = salt ? `${salt}:${value}` : value;
  return hash(input).slice(0, 8);
}

// ---------------------------------------------------------------------------
// Substitution
// ---------------------------------------------------------------------------

/**
 * Substitute every replacement into `text`.
 *
 * Spans must not overlap. They are processed right to left so that
 * earlier offsets stay valid as replacement lengths differ.
 */
export function applyReplacements(text: string, replacements: readonly Replacement[]): string {
  if (replacements.length === 0) return text;

  const sorted = [...replacements].sort((a, b) => b.start - a.start);

  let result = text;
  for (const r of sorted) {
    result = result.slice(0, r.start) + r.replacement + result.slice(r.end);
  }
  return result;
}

/**
 * Build the token -> original map for a set of replacements.
 *
 * A token that stands for two different originals (possible with the
 * redact format) cannot be restored and is left out of the map.
 */
export function buildCloakMap(replacements: readonly Replacement[]): Record<string, string> {
  const map = new Map<string, string>();
  const ambiguous = new Set<string>();

  for (const r of replacements) {
    if (ambiguous.has(r.replacement)) continue;

    const existing = map.get(r.replacement);
    if (existing !== undefined && existing !== r.original) {
      map.delete(r.replacement);
      ambiguous.add(r.replacement);
      continue;
    }
    map.set(r.replacement, r.original);
  }

  return Object.fromEntries(map);
}

/**
 * Restore originals by literal token substitution.
 *
 * Longer tokens are substituted first so a short redact token never eats
 * part of a longer one. Replacement text is inserted verbatim (no `$`
 * pattern expansion).
 */
export function uncloakText(text: string, cloakMap: Readonly<Record<string, string>>): string {
  const tokens = Object.keys(cloakMap).sort((a, b) => b.length - a.length);

  let result = text;
  for (const token of tokens) {
    const original = cloakMap[token];
    if (original === undefined || token === '') continue;
    result = result.split(token).join(original);
  }
  return result;
}
