/**
 * @warden/shield - Secret Scanner
 *
 * Finds credentials and tokens in free text. Values are masked at
 * detection time: a SecretMatch only ever carries a 4-character prefix.
 */

import { compilePattern, countChar, lazy } from '@warden/core';
import { isAtLeast, maxRisk, type RiskLevel } from './levels.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const BUILTIN_SECRET_TYPES = [
  'api_key',
  'aws_access_key',
  'aws_secret_key',
  'github_token',
  'gitlab_token',
  'slack_token',
  'private_key',
  'password',
  'jwt_token',
  'generic_secret',
  'database_url',
] as const;

export type BuiltinSecretType = (typeof BUILTIN_SECRET_TYPES)[number];
export type SecretType = BuiltinSecretType | `custom:${string}`;

export function secretTypeLabel(type: SecretType): string {
  return type.startsWith('custom:') ? type.slice('custom:'.length) : type.toUpperCase();
}

export interface SecretMatch {
  type: SecretType;
  /** Masked value: at most the first 4 characters, then `****`. */
  value: string;
  /** Where the text came from, e.g. a file name or `<inline>`. */
  location: string;
  /** 1-based line of the match start. */
  line: number;
  confidence: number;
}

export interface ScanResult {
  matches: SecretMatch[];
  filesScanned: number;
  riskLevel: RiskLevel;
}

interface SecretPattern {
  type: SecretType;
  regex: RegExp;
  confidence: number;
  risk: RiskLevel;
}

// ---------------------------------------------------------------------------
// Built-in patterns
// ---------------------------------------------------------------------------

// Patterns that can fail at the end of a long token (JWT) only start at the
// token's first character.

const BUILTIN_PATTERN_SOURCES: ReadonlyArray<{
  type: BuiltinSecretType;
  source: string;
  flags?: string;
  confidence: number;
  risk: RiskLevel;
}> = [
  { type: 'aws_access_key', source: String.raw`AKIA[0-9A-Z]{16}`, confidence: 0.95, risk: 'critical' },
  {
    type: 'aws_secret_key',
    source: String.raw`aws_?secret_?(?:access_?)?key\s*[=:]\s*['"]?[A-Za-z0-9/+=]{40}['"]?`,
    flags: 'i',
    confidence: 0.9,
    risk: 'critical',
  },
  { type: 'github_token', source: String.raw`gh[pousr]_[A-Za-z0-9_]{36,}`, confidence: 0.95, risk: 'critical' },
  { type: 'gitlab_token', source: String.raw`glpat-[A-Za-z0-9\-]{20,}`, confidence: 0.95, risk: 'critical' },
  { type: 'slack_token', source: String.raw`xox[baprs]-[A-Za-z0-9\-]+`, confidence: 0.9, risk: 'high' },
  {
    type: 'jwt_token',
    source: String.raw`(?<![A-Za-z0-9_\-])eyJ[A-Za-z0-9_\-]+\.eyJ[A-Za-z0-9_\-]+\.[A-Za-z0-9_\-]+`,
    confidence: 0.85,
    risk: 'high',
  },
  {
    type: 'private_key',
    source: String.raw`-----BEGIN (?:RSA |EC |DSA |OPENSSH )?PRIVATE KEY-----`,
    confidence: 0.99,
    risk: 'critical',
  },
  {
    type: 'database_url',
    source: String.raw`(?:postgres|mysql|mongodb|redis)://[^\s]+`,
    flags: 'i',
    confidence: 0.9,
    risk: 'high',
  },
  { type: 'api_key', source: String.raw`\bsk-(?:ant-|proj-)?[A-Za-z0-9_\-]{20,}`, confidence: 0.9, risk: 'high' },
  {
    type: 'password',
    source: String.raw`\b(?:password|passwd|pwd)\s*[=:]\s*['"]?[^\s'"]{8,}['"]?`,
    flags: 'i',
    confidence: 0.75,
    risk: 'high',
  },
  {
    type: 'generic_secret',
    source: String.raw`(?:api[_\-]?key|apikey|api_secret|access_token)\s*[=:]\s*['"]?[a-zA-Z0-9_\-]{20,}['"]?`,
    flags: 'i',
    confidence: 0.7,
    risk: 'medium',
  },
];

const builtinPatterns = lazy((): readonly SecretPattern[] =>
  Object.freeze(
    BUILTIN_PATTERN_SOURCES.map((p) => ({
      type: p.type,
      regex: compilePattern(p.source, `g${p.flags ?? ''}`, `secret:${p.type}`),
      confidence: p.confidence,
      risk: p.risk,
    })),
  ),
);

const BUILTIN_RISK = new Map<SecretType, RiskLevel>(
  BUILTIN_PATTERN_SOURCES.map((p): [SecretType, RiskLevel] => [p.type, p.risk]),
);

/**
 * Compile every built-in secret pattern now instead of on first scan.
 */
export function warmSecretPatterns(): void {
  builtinPatterns();
}

// ---------------------------------------------------------------------------
// Masking
// ---------------------------------------------------------------------------

const MASK = '****';

/**
 * Irreversibly mask a secret, keeping at most its first 4 characters.
 * Characters are code points, so a surrogate pair is never split.
 */
export function maskSecret(secret: string): string {
  const chars = Array.from(secret);
  if (chars.length <= 4) return MASK;
  return chars.slice(0, 4).join('') + MASK;
}

// ---------------------------------------------------------------------------
// SecretScanner class
// ---------------------------------------------------------------------------

export interface CustomSecretPattern {
  label: string;
  pattern: string | RegExp;
  confidence: number;
  risk: RiskLevel;
}

export class SecretScanner {
  private readonly customPatterns: SecretPattern[] = [];

  constructor(customPatterns: CustomSecretPattern[] = []) {
    for (const custom of customPatterns) {
      this.addPattern(custom.label, custom.pattern, custom.confidence, custom.risk);
    }
  }

  /**
   * Register an extra pattern, reported as `custom:<label>`.
   *
   * @throws PatternCompileError when a string pattern does not compile
   */
  addPattern(label: string, pattern: string | RegExp, confidence: number, risk: RiskLevel = 'high'): void {
    const type: SecretType = `custom:${label}`;
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    const baseFlags = typeof pattern === 'string' ? '' : pattern.flags;
    const flags = baseFlags.includes('g') ? baseFlags : baseFlags + 'g';

    this.customPatterns.push({
      type,
      regex: compilePattern(source, flags, `secret:${type}`),
      confidence,
      risk,
    });
  }

  scanText(text: string): SecretMatch[] {
    return this.scanTextWithContext(text, '<inline>');
  }

  /**
   * Scan `text`, tagging every match with `location`. Results are ordered
   * by line; matches on the same line keep pattern order.
   */
  scanTextWithContext(text: string, location: string): SecretMatch[] {
    const matches: SecretMatch[] = [];

    for (const pattern of [...builtinPatterns(), ...this.customPatterns]) {
      for (const m of text.matchAll(pattern.regex)) {
        const value = m[0];
        if (value.length === 0) continue;
        const start = m.index ?? 0;

        matches.push({
          type: pattern.type,
          value: maskSecret(value),
          location,
          line: countChar(text, '\n', start) + 1,
          confidence: pattern.confidence,
        });
      }
    }

    matches.sort((a, b) => a.line - b.line);
    return matches;
  }

  /**
   * Aggregate risk of a set of matches.
   *
   * The worst intrinsic risk wins, then volume raises the floor: three or
   * more matches are at least high, five or more are critical.
   */
  riskLevel(matches: readonly SecretMatch[]): RiskLevel {
    if (matches.length === 0) return 'none';

    let worst: RiskLevel = 'low';
    for (const m of matches) {
      worst = maxRisk(worst, this.intrinsicRisk(m.type));
    }

    if (matches.length >= 5) return 'critical';
    if (matches.length >= 3 && !isAtLeast(worst, 'high')) return 'high';
    return worst;
  }

  scan(text: string): ScanResult {
    const matches = this.scanText(text);
    return {
      matches,
      filesScanned: 1,
      riskLevel: this.riskLevel(matches),
    };
  }

  /** Unknown types count as low. */
  private intrinsicRisk(type: SecretType): RiskLevel {
    const builtin = BUILTIN_RISK.get(type);
    if (builtin) return builtin;
    return this.customPatterns.find((p) => p.type === type)?.risk ?? 'low';
  }
}
