/**
 * @warden/shield - PII Detector
 *
 * Pattern-based PII scanner with confidence scoring and a reversible
 * cloaking codec. Built-in patterns cover email, phone, SSN, credit card
 * and IPv4 addresses; custom patterns can be added per instance.
 */

import {
  BUILTIN_PII_TYPE_NAMES,
  ShieldConfigError,
  compilePattern,
  isValidCustomPiiLabel,
  isValidPiiTypeName,
  lazy,
} from '@warden/core';
import {
  applyReplacements,
  buildCloakMap,
  buildReplacement,
  uncloakText,
  type CloakFormat,
} from './cloaking.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const BUILTIN_PII_TYPES = BUILTIN_PII_TYPE_NAMES;

export type BuiltinPiiType = (typeof BUILTIN_PII_TYPES)[number];
export type CustomPiiType = `custom:${string}`;
export type PiiType = BuiltinPiiType | CustomPiiType;

const PII_TYPE_LABELS: Record<BuiltinPiiType, string> = {
  email: 'EMAIL',
  phone: 'PHONE',
  ssn: 'SSN',
  credit_card: 'CREDIT_CARD',
  ip_address: 'IP_ADDRESS',
  name: 'NAME',
  address: 'ADDRESS',
  date_of_birth: 'DOB',
  passport: 'PASSPORT',
  drivers_license: 'DRIVERS_LICENSE',
  bank_account: 'BANK_ACCOUNT',
};

export function customPiiType(label: string): CustomPiiType {
  return `custom:${label}`;
}

export function isCustomPiiType(type: PiiType): type is CustomPiiType {
  return type.startsWith('custom:');
}

/** Narrow a configuration string to a PiiType. Same rule as the config validator. */
export function isPiiType(value: string): value is PiiType {
  return isValidPiiTypeName(value);
}

/**
 * Display label used in placeholder tokens and reports, e.g. EMAIL or DOB.
 */
export function piiTypeLabel(type: PiiType): string {
  if (isCustomPiiType(type)) {
    return type.slice('custom:'.length).toUpperCase().replace(/[^A-Z0-9]+/g, '_');
  }
  return PII_TYPE_LABELS[type];
}

export interface PiiMatch {
  type: PiiType;
  original: string;
  /** Filled in by cloak(); empty after detect(). */
  replacement: string;
  start: number;
  end: number;
  confidence: number;
}

export interface CloakedText {
  text: string;
  matches: PiiMatch[];
  /** Replacement token -> original value. */
  cloakMap: Record<string, string>;
}

export type PiiRiskLabel = 'none' | 'low' | 'medium' | 'high';

export interface PiiReport {
  totalFound: number;
  /** Count per display label. */
  byType: Record<string, number>;
  riskLevel: PiiRiskLabel;
}

export interface CustomPiiPattern {
  label: string;
  pattern: string | RegExp;
  confidence: number;
}

export interface PiiConfig {
  /** Types to scan for. Empty means every built-in and custom type. */
  typesToDetect: PiiType[];
  cloakingFormat: CloakFormat;
  /** Redact format only: keep the original length. */
  preserveFormat: boolean;
  /** Hash format only: salt mixed into the digest. */
  hashSalt?: string;
  /** Matches below this confidence are dropped. Default 0. */
  minConfidence?: number;
  customPatterns?: CustomPiiPattern[];
}

export const DEFAULT_PII_CONFIG: PiiConfig = {
  typesToDetect: [],
  cloakingFormat: 'placeholder',
  preserveFormat: false,
};

interface PiiPattern {
  type: PiiType;
  regex: RegExp;
  confidence: number;
}

// ---------------------------------------------------------------------------
// Built-in patterns (compiled once, on first use)
// ---------------------------------------------------------------------------

// The email match may not start inside a run of local-part characters, so a
// long run with no '@' is walked once instead of once per offset.

const BUILTIN_PATTERN_SOURCES: ReadonlyArray<{
  type: BuiltinPiiType;
  source: string;
  confidence: number;
}> = [
  { type: 'email', source: String.raw`(?<![a-zA-Z0-9._%+\-])[a-zA-Z0-9._%+\-]+@[a-zA-Z0-9.\-]+\.[a-zA-Z]{2,}`, confidence: 0.95 },
  { type: 'ssn', source: String.raw`\b\d{3}-\d{2}-\d{4}\b`, confidence: 0.9 },
  { type: 'credit_card', source: String.raw`\b\d{4}[- ]?\d{4}[- ]?\d{4}[- ]?\d{4}\b`, confidence: 0.85 },
  { type: 'phone', source: String.raw`\b\d{3}[-.]?\d{3}[-.]?\d{4}\b`, confidence: 0.8 },
  { type: 'ip_address', source: String.raw`\b\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}\b`, confidence: 0.75 },
];

const builtinPatterns = lazy((): readonly PiiPattern[] =>
  Object.freeze(
    BUILTIN_PATTERN_SOURCES.map((p) => ({
      type: p.type,
      regex: compilePattern(p.source, 'g', `pii:${p.type}`),
      confidence: p.confidence,
    })),
  ),
);

/**
 * Compile every built-in PII pattern now instead of on first scan.
 * Throws PatternCompileError if any of them is malformed.
 */
export function warmPiiPatterns(): void {
  builtinPatterns();
}

// ---------------------------------------------------------------------------
// PiiDetector class
// ---------------------------------------------------------------------------

export class PiiDetector {
  private readonly config: PiiConfig;
  private readonly customPatterns: PiiPattern[] = [];

  constructor(config: Partial<PiiConfig> = {}) {
    this.config = {
      ...DEFAULT_PII_CONFIG,
      ...config,
      typesToDetect: [...(config.typesToDetect ?? DEFAULT_PII_CONFIG.typesToDetect)],
    };

    for (const custom of config.customPatterns ?? []) {
      this.addPattern(custom.label, custom.pattern, custom.confidence);
    }
  }

  /**
   * Add a custom PII pattern, reported as `custom:<label>`.
   *
   * @throws ShieldConfigError when the label has characters other than
   *   letters, digits, `_` and `-`
   * @throws PatternCompileError when a string pattern does not compile
   */
  addPattern(label: string, pattern: string | RegExp, confidence: number): void {
    if (!isValidCustomPiiLabel(label)) {
      throw new ShieldConfigError(
        `Invalid custom PII label "${label}": use letters, digits, "_" or "-"`,
      );
    }
    const type = customPiiType(label);
    const source = typeof pattern === 'string' ? pattern : pattern.source;
    const baseFlags = typeof pattern === 'string' ? '' : pattern.flags;
    // Ensure global flag so we can iterate all matches
    const flags = baseFlags.includes('g') ? baseFlags : baseFlags + 'g';

    this.customPatterns.push({
      type,
      regex: compilePattern(source, flags, `pii:${type}`),
      confidence,
    });
  }

  /**
   * Scan `text` and return all PII matches, ascending by start offset and
   * free of overlaps. The text is not modified.
   */
  detect(text: string): PiiMatch[] {
    const minConfidence = this.config.minConfidence ?? 0;
    const matches: PiiMatch[] = [];

    for (const pattern of this.activePatterns()) {
      if (pattern.confidence < minConfidence) continue;

      for (const m of text.matchAll(pattern.regex)) {
        const value = m[0];
        if (value.length === 0) continue;
        const start = m.index ?? 0;

        matches.push({
          type: pattern.type,
          original: value,
          replacement: '',
          start,
          end: start + value.length,
          confidence: pattern.confidence,
        });
      }
    }

    // Stable sort: on equal starts the earlier pattern stays first.
    matches.sort((a, b) => a.start - b.start);

    return resolveOverlaps(matches);
  }

  /**
   * Replace all detected PII with cloaked tokens, returning the cloaked
   * text and the map needed to restore the originals.
   */
  cloak(text: string): CloakedText {
    const ordinals = new Map<string, number>();

    const matches = this.detect(text).map((m) => {
      const label = piiTypeLabel(m.type);
      const ordinal = (ordinals.get(label) ?? 0) + 1;
      ordinals.set(label, ordinal);

      return {
        ...m,
        replacement: buildReplacement(m.original, label, ordinal, {
          format: this.config.cloakingFormat,
          preserveFormat: this.config.preserveFormat,
          hashSalt: this.config.hashSalt,
        }),
      };
    });

    return {
      text: applyReplacements(text, matches),
      matches,
      cloakMap: buildCloakMap(matches),
    };
  }

  /**
   * Restore original PII values in a cloaked text. Purely textual; does
   * not re-run detection.
   */
  static uncloak(cloaked: Pick<CloakedText, 'text' | 'cloakMap'>): string {
    return uncloakText(cloaked.text, cloaked.cloakMap);
  }

  /**
   * Aggregate report of PII found in `text`.
   *
   * The risk label is derived from the total count only; an SSN and an IP
   * address weigh the same.
   */
  detectAndReport(text: string): PiiReport {
    const matches = this.detect(text);
    const byType: Record<string, number> = {};

    for (const m of matches) {
      const label = piiTypeLabel(m.type);
      byType[label] = (byType[label] ?? 0) + 1;
    }

    return {
      totalFound: matches.length,
      byType,
      riskLevel: piiRiskFromCount(matches.length),
    };
  }

  /**
   * True if `type` is scanned under the current config (an empty
   * allowlist scans everything).
   */
  shouldDetect(type: PiiType): boolean {
    return this.config.typesToDetect.length === 0 || this.config.typesToDetect.includes(type);
  }

  private activePatterns(): PiiPattern[] {
    return [...builtinPatterns(), ...this.customPatterns].filter((p) => this.shouldDetect(p.type));
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function piiRiskFromCount(count: number): PiiRiskLabel {
  if (count === 0) return 'none';
  if (count <= 2) return 'low';
  if (count <= 5) return 'medium';
  return 'high';
}

/**
 * Remove overlapping matches from a start-sorted list.
 *
 * For every overlapping pair the lower-confidence match is dropped; on a
 * tie the earlier one is kept.
 */
function resolveOverlaps(matches: PiiMatch[]): PiiMatch[] {
  if (matches.length < 2) return matches;

  const keep = matches.map(() => true);

  for (let i = 0; i < matches.length; i++) {
    const current = matches[i];
    if (!keep[i] || current === undefined) continue;

    for (let j = i + 1; j < matches.length; j++) {
      const other = matches[j];
      if (!keep[j] || other === undefined) continue;
      if (other.start >= current.end) break;

      if (other.confidence > current.confidence) {
        keep[i] = false;
        break;
      }
      keep[j] = false;
    }
  }

  return matches.filter((_, idx) => keep[idx]);
}
