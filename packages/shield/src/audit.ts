/**
 * @warden/shield - Audit entries
 *
 * Content-free projection of a ShieldResult for an external audit sink.
 * Entries carry counts, types and the decision; never the inspected text,
 * PII values or secret prefixes.
 */

import { piiTypeLabel } from './pii-detector.js';
import { secretTypeLabel } from './secret-scanner.js';
import type { ShieldAction, ShieldResult } from './shield.js';
import type { ThreatLevel } from './levels.js';

export type Direction = 'outgoing' | 'incoming';

export interface AuditEntry {
  auditId: string;
  direction: Direction;
  destination?: string;
  action: ShieldAction['type'];
  reason?: string;
  piiCount: number;
  piiTypes: string[];
  secretCount: number;
  secretTypes: string[];
  threatLevel?: ThreatLevel;
  threatCategories: string[];
  processingTimeMs: number;
}

export function toAuditEntry(
  result: ShieldResult,
  direction: Direction,
  destination?: string,
): AuditEntry {
  const entry: AuditEntry = {
    auditId: result.auditId,
    direction,
    action: result.action.type,
    piiCount: result.piiFound.length,
    piiTypes: unique(result.piiFound.map((m) => piiTypeLabel(m.type))),
    secretCount: result.secretsFound.length,
    secretTypes: unique(result.secretsFound.map((m) => secretTypeLabel(m.type))),
    threatCategories: unique(result.assessment?.threats.map((t) => t.category) ?? []),
    processingTimeMs: result.processingTimeMs,
  };

  if (destination !== undefined) entry.destination = destination;
  if (result.action.type === 'block' || result.action.type === 'warn') {
    entry.reason = result.action.reason;
  }
  if (result.assessment) entry.threatLevel = result.assessment.threatLevel;

  return entry;
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
