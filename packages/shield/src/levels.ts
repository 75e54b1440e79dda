/**
 * @warden/shield - Ordered scales
 *
 * Risk, data classification and provider trust are all small totally
 * ordered sets. They are plain string unions so they serialise as-is; the
 * ordering lives in the tuples below.
 */

export const RISK_LEVELS = ['none', 'low', 'medium', 'high', 'critical'] as const;
export type RiskLevel = (typeof RISK_LEVELS)[number];

/** Threat levels share the risk scale. */
export type ThreatLevel = RiskLevel;

export const DATA_CLASSIFICATIONS = ['public', 'internal', 'confidential', 'restricted'] as const;
export type DataClassification = (typeof DATA_CLASSIFICATIONS)[number];

export const PROVIDER_TRUST_LEVELS = ['local', 'trusted', 'standard', 'untrusted'] as const;
export type ProviderTrust = (typeof PROVIDER_TRUST_LEVELS)[number];

/** Position of a risk level on the scale (none = 0). */
export function riskRank(level: RiskLevel): number {
  return RISK_LEVELS.indexOf(level);
}

/** Position of a classification on the scale (public = 0). */
export function classificationRank(classification: DataClassification): number {
  return DATA_CLASSIFICATIONS.indexOf(classification);
}

/** The more severe of two risk levels. */
export function maxRisk(a: RiskLevel, b: RiskLevel): RiskLevel {
  return riskRank(a) >= riskRank(b) ? a : b;
}

/** Move `steps` up the risk scale, stopping at critical. */
export function raiseRisk(level: RiskLevel, steps = 1): RiskLevel {
  const idx = Math.min(riskRank(level) + steps, RISK_LEVELS.length - 1);
  return RISK_LEVELS[idx] ?? 'critical';
}

export function isAtLeast(level: RiskLevel, floor: RiskLevel): boolean {
  return riskRank(level) >= riskRank(floor);
}
