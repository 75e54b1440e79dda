/**
 * @warden/shield - Privacy and security inspection shield
 *
 * PII detection and cloaking, secret scanning, injection assessment and
 * per-destination access policy, combined by HiveShield into one decision
 * per message.
 */

export {
  RISK_LEVELS,
  DATA_CLASSIFICATIONS,
  PROVIDER_TRUST_LEVELS,
  riskRank,
  classificationRank,
  maxRisk,
  raiseRisk,
  isAtLeast,
  type RiskLevel,
  type ThreatLevel,
  type DataClassification,
  type ProviderTrust,
} from './levels.js';

export {
  buildReplacement,
  applyReplacements,
  buildCloakMap,
  uncloakText,
  type CloakFormat,
  type CloakOptions,
  type Replacement,
} from './cloaking.js';

export {
  PiiDetector,
  BUILTIN_PII_TYPES,
  DEFAULT_PII_CONFIG,
  customPiiType,
  isCustomPiiType,
  isPiiType,
  piiTypeLabel,
  piiRiskFromCount,
  warmPiiPatterns,
  type BuiltinPiiType,
  type CustomPiiType,
  type PiiType,
  type PiiMatch,
  type CloakedText,
  type PiiReport,
  type PiiRiskLabel,
  type PiiConfig,
  type CustomPiiPattern,
} from './pii-detector.js';

export {
  SecretScanner,
  BUILTIN_SECRET_TYPES,
  maskSecret,
  secretTypeLabel,
  warmSecretPatterns,
  type BuiltinSecretType,
  type SecretType,
  type SecretMatch,
  type ScanResult,
  type CustomSecretPattern,
} from './secret-scanner.js';

export {
  VulnerabilityAssessor,
  UNSAFE_THRESHOLD,
  type Assessment,
  type DetectedThreat,
  type ThreatCategory,
} from './vulnerability.js';

export {
  PolicyEngine,
  type AccessPolicy,
  type AccessDecision,
  type AccessContext,
  type RequiredAction,
  type PolicyEngineOptions,
} from './policy-engine.js';

export {
  ShieldCounters,
  COUNTER_NAMES,
  type CounterName,
  type CounterSnapshot,
} from './counters.js';

export {
  HiveShield,
  DEFAULT_SHIELD_CONFIG,
  SECRETS_BLOCKED_REASON,
  PII_NOT_CLOAKED_REASON,
  type ShieldConfig,
  type ShieldAction,
  type ShieldResult,
  type OutgoingOptions,
  type HiveShieldOptions,
} from './shield.js';

export { toAuditEntry, type AuditEntry, type Direction } from './audit.js';

export { createShieldFromConfig } from './from-config.js';
