/**
 * @warden/shield - HiveShield
 *
 * Orchestrates the detectors into one decision per message.
 *
 * Outgoing: secret scan -> vulnerability check -> PII detection ->
 * access policy -> allow / cloak / warn. The first blocking stage wins.
 * Incoming: every detector runs and findings fold into a single warning.
 */

import { performance } from 'node:perf_hooks';
import { nanoid } from 'nanoid';
import { assertNever, type Logger } from '@warden/core';
import { toAuditEntry, type Direction } from './audit.js';
import { ShieldCounters } from './counters.js';
import type { DataClassification } from './levels.js';
import {
  DEFAULT_PII_CONFIG,
  PiiDetector,
  warmPiiPatterns,
  type CloakedText,
  type PiiConfig,
  type PiiMatch,
} from './pii-detector.js';
import { PolicyEngine, type AccessPolicy } from './policy-engine.js';
import {
  SecretScanner,
  warmSecretPatterns,
  type CustomSecretPattern,
  type SecretMatch,
} from './secret-scanner.js';
import { VulnerabilityAssessor, type Assessment } from './vulnerability.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ShieldConfig {
  pii: PiiConfig;
  enableSecretScan: boolean;
  enableVulnerabilityCheck: boolean;
  /** Destination name -> policy. */
  accessPolicies: Record<string, AccessPolicy>;
  /** Policy for destinations not listed above. Null denies them. */
  fallbackPolicy?: AccessPolicy | null;
  customSecretPatterns?: CustomSecretPattern[];
}

export const DEFAULT_SHIELD_CONFIG: ShieldConfig = {
  pii: DEFAULT_PII_CONFIG,
  enableSecretScan: true,
  enableVulnerabilityCheck: true,
  accessPolicies: {},
  fallbackPolicy: null,
};

export type ShieldAction =
  | { type: 'allow' }
  | { type: 'cloak_and_allow'; cloaked: CloakedText }
  | { type: 'block'; reason: string }
  | { type: 'warn'; reason: string };

export interface ShieldResult {
  /** Unique id for correlating this decision with audit records. */
  auditId: string;
  action: ShieldAction;
  piiFound: PiiMatch[];
  secretsFound: SecretMatch[];
  assessment?: Assessment;
  processingTimeMs: number;
}

export interface OutgoingOptions {
  /** Defaults to 'internal'. */
  classification?: DataClassification;
  dataType?: string;
}

export interface HiveShieldOptions {
  logger?: Logger;
  /** Share counters with other shields or threads. */
  counters?: ShieldCounters;
}

export const SECRETS_BLOCKED_REASON = 'Message contains secrets/credentials and cannot be sent';
export const PII_NOT_CLOAKED_REASON =
  'PII detected in outgoing message but cloaking not required by policy';

// ---------------------------------------------------------------------------
// HiveShield class
// ---------------------------------------------------------------------------

export class HiveShield {
  readonly config: Readonly<ShieldConfig>;
  readonly counters: ShieldCounters;
  readonly logger: Logger | undefined;

  private readonly piiDetector: PiiDetector;
  private readonly secretScanner: SecretScanner;
  private readonly assessor: VulnerabilityAssessor;
  private readonly policyEngine: PolicyEngine;

  constructor(config: Partial<ShieldConfig> = {}, options: HiveShieldOptions = {}) {
    this.config = Object.freeze({ ...DEFAULT_SHIELD_CONFIG, ...config });
    this.counters = options.counters ?? new ShieldCounters();
    this.logger = options.logger;

    // Malformed built-in patterns fail here, not on the first message.
    warmPiiPatterns();
    warmSecretPatterns();

    this.piiDetector = new PiiDetector(this.config.pii);
    this.secretScanner = new SecretScanner(this.config.customSecretPatterns);
    this.assessor = new VulnerabilityAssessor();
    this.policyEngine = new PolicyEngine({
      fallbackPolicy: this.config.fallbackPolicy,
      logger: this.logger,
    });

    for (const [destination, policy] of Object.entries(this.config.accessPolicies)) {
      this.policyEngine.addPolicy(destination, policy);
    }
  }

  // ---- Counters ----

  piiDetectionCount(): number {
    return this.counters.get('piiDetections');
  }

  secretsBlockedCount(): number {
    return this.counters.get('secretsBlocked');
  }

  threatsCaughtCount(): number {
    return this.counters.get('threatsCaught');
  }

  // ---- Pipelines ----

  /**
   * Inspect text headed to `destination` and decide what may be sent.
   */
  processOutgoing(text: string, destination: string, options: OutgoingOptions = {}): ShieldResult {
    const startedAt = performance.now();
    const finish = (
      action: ShieldAction,
      findings: Pick<ShieldResult, 'piiFound' | 'secretsFound' | 'assessment'>,
    ): ShieldResult => this.finish('outgoing', startedAt, action, findings, destination);

    // 1. Secrets are never forwarded, whatever the policy says.
    const secretsFound = this.config.enableSecretScan ? this.secretScanner.scanText(text) : [];
    if (secretsFound.length > 0) {
      this.counters.add('secretsBlocked', secretsFound.length);
      return finish({ type: 'block', reason: SECRETS_BLOCKED_REASON }, { piiFound: [], secretsFound });
    }

    // 2. Injection / exfiltration
    const assessment = this.config.enableVulnerabilityCheck
      ? this.assessor.assessPrompt(text)
      : undefined;
    if (assessment && !assessment.safeToSend) {
      this.counters.add('threatsCaught', 1);
      return finish(
        { type: 'block', reason: `Prompt blocked: threat level '${assessment.threatLevel}' detected` },
        { piiFound: [], secretsFound, assessment },
      );
    }

    // 3. PII
    const piiFound = this.piiDetector.detect(text);
    const containsPii = piiFound.length > 0;
    this.counters.add('piiDetections', piiFound.length);

    // 4. Access policy
    const decision = this.policyEngine.checkAccess(
      destination,
      options.classification ?? 'internal',
      containsPii,
      { content: text, dataType: options.dataType },
    );
    const findings = { piiFound, secretsFound, assessment };

    if (!decision.allowed) {
      return finish({ type: 'block', reason: decision.reason }, findings);
    }

    // 5. Resolution
    if (containsPii && decision.requiredActions.includes('cloak_pii')) {
      return finish({ type: 'cloak_and_allow', cloaked: this.piiDetector.cloak(text) }, findings);
    }
    if (containsPii) {
      return finish({ type: 'warn', reason: PII_NOT_CLOAKED_REASON }, findings);
    }
    return finish({ type: 'allow' }, findings);
  }

  /**
   * Inspect a model response. Nothing is blocked; findings become a
   * single warning naming each category that fired.
   */
  processIncoming(text: string): ShieldResult {
    const startedAt = performance.now();

    const secretsFound = this.config.enableSecretScan ? this.secretScanner.scanText(text) : [];
    const assessment = this.config.enableVulnerabilityCheck
      ? this.assessor.assessResponse(text)
      : undefined;
    const piiFound = this.piiDetector.detect(text);

    this.counters.add('secretsBlocked', secretsFound.length);
    this.counters.add('piiDetections', piiFound.length);
    const injection = assessment !== undefined && !assessment.safeToSend;
    if (injection) this.counters.add('threatsCaught', 1);

    const warnings: string[] = [];
    if (secretsFound.length > 0) warnings.push('Response contains secrets/credentials');
    if (piiFound.length > 0) warnings.push('Response contains PII');
    if (injection) warnings.push('Response contains potential injection');

    const action: ShieldAction =
      warnings.length > 0 ? { type: 'warn', reason: warnings.join('; ') } : { type: 'allow' };

    return this.finish('incoming', startedAt, action, { piiFound, secretsFound, assessment });
  }

  /**
   * Put original PII back into a response that echoes tokens produced
   * when the matching outgoing message was cloaked.
   */
  static uncloakResponse(text: string, cloaked: Pick<CloakedText, 'cloakMap'>): string {
    return PiiDetector.uncloak({ text, cloakMap: cloaked.cloakMap });
  }

  // ---- Internal ----

  private finish(
    direction: Direction,
    startedAt: number,
    action: ShieldAction,
    findings: Pick<ShieldResult, 'piiFound' | 'secretsFound' | 'assessment'>,
    destination?: string,
  ): ShieldResult {
    const result: ShieldResult = {
      auditId: nanoid(),
      action,
      piiFound: findings.piiFound,
      secretsFound: findings.secretsFound,
      processingTimeMs: performance.now() - startedAt,
    };
    if (findings.assessment) result.assessment = findings.assessment;

    this.log(result, direction, destination);
    return result;
  }

  private log(result: ShieldResult, direction: Direction, destination?: string): void {
    if (!this.logger) return;

    const entry = toAuditEntry(result, direction, destination);
    const { action } = result;

    switch (action.type) {
      case 'block':
        this.logger.warn(entry, 'Shield blocked message');
        break;
      case 'warn':
      case 'cloak_and_allow':
      case 'allow':
        this.logger.debug(entry, 'Shield decision');
        break;
      default:
        assertNever(action, 'shield action');
    }
  }
}
