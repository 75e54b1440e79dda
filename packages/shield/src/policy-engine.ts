/**
 * @warden/shield - Policy Engine
 *
 * Per-destination access control. Each destination (a provider or channel
 * name) carries a policy that caps the data classification it may
 * receive and says whether PII must be cloaked first. Destinations
 * without a policy are denied unless a fallback policy is configured.
 */

import { ShieldConfigError, type ConfigIssue, type Logger } from '@warden/core';
import {
  classificationRank,
  type DataClassification,
  type ProviderTrust,
} from './levels.js';

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface AccessPolicy {
  providerTrust: ProviderTrust;
  /** Highest classification this destination may receive. */
  maxClassification: DataClassification;
  requirePiiCloaking: boolean;
  /** Empty allows every data type. */
  allowedDataTypes: readonly string[];
  /** Case-insensitive regular expressions checked against the content. */
  blockedPatterns: readonly string[];
}

export type RequiredAction = 'cloak_pii';

export interface AccessDecision {
  allowed: boolean;
  reason: string;
  requiredActions: RequiredAction[];
}

export interface AccessContext {
  /** Text about to be sent, checked against blockedPatterns. */
  content?: string;
  /** Caller-declared kind of data, checked against allowedDataTypes. */
  dataType?: string;
}

export interface PolicyEngineOptions {
  /** Applied to destinations with no policy. Omit to deny them. */
  fallbackPolicy?: AccessPolicy | null;
  logger?: Logger;
}

interface CompiledPolicy {
  policy: Readonly<AccessPolicy>;
  blocked: ReadonlyArray<{ source: string; regex: RegExp }>;
}

// ---------------------------------------------------------------------------
// Defaults per trust level
// ---------------------------------------------------------------------------

const TRUST_DEFAULTS: Record<ProviderTrust, Pick<AccessPolicy, 'maxClassification' | 'requirePiiCloaking'>> = {
  local: { maxClassification: 'restricted', requirePiiCloaking: false },
  trusted: { maxClassification: 'confidential', requirePiiCloaking: true },
  standard: { maxClassification: 'internal', requirePiiCloaking: true },
  untrusted: { maxClassification: 'public', requirePiiCloaking: true },
};

// ---------------------------------------------------------------------------
// PolicyEngine class
// ---------------------------------------------------------------------------

export class PolicyEngine {
  private readonly policies = new Map<string, CompiledPolicy>();
  private readonly fallback: CompiledPolicy | null;
  private readonly logger: Logger | undefined;

  constructor(options: PolicyEngineOptions = {}) {
    this.logger = options.logger;
    this.fallback = options.fallbackPolicy ? compile('<fallback>', options.fallbackPolicy) : null;
  }

  /**
   * A starting policy for a trust level. Callers may override any field;
   * an explicit requirePiiCloaking always wins over the trust default.
   */
  static defaultPolicyFor(trust: ProviderTrust): AccessPolicy {
    return {
      providerTrust: trust,
      ...TRUST_DEFAULTS[trust],
      allowedDataTypes: [],
      blockedPatterns: [],
    };
  }

  /**
   * Register (or replace) the policy for a destination. The stored copy
   * is frozen.
   *
   * @throws ShieldConfigError if a blocked pattern is not a valid regex
   */
  addPolicy(destination: string, policy: AccessPolicy): void {
    this.policies.set(destination, compile(destination, policy));
    this.logger?.debug({ destination, trust: policy.providerTrust }, 'Access policy registered');
  }

  removePolicy(destination: string): boolean {
    return this.policies.delete(destination);
  }

  getPolicy(destination: string): Readonly<AccessPolicy> | undefined {
    return this.policies.get(destination)?.policy;
  }

  destinations(): string[] {
    return [...this.policies.keys()];
  }

  /**
   * Decide whether data may go to `destination`.
   *
   * Checks run in order and the first denial wins: missing policy,
   * untrusted destination with non-public data, classification ceiling,
   * data type allowlist, blocked patterns.
   */
  checkAccess(
    destination: string,
    classification: DataClassification,
    containsPii: boolean,
    context: AccessContext = {},
  ): AccessDecision {
    const entry = this.policies.get(destination) ?? this.fallback;
    if (!entry) {
      return deny(`No access policy registered for destination '${destination}'`);
    }

    const { policy } = entry;

    if (policy.providerTrust === 'untrusted' && classification !== 'public') {
      return deny(`Untrusted destination '${destination}' may only receive public data`);
    }

    if (classificationRank(classification) > classificationRank(policy.maxClassification)) {
      return deny(
        `Data classification '${classification}' exceeds maximum allowed '${policy.maxClassification}' for '${destination}'`,
      );
    }

    if (
      policy.allowedDataTypes.length > 0 &&
      context.dataType !== undefined &&
      !policy.allowedDataTypes.includes(context.dataType)
    ) {
      return deny(`Data type '${context.dataType}' is not allowed for '${destination}'`);
    }

    if (context.content !== undefined) {
      const content = context.content;
      const hit = entry.blocked.find((b) => b.regex.test(content));
      if (hit) {
        return deny(`Content matches blocked pattern '${hit.source}' for '${destination}'`);
      }
    }

    const requiredActions: RequiredAction[] = [];
    if (containsPii && policy.requirePiiCloaking) {
      requiredActions.push('cloak_pii');
    }

    return { allowed: true, reason: 'Access granted', requiredActions };
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function deny(reason: string): AccessDecision {
  return { allowed: false, reason, requiredActions: [] };
}

function compile(destination: string, policy: AccessPolicy): CompiledPolicy {
  const issues: ConfigIssue[] = [];
  const blocked: Array<{ source: string; regex: RegExp }> = [];

  policy.blockedPatterns.forEach((source, idx) => {
    try {
      // No 'g' flag: test() must not carry lastIndex between calls.
      blocked.push({ source, regex: new RegExp(source, 'i') });
    } catch (err) {
      issues.push({
        path: `accessPolicies.${destination}.blockedPatterns[${idx}]`,
        message: err instanceof Error ? err.message : String(err),
      });
    }
  });

  if (issues.length > 0) {
    throw new ShieldConfigError(
      `Invalid blocked pattern in access policy for '${destination}'`,
      issues,
    );
  }

  const frozen: Readonly<AccessPolicy> = Object.freeze({
    ...policy,
    allowedDataTypes: Object.freeze([...policy.allowedDataTypes]),
    blockedPatterns: Object.freeze([...policy.blockedPatterns]),
  });

  return { policy: frozen, blocked };
}
