/**
 * @warden/core - Configuration validator
 *
 * Validates a WardenConfig object using TypeBox, then applies business rules
 * (supported version, known PII type names, compilable patterns, cloaking
 * sanity checks).
 */

import { Value } from '@sinclair/typebox/value';
import { CONFIG_VERSION, WardenConfigSchema, type WardenConfig } from './schema.js';
import type { ConfigIssue } from '../errors.js';

/** Validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ConfigIssue[];
  warnings: ConfigIssue[];
  config: WardenConfig | null;
}

/** PII type names the detector ships patterns for. */
export const BUILTIN_PII_TYPE_NAMES = [
  'email',
  'phone',
  'ssn',
  'credit_card',
  'ip_address',
  'name',
  'address',
  'date_of_birth',
  'passport',
  'drivers_license',
  'bank_account',
] as const;

const BUILTIN_PII_TYPE_NAME_SET: ReadonlySet<string> = new Set(BUILTIN_PII_TYPE_NAMES);

const CUSTOM_PII_LABEL_RE = /^[A-Za-z0-9_-]+$/;

/**
 * Check a custom PII label: letters, digits, `_` and `-` only.
 */
export function isValidCustomPiiLabel(label: string): boolean {
  return CUSTOM_PII_LABEL_RE.test(label);
}

/**
 * Check whether a string names a PII type the detector understands:
 * a built-in name or `custom:<label>`.
 */
export function isValidPiiTypeName(name: string): boolean {
  if (name.startsWith('custom:')) {
    return isValidCustomPiiLabel(name.slice('custom:'.length));
  }
  return BUILTIN_PII_TYPE_NAME_SET.has(name);
}

/**
 * Report whether `source` compiles as a regular expression.
 * Returns the compiler's message on failure, null on success.
 */
function regexError(source: string, flags: string): string | null {
  try {
    new RegExp(source, flags);
    return null;
  } catch (err) {
    return err instanceof Error ? err.message : String(err);
  }
}

/**
 * Validate and normalise a WardenConfig object.
 *
 * 1. TypeBox schema check
 * 2. PII type names are known
 * 3. Custom patterns and blocked patterns compile
 * 4. Soft warnings (uncloaked cloud destinations, duplicate labels)
 */
export function validateConfig(raw: unknown): ValidationResult {
  const errors: ConfigIssue[] = [];
  const warnings: ConfigIssue[] = [];

  // ----- TypeBox schema validation -----
  for (const err of Value.Errors(WardenConfigSchema, raw)) {
    errors.push({ path: err.path, message: err.message });
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings, config: null };
  }

  const config = Value.Decode(WardenConfigSchema, raw);

  if (config.version !== CONFIG_VERSION) {
    errors.push({
      path: '/version',
      message: `Unsupported config version ${config.version}; expected ${CONFIG_VERSION}`,
    });
  }

  // ----- PII section -----
  const customLabels = new Set<string>();
  config.pii.customPatterns.forEach((custom, i) => {
    const prefix = `/pii/customPatterns/${i}`;
    if (!isValidCustomPiiLabel(custom.label)) {
      errors.push({
        path: `${prefix}/label`,
        message: `Invalid custom PII label "${custom.label}"`,
      });
    }
    if (customLabels.has(custom.label)) {
      warnings.push({
        path: `${prefix}/label`,
        message: `Duplicate custom PII label "${custom.label}"`,
      });
    }
    customLabels.add(custom.label);

    const problem = regexError(custom.pattern, 'g');
    if (problem) {
      errors.push({ path: `${prefix}/pattern`, message: `Invalid pattern: ${problem}` });
    }
  });

  config.pii.typesToDetect.forEach((name, i) => {
    const path = `/pii/typesToDetect/${i}`;
    if (!isValidPiiTypeName(name)) {
      errors.push({ path, message: `Unknown PII type "${name}"` });
    } else if (name.startsWith('custom:') && !customLabels.has(name.slice('custom:'.length))) {
      warnings.push({
        path,
        message: `"${name}" has no matching entry in pii.customPatterns`,
      });
    }
  });

  // ----- Secrets section -----
  config.secrets.customPatterns.forEach((custom, i) => {
    const problem = regexError(custom.pattern, 'g');
    if (problem) {
      errors.push({
        path: `/secrets/customPatterns/${i}/pattern`,
        message: `Invalid pattern: ${problem}`,
      });
    }
  });

  // ----- Access policies -----
  const policies = Object.entries(config.accessPolicies);
  if (config.fallbackPolicy) {
    policies.push(['', config.fallbackPolicy]);
  }

  for (const [destination, policy] of policies) {
    const prefix = destination === '' ? '/fallbackPolicy' : `/accessPolicies/${destination}`;

    policy.blockedPatterns.forEach((pattern, i) => {
      const problem = regexError(pattern, 'i');
      if (problem) {
        errors.push({
          path: `${prefix}/blockedPatterns/${i}`,
          message: `Invalid blocked pattern: ${problem}`,
        });
      }
    });

    if (policy.providerTrust !== 'local' && !policy.requirePiiCloaking) {
      warnings.push({
        path: `${prefix}/requirePiiCloaking`,
        message: `PII will be forwarded uncloaked to a ${policy.providerTrust} destination`,
      });
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
    config: errors.length === 0 ? config : null,
  };
}
