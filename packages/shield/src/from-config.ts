/**
 * @warden/shield - Build a shield from warden.json
 */

import {
  ShieldConfigError,
  createLogger,
  type ConfigIssue,
  type WardenConfig,
} from '@warden/core';
import { isPiiType, type PiiType } from './pii-detector.js';
import { HiveShield, type HiveShieldOptions } from './shield.js';

/**
 * Create a HiveShield from a loaded, validated configuration. Without an
 * injected logger, one is created at `config.logLevel`.
 *
 * @throws ShieldConfigError on PII type names the detector does not know
 */
export function createShieldFromConfig(
  config: WardenConfig,
  options: HiveShieldOptions = {},
): HiveShield {
  const typesToDetect: PiiType[] = [];
  const issues: ConfigIssue[] = [];

  config.pii.typesToDetect.forEach((name, i) => {
    if (isPiiType(name)) {
      typesToDetect.push(name);
    } else {
      issues.push({ path: `/pii/typesToDetect/${i}`, message: `Unknown PII type "${name}"` });
    }
  });

  if (issues.length > 0) {
    throw new ShieldConfigError('Unknown PII types in configuration', issues);
  }

  return new HiveShield(
    {
      pii: {
        typesToDetect,
        cloakingFormat: config.pii.cloakingFormat,
        preserveFormat: config.pii.preserveFormat,
        hashSalt: config.pii.hashSalt || undefined,
        minConfidence: config.pii.minConfidence,
        customPatterns: config.pii.customPatterns,
      },
      enableSecretScan: config.enableSecretScan,
      enableVulnerabilityCheck: config.enableVulnerabilityCheck,
      accessPolicies: config.accessPolicies,
      fallbackPolicy: config.fallbackPolicy ?? null,
      customSecretPatterns: config.secrets.customPatterns,
    },
    {
      ...options,
      logger: options.logger ?? createLogger('@warden/shield', { level: config.logLevel }),
    },
  );
}
