/**
 * @warden/core - TypeBox schema for warden.json configuration
 *
 * Sections: logging, pii, secrets, vulnerability, accessPolicies
 */

import { Type, type Static } from '@sinclair/typebox';

// ---------------------------------------------------------------------------
// Shared enums
// ---------------------------------------------------------------------------

/** The only warden.json layout this release reads. */
export const CONFIG_VERSION = 1;

const LogLevelSchema = Type.Union(
  [
    Type.Literal('fatal'),
    Type.Literal('error'),
    Type.Literal('warn'),
    Type.Literal('info'),
    Type.Literal('debug'),
    Type.Literal('trace'),
    Type.Literal('silent'),
  ],
  { default: 'info' },
);

const riskLevelSchema = (options: { default?: string } = {}) =>
  Type.Union(
    [
      Type.Literal('none'),
      Type.Literal('low'),
      Type.Literal('medium'),
      Type.Literal('high'),
      Type.Literal('critical'),
    ],
    options,
  );

const DataClassificationSchema = Type.Union([
  Type.Literal('public'),
  Type.Literal('internal'),
  Type.Literal('confidential'),
  Type.Literal('restricted'),
]);

const ProviderTrustSchema = Type.Union([
  Type.Literal('local'),
  Type.Literal('trusted'),
  Type.Literal('standard'),
  Type.Literal('untrusted'),
]);

const CloakFormatSchema = Type.Union(
  [Type.Literal('placeholder'), Type.Literal('hash'), Type.Literal('redact')],
  { default: 'placeholder' },
);

// ---------------------------------------------------------------------------
// Sub-schemas
// ---------------------------------------------------------------------------

const CustomPiiPatternSchema = Type.Object({
  label: Type.String({ minLength: 1, description: 'Becomes the custom:<label> PII type' }),
  pattern: Type.String({ minLength: 1, description: 'Regular expression' }),
  confidence: Type.Number({ minimum: 0, maximum: 1, default: 0.9 }),
});

const CustomSecretPatternSchema = Type.Object({
  label: Type.String({ minLength: 1 }),
  pattern: Type.String({ minLength: 1, description: 'Regular expression' }),
  confidence: Type.Number({ minimum: 0, maximum: 1, default: 0.8 }),
  risk: riskLevelSchema({ default: 'high' }),
});

const PiiSchema = Type.Object({
  typesToDetect: Type.Array(Type.String(), {
    default: [],
    description: 'Empty means every built-in and custom type',
  }),
  cloakingFormat: CloakFormatSchema,
  preserveFormat: Type.Boolean({ default: false }),
  hashSalt: Type.Optional(Type.String()),
  minConfidence: Type.Number({ minimum: 0, maximum: 1, default: 0 }),
  customPatterns: Type.Array(CustomPiiPatternSchema, { default: [] }),
});

const SecretsSchema = Type.Object({
  customPatterns: Type.Array(CustomSecretPatternSchema, { default: [] }),
});

export const AccessPolicySchema = Type.Object({
  providerTrust: ProviderTrustSchema,
  maxClassification: DataClassificationSchema,
  requirePiiCloaking: Type.Boolean(),
  allowedDataTypes: Type.Array(Type.String(), { default: [] }),
  blockedPatterns: Type.Array(Type.String(), {
    default: [],
    description: 'Case-insensitive regular expressions; plain text works as a literal',
  }),
});

// ---------------------------------------------------------------------------
// Root config schema
// ---------------------------------------------------------------------------

export const WardenConfigSchema = Type.Object({
  $schema: Type.Optional(Type.String()),
  version: Type.Number({ default: CONFIG_VERSION }),
  logLevel: LogLevelSchema,
  pii: PiiSchema,
  secrets: SecretsSchema,
  enableSecretScan: Type.Boolean({ default: true }),
  enableVulnerabilityCheck: Type.Boolean({ default: true }),
  accessPolicies: Type.Record(Type.String(), AccessPolicySchema, { default: {} }),
  fallbackPolicy: Type.Optional(
    Type.Union([AccessPolicySchema, Type.Null()], {
      description: 'Policy for unregistered destinations. Null keeps the fail-closed default.',
    }),
  ),
});

export type WardenConfig = Static<typeof WardenConfigSchema>;
export type AccessPolicyConfig = Static<typeof AccessPolicySchema>;
export type CustomPiiPatternConfig = Static<typeof CustomPiiPatternSchema>;
export type CustomSecretPatternConfig = Static<typeof CustomSecretPatternSchema>;

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

export const DEFAULT_CONFIG: WardenConfig = {
  version: CONFIG_VERSION,
  logLevel: 'info',
  pii: {
    typesToDetect: [],
    cloakingFormat: 'placeholder',
    preserveFormat: false,
    minConfidence: 0,
    customPatterns: [],
  },
  secrets: {
    customPatterns: [],
  },
  enableSecretScan: true,
  enableVulnerabilityCheck: true,
  accessPolicies: {},
  fallbackPolicy: null,
};
