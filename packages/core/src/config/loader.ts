/**
 * @warden/core - Configuration loader
 *
 * Loads warden.json, merges it over the defaults, fills TypeBox defaults,
 * and validates. Invalid configuration is a startup error.
 */

import { readFileSync, existsSync } from 'node:fs';
import { resolve } from 'node:path';
import { Value } from '@sinclair/typebox/value';
import { WardenConfigSchema, DEFAULT_CONFIG, type WardenConfig } from './schema.js';
import { validateConfig, type ValidationResult } from './validator.js';
import { ShieldConfigError } from '../errors.js';
import { isPlainObject } from '../utils/index.js';

/**
 * Resolve the config file location.
 * Priority: explicit argument > WARDEN_CONFIG env var > ./warden.json
 */
export function resolveConfigPath(configPath?: string): string {
  if (configPath) return resolve(configPath);
  const fromEnv = process.env['WARDEN_CONFIG'];
  if (fromEnv) return resolve(fromEnv);
  return resolve('warden.json');
}

/**
 * Deep-merge two objects. Arrays are replaced (not concatenated).
 */
function deepMerge(
  base: Record<string, unknown>,
  override: Record<string, unknown>,
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };

  for (const key of Object.keys(override)) {
    const overVal = override[key];
    const baseVal = result[key];

    if (isPlainObject(overVal) && isPlainObject(baseVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else if (overVal !== undefined) {
      result[key] = overVal;
    }
  }

  return result;
}

/**
 * Merge a raw (already parsed) config object over the defaults, apply
 * schema defaults and validate it.
 *
 * @throws ShieldConfigError when validation fails
 */
export function parseConfig(
  raw: unknown,
  source = '<inline>',
): { config: WardenConfig; validation: ValidationResult } {
  if (!isPlainObject(raw)) {
    throw new ShieldConfigError(`Config in ${source} must be a JSON object`);
  }

  const defaults: Record<string, unknown> = { ...DEFAULT_CONFIG };
  const merged = deepMerge(defaults, raw);
  const withDefaults = Value.Default(WardenConfigSchema, Value.Clone(merged));

  const validation = validateConfig(withDefaults);
  if (!validation.valid || validation.config === null) {
    const summary = validation.errors.map((e) => `${e.path || '/'}: ${e.message}`).join('; ');
    throw new ShieldConfigError(`Invalid configuration in ${source}: ${summary}`, validation.errors);
  }

  return { config: validation.config, validation };
}

/**
 * Load the Warden configuration.
 *
 * 1. Read the config file (defaults are used when it does not exist)
 * 2. Deep-merge with DEFAULT_CONFIG
 * 3. Fill TypeBox defaults
 * 4. Validate; throw ShieldConfigError on any error
 */
export function loadShieldConfig(
  configPath?: string,
): { config: WardenConfig; validation: ValidationResult } {
  const path = resolveConfigPath(configPath);

  if (!existsSync(path)) {
    if (configPath) {
      throw new ShieldConfigError(`Config file not found: ${path}`);
    }
    return parseConfig({}, '<defaults>');
  }

  let rawJson: unknown;
  try {
    rawJson = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    throw new ShieldConfigError(
      `Failed to parse ${path}: ${err instanceof Error ? err.message : String(err)}`,
    );
  }

  return parseConfig(rawJson, path);
}
