/**
 * Policy Engine Settings
 *
 * Read from environment variables. Booleans accept 'true' (any case) or '1';
 * an unset or empty variable keeps the default.
 */

import type { PolicyEngineConfig } from './engine';

export interface PolicyEngineSettings extends PolicyEngineConfig {
  /** Seed the built-in policies in createDefaultPolicyEngine */
  loadDefaultPolicies: boolean;

  /** Store key read by reloadPolicies */
  storeKey: string;
}

export const DEFAULT_SETTINGS: PolicyEngineSettings = {
  verbose: false,
  enableAttributeRefs: false,
  enforceResourcePatterns: false,
  loadDefaultPolicies: true,
  storeKey: 'policy:rules',
};

/**
 * Environment variable names
 */
export const SETTING_ENV_VARS = {
  verbose: 'POLICY_VERBOSE',
  enableAttributeRefs: 'POLICY_ENABLE_ATTRIBUTE_REFS',
  enforceResourcePatterns: 'POLICY_ENFORCE_RESOURCE_PATTERNS',
  loadDefaultPolicies: 'POLICY_LOAD_DEFAULTS',
  storeKey: 'POLICY_STORE_KEY',
} as const satisfies Record<keyof PolicyEngineSettings, string>;

/**
 * Parse boolean from string (for environment variables)
 */
export function parseBool(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined || value === '') {
    return defaultValue;
  }
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Get engine settings from environment variables
 */
export function getEngineConfigFromEnv(
  env: Record<string, string | undefined>
): PolicyEngineSettings {
  const storeKey = env[SETTING_ENV_VARS.storeKey]?.trim();

  return {
    verbose: parseBool(env[SETTING_ENV_VARS.verbose], DEFAULT_SETTINGS.verbose),
    enableAttributeRefs: parseBool(
      env[SETTING_ENV_VARS.enableAttributeRefs],
      DEFAULT_SETTINGS.enableAttributeRefs
    ),
    enforceResourcePatterns: parseBool(
      env[SETTING_ENV_VARS.enforceResourcePatterns],
      DEFAULT_SETTINGS.enforceResourcePatterns
    ),
    loadDefaultPolicies: parseBool(
      env[SETTING_ENV_VARS.loadDefaultPolicies],
      DEFAULT_SETTINGS.loadDefaultPolicies
    ),
    storeKey: storeKey ? storeKey : DEFAULT_SETTINGS.storeKey,
  };
}
