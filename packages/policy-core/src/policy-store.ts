/**
 * Policy Store
 *
 * Loads a rule set from an external key-value store and swaps it into an
 * engine. The document is JSON: `{ "version"?: number, "policies": [...] }`.
 */

import {
  PolicyStoreError,
  PolicyValidationError,
  createLogger,
  toError,
} from '@claimshield/lib-core';
import type { Logger } from '@claimshield/lib-core';
import { DEFAULT_SETTINGS } from './config';
import type { PolicyEngine } from './engine';
import { parsePolicyDocument } from './schema';
import type { PolicyRule } from './types';

/**
 * Read side of a key-value store (Redis, a KV service, a file-backed map)
 */
export interface PolicyStore {
  get(key: string): Promise<string | null>;
}

export const DEFAULT_POLICY_STORE_KEY = DEFAULT_SETTINGS.storeKey;

export interface ReloadOptions {
  key?: string;
  logger?: Logger;
}

/**
 * Fetch and validate the policy document stored under `key`
 *
 * @throws PolicyStoreError when the store fails or holds no document
 * @throws PolicyValidationError when the document is not valid JSON or fails validation
 */
export async function loadPolicyDocument(
  store: PolicyStore,
  key: string = DEFAULT_POLICY_STORE_KEY
): Promise<PolicyRule[]> {
  let raw: string | null;
  try {
    raw = await store.get(key);
  } catch (error) {
    throw new PolicyStoreError(`Failed to read policy document '${key}'`, {
      cause: toError(error),
    });
  }

  if (raw === null) {
    throw new PolicyStoreError(`Policy document '${key}' not found`);
  }

  let document: unknown;
  try {
    document = JSON.parse(raw);
  } catch (error) {
    throw new PolicyValidationError('Policy document is not valid JSON', [toError(error).message]);
  }

  return parsePolicyDocument(document);
}

/**
 * Replace the engine's rules with the stored document. On any failure the
 * engine keeps its current rules.
 *
 * @returns number of rules loaded
 */
export async function reloadPolicies(
  engine: PolicyEngine,
  store: PolicyStore,
  options: ReloadOptions = {}
): Promise<number> {
  const key = options.key ?? DEFAULT_POLICY_STORE_KEY;
  const log = options.logger ?? createLogger().module('POLICY_ENGINE');
  const startedAt = Date.now();

  let rules: PolicyRule[];
  try {
    rules = await loadPolicyDocument(store, key);
  } catch (error) {
    log.error('Policy reload failed', { action: 'reload', key }, toError(error));
    throw error;
  }

  engine.replacePolicies(rules);
  log.info('Policies reloaded', {
    action: 'reload',
    key,
    count: rules.length,
    durationMs: Date.now() - startedAt,
  });
  return rules.length;
}
