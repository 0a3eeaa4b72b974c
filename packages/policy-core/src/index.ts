/**
 * @claimshield/policy-core
 *
 * Two-phase authorization for the claims platform: a coarse RBAC gate
 * followed by prioritized ABAC rules.
 *
 * @example
 * ```typescript
 * import { createDefaultPolicyEngine } from '@claimshield/policy-core';
 *
 * const engine = createDefaultPolicyEngine();
 * const allowed = engine.evaluate(
 *   { id: 'u-1', roles: ['user'], region: 'eu-west' },
 *   { type: 'claim', id: 'c-42', region: 'eu-west' },
 *   'claim:view'
 * );
 * ```
 */

// Types
export type {
  AttributeMap,
  SubjectAttributes,
  ResourceAttributes,
  RequestContext,
  EvaluationContext,
  PolicyEffect,
  ConditionLiteral,
  AttributeReference,
  ConditionOperand,
  OperatorExpression,
  ConditionValue,
  PolicyConditions,
  PolicyRule,
  PolicyRuleUpdate,
  DecisionStage,
  AccessDecision,
} from './types';

// Roles and permissions
export {
  ROLES,
  PERMISSIONS,
  isRole,
  isPermission,
  parseRole,
  parseRoles,
  parsePermission,
  formatPermission,
} from './permissions';
export type { Role, Permission, ParsedPermission } from './permissions';

export { RoleAuthority, DEFAULT_ROLE_DEFINITIONS } from './role-authority';
export type { RoleDefinition, RoleDefinitions, RolePermissionSet } from './role-authority';

// Policy Engine
export {
  PolicyEngine,
  createDefaultPolicyEngine,
  DEFAULT_ENGINE_CONFIG,
  matchesResourcePattern,
  resourceKeyOf,
  synthesizeContext,
} from './engine';
export type {
  PolicyEngineConfig,
  PolicyEngineOptions,
  DefaultPolicyEngineOptions,
} from './engine';

export { DEFAULT_POLICIES } from './default-policies';

// Conditions
export {
  evaluateCondition,
  evaluateConditions,
  freezeConditions,
  resolveAttribute,
  splitAttributePath,
  valuesEqual,
  isAttributeReference,
  OPERATOR_ALIASES,
  DEFAULT_CONDITION_OPTIONS,
} from './conditions';
export type {
  ConditionOptions,
  ComparisonOperator,
  AttributeNamespace,
  AttributeLookup,
} from './conditions';

// Validation
export {
  policyRuleSchema,
  policyRuleUpdateSchema,
  policyDocumentSchema,
  conditionValueSchema,
  parsePolicyRule,
  parsePolicyUpdate,
  parsePolicyDocument,
} from './schema';
export type { PolicyRuleInput, PolicyRuleSource, PolicyDocument } from './schema';

// Settings
export {
  getEngineConfigFromEnv,
  parseBool,
  DEFAULT_SETTINGS,
  SETTING_ENV_VARS,
} from './config';
export type { PolicyEngineSettings } from './config';

// Policy store
export { loadPolicyDocument, reloadPolicies, DEFAULT_POLICY_STORE_KEY } from './policy-store';
export type { PolicyStore, ReloadOptions } from './policy-store';

// Middleware
export { requireAccess } from './middleware/require-access';
export type {
  AccessEnv,
  AccessVariables,
  RequireAccessOptions,
} from './middleware/require-access';
