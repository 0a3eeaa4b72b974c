/**
 * Policy Core Types
 *
 * Type definitions for the two-phase (RBAC gate + ABAC rules) evaluator.
 */

/**
 * Arbitrary attribute bag supplied by the caller
 */
export type AttributeMap = Record<string, unknown>;

/**
 * Subject (user/service) attributes. `roles` drives the RBAC gate;
 * every other key is available to conditions as `user.<key>`.
 */
export interface SubjectAttributes extends AttributeMap {
  roles: readonly string[];
}

/**
 * Resource attributes, available to conditions as `resource.<key>`.
 * Commonly `owner_id`, `region`, `data_classification`.
 */
export type ResourceAttributes = AttributeMap;

/**
 * Request context, available to conditions as `context.<key>`.
 * Synthesized from the wall clock when the caller passes none.
 */
export type RequestContext = AttributeMap;

/**
 * Per-call evaluation record. Never persisted.
 */
export interface EvaluationContext {
  user: SubjectAttributes;
  resource: ResourceAttributes;
  action: string;
  context: RequestContext;
}

export type PolicyEffect = 'allow' | 'deny';

export type ConditionLiteral = string | number | boolean | null;

/**
 * Explicit reference to another attribute path, e.g. `{ $ref: 'user.id' }`.
 * Only honored when attribute references are enabled.
 */
export interface AttributeReference {
  $ref: string;
}

export type ConditionOperand = ConditionLiteral | readonly ConditionLiteral[] | AttributeReference;

/**
 * Operator object, e.g. `{ $gte: 9, $lte: 17 }`. All operators must hold.
 * Keys outside the supported operator set are ignored.
 */
export type OperatorExpression = Readonly<Record<string, ConditionOperand>>;

/**
 * Expected value of a condition:
 * - literal: strict equality
 * - list: membership
 * - operator object: every operator holds
 */
export type ConditionValue =
  | ConditionLiteral
  | readonly ConditionLiteral[]
  | OperatorExpression
  | AttributeReference;

/**
 * Condition map keyed by dotted attribute path ("<namespace>.<field>",
 * namespace ∈ user | resource | context | action)
 */
export type PolicyConditions = Readonly<Record<string, ConditionValue>>;

/**
 * ABAC policy rule
 */
export interface PolicyRule {
  /** Unique rule identifier */
  id: string;

  /** Human-readable name */
  name: string;

  /** Rule description */
  description?: string;

  /** Effect when the rule matches */
  effect: PolicyEffect;

  /** Conditions that must all hold */
  conditions: PolicyConditions;

  /** Actions the rule applies to ('*' for any) */
  actions: readonly string[];

  /** Resource patterns the rule applies to ('*' for any) */
  resources: readonly string[];

  /** Priority (higher = evaluated first) */
  priority: number;

  /** Disabled rules are skipped */
  enabled: boolean;
}

/**
 * Fields accepted by updatePolicy. Unknown keys are ignored.
 */
export type PolicyRuleUpdate = Partial<Omit<PolicyRule, 'id'>>;

/**
 * Which phase produced a decision
 */
export type DecisionStage = 'rbac' | 'abac' | 'default';

/**
 * Result of policy evaluation
 */
export interface AccessDecision {
  /** Whether access is allowed */
  allowed: boolean;

  /** Reason for the decision */
  reason: string;

  /** Rule id, 'rbac' or 'default' */
  decidedBy: string;

  stage: DecisionStage;

  /** Rule details (verbose mode only) */
  details?: {
    ruleName: string;
    effect: PolicyEffect;
    priority: number;
  };
}
