/**
 * Policy Engine
 *
 * Two-phase access decision:
 * 1. Coarse RBAC gate: the subject's roles must carry the permission named by
 *    the action. Failing the gate denies without consulting any rule.
 * 2. ABAC rules applicable to the action, in descending priority order. The
 *    first enabled rule whose conditions all hold decides. No match denies.
 */

import { PolicyNotFoundError, createLogger, toError } from '@claimshield/lib-core';
import type { Logger } from '@claimshield/lib-core';
import { parsePermission } from './permissions';
import { RoleAuthority } from './role-authority';
import { evaluateConditions, freezeConditions } from './conditions';
import { parsePolicyRule, parsePolicyUpdate } from './schema';
import type { PolicyRuleSource } from './schema';
import { DEFAULT_POLICIES } from './default-policies';
import type {
  AccessDecision,
  EvaluationContext,
  PolicyRule,
  RequestContext,
  ResourceAttributes,
  SubjectAttributes,
} from './types';

/**
 * Policy Engine configuration
 */
export interface PolicyEngineConfig {
  /** Include rule details in decisions and log each decision at debug level */
  verbose: boolean;

  /** Resolve `{ $ref: "<path>" }` operands in conditions */
  enableAttributeRefs: boolean;

  /** Require a rule's resource patterns to match "<type>/<id>" of the resource */
  enforceResourcePatterns: boolean;
}

export const DEFAULT_ENGINE_CONFIG: PolicyEngineConfig = {
  verbose: false,
  enableAttributeRefs: false,
  enforceResourcePatterns: false,
};

export interface PolicyEngineOptions {
  config?: Partial<PolicyEngineConfig>;
  roleAuthority?: RoleAuthority;
  logger?: Logger;
  /** Clock used to synthesize a context when the caller passes none */
  now?: () => Date;
}

interface RuleEntry {
  readonly rule: Readonly<PolicyRule>;
  /** Insertion sequence, breaks priority ties */
  readonly seq: number;
}

function compareEntries(a: RuleEntry, b: RuleEntry): number {
  return b.rule.priority - a.rule.priority || a.seq - b.seq;
}

function freezeRule(rule: PolicyRule): Readonly<PolicyRule> {
  return Object.freeze({
    ...rule,
    conditions: freezeConditions(rule.conditions),
    actions: Object.freeze([...rule.actions]),
    resources: Object.freeze([...rule.resources]),
  });
}

/**
 * Simple wildcard substring match: '*' matches everything, otherwise the
 * pattern with '*' removed must occur in the key.
 */
export function matchesResourcePattern(pattern: string, resourceKey: string): boolean {
  if (pattern === '*') {
    return true;
  }
  return resourceKey.includes(pattern.replace(/\*/g, ''));
}

/**
 * Key used for resource pattern matching: "<type>/<id>"
 */
export function resourceKeyOf(resource: ResourceAttributes): string {
  const type = typeof resource.type === 'string' ? resource.type : '';
  const id =
    typeof resource.id === 'string' || typeof resource.id === 'number' ? String(resource.id) : '';
  return `${type}/${id}`;
}

/**
 * Build the context used when the caller supplies none (UTC).
 *
 * `day_of_week` counts from Monday: 0 = Monday … 6 = Sunday. Policy documents
 * written against that numbering keep their meaning, so the built-in
 * business-hours rule (`[1..5]`) covers Tuesday to Saturday.
 */
export function synthesizeContext(now: Date): RequestContext {
  return {
    timestamp: now.getTime(),
    hour: now.getUTCHours(),
    day_of_week: (now.getUTCDay() + 6) % 7,
  };
}

/**
 * Policy Evaluation Engine
 *
 * The rule list is an immutable snapshot. Every mutation builds a new sorted
 * array and swaps the reference; evaluation reads the reference once, so it
 * never observes a list mid-sort or mid-update.
 */
export class PolicyEngine {
  private entries: readonly RuleEntry[] = Object.freeze([]);
  private sequence = 0;
  private readonly config: PolicyEngineConfig;
  private readonly authority: RoleAuthority;
  private readonly log: Logger;
  private readonly now: () => Date;

  constructor(options: PolicyEngineOptions = {}) {
    this.config = { ...DEFAULT_ENGINE_CONFIG, ...options.config };
    this.authority = options.roleAuthority ?? new RoleAuthority();
    this.log = options.logger ?? createLogger().module('POLICY_ENGINE');
    this.now = options.now ?? (() => new Date());
  }

  get roleAuthority(): RoleAuthority {
    return this.authority;
  }

  /**
   * Add a policy rule. A rule with an existing id replaces that rule and keeps
   * its insertion slot for tie-breaking.
   *
   * @throws PolicyValidationError
   */
  addPolicy(input: PolicyRuleSource): PolicyRule {
    const rule = freezeRule(parsePolicyRule(input));
    const existing = this.entries.find((entry) => entry.rule.id === rule.id);

    if (existing) {
      this.commit(
        this.entries.map((entry) => (entry === existing ? { rule, seq: existing.seq } : entry))
      );
      this.log.warn('Policy replaced', { policyId: rule.id });
    } else {
      this.commit([...this.entries, { rule, seq: this.sequence++ }]);
      this.log.info('Policy added', { policyId: rule.id, priority: rule.priority });
    }
    return rule;
  }

  /**
   * Add multiple policy rules
   */
  addPolicies(inputs: readonly PolicyRuleSource[]): void {
    for (const input of inputs) {
      this.addPolicy(input);
    }
  }

  /**
   * Remove a policy by id
   *
   * @returns whether a rule was removed
   */
  removePolicy(id: string): boolean {
    const remaining = this.entries.filter((entry) => entry.rule.id !== id);
    if (remaining.length === this.entries.length) {
      return false;
    }
    this.commit(remaining);
    this.log.info('Policy removed', { policyId: id });
    return true;
  }

  /**
   * Update the fields present in the payload. Unknown field names, and `id`,
   * are ignored.
   *
   * @throws PolicyNotFoundError when no rule has this id
   * @throws PolicyValidationError when a known field has an invalid value
   */
  updatePolicy(id: string, fields: Record<string, unknown>): PolicyRule {
    const existing = this.entries.find((entry) => entry.rule.id === id);
    if (!existing) {
      throw new PolicyNotFoundError(id);
    }

    const update = parsePolicyUpdate(fields);
    const rule = freezeRule({ ...existing.rule, ...update, id });
    this.commit(
      this.entries.map((entry) => (entry === existing ? { rule, seq: existing.seq } : entry))
    );
    this.log.info('Policy updated', { policyId: id, fields: Object.keys(update) });
    return rule;
  }

  /**
   * Replace the whole rule set at once
   *
   * @throws PolicyValidationError (the current rules are left untouched)
   */
  replacePolicies(inputs: readonly PolicyRuleSource[]): void {
    const rules = inputs.map((input) => freezeRule(parsePolicyRule(input)));
    const byId = new Map<string, Readonly<PolicyRule>>();
    for (const rule of rules) {
      byId.set(rule.id, rule);
    }
    let seq = 0;
    this.commit([...byId.values()].map((rule) => ({ rule, seq: seq++ })));
    this.sequence = seq;
    this.log.info('Policies replaced', { count: byId.size });
  }

  clearPolicies(): void {
    this.commit([]);
    this.sequence = 0;
  }

  getPolicy(id: string): PolicyRule | undefined {
    return this.entries.find((entry) => entry.rule.id === id)?.rule;
  }

  /**
   * All rules in evaluation order
   */
  listPolicies(): PolicyRule[] {
    return this.entries.map((entry) => entry.rule);
  }

  /**
   * Evaluate an access request
   *
   * @returns true when access is allowed
   */
  evaluate(
    subject: SubjectAttributes,
    resource: ResourceAttributes,
    action: string,
    context?: RequestContext | null
  ): boolean {
    return this.decide(subject, resource, action, context).allowed;
  }

  /**
   * Evaluate an access request and explain the outcome
   */
  decide(
    subject: SubjectAttributes,
    resource: ResourceAttributes,
    action: string,
    context?: RequestContext | null
  ): AccessDecision {
    const decision = this.runDecision(
      subject,
      resource,
      action,
      context ?? synthesizeContext(this.now())
    );
    if (this.config.verbose) {
      this.log.debug('Access decision', {
        action,
        allowed: decision.allowed,
        decidedBy: decision.decidedBy,
        stage: decision.stage,
      });
    }
    return decision;
  }

  private runDecision(
    subject: SubjectAttributes,
    resource: ResourceAttributes,
    action: string,
    context: RequestContext
  ): AccessDecision {
    const permission = parsePermission(action);
    if (permission.kind === 'unknown') {
      return {
        allowed: false,
        reason: `Unknown permission '${action}'`,
        decidedBy: 'rbac',
        stage: 'rbac',
      };
    }

    const roles = Array.isArray(subject.roles) ? subject.roles : [];
    if (!this.authority.hasPermission(roles, permission.permission)) {
      return {
        allowed: false,
        reason: `Roles do not grant '${permission.permission}'`,
        decidedBy: 'rbac',
        stage: 'rbac',
      };
    }

    const evaluation: EvaluationContext = { user: subject, resource, action, context };
    const entries = this.entries;
    const resourceKey = this.config.enforceResourcePatterns ? resourceKeyOf(resource) : null;

    for (const { rule } of entries) {
      if (!this.appliesTo(rule, action, resourceKey) || !rule.enabled) continue;
      if (!this.matches(rule, evaluation)) continue;

      return {
        allowed: rule.effect === 'allow',
        reason: rule.description || `Rule '${rule.name}' matched`,
        decidedBy: rule.id,
        stage: 'abac',
        details: this.config.verbose
          ? { ruleName: rule.name, effect: rule.effect, priority: rule.priority }
          : undefined,
      };
    }

    return {
      allowed: false,
      reason: 'No matching policy rule, default deny',
      decidedBy: 'default',
      stage: 'default',
    };
  }

  /**
   * Rules are filtered by action only, unless resource pattern
   * enforcement is enabled.
   */
  private appliesTo(rule: PolicyRule, action: string, resourceKey: string | null): boolean {
    if (!rule.actions.includes('*') && !rule.actions.includes(action)) {
      return false;
    }
    if (resourceKey === null) {
      return true;
    }
    return rule.resources.some((pattern) => matchesResourcePattern(pattern, resourceKey));
  }

  private matches(rule: PolicyRule, evaluation: EvaluationContext): boolean {
    try {
      return evaluateConditions(rule.conditions, evaluation, {
        enableAttributeRefs: this.config.enableAttributeRefs,
      });
    } catch (error) {
      this.log.error('Condition evaluation failed', { policyId: rule.id }, toError(error));
      return false;
    }
  }

  private commit(entries: readonly RuleEntry[]): void {
    this.entries = Object.freeze([...entries].sort(compareEntries));
  }
}

/**
 * Options for createDefaultPolicyEngine
 */
export interface DefaultPolicyEngineOptions extends PolicyEngineOptions {
  /** Seed the built-in example policies (default: true) */
  loadDefaultPolicies?: boolean;
}

/**
 * Create a policy engine seeded with the built-in claim/member policies
 */
export function createDefaultPolicyEngine(options: DefaultPolicyEngineOptions = {}): PolicyEngine {
  const { loadDefaultPolicies = true, ...engineOptions } = options;
  const engine = new PolicyEngine(engineOptions);
  if (loadDefaultPolicies) {
    engine.addPolicies(DEFAULT_POLICIES);
  }
  return engine;
}
