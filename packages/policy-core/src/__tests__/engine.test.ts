/**
 * Policy Engine Unit Tests
 */

import { describe, it, expect, beforeEach, vi } from 'vitest';
import { PolicyNotFoundError, PolicyValidationError } from '@claimshield/lib-core';
import type { Logger } from '@claimshield/lib-core';
import {
  PolicyEngine,
  createDefaultPolicyEngine,
  matchesResourcePattern,
  synthesizeContext,
} from '../engine';
import type { PolicyRuleInput } from '../schema';
import type { RequestContext, SubjectAttributes } from '../types';

const BUSINESS_HOURS: RequestContext = { hour: 12, day_of_week: 2 };
const AFTER_HOURS: RequestContext = { hour: 20, day_of_week: 2 };

function createMockLogger() {
  const calls = {
    info: vi.fn(),
    warn: vi.fn(),
    error: vi.fn(),
    debug: vi.fn(),
  };
  const logger: Logger = {
    ...calls,
    child: () => logger,
    module: () => logger,
  };
  return { logger, calls };
}

function allowAll(id: string, overrides: Partial<PolicyRuleInput> = {}): PolicyRuleInput {
  return {
    id,
    name: `Rule ${id}`,
    effect: 'allow',
    actions: ['*'],
    ...overrides,
  };
}

describe('PolicyEngine', () => {
  let engine: PolicyEngine;
  let calls: ReturnType<typeof createMockLogger>['calls'];

  beforeEach(() => {
    const mock = createMockLogger();
    calls = mock.calls;
    engine = new PolicyEngine({ logger: mock.logger });
  });

  describe('RBAC gate', () => {
    it('should deny when the roles lack the permission, without consulting rules', () => {
      engine.addPolicy(allowAll('open'));

      const decision = engine.decide({ roles: ['viewer'] }, {}, 'claim:delete', BUSINESS_HOURS);

      expect(decision).toEqual({
        allowed: false,
        reason: "Roles do not grant 'claim:delete'",
        decidedBy: 'rbac',
        stage: 'rbac',
      });
    });

    it('should deny unknown permission strings', () => {
      engine.addPolicy(allowAll('open'));

      const decision = engine.decide({ roles: ['super_admin'] }, {}, 'claim:archive', BUSINESS_HOURS);

      expect(decision.allowed).toBe(false);
      expect(decision.stage).toBe('rbac');
      expect(decision.reason).toBe("Unknown permission 'claim:archive'");
    });

    it('should match permissions case-sensitively', () => {
      engine.addPolicy(allowAll('open'));

      expect(engine.evaluate({ roles: ['admin'] }, {}, 'Claim:View', BUSINESS_HOURS)).toBe(false);
    });

    it('should deny subjects with no known roles', () => {
      engine.addPolicy(allowAll('open'));

      expect(engine.evaluate({ roles: ['guest'] }, {}, 'claim:view', BUSINESS_HOURS)).toBe(false);
      expect(engine.evaluate({ roles: [] }, {}, 'claim:view', BUSINESS_HOURS)).toBe(false);
    });

    it('should pass the gate when any role carries the permission', () => {
      engine.addPolicy(allowAll('open'));

      expect(engine.evaluate({ roles: ['guest', 'viewer'] }, {}, 'member:view', BUSINESS_HOURS)).toBe(
        true
      );
    });
  });

  describe('rule evaluation', () => {
    it('should deny by default when no rule matches', () => {
      const decision = engine.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS);

      expect(decision).toEqual({
        allowed: false,
        reason: 'No matching policy rule, default deny',
        decidedBy: 'default',
        stage: 'default',
      });
    });

    it('should let the higher priority rule decide', () => {
      engine.addPolicy(allowAll('low-allow', { priority: 10 }));
      engine.addPolicy(allowAll('high-deny', { priority: 20, effect: 'deny' }));

      const decision = engine.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS);

      expect(decision.allowed).toBe(false);
      expect(decision.decidedBy).toBe('high-deny');
      expect(decision.stage).toBe('abac');
    });

    it('should break priority ties by insertion order', () => {
      engine.addPolicy(allowAll('first'));
      engine.addPolicy(allowAll('second', { effect: 'deny' }));

      expect(engine.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS).decidedBy).toBe(
        'first'
      );
    });

    it('should skip disabled rules', () => {
      engine.addPolicy(allowAll('disabled-deny', { effect: 'deny', priority: 100, enabled: false }));
      engine.addPolicy(allowAll('allow'));

      expect(engine.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS).decidedBy).toBe(
        'allow'
      );
    });

    it('should only consider rules listing the action or "*"', () => {
      engine.addPolicy(allowAll('edit-only', { actions: ['claim:edit'] }));

      expect(engine.evaluate({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS)).toBe(false);
      expect(engine.evaluate({ roles: ['user'] }, {}, 'claim:edit', BUSINESS_HOURS)).toBe(true);
    });

    it('should fall through to the next rule when conditions fail', () => {
      engine.addPolicy(
        allowAll('eu-deny', { effect: 'deny', priority: 10, conditions: { 'user.region': 'eu' } })
      );
      engine.addPolicy(allowAll('fallback'));

      const subject: SubjectAttributes = { roles: ['user'], region: 'us' };
      expect(engine.decide(subject, {}, 'claim:view', BUSINESS_HOURS).decidedBy).toBe('fallback');
    });

    it('should use the rule description as the reason', () => {
      engine.addPolicy(allowAll('described', { description: 'Everyone may look' }));

      expect(engine.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS).reason).toBe(
        'Everyone may look'
      );
    });

    it('should treat a throwing condition as false and log it', () => {
      engine.addPolicy(allowAll('regional', { conditions: { 'user.region': 'eu' } }));
      const subject: SubjectAttributes = {
        roles: ['user'],
        get region(): string {
          throw new Error('attribute source unavailable');
        },
      };

      const decision = engine.decide(subject, {}, 'claim:view', BUSINESS_HOURS);

      expect(decision.stage).toBe('default');
      expect(calls.error).toHaveBeenCalledWith(
        'Condition evaluation failed',
        { policyId: 'regional' },
        expect.any(Error)
      );
    });
  });

  describe('context', () => {
    it('should synthesize a UTC context when none is given', () => {
      // 2024-01-02 is a Tuesday
      const clocked = new PolicyEngine({
        logger: createMockLogger().logger,
        now: () => new Date('2024-01-02T10:00:00Z'),
      });
      clocked.addPolicy(
        allowAll('hours', { conditions: { 'context.hour': 10, 'context.day_of_week': 1 } })
      );

      expect(clocked.evaluate({ roles: ['user'] }, {}, 'claim:view')).toBe(true);
      expect(clocked.evaluate({ roles: ['user'] }, {}, 'claim:view', null)).toBe(true);
    });

    it('should build hour, day_of_week and timestamp', () => {
      // Saturday
      const now = new Date('2024-01-06T20:30:00Z');

      expect(synthesizeContext(now)).toEqual({
        timestamp: now.getTime(),
        hour: 20,
        day_of_week: 5,
      });
    });

    it('should number days from Monday = 0 to Sunday = 6', () => {
      expect(synthesizeContext(new Date('2024-01-01T00:00:00Z')).day_of_week).toBe(0);
      expect(synthesizeContext(new Date('2024-01-07T23:59:59Z')).day_of_week).toBe(6);
    });
  });

  describe('policy management', () => {
    it('should apply defaults to added rules', () => {
      const rule = engine.addPolicy({ id: 'bare', name: 'Bare', effect: 'allow', actions: ['*'] });

      expect(rule).toEqual({
        id: 'bare',
        name: 'Bare',
        effect: 'allow',
        actions: ['*'],
        conditions: {},
        resources: ['*'],
        priority: 0,
        enabled: true,
      });
      expect(calls.info).toHaveBeenCalledWith('Policy added', { policyId: 'bare', priority: 0 });
    });

    it('should reject invalid rules', () => {
      expect(() => engine.addPolicy({ id: '', name: 'X', effect: 'allow', actions: [] })).toThrow(
        PolicyValidationError
      );
      expect(engine.listPolicies()).toHaveLength(0);
    });

    it('should replace a rule with the same id in its original slot', () => {
      engine.addPolicy(allowAll('a'));
      engine.addPolicy(allowAll('b'));
      engine.addPolicy(allowAll('a', { effect: 'deny' }));

      expect(engine.listPolicies().map((rule) => rule.id)).toEqual(['a', 'b']);
      const decision = engine.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS);
      expect(decision).toMatchObject({ allowed: false, decidedBy: 'a' });
    });

    it('should remove rules by id', () => {
      engine.addPolicy(allowAll('a'));

      expect(engine.removePolicy('a')).toBe(true);
      expect(engine.removePolicy('a')).toBe(false);
      expect(engine.getPolicy('a')).toBeUndefined();
    });

    it('should update known fields and re-sort', () => {
      engine.addPolicy(allowAll('a', { priority: 10 }));
      engine.addPolicy(allowAll('b', { priority: 5, effect: 'deny' }));

      engine.updatePolicy('b', { priority: 50 });

      expect(engine.listPolicies().map((rule) => rule.id)).toEqual(['b', 'a']);
      expect(engine.evaluate({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS)).toBe(false);
    });

    it('should ignore unknown fields and id changes in updates', () => {
      engine.addPolicy(allowAll('a'));

      const updated = engine.updatePolicy('a', { id: 'renamed', bogus: true, name: 'Renamed' });

      expect(updated.id).toBe('a');
      expect(updated.name).toBe('Renamed');
      expect(engine.getPolicy('renamed')).toBeUndefined();
      expect(engine.getPolicy('a')).not.toHaveProperty('bogus');
    });

    it('should throw PolicyNotFoundError for unknown ids', () => {
      expect(() => engine.updatePolicy('missing', { priority: 1 })).toThrow(PolicyNotFoundError);
    });

    it('should reject invalid update values', () => {
      engine.addPolicy(allowAll('a'));

      expect(() => engine.updatePolicy('a', { priority: 'high' })).toThrow(PolicyValidationError);
      expect(engine.getPolicy('a')?.priority).toBe(0);
    });

    it('should replace the whole rule set', () => {
      engine.addPolicy(allowAll('old'));

      engine.replacePolicies([allowAll('x', { priority: 1 }), allowAll('y', { priority: 2 })]);

      expect(engine.listPolicies().map((rule) => rule.id)).toEqual(['y', 'x']);
    });

    it('should keep current rules when a replacement is invalid', () => {
      engine.addPolicy(allowAll('old'));

      expect(() =>
        engine.replacePolicies([allowAll('x'), { id: 'broken', name: 'B', effect: 'allow', actions: [''] }])
      ).toThrow(PolicyValidationError);
      expect(engine.listPolicies().map((rule) => rule.id)).toEqual(['old']);
    });

    it('should clear all rules', () => {
      engine.addPolicy(allowAll('a'));
      engine.clearPolicies();

      expect(engine.listPolicies()).toEqual([]);
    });

    it('should not let callers mutate stored rules', () => {
      engine.addPolicy(allowAll('a'));
      const listed = engine.listPolicies();
      listed.pop();

      expect(engine.listPolicies()).toHaveLength(1);
      expect(Object.isFrozen(engine.getPolicy('a'))).toBe(true);
    });

    it('should freeze nested condition values', () => {
      engine.addPolicy(
        allowAll('hours', {
          conditions: { 'context.hour': { $gte: 9, $lte: 17 }, 'user.region': ['eu'] },
        })
      );
      const conditions = engine.getPolicy('hours')?.conditions ?? {};
      const hour = conditions['context.hour'];
      const region = conditions['user.region'];

      expect(Object.isFrozen(conditions)).toBe(true);
      expect(Object.isFrozen(hour)).toBe(true);
      expect(Object.isFrozen(region)).toBe(true);
      expect(() => Object.assign(hour ?? {}, { $gte: 0 })).toThrow(TypeError);
      expect(
        engine.evaluate({ roles: ['user'], region: 'eu' }, {}, 'claim:view', { hour: 3, day_of_week: 2 })
      ).toBe(false);
    });

    it('should not share condition objects with the caller', () => {
      const hour = { $gte: 9, $lte: 17 };
      engine.addPolicy(allowAll('hours', { conditions: { 'context.hour': hour } }));

      hour.$gte = 0;

      expect(engine.evaluate({ roles: ['user'] }, {}, 'claim:view', { hour: 3 })).toBe(false);
    });

    it('should keep serving the snapshot an evaluation started with', () => {
      engine.addPolicy(allowAll('a'));
      const before = engine.listPolicies();

      engine.removePolicy('a');

      expect(before.map((rule) => rule.id)).toEqual(['a']);
      expect(engine.listPolicies()).toEqual([]);
    });
  });

  describe('verbose mode', () => {
    it('should include rule details and log the decision', () => {
      const mock = createMockLogger();
      const verbose = new PolicyEngine({ logger: mock.logger, config: { verbose: true } });
      verbose.addPolicy(allowAll('open', { priority: 7 }));

      const decision = verbose.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS);

      expect(decision.details).toEqual({ ruleName: 'Rule open', effect: 'allow', priority: 7 });
      expect(mock.calls.debug).toHaveBeenCalledWith('Access decision', {
        action: 'claim:view',
        allowed: true,
        decidedBy: 'open',
        stage: 'abac',
      });
    });

    it('should omit details otherwise', () => {
      engine.addPolicy(allowAll('open'));

      expect(engine.decide({ roles: ['user'] }, {}, 'claim:view', BUSINESS_HOURS).details).toBeUndefined();
      expect(calls.debug).not.toHaveBeenCalled();
    });
  });

  describe('attribute references', () => {
    it('should compare against the referenced attribute when enabled', () => {
      const refs = new PolicyEngine({
        logger: createMockLogger().logger,
        config: { enableAttributeRefs: true },
      });
      refs.addPolicy(
        allowAll('owner', {
          actions: ['claim:edit'],
          conditions: { 'resource.owner_id': { $ref: 'user.id' } },
        })
      );
      const subject: SubjectAttributes = { roles: ['user'], id: 'u-1' };

      expect(refs.evaluate(subject, { owner_id: 'u-1' }, 'claim:edit', BUSINESS_HOURS)).toBe(true);
      expect(refs.evaluate(subject, { owner_id: 'u-2' }, 'claim:edit', BUSINESS_HOURS)).toBe(false);
    });

    it('should deny ownership rules written with $ref when references are disabled', () => {
      engine.addPolicy(
        allowAll('owner', {
          actions: ['claim:edit'],
          conditions: { 'resource.owner_id': { $ref: 'user.id' } },
        })
      );

      const other = engine.decide(
        { roles: ['user'], id: 'u-2' },
        { owner_id: 'u-1' },
        'claim:edit',
        BUSINESS_HOURS
      );
      expect(other.allowed).toBe(false);
      expect(other.stage).toBe('default');

      expect(
        engine.evaluate({ roles: ['user'], id: 'u-1' }, { owner_id: 'u-1' }, 'claim:edit', BUSINESS_HOURS)
      ).toBe(false);
    });
  });

  describe('resource patterns', () => {
    it('should ignore resource patterns by default', () => {
      engine.addPolicy(allowAll('claims', { resources: ['claim/*'] }));

      expect(
        engine.evaluate({ roles: ['user'] }, { type: 'member', id: 'm-1' }, 'member:view', BUSINESS_HOURS)
      ).toBe(true);
    });

    it('should filter by resource pattern when enforced', () => {
      const strict = new PolicyEngine({
        logger: createMockLogger().logger,
        config: { enforceResourcePatterns: true },
      });
      strict.addPolicy(allowAll('claims', { resources: ['claim/*'] }));
      const subject: SubjectAttributes = { roles: ['user'] };

      expect(strict.evaluate(subject, { type: 'member', id: 'm-1' }, 'member:view', BUSINESS_HOURS)).toBe(
        false
      );
      expect(strict.evaluate(subject, { type: 'claim', id: 'c-1' }, 'claim:view', BUSINESS_HOURS)).toBe(
        true
      );
    });

    it('should match patterns by substring', () => {
      expect(matchesResourcePattern('*', 'anything/1')).toBe(true);
      expect(matchesResourcePattern('claim/*', 'claim/c-1')).toBe(true);
      expect(matchesResourcePattern('*/c-1', 'claim/c-1')).toBe(true);
      expect(matchesResourcePattern('member/*', 'claim/c-1')).toBe(false);
    });
  });
});

describe('createDefaultPolicyEngine', () => {
  let engine: PolicyEngine;

  beforeEach(() => {
    engine = createDefaultPolicyEngine({ logger: createMockLogger().logger });
  });

  it('should load the built-in policies in priority order', () => {
    expect(engine.listPolicies().map((rule) => rule.id)).toEqual([
      'compliance-data-access',
      'claim-owner-edit',
      'regional-data-access',
      'business-hours-access',
    ]);
  });

  it('should skip the built-in policies on request', () => {
    const empty = createDefaultPolicyEngine({
      logger: createMockLogger().logger,
      loadDefaultPolicies: false,
    });

    expect(empty.listPolicies()).toEqual([]);
  });

  it('should allow users during business hours', () => {
    const decision = engine.decide({ roles: ['user'], region: 'eu' }, {}, 'claim:view', BUSINESS_HOURS);

    expect(decision.allowed).toBe(true);
    expect(decision.decidedBy).toBe('business-hours-access');
  });

  it('should deny users after hours', () => {
    const decision = engine.decide({ roles: ['user'], region: 'eu' }, {}, 'claim:view', AFTER_HOURS);

    expect(decision.allowed).toBe(false);
    expect(decision.stage).toBe('default');
  });

  it('should deny users on day 0', () => {
    expect(engine.evaluate({ roles: ['user'] }, {}, 'claim:view', { hour: 12, day_of_week: 0 })).toBe(
      false
    );
  });

  it('should apply business hours from Tuesday to Saturday on the synthesized clock', () => {
    const at = (iso: string) =>
      createDefaultPolicyEngine({ logger: createMockLogger().logger, now: () => new Date(iso) });
    const subject: SubjectAttributes = { roles: ['user'] };

    expect(at('2024-01-06T12:00:00Z').decide(subject, {}, 'claim:view').decidedBy).toBe(
      'business-hours-access'
    );
    expect(at('2024-01-01T12:00:00Z').evaluate(subject, {}, 'claim:view')).toBe(false);
    expect(at('2024-01-07T12:00:00Z').evaluate(subject, {}, 'claim:view')).toBe(false);
  });

  it('should exempt subjects whose role attribute is admin from the business-hours rule', () => {
    const admin: SubjectAttributes = { roles: ['admin'], role: 'admin' };

    expect(engine.decide(admin, {}, 'claim:view', BUSINESS_HOURS).stage).toBe('default');
  });

  it('should compare condition strings literally', () => {
    const subject: SubjectAttributes = { roles: ['user'], region: 'eu' };

    expect(engine.evaluate(subject, { region: 'eu' }, 'claim:view', AFTER_HOURS)).toBe(false);

    const literal: SubjectAttributes = { roles: ['user'], region: 'resource.region' };
    expect(engine.decide(literal, { region: 'eu' }, 'claim:view', AFTER_HOURS).decidedBy).toBe(
      'regional-data-access'
    );
  });

  it('should grant auditors compliance data outside business hours', () => {
    const auditor: SubjectAttributes = { roles: ['auditor'], role: 'auditor', compliance_access: true };

    const decision = engine.decide(
      auditor,
      { data_classification: 'compliance' },
      'claim:view',
      AFTER_HOURS
    );

    expect(decision.allowed).toBe(true);
    expect(decision.decidedBy).toBe('compliance-data-access');
  });

  it('should not grant compliance data without the compliance flag', () => {
    const auditor: SubjectAttributes = { roles: ['auditor'], role: 'auditor', compliance_access: false };

    expect(
      engine.evaluate(auditor, { data_classification: 'compliance' }, 'claim:view', AFTER_HOURS)
    ).toBe(false);
  });

  it('should still apply the RBAC gate before the built-in policies', () => {
    const auditor: SubjectAttributes = { roles: ['auditor'], role: 'auditor', compliance_access: true };

    expect(
      engine.decide(auditor, { data_classification: 'compliance' }, 'claim:edit', BUSINESS_HOURS).stage
    ).toBe('rbac');
  });
});
