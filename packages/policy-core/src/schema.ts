/**
 * Policy Rule Schemas
 *
 * Zod schemas for rules that arrive from outside the process: the admin API
 * (addPolicy / updatePolicy) and policy documents read from an external store.
 */

import { z } from 'zod';
import { PolicyValidationError } from '@claimshield/lib-core';
import type { PolicyRule, PolicyRuleUpdate } from './types';

const conditionLiteralSchema = z.union([z.string(), z.number(), z.boolean(), z.null()]);

const attributeReferenceSchema = z.object({ $ref: z.string().min(1) }).strict();

const conditionOperandSchema = z.union([
  conditionLiteralSchema,
  z.array(conditionLiteralSchema),
  attributeReferenceSchema,
]);

export const conditionValueSchema = z.union([
  conditionLiteralSchema,
  z.array(conditionLiteralSchema),
  attributeReferenceSchema,
  z.record(z.string(), conditionOperandSchema),
]);

const ruleFields = {
  name: z.string().min(1),
  description: z.string().optional(),
  effect: z.enum(['allow', 'deny']),
  conditions: z.record(z.string(), conditionValueSchema),
  actions: z.array(z.string().min(1)),
  resources: z.array(z.string().min(1)),
  priority: z.number().int(),
  enabled: z.boolean(),
};

export const policyRuleSchema = z.object({
  id: z.string().min(1),
  ...ruleFields,
  conditions: ruleFields.conditions.default({}),
  resources: ruleFields.resources.default(['*']),
  priority: ruleFields.priority.default(0),
  enabled: ruleFields.enabled.default(true),
});

/**
 * Update payload: every field optional, unknown keys (including `id`) stripped
 */
export const policyRuleUpdateSchema = z.object(ruleFields).partial();

export const policyDocumentSchema = z
  .object({
    version: z.number().int().positive().optional(),
    policies: z.array(policyRuleSchema),
  })
  .superRefine((document, ctx) => {
    const seen = new Set<string>();
    document.policies.forEach((policy, index) => {
      if (seen.has(policy.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['policies', index, 'id'],
          message: `Duplicate policy id '${policy.id}'`,
        });
      }
      seen.add(policy.id);
    });
  });

/**
 * Input shape accepted by addPolicy (defaults applied for optional fields)
 */
export type PolicyRuleInput = z.input<typeof policyRuleSchema>;

/**
 * Anything addPolicy accepts: raw input or an already complete rule
 */
export type PolicyRuleSource = PolicyRuleInput | PolicyRule;

export type PolicyDocument = z.input<typeof policyDocumentSchema>;

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) =>
    issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
  );
}

/**
 * Validate a single rule, applying defaults
 *
 * @throws PolicyValidationError
 */
export function parsePolicyRule(input: unknown): PolicyRule {
  const result = policyRuleSchema.safeParse(input);
  if (!result.success) {
    throw new PolicyValidationError('Invalid policy rule', formatIssues(result.error));
  }
  const rule: PolicyRule = result.data;
  return rule;
}

/**
 * Validate an update payload. Unknown field names are dropped silently.
 *
 * @throws PolicyValidationError when a known field has an invalid value
 */
export function parsePolicyUpdate(input: unknown): PolicyRuleUpdate {
  const result = policyRuleUpdateSchema.safeParse(input);
  if (!result.success) {
    throw new PolicyValidationError('Invalid policy update', formatIssues(result.error));
  }
  const update: PolicyRuleUpdate = result.data;
  return update;
}

/**
 * Validate a whole policy document and return its rules
 *
 * @throws PolicyValidationError
 */
export function parsePolicyDocument(input: unknown): PolicyRule[] {
  const result = policyDocumentSchema.safeParse(input);
  if (!result.success) {
    throw new PolicyValidationError('Invalid policy document', formatIssues(result.error));
  }
  const rules: PolicyRule[] = result.data.policies;
  return rules;
}
