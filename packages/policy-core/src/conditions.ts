/**
 * Condition Evaluator
 *
 * Evaluates a rule's condition map against an evaluation context.
 *
 * Path resolution:
 * - "<namespace>.<field>" with namespace user | resource | context
 * - "action.<anything>" reads context.action (the evaluated action is NOT
 *   injected there automatically; callers that want action.* conditions must
 *   put it in the context themselves)
 * - any other shape (no dot, more than one dot, unknown namespace) is skipped
 *   and counts as satisfied
 *
 * A string on the right-hand side is always a literal: the condition
 * `"resource.owner_id": "user.id"` compares owner_id with the text "user.id".
 * Cross-attribute comparison needs an explicit `{ $ref: "user.id" }`, which is
 * honored only when attribute references are enabled. With references
 * disabled a `$ref` never matches.
 */

import type {
  AttributeReference,
  ConditionOperand,
  ConditionValue,
  EvaluationContext,
  PolicyConditions,
} from './types';

export interface ConditionOptions {
  /** Resolve `{ $ref: "<path>" }` operands against the context */
  enableAttributeRefs: boolean;
}

export const DEFAULT_CONDITION_OPTIONS: ConditionOptions = {
  enableAttributeRefs: false,
};

/**
 * Canonical comparison operators
 */
export type ComparisonOperator = 'eq' | 'ne' | 'in' | 'nin' | 'gte' | 'lte' | 'gt' | 'lt';

/**
 * Accepted operator spellings
 */
export const OPERATOR_ALIASES: Readonly<Record<string, ComparisonOperator>> = {
  $eq: 'eq',
  '=': 'eq',
  $ne: 'ne',
  '!=': 'ne',
  $in: 'in',
  $nin: 'nin',
  $not_in: 'nin',
  $gte: 'gte',
  '>=': 'gte',
  $lte: 'lte',
  '<=': 'lte',
  $gt: 'gt',
  '>': 'gt',
  $lt: 'lt',
  '<': 'lt',
};

export type AttributeNamespace = 'user' | 'resource' | 'context' | 'action';

/**
 * Outcome of resolving a condition path
 */
export type AttributeLookup = { kind: 'resolved'; value: unknown } | { kind: 'skipped' };

/**
 * Split "<namespace>.<field>". Returns null unless the path has exactly one dot.
 */
export function splitAttributePath(path: string): [string, string] | null {
  const parts = path.split('.');
  if (parts.length !== 2) {
    return null;
  }
  return [parts[0], parts[1]];
}

function readAttribute(bag: Record<string, unknown>, field: string): unknown {
  return Object.prototype.hasOwnProperty.call(bag, field) ? bag[field] : undefined;
}

/**
 * Resolve a condition path against the evaluation context.
 * Missing attributes resolve to undefined; malformed paths are skipped.
 */
export function resolveAttribute(path: string, ctx: EvaluationContext): AttributeLookup {
  const split = splitAttributePath(path);
  if (!split) {
    return { kind: 'skipped' };
  }
  const [namespace, field] = split;

  switch (namespace) {
    case 'user':
      return { kind: 'resolved', value: readAttribute(ctx.user, field) };
    case 'resource':
      return { kind: 'resolved', value: readAttribute(ctx.resource, field) };
    case 'context':
      return { kind: 'resolved', value: readAttribute(ctx.context, field) };
    case 'action':
      return { kind: 'resolved', value: readAttribute(ctx.context, 'action') };
    default:
      return { kind: 'skipped' };
  }
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isAttributeReference(value: unknown): value is AttributeReference {
  return (
    isPlainObject(value) && Object.keys(value).length === 1 && typeof value.$ref === 'string'
  );
}

function freezeOperand(operand: ConditionOperand): ConditionOperand {
  if (Array.isArray(operand)) return Object.freeze([...operand]);
  if (isAttributeReference(operand)) return Object.freeze({ $ref: operand.$ref });
  return operand;
}

function freezeConditionValue(value: ConditionValue): ConditionValue {
  if (Array.isArray(value)) return Object.freeze([...value]);
  if (value === null || typeof value !== 'object') return value;
  if (isAttributeReference(value)) return Object.freeze({ $ref: value.$ref });

  const expression: Record<string, ConditionOperand> = {};
  for (const [key, operand] of Object.entries(value)) {
    expression[key] = freezeOperand(operand);
  }
  return Object.freeze(expression);
}

/**
 * Frozen copy of a condition map, down to operator objects and list values
 */
export function freezeConditions(conditions: PolicyConditions): PolicyConditions {
  const frozen: Record<string, ConditionValue> = {};
  for (const [path, value] of Object.entries(conditions)) {
    frozen[path] = freezeConditionValue(value);
  }
  return Object.freeze(frozen);
}

function isAbsent(value: unknown): value is null | undefined {
  return value === null || value === undefined;
}

/**
 * Structural equality for attribute values: primitives by identity,
 * arrays element-wise, plain objects key-wise. A missing attribute equals null.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === b) return true;
  if (isAbsent(a) && isAbsent(b)) return true;

  if (Array.isArray(a) && Array.isArray(b)) {
    return a.length === b.length && a.every((item, index) => valuesEqual(item, b[index]));
  }

  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return (
      keys.length === Object.keys(b).length &&
      keys.every((key) => Object.prototype.hasOwnProperty.call(b, key) && valuesEqual(a[key], b[key]))
    );
  }

  return false;
}

function contains(list: unknown, value: unknown): boolean | null {
  if (!Array.isArray(list)) {
    return null;
  }
  return list.some((item) => valuesEqual(item, value));
}

/**
 * Order two values. Only number/number and string/string pairs are orderable;
 * anything else returns null (type mismatch).
 */
function compareOrdered(actual: unknown, expected: unknown): number | null {
  if (typeof actual === 'number' && typeof expected === 'number') {
    if (Number.isNaN(actual) || Number.isNaN(expected)) return null;
    return actual - expected;
  }
  if (typeof actual === 'string' && typeof expected === 'string') {
    return actual < expected ? -1 : actual > expected ? 1 : 0;
  }
  return null;
}

type OperatorCheck = (actual: unknown, operand: unknown) => boolean;

const OPERATOR_CHECKS: Record<ComparisonOperator, OperatorCheck> = {
  eq: (actual, operand) => valuesEqual(actual, operand),
  ne: (actual, operand) => !valuesEqual(actual, operand),
  in: (actual, operand) => contains(operand, actual) === true,
  nin: (actual, operand) => contains(operand, actual) === false,
  gte: (actual, operand) => {
    const order = compareOrdered(actual, operand);
    return order !== null && order >= 0;
  },
  lte: (actual, operand) => {
    const order = compareOrdered(actual, operand);
    return order !== null && order <= 0;
  },
  gt: (actual, operand) => {
    const order = compareOrdered(actual, operand);
    return order !== null && order > 0;
  },
  lt: (actual, operand) => {
    const order = compareOrdered(actual, operand);
    return order !== null && order < 0;
  },
};

/**
 * Result of resolving an operand: references that point nowhere never match.
 */
type OperandLookup = { kind: 'value'; value: unknown } | { kind: 'unresolved' };

function resolveOperand(
  operand: unknown,
  ctx: EvaluationContext,
  options: ConditionOptions
): OperandLookup {
  if (!isAttributeReference(operand)) {
    return { kind: 'value', value: operand };
  }
  if (!options.enableAttributeRefs) {
    return { kind: 'unresolved' };
  }
  const lookup = resolveAttribute(operand.$ref, ctx);
  if (lookup.kind === 'skipped' || lookup.value === undefined) {
    return { kind: 'unresolved' };
  }
  return { kind: 'value', value: lookup.value };
}

function evaluateOperators(
  actual: unknown,
  expression: Record<string, unknown>,
  ctx: EvaluationContext,
  options: ConditionOptions
): boolean {
  for (const [key, rawOperand] of Object.entries(expression)) {
    const operator = Object.prototype.hasOwnProperty.call(OPERATOR_ALIASES, key)
      ? OPERATOR_ALIASES[key]
      : undefined;
    if (!operator) continue;

    const operand = resolveOperand(rawOperand, ctx, options);
    if (operand.kind === 'unresolved') return false;
    if (!OPERATOR_CHECKS[operator](actual, operand.value)) return false;
  }
  return true;
}

/**
 * Compare one resolved attribute value against a condition's expected value
 */
export function evaluateCondition(
  actual: unknown,
  expected: ConditionValue,
  ctx: EvaluationContext,
  options: ConditionOptions = DEFAULT_CONDITION_OPTIONS
): boolean {
  if (Array.isArray(expected)) {
    return contains(expected, actual) === true;
  }

  if (isPlainObject(expected)) {
    if (isAttributeReference(expected)) {
      const operand = resolveOperand(expected, ctx, options);
      return operand.kind === 'value' && actual !== undefined && valuesEqual(actual, operand.value);
    }
    return evaluateOperators(actual, expected, ctx, options);
  }

  return valuesEqual(actual, expected);
}

/**
 * Evaluate every condition of a rule (logical AND). An empty map matches.
 */
export function evaluateConditions(
  conditions: PolicyConditions,
  ctx: EvaluationContext,
  options: ConditionOptions = DEFAULT_CONDITION_OPTIONS
): boolean {
  for (const [path, expected] of Object.entries(conditions)) {
    const lookup = resolveAttribute(path, ctx);
    if (lookup.kind === 'skipped') continue;

    if (!evaluateCondition(lookup.value, expected, ctx, options)) {
      return false;
    }
  }
  return true;
}
