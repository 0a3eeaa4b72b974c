/**
 * Built-in example policies for the claims domain.
 *
 * Right-hand string values are literals. "resource.owner_id": "user.id"
 * therefore only matches a resource whose owner_id is the text "user.id";
 * use `{ $ref: 'user.id' }` with attribute references enabled for an
 * ownership check. Keys without a namespace (`action`) are skipped.
 *
 * `context.day_of_week` counts from Monday = 0.
 */

import type { PolicyRule } from './types';

export const DEFAULT_POLICIES: readonly PolicyRule[] = [
  {
    id: 'claim-owner-edit',
    name: 'Claim Owner Edit Policy',
    description: 'Claim owners may edit their claims',
    effect: 'allow',
    conditions: {
      'resource.owner_id': 'user.id',
      action: 'claim:edit',
    },
    actions: ['claim:edit'],
    resources: ['claim/*'],
    priority: 100,
    enabled: true,
  },
  {
    id: 'regional-data-access',
    name: 'Regional Data Access Policy',
    description: 'Claims and members are visible within the same region',
    effect: 'allow',
    conditions: {
      'user.region': 'resource.region',
      action: ['claim:view', 'member:view'],
    },
    actions: ['claim:view', 'member:view'],
    resources: ['claim/*', 'member/*'],
    priority: 90,
    enabled: true,
  },
  {
    id: 'business-hours-access',
    name: 'Business Hours Access Policy',
    description: 'Access during business hours, days 1 to 5 (Tuesday to Saturday)',
    effect: 'allow',
    conditions: {
      'context.hour': { $gte: 9, $lte: 17 },
      'context.day_of_week': { $in: [1, 2, 3, 4, 5] },
      'user.role': { $ne: 'admin' },
    },
    actions: ['*'],
    resources: ['*'],
    priority: 50,
    enabled: true,
  },
  {
    id: 'compliance-data-access',
    name: 'Compliance Data Access Policy',
    description: 'Compliance data for auditors and admins with compliance access',
    effect: 'allow',
    conditions: {
      'resource.data_classification': 'compliance',
      'user.compliance_access': true,
      'user.role': { $in: ['auditor', 'admin'] },
    },
    actions: ['claim:view', 'member:view', 'policy:view'],
    resources: ['*'],
    priority: 200,
    enabled: true,
  },
];
