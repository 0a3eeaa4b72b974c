/**
 * Roles and Permissions
 *
 * Closed sets of roles and "<resource>:<verb>" permissions. Parsing is total:
 * unknown strings produce an explicit unknown result instead of throwing, so
 * callers cannot accidentally grant access on a parse failure.
 */

export const ROLES = ['super_admin', 'admin', 'user', 'viewer', 'auditor'] as const;

export type Role = (typeof ROLES)[number];

export const PERMISSIONS = [
  // Claims
  'claim:view',
  'claim:create',
  'claim:edit',
  'claim:delete',
  'claim:approve',
  // Members
  'member:view',
  'member:create',
  'member:edit',
  'member:delete',
  // Policies
  'policy:view',
  'policy:create',
  'policy:edit',
  'policy:delete',
  // Admin
  'admin:view',
  'admin:manage_users',
  'admin:manage_roles',
  'admin:view_audit',
  'admin:system_config',
  // Analytics
  'analytics:view',
  'analytics:export',
] as const;

export type Permission = (typeof PERMISSIONS)[number];

/**
 * Result of parsing a permission string
 */
export type ParsedPermission =
  | { kind: 'known'; permission: Permission }
  | { kind: 'unknown'; value: string };

const ROLE_SET: ReadonlySet<string> = new Set(ROLES);
const PERMISSION_SET: ReadonlySet<string> = new Set(PERMISSIONS);

export function isRole(value: unknown): value is Role {
  return typeof value === 'string' && ROLE_SET.has(value);
}

export function isPermission(value: unknown): value is Permission {
  return typeof value === 'string' && PERMISSION_SET.has(value);
}

/**
 * Parse a role name. Unknown names yield undefined.
 */
export function parseRole(value: unknown): Role | undefined {
  return isRole(value) ? value : undefined;
}

/**
 * Keep the known roles of an untrusted role list, in order, without duplicates.
 * Anything that is not an array yields an empty list.
 */
export function parseRoles(values: unknown): Role[] {
  if (!Array.isArray(values)) {
    return [];
  }
  const roles: Role[] = [];
  for (const value of values) {
    const role = parseRole(value);
    if (role && !roles.includes(role)) {
      roles.push(role);
    }
  }
  return roles;
}

/**
 * Parse a "<resource>:<verb>" permission string (exact match, case-sensitive).
 *
 * @example
 * parsePermission('claim:approve'); // { kind: 'known', permission: 'claim:approve' }
 * parsePermission('claim:archive'); // { kind: 'unknown', value: 'claim:archive' }
 */
export function parsePermission(value: string): ParsedPermission {
  return isPermission(value) ? { kind: 'known', permission: value } : { kind: 'unknown', value };
}

/**
 * Build the permission string for a resource type and verb.
 * The result is lower-cased to match the permission catalog.
 */
export function formatPermission(resourceType: string, action: string): string {
  return `${resourceType}:${action}`.toLowerCase();
}
