/**
 * Role Authority
 *
 * Owns the role → permission table and the declared role inheritance.
 * Answers the coarse RBAC questions used as the first evaluation phase.
 *
 * Inheritance depth is one hop: a role carries its own permissions plus the
 * direct permissions of each role it declares in `inherits`. The inherited
 * roles' own `inherits` lists are not followed.
 */

import { PERMISSIONS, formatPermission, parsePermission, parseRole } from './permissions';
import type { Permission, Role } from './permissions';

/**
 * Declarative definition of one role
 */
export interface RoleDefinition {
  /** Permissions granted directly */
  permissions: readonly Permission[];
  /** Roles whose direct permissions this role also carries */
  inherits: readonly Role[];
}

export type RoleDefinitions = Readonly<Record<Role, RoleDefinition>>;

/**
 * Resolved entry of the role table
 */
export interface RolePermissionSet {
  role: Role;
  permissions: ReadonlySet<Permission>;
  inherits: readonly Role[];
}

export const DEFAULT_ROLE_DEFINITIONS: RoleDefinitions = {
  super_admin: {
    permissions: PERMISSIONS,
    inherits: [],
  },
  admin: {
    permissions: [
      'claim:view',
      'claim:create',
      'claim:edit',
      'claim:delete',
      'claim:approve',
      'member:view',
      'member:create',
      'member:edit',
      'member:delete',
      'policy:view',
      'policy:create',
      'policy:edit',
      'policy:delete',
      'admin:view',
      'admin:manage_users',
      'analytics:view',
      'analytics:export',
    ],
    inherits: ['user', 'viewer'],
  },
  user: {
    permissions: [
      'claim:view',
      'claim:create',
      'claim:edit',
      'member:view',
      'member:create',
      'member:edit',
      'policy:view',
      'analytics:view',
    ],
    inherits: ['viewer'],
  },
  viewer: {
    permissions: ['claim:view', 'member:view', 'policy:view'],
    inherits: [],
  },
  auditor: {
    permissions: ['claim:view', 'member:view', 'policy:view', 'admin:view_audit', 'analytics:view'],
    inherits: [],
  },
};

type RoleTable = ReadonlyMap<Role, RolePermissionSet>;

function buildTable(definitions: Partial<Record<Role, RoleDefinition>>): RoleTable {
  const table = new Map<Role, RolePermissionSet>();
  for (const [name, definition] of Object.entries(definitions)) {
    const role = parseRole(name);
    if (!role || !definition) continue;
    table.set(
      role,
      Object.freeze({
        role,
        permissions: new Set(definition.permissions),
        inherits: Object.freeze([...definition.inherits]),
      })
    );
  }
  return table;
}

/**
 * Role Authority
 *
 * Reads go against an immutable table snapshot. The two mutation methods
 * build a new table and swap the reference, so a concurrent reader sees
 * either the old table or the new one.
 */
export class RoleAuthority {
  private table: RoleTable;

  constructor(definitions: Partial<Record<Role, RoleDefinition>> = DEFAULT_ROLE_DEFINITIONS) {
    this.table = buildTable(definitions);
  }

  /**
   * Check whether any of the roles carries the permission, directly or
   * through a one-hop inherited role. Unknown roles carry nothing.
   */
  hasPermission(roles: readonly string[], permission: Permission): boolean {
    const table = this.table;
    for (const name of roles) {
      const role = parseRole(name);
      if (!role) continue;

      const entry = table.get(role);
      if (!entry) continue;
      if (entry.permissions.has(permission)) return true;

      for (const inherited of entry.inherits) {
        if (table.get(inherited)?.permissions.has(permission)) return true;
      }
    }
    return false;
  }

  /**
   * Union of direct and one-hop inherited permissions across all roles
   */
  permissionClosure(roles: readonly string[]): Set<Permission> {
    const table = this.table;
    const closure = new Set<Permission>();
    const add = (role: Role) => {
      table.get(role)?.permissions.forEach((permission) => closure.add(permission));
    };

    for (const name of roles) {
      const role = parseRole(name);
      if (!role) continue;
      add(role);
      table.get(role)?.inherits.forEach(add);
    }
    return closure;
  }

  /**
   * Check "<resourceType>:<action>". Unknown permission strings deny.
   *
   * @example
   * authority.canAccess(['user'], 'Claim', 'VIEW'); // true ('claim:view')
   * authority.canAccess(['admin'], 'claim', 'archive'); // false (unknown permission)
   */
  canAccess(roles: readonly string[], resourceType: string, action: string): boolean {
    const parsed = parsePermission(formatPermission(resourceType, action));
    if (parsed.kind === 'unknown') {
      return false;
    }
    return this.hasPermission(roles, parsed.permission);
  }

  /**
   * Table entry for a single role, if defined
   */
  rolePermissions(role: Role): RolePermissionSet | undefined {
    return this.table.get(role);
  }

  /**
   * Grant a permission directly to a role, creating the role entry if needed
   */
  addRolePermission(role: Role, permission: Permission): void {
    const current = this.table.get(role);
    if (current?.permissions.has(permission)) return;

    const next = new Map(this.table);
    next.set(
      role,
      Object.freeze({
        role,
        permissions: new Set([...(current?.permissions ?? []), permission]),
        inherits: current?.inherits ?? Object.freeze([]),
      })
    );
    this.table = next;
  }

  /**
   * Revoke a directly granted permission. Inherited grants are unaffected.
   */
  removeRolePermission(role: Role, permission: Permission): void {
    const current = this.table.get(role);
    if (!current?.permissions.has(permission)) return;

    const permissions = new Set(current.permissions);
    permissions.delete(permission);

    const next = new Map(this.table);
    next.set(role, Object.freeze({ ...current, permissions }));
    this.table = next;
  }
}
