import type { Repositories } from '../repositories/types';
import {
  CAPABILITIES,
  type AggregatedPermissions,
  type Capability,
  type CapabilityFlags,
  type ModuleInfo,
  type ModulePermissionEntry,
  type RoleModuleGrant,
} from '../types/access.types';
import type { Employee } from '../types/employee.types';
import type { AccessContext } from './auth.types';

function noCapabilities(): CapabilityFlags {
  return {
    canView: false,
    canCreate: false,
    canEdit: false,
    canDelete: false,
    canExport: false,
    adminActions: false,
    otherActions: false,
  };
}

/**
 * Merges the permission rows of every role an employee holds.
 *
 * Roles are additive: a capability is granted on a module when at least one
 * role grants it. There is no deny and no precedence between roles. Entries
 * keep the order in which their module first appears in `grants`.
 */
export function aggregatePermissions(grants: RoleModuleGrant[]): AggregatedPermissions {
  const byModule = new Map<string, ModulePermissionEntry>();

  for (const grant of grants) {
    let entry = byModule.get(grant.module.key);
    if (!entry) {
      entry = { moduleKey: grant.module.key, moduleInfo: grant.module, permissions: noCapabilities() };
      byModule.set(grant.module.key, entry);
    }

    for (const capability of CAPABILITIES) {
      entry.permissions[capability] = entry.permissions[capability] || grant.flags[capability];
    }
  }

  const permissions = Array.from(byModule.values());
  const accessibleModules: ModuleInfo[] = permissions
    .filter((entry) => entry.permissions.canView)
    .map((entry) => entry.moduleInfo);

  return { permissions, accessibleModules };
}

export async function resolveAccessContext(db: Repositories, employee: Employee): Promise<AccessContext> {
  const [roles, grants] = await Promise.all([
    db.roles.listForEmployee(employee.id),
    db.permissions.listGrantsForEmployee(employee.id),
  ]);

  return { employee, roles, ...aggregatePermissions(grants) };
}

export function hasCapability(context: AggregatedPermissions, moduleKey: string, capability: Capability): boolean {
  const entry = context.permissions.find((p) => p.moduleKey === moduleKey);
  return entry?.permissions[capability] ?? false;
}
