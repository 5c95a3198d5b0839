export interface Role {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date;
}

export interface AppModule {
  id: number;
  name: string;
  key: string;
  description: string | null;
  icon: string | null;
  routeUrl: string | null;
  displayOrder: number;
  isActive: boolean;
  parentModuleId: number | null;
  createdAt: Date;
}

export const CAPABILITIES = [
  'canView',
  'canCreate',
  'canEdit',
  'canDelete',
  'canExport',
  'adminActions',
  'otherActions',
] as const;

export type Capability = (typeof CAPABILITIES)[number];

export type CapabilityFlags = Record<Capability, boolean>;

export interface ModulePermission extends CapabilityFlags {
  roleId: number;
  moduleId: number;
  assignedAt: Date;
}

export interface ModulePermissionDetails extends ModulePermission {
  roleName: string;
  moduleName: string;
  moduleKey: string;
}

export interface ModuleInfo {
  id: number;
  name: string;
  key: string;
  routeUrl: string | null;
  icon: string | null;
  displayOrder: number;
  parentModuleId: number | null;
}

/** One permission row of one role, with the module it applies to. */
export interface RoleModuleGrant {
  roleId: number;
  module: ModuleInfo;
  flags: CapabilityFlags;
}

export interface ModulePermissionEntry {
  moduleKey: string;
  moduleInfo: ModuleInfo;
  permissions: CapabilityFlags;
}

export interface AggregatedPermissions {
  permissions: ModulePermissionEntry[];
  accessibleModules: ModuleInfo[];
}
