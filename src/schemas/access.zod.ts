import { z } from 'zod';
import { nonEmptyPatch, nullableText } from './common.zod';

/* ----------------------------------
   Roles
----------------------------------- */
export const CreateRoleSchema = z.object({
  name: z.string().trim().min(2, 'Role name must be at least 2 characters').max(50),
  description: nullableText(200),
});

export const UpdateRoleSchema = nonEmptyPatch(CreateRoleSchema.shape);

/* ----------------------------------
   Modules
----------------------------------- */
const moduleKey = z
  .string()
  .trim()
  .min(1)
  .max(50)
  .regex(/^[a-z0-9_-]+$/, 'Module key may only contain lowercase letters, digits, "-" and "_"');

export const CreateModuleSchema = z.object({
  name: z.string().trim().min(1).max(50),
  key: moduleKey,
  description: nullableText(200),
  icon: nullableText(50),
  routeUrl: nullableText(100),
  displayOrder: z.number().int().default(0),
  isActive: z.boolean().default(true),
  parentModuleId: z.number().int().positive().nullable().optional(),
});

export const UpdateModuleSchema = nonEmptyPatch({
  name: z.string().trim().min(1).max(50),
  key: moduleKey,
  description: nullableText(200),
  icon: nullableText(50),
  routeUrl: nullableText(100),
  displayOrder: z.number().int(),
  isActive: z.boolean(),
  parentModuleId: z.number().int().positive().nullable(),
});

export const ListModulesQuerySchema = z.object({
  includeInactive: z
    .enum(['true', 'false'])
    .default('false')
    .transform((v) => v === 'true'),
});

export const ModuleKeyParamsSchema = z.object({ key: z.string().min(1) });

/* ----------------------------------
   Module permissions
----------------------------------- */
const capabilityShape = {
  canView: z.boolean(),
  canCreate: z.boolean(),
  canEdit: z.boolean(),
  canDelete: z.boolean(),
  canExport: z.boolean(),
  adminActions: z.boolean(),
  otherActions: z.boolean(),
};

export const CreatePermissionSchema = z.object({
  roleId: z.number().int().positive(),
  moduleId: z.number().int().positive(),
  canView: capabilityShape.canView.default(true),
  canCreate: capabilityShape.canCreate.default(false),
  canEdit: capabilityShape.canEdit.default(false),
  canDelete: capabilityShape.canDelete.default(false),
  canExport: capabilityShape.canExport.default(false),
  adminActions: capabilityShape.adminActions.default(false),
  otherActions: capabilityShape.otherActions.default(false),
});

export const UpdatePermissionSchema = nonEmptyPatch(capabilityShape);

export const BulkPermissionUpdateSchema = z
  .object({
    roleId: z.number().int().positive(),
    permissions: z.array(CreatePermissionSchema.omit({ roleId: true }).extend({ roleId: z.number().int().positive().optional() })),
  })
  .refine((data) => data.permissions.every((p) => p.roleId === undefined || p.roleId === data.roleId), {
    message: 'Every permission must belong to the role being updated',
    path: ['permissions'],
  })
  .refine((data) => new Set(data.permissions.map((p) => p.moduleId)).size === data.permissions.length, {
    message: 'A module may only appear once per role',
    path: ['permissions'],
  });

export const PermissionKeyParamsSchema = z.object({
  roleId: z.coerce.number().int().positive(),
  moduleId: z.coerce.number().int().positive(),
});

export const RoleIdParamsSchema = z.object({ roleId: z.coerce.number().int().positive() });
export const ModuleIdParamsSchema = z.object({ moduleId: z.coerce.number().int().positive() });

export const PERMISSION_ACTIONS = {
  view: 'canView',
  create: 'canCreate',
  edit: 'canEdit',
  delete: 'canDelete',
  export: 'canExport',
  admin_actions: 'adminActions',
  other_actions: 'otherActions',
} as const;

export const CheckPermissionParamsSchema = z.object({
  moduleKey: z.string().min(1),
  action: z.enum(['view', 'create', 'edit', 'delete', 'export', 'admin_actions', 'other_actions']),
});

export type CreateRoleInput = z.infer<typeof CreateRoleSchema>;
export type UpdateRoleInput = z.infer<typeof UpdateRoleSchema>;
export type CreateModuleInput = z.infer<typeof CreateModuleSchema>;
export type UpdateModuleInput = z.infer<typeof UpdateModuleSchema>;
export type CreatePermissionInput = z.infer<typeof CreatePermissionSchema>;
export type UpdatePermissionInput = z.infer<typeof UpdatePermissionSchema>;
export type BulkPermissionInput = z.infer<typeof BulkPermissionUpdateSchema>;
