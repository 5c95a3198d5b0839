import { FastifyReply, FastifyRequest } from 'fastify';
import { getAccessContext } from '../auth/current-employee';
import { hasCapability } from '../auth/permission.resolver';
import {
  BulkPermissionUpdateSchema,
  CheckPermissionParamsSchema,
  CreatePermissionSchema,
  ModuleIdParamsSchema,
  PERMISSION_ACTIONS,
  PermissionKeyParamsSchema,
  RoleIdParamsSchema,
  UpdatePermissionSchema,
} from '../schemas/access.zod';
import { ModuleService } from '../services/module.service';
import { PermissionService } from '../services/permission.service';
import { Logger } from '../utils/logger';

/**
 * GET /permissions/me
 * Roles and aggregated module permissions of the caller.
 */
export async function myPermissionsHandler(request: FastifyRequest, reply: FastifyReply) {
  const context = await getAccessContext(request);
  const { employee } = context;

  return reply.send({
    employee: {
      id: employee.id,
      firstName: employee.firstName,
      lastName: employee.lastName,
      displayName: employee.displayName,
      email: employee.email,
      title: employee.title,
      azureOid: employee.azureOid,
    },
    roles: context.roles.map((role) => ({ id: role.id, name: role.name, description: role.description })),
    permissions: context.permissions,
    accessibleModules: context.accessibleModules,
  });
}

/**
 * GET /permissions/check/:moduleKey/:action
 */
export async function checkPermissionHandler(request: FastifyRequest, reply: FastifyReply) {
  const { moduleKey, action } = CheckPermissionParamsSchema.parse(request.params);
  const found = await ModuleService.getByKey(request.server.db, moduleKey);
  const context = await getAccessContext(request);

  return reply.send({
    moduleKey,
    moduleName: found.name,
    action,
    allowed: hasCapability(context, moduleKey, PERMISSION_ACTIONS[action]),
  });
}

export async function createPermissionHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreatePermissionSchema.parse(request.body);
  const permission = await PermissionService.createPermission(request.server.db, data);
  return reply.status(201).send(permission);
}

export async function listPermissionsHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await PermissionService.list(request.server.db));
}

export async function listRolePermissionsHandler(request: FastifyRequest, reply: FastifyReply) {
  const { roleId } = RoleIdParamsSchema.parse(request.params);
  return reply.send(await PermissionService.listForRole(request.server.db, roleId));
}

export async function listModulePermissionsHandler(request: FastifyRequest, reply: FastifyReply) {
  const { moduleId } = ModuleIdParamsSchema.parse(request.params);
  return reply.send(await PermissionService.listForModule(request.server.db, moduleId));
}

export async function getPermissionHandler(request: FastifyRequest, reply: FastifyReply) {
  const { roleId, moduleId } = PermissionKeyParamsSchema.parse(request.params);
  return reply.send(await PermissionService.get(request.server.db, roleId, moduleId));
}

export async function updatePermissionHandler(request: FastifyRequest, reply: FastifyReply) {
  const { roleId, moduleId } = PermissionKeyParamsSchema.parse(request.params);
  const data = UpdatePermissionSchema.parse(request.body);
  return reply.send(await PermissionService.updatePermission(request.server.db, roleId, moduleId, data));
}

export async function deletePermissionHandler(request: FastifyRequest, reply: FastifyReply) {
  const { roleId, moduleId } = PermissionKeyParamsSchema.parse(request.params);
  await PermissionService.deletePermission(request.server.db, roleId, moduleId);
  return reply.send({ success: true, message: 'Permission deleted successfully' });
}

export async function bulkUpdatePermissionsHandler(request: FastifyRequest, reply: FastifyReply) {
  const input = BulkPermissionUpdateSchema.parse(request.body);
  const permissions = await PermissionService.bulkUpdate(request.server.db, input);

  new Logger(request.log).audit({
    employeeId: request.accessContext?.employee.id,
    action: 'PERMISSIONS_REPLACE',
    resource: 'roles',
    resourceId: input.roleId,
    status: 'success',
    metadata: { count: permissions.length },
  });

  return reply.send({ roleId: input.roleId, permissions });
}
