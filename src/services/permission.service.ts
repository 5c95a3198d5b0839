// services/permission.service.ts
import type { Repositories } from '../repositories/types';
import type { BulkPermissionInput, CreatePermissionInput, UpdatePermissionInput } from '../schemas/access.zod';
import { BadRequestError, NotFoundError } from '../utils/errors';
import { getRoleOrThrow } from './role.service';
import { ModuleService } from './module.service';

export class PermissionService {
  static list(db: Repositories) {
    return db.permissions.list();
  }

  static async listForRole(db: Repositories, roleId: number) {
    await getRoleOrThrow(db, roleId);
    return db.permissions.list({ roleId });
  }

  static async listForModule(db: Repositories, moduleId: number) {
    await ModuleService.getById(db, moduleId);
    return db.permissions.list({ moduleId });
  }

  static async get(db: Repositories, roleId: number, moduleId: number) {
    const permission = await db.permissions.find(roleId, moduleId);
    if (!permission) throw new NotFoundError('Permission not found');
    return permission;
  }

  static async createPermission(db: Repositories, data: CreatePermissionInput) {
    await getRoleOrThrow(db, data.roleId);
    await ModuleService.getById(db, data.moduleId);

    if (await db.permissions.find(data.roleId, data.moduleId)) {
      throw new BadRequestError('Permission already exists for this role and module');
    }

    return db.permissions.create(data);
  }

  static async updatePermission(db: Repositories, roleId: number, moduleId: number, data: UpdatePermissionInput) {
    const permission = await db.permissions.update(roleId, moduleId, data);
    if (!permission) throw new NotFoundError('Permission not found');
    return permission;
  }

  static async deletePermission(db: Repositories, roleId: number, moduleId: number) {
    if (!(await db.permissions.delete(roleId, moduleId))) {
      throw new NotFoundError('Permission not found');
    }
  }

  /** Replaces every permission row of the role with the submitted set. */
  static async bulkUpdate(db: Repositories, input: BulkPermissionInput) {
    await getRoleOrThrow(db, input.roleId);
    for (const permission of input.permissions) {
      await ModuleService.getById(db, permission.moduleId);
    }

    const rows = input.permissions.map(({ roleId: _roleId, ...rest }) => rest);
    return db.permissions.replaceForRole(input.roleId, rows);
  }
}
