import type { Repositories } from '../repositories/types';
import type { CreateRoleInput, UpdateRoleInput } from '../schemas/access.zod';
import type { Role } from '../types/access.types';
import { NotFoundError } from '../utils/errors';

/**
 * ---------------------------------------------------------
 * ROLE SERVICE
 * ---------------------------------------------------------
 * Roles are plain named bundles of module permissions.
 * Deleting a role cascades to its employee assignments
 * and permission rows.
 * ---------------------------------------------------------
 */

export async function getRoleOrThrow(db: Repositories, id: number): Promise<Role> {
  const role = await db.roles.findById(id);
  if (!role) throw new NotFoundError('Role not found');
  return role;
}

export function listRoles(db: Repositories) {
  return db.roles.list();
}

export function createRole(db: Repositories, data: CreateRoleInput) {
  return db.roles.create(data);
}

export async function updateRole(db: Repositories, id: number, data: UpdateRoleInput) {
  const role = await db.roles.update(id, data);
  if (!role) throw new NotFoundError('Role not found');
  return role;
}

export async function deleteRole(db: Repositories, id: number) {
  if (!(await db.roles.delete(id))) {
    throw new NotFoundError('Role not found');
  }
}
