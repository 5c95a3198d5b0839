import type { Database, Queryable } from '../../lib/db';
import {
  CAPABILITIES,
  type AppModule,
  type Capability,
  type CapabilityFlags,
  type ModulePermission,
  type ModulePermissionDetails,
  type Role,
  type RoleModuleGrant,
} from '../../types/access.types';
import type {
  CreateModuleInput,
  CreatePermissionInput,
  CreateRoleInput,
  UpdateModuleInput,
  UpdatePermissionInput,
  UpdateRoleInput,
} from '../../schemas/access.zod';
import type { ModuleRepository, PermissionRepository, RoleRepository } from '../types';
import { PgCrudRepository, PgTable } from './table';

const ROLE_COLUMNS = { id: 'id', name: 'name', description: 'description', createdAt: 'created_at' };

export class PgRoleRepository
  extends PgCrudRepository<Role, CreateRoleInput, UpdateRoleInput>
  implements RoleRepository
{
  constructor(db: Queryable) {
    super(db, { name: 'roles', columns: ROLE_COLUMNS });
  }

  async listForEmployee(employeeId: number) {
    const { rows } = await this.db.query<Role>(
      `SELECT r.id, r.name, r.description, r.created_at AS "createdAt"
       FROM employee_roles er
       JOIN roles r ON r.id = er.role_id
       WHERE er.employee_id = $1
       ORDER BY r.id`,
      [employeeId]
    );
    return rows;
  }

  async assignToEmployee(employeeId: number, roleId: number) {
    const { rowCount } = await this.db.query(
      `INSERT INTO employee_roles (employee_id, role_id) VALUES ($1, $2)
       ON CONFLICT (employee_id, role_id) DO NOTHING`,
      [employeeId, roleId]
    );
    return (rowCount ?? 0) > 0;
  }

  async removeFromEmployee(employeeId: number, roleId: number) {
    const { rowCount } = await this.db.query(
      'DELETE FROM employee_roles WHERE employee_id = $1 AND role_id = $2',
      [employeeId, roleId]
    );
    return (rowCount ?? 0) > 0;
  }
}

export class PgModuleRepository implements ModuleRepository {
  private readonly table: PgTable<AppModule>;

  constructor(db: Queryable) {
    this.table = new PgTable<AppModule>(db, {
      name: 'modules',
      columns: {
        id: 'id',
        name: 'name',
        key: 'module_key',
        description: 'description',
        icon: 'icon',
        routeUrl: 'route_url',
        displayOrder: 'display_order',
        isActive: 'is_active',
        parentModuleId: 'parent_module_id',
        createdAt: 'created_at',
      },
      orderBy: 'display_order, id',
    });
  }

  list(options: { includeInactive?: boolean } = {}) {
    return options.includeInactive ? this.table.findAll() : this.table.findAll('is_active');
  }

  findById(id: number) {
    return this.table.findById(id);
  }

  findByKey(key: string) {
    return this.table.findOne('module_key = $1', [key]);
  }

  listChildren(parentId: number) {
    return this.table.findAll('parent_module_id = $1', [parentId]);
  }

  listRoots() {
    return this.table.findAll('parent_module_id IS NULL AND is_active');
  }

  create(data: CreateModuleInput) {
    return this.table.insert(data);
  }

  update(id: number, data: UpdateModuleInput) {
    return this.table.update(id, data);
  }

  delete(id: number) {
    return this.table.delete(id);
  }
}

const CAPABILITY_COLUMNS: Record<Capability, string> = {
  canView: 'can_view',
  canCreate: 'can_create',
  canEdit: 'can_edit',
  canDelete: 'can_delete',
  canExport: 'can_export',
  adminActions: 'admin_actions',
  otherActions: 'other_actions',
};

const PERMISSION_SELECT = [
  'rm.role_id AS "roleId"',
  'rm.module_id AS "moduleId"',
  ...CAPABILITIES.map((c) => `rm.${CAPABILITY_COLUMNS[c]} AS "${c}"`),
  'rm.assigned_at AS "assignedAt"',
].join(', ');

const PERMISSION_DETAILS_SQL = `
  SELECT ${PERMISSION_SELECT}, r.name AS "roleName", m.name AS "moduleName", m.module_key AS "moduleKey"
  FROM role_modules rm
  JOIN roles r ON r.id = rm.role_id
  JOIN modules m ON m.id = rm.module_id`;

const FLAGS_JSON = `json_build_object(${CAPABILITIES.map((c) => `'${c}', rm.${CAPABILITY_COLUMNS[c]}`).join(', ')})`;

export class PgPermissionRepository implements PermissionRepository {
  constructor(private readonly db: Database) {}

  async list(filter: { roleId?: number; moduleId?: number } = {}) {
    const conditions: string[] = [];
    const values: unknown[] = [];

    if (filter.roleId !== undefined) {
      values.push(filter.roleId);
      conditions.push(`rm.role_id = $${values.length}`);
    }
    if (filter.moduleId !== undefined) {
      values.push(filter.moduleId);
      conditions.push(`rm.module_id = $${values.length}`);
    }

    const where = conditions.length ? ` WHERE ${conditions.join(' AND ')}` : '';
    const { rows } = await this.db.query<ModulePermissionDetails>(
      `${PERMISSION_DETAILS_SQL}${where} ORDER BY rm.role_id, m.display_order, rm.module_id`,
      values
    );
    return rows;
  }

  async find(roleId: number, moduleId: number) {
    const { rows } = await this.db.query<ModulePermissionDetails>(
      `${PERMISSION_DETAILS_SQL} WHERE rm.role_id = $1 AND rm.module_id = $2`,
      [roleId, moduleId]
    );
    return rows[0] ?? null;
  }

  create(data: CreatePermissionInput) {
    return insertPermission(this.db, data.roleId, data);
  }

  async update(roleId: number, moduleId: number, data: UpdatePermissionInput) {
    const values: unknown[] = [roleId, moduleId];
    const sets: string[] = [];

    for (const capability of CAPABILITIES) {
      const value = data[capability];
      if (value === undefined) continue;
      values.push(value);
      sets.push(`${CAPABILITY_COLUMNS[capability]} = $${values.length}`);
    }

    if (sets.length === 0) {
      return this.find(roleId, moduleId);
    }

    const { rows } = await this.db.query<ModulePermission>(
      `UPDATE role_modules rm SET ${sets.join(', ')}
       WHERE rm.role_id = $1 AND rm.module_id = $2
       RETURNING ${PERMISSION_SELECT}`,
      values
    );
    return rows[0] ?? null;
  }

  async delete(roleId: number, moduleId: number) {
    const { rowCount } = await this.db.query('DELETE FROM role_modules WHERE role_id = $1 AND module_id = $2', [
      roleId,
      moduleId,
    ]);
    return (rowCount ?? 0) > 0;
  }

  replaceForRole(roleId: number, rows: Array<{ moduleId: number } & CapabilityFlags>) {
    return this.db.transaction(async (tx) => {
      await tx.query('DELETE FROM role_modules WHERE role_id = $1', [roleId]);

      const created: ModulePermission[] = [];
      for (const row of rows) {
        created.push(await insertPermission(tx, roleId, row));
      }
      return created;
    });
  }

  async listGrantsForEmployee(employeeId: number) {
    const { rows } = await this.db.query<RoleModuleGrant>(
      `SELECT rm.role_id AS "roleId",
              json_build_object(
                'id', m.id, 'name', m.name, 'key', m.module_key, 'routeUrl', m.route_url,
                'icon', m.icon, 'displayOrder', m.display_order, 'parentModuleId', m.parent_module_id
              ) AS "module",
              ${FLAGS_JSON} AS "flags"
       FROM employee_roles er
       JOIN role_modules rm ON rm.role_id = er.role_id
       JOIN modules m ON m.id = rm.module_id
       WHERE er.employee_id = $1
       ORDER BY m.display_order, m.id, rm.role_id`,
      [employeeId]
    );
    return rows;
  }
}

async function insertPermission(db: Queryable, roleId: number, data: { moduleId: number } & CapabilityFlags) {
  const columns = ['role_id', 'module_id', ...CAPABILITIES.map((c) => CAPABILITY_COLUMNS[c])];
  const values = [roleId, data.moduleId, ...CAPABILITIES.map((c) => data[c])];

  const { rows } = await db.query<ModulePermission>(
    `INSERT INTO role_modules AS rm (${columns.join(', ')})
     VALUES (${values.map((_, i) => `$${i + 1}`).join(', ')})
     RETURNING ${PERMISSION_SELECT}`,
    values
  );
  return rows[0];
}
