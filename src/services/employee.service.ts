import * as XLSX from 'xlsx';
import type { Repositories } from '../repositories/types';
import type { CreateEmployeeInput, UpdateEmployeeInput } from '../schemas/employee.zod';
import type { Employee } from '../types/employee.types';
import { BadRequestError, NotFoundError } from '../utils/errors';

export async function getEmployeeOrThrow(db: Repositories, id: number): Promise<Employee> {
  const employee = await db.employees.findById(id);
  if (!employee) throw new NotFoundError('Employee not found');
  return employee;
}

/** Used by every entity that references an employee. */
export async function assertEmployeeExists(db: Repositories, id: number | null | undefined, label = 'Employee') {
  if (id === null || id === undefined) return;
  if (!(await db.employees.findById(id))) {
    throw new NotFoundError(`${label} not found`);
  }
}

async function assertReferences(db: Repositories, data: UpdateEmployeeInput, currentId?: number) {
  if (data.azureOid) {
    const owner = await db.employees.findByAzureOid(data.azureOid);
    if (owner && owner.id !== currentId) {
      throw new BadRequestError('Another employee is already linked to this directory account');
    }
  }

  if (data.countryId !== undefined && data.countryId !== null) {
    if (!(await db.countries.findById(data.countryId))) {
      throw new NotFoundError('Country not found');
    }
  }
}

export function listEmployees(db: Repositories) {
  return db.employees.list();
}

export async function createEmployee(db: Repositories, data: CreateEmployeeInput) {
  await assertReferences(db, data);
  return db.employees.create(data);
}

export async function updateEmployee(db: Repositories, id: number, data: UpdateEmployeeInput) {
  await getEmployeeOrThrow(db, id);
  await assertReferences(db, data, id);

  const updated = await db.employees.update(id, data);
  if (!updated) throw new NotFoundError('Employee not found');
  return updated;
}

export async function deleteEmployee(db: Repositories, id: number) {
  if (!(await db.employees.delete(id))) {
    throw new NotFoundError('Employee not found');
  }
}

/* ----------------------------------
   Role assignment
----------------------------------- */

export async function listEmployeeRoles(db: Repositories, employeeId: number) {
  await getEmployeeOrThrow(db, employeeId);
  return db.roles.listForEmployee(employeeId);
}

export async function assignRoleToEmployee(db: Repositories, employeeId: number, roleId: number) {
  await getEmployeeOrThrow(db, employeeId);
  const role = await db.roles.findById(roleId);
  if (!role) throw new NotFoundError('Role not found');

  if (!(await db.roles.assignToEmployee(employeeId, roleId))) {
    throw new BadRequestError('Role already assigned to this employee');
  }
  return role;
}

export async function removeRoleFromEmployee(db: Repositories, employeeId: number, roleId: number) {
  if (!(await db.roles.removeFromEmployee(employeeId, roleId))) {
    throw new NotFoundError('Role assignment not found');
  }
}

/* ----------------------------------
   Spreadsheet export
----------------------------------- */

const EXPORT_COLUMNS: Array<[header: string, pick: (e: Employee, country: string | null) => string | number | null]> = [
  ['ID', (e) => e.id],
  ['First Name', (e) => e.firstName],
  ['Last Name', (e) => e.lastName],
  ['Display Name', (e) => e.displayName],
  ['Email', (e) => e.email],
  ['Title', (e) => e.title],
  ['Department', (e) => e.department],
  ['Office', (e) => e.office],
  ['Mobile Phone', (e) => e.mobilePhone],
  ['Office Phone', (e) => e.officePhone],
  ['City', (e) => e.city],
  ['State', (e) => e.state],
  ['Country', (_e, country) => country],
  ['Last Synced', (e) => (e.lastSyncedAt ? e.lastSyncedAt.toISOString() : null)],
];

/** Builds the rows of the employee export, one object per employee keyed by column header. */
export async function buildEmployeeExportRows(db: Repositories) {
  const [employees, countries] = await Promise.all([db.employees.list(), db.countries.list()]);
  const countryNames = new Map(countries.map((c) => [c.id, c.name]));

  return employees.map((employee) => {
    const country = employee.countryId === null ? null : countryNames.get(employee.countryId) ?? null;
    const row: Record<string, string | number | null> = {};
    for (const [header, pick] of EXPORT_COLUMNS) {
      row[header] = pick(employee, country);
    }
    return row;
  });
}

export async function exportEmployeesWorkbook(db: Repositories): Promise<Buffer> {
  const rows = await buildEmployeeExportRows(db);
  const sheet = XLSX.utils.json_to_sheet(rows, { header: EXPORT_COLUMNS.map(([header]) => header) });
  const workbook = XLSX.utils.book_new();
  XLSX.utils.book_append_sheet(workbook, sheet, 'Employees');

  const output: unknown = XLSX.write(workbook, { type: 'buffer', bookType: 'xlsx' });
  if (!Buffer.isBuffer(output)) {
    throw new Error('Spreadsheet writer did not return a buffer');
  }
  return output;
}
