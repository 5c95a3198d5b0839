import { FastifyReply, FastifyRequest } from 'fastify';
import { IdParamsSchema } from '../schemas/common.zod';
import { CreateEmployeeSchema, EmployeeRoleParamsSchema, UpdateEmployeeSchema } from '../schemas/employee.zod';
import { pullEmployeeFromDirectory, pushEmployeeToDirectory } from '../services/directory-sync.service';
import {
  assignRoleToEmployee,
  createEmployee,
  deleteEmployee,
  exportEmployeesWorkbook,
  getEmployeeOrThrow,
  listEmployeeRoles,
  listEmployees,
  removeRoleFromEmployee,
  updateEmployee,
} from '../services/employee.service';
import { attachmentDisposition } from '../utils/download';
import { Logger } from '../utils/logger';
import { directorySyncDeps } from './sync.controller';

export async function listEmployeesHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply.send(await listEmployees(request.server.db));
}

export async function getEmployeeHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await getEmployeeOrThrow(request.server.db, id));
}

export async function createEmployeeHandler(request: FastifyRequest, reply: FastifyReply) {
  const data = CreateEmployeeSchema.parse(request.body);
  const employee = await createEmployee(request.server.db, data);
  return reply.status(201).send(employee);
}

export async function updateEmployeeHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const data = UpdateEmployeeSchema.parse(request.body);
  return reply.send(await updateEmployee(request.server.db, id, data));
}

export async function deleteEmployeeHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  await deleteEmployee(request.server.db, id);
  return reply.send({ success: true, message: 'Employee deleted successfully' });
}

export async function exportEmployeesHandler(request: FastifyRequest, reply: FastifyReply) {
  const workbook = await exportEmployeesWorkbook(request.server.db);
  const stamp = new Date().toISOString().slice(0, 10);

  return reply
    .header('Content-Type', 'application/vnd.openxmlformats-officedocument.spreadsheetml.sheet')
    .header('Content-Disposition', attachmentDisposition(`employees_${stamp}.xlsx`))
    .send(workbook);
}

/* ----------------------------------
   Roles of an employee
----------------------------------- */

export async function listEmployeeRolesHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  return reply.send(await listEmployeeRoles(request.server.db, id));
}

export async function assignEmployeeRoleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id, roleId } = EmployeeRoleParamsSchema.parse(request.params);
  const role = await assignRoleToEmployee(request.server.db, id, roleId);

  new Logger(request.log).audit({
    employeeId: request.accessContext?.employee.id,
    action: 'ROLE_ASSIGN',
    resource: 'employees',
    resourceId: id,
    status: 'success',
    metadata: { roleId },
  });

  return reply.status(201).send({ employeeId: id, role });
}

export async function removeEmployeeRoleHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id, roleId } = EmployeeRoleParamsSchema.parse(request.params);
  await removeRoleFromEmployee(request.server.db, id, roleId);
  return reply.send({ success: true, message: 'Role removed from employee' });
}

/* ----------------------------------
   Directory round trips
----------------------------------- */

export async function pullEmployeeHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const deps = directorySyncDeps(request);
  const employee = await getEmployeeOrThrow(deps.db, id);

  return reply.send(await pullEmployeeFromDirectory(deps, employee));
}

export async function pushEmployeeHandler(request: FastifyRequest, reply: FastifyReply) {
  const { id } = IdParamsSchema.parse(request.params);
  const deps = directorySyncDeps(request);
  const employee = await getEmployeeOrThrow(deps.db, id);

  const result = await pushEmployeeToDirectory(deps, employee);
  new Logger(request.log).audit({
    employeeId: request.accessContext?.employee.id,
    action: 'DIRECTORY_PUSH',
    resource: 'employees',
    resourceId: id,
    status: 'success',
  });

  return reply.send(result);
}
