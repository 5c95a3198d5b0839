import { FastifyRequest } from 'fastify';
import type { Employee } from '../types/employee.types';
import { BadRequestError, NotFoundError, UnauthorizedError } from '../utils/errors';
import type { AccessContext } from './auth.types';
import { resolveAccessContext } from './permission.resolver';

/** The local employee behind the caller's token, looked up by `oid`. */
export async function getCurrentEmployee(request: FastifyRequest): Promise<Employee> {
  if (request.accessContext) {
    return request.accessContext.employee;
  }
  if (!request.user) {
    throw new UnauthorizedError('Authentication required');
  }
  if (!request.user.oid) {
    throw new BadRequestError('Invalid token: missing user identifier (oid)');
  }

  const employee = await request.server.db.employees.findByAzureOid(request.user.oid);
  if (!employee) {
    throw new NotFoundError('Employee not found in database. Please contact administrator.');
  }
  return employee;
}

/** Resolved once per request and kept on `request.accessContext`. */
export async function getAccessContext(request: FastifyRequest): Promise<AccessContext> {
  if (request.accessContext) {
    return request.accessContext;
  }

  const employee = await getCurrentEmployee(request);
  request.accessContext = await resolveAccessContext(request.server.db, employee);
  return request.accessContext;
}
