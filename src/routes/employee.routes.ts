import { FastifyInstance } from 'fastify';
import {
  assignEmployeeRoleHandler,
  createEmployeeHandler,
  deleteEmployeeHandler,
  exportEmployeesHandler,
  getEmployeeHandler,
  listEmployeeRolesHandler,
  listEmployeesHandler,
  pullEmployeeHandler,
  pushEmployeeHandler,
  removeEmployeeRoleHandler,
  updateEmployeeHandler,
} from '../controllers/employee.controller';
import { requireModulePermission } from '../guards/permission.guard';
import { authGuard } from '../hooks/auth.guard';

export async function employeeRoutes(app: FastifyInstance) {
  app.get('/employees', { preHandler: [authGuard] }, listEmployeesHandler);

  // Registered before /employees/:id so "export" is not read as an id
  app.get(
    '/employees/export',
    { preHandler: [authGuard, requireModulePermission('employees', 'canExport')] },
    exportEmployeesHandler
  );

  app.get('/employees/:id', { preHandler: [authGuard] }, getEmployeeHandler);
  app.post('/employees', { preHandler: [authGuard] }, createEmployeeHandler);
  app.put('/employees/:id', { preHandler: [authGuard] }, updateEmployeeHandler);
  app.delete('/employees/:id', { preHandler: [authGuard] }, deleteEmployeeHandler);

  app.get('/employees/:id/roles', { preHandler: [authGuard] }, listEmployeeRolesHandler);
  app.post('/employees/:id/roles/:roleId', { preHandler: [authGuard] }, assignEmployeeRoleHandler);
  app.delete('/employees/:id/roles/:roleId', { preHandler: [authGuard] }, removeEmployeeRoleHandler);

  app.post('/employees/:id/directory/pull', { preHandler: [authGuard] }, pullEmployeeHandler);
  app.post('/employees/:id/directory/push', { preHandler: [authGuard] }, pushEmployeeHandler);
}
