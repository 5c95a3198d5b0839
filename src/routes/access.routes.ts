import { FastifyInstance } from 'fastify';
import { listCountriesHandler } from '../controllers/country.controller';
import {
  createModuleHandler,
  deleteModuleHandler,
  getModuleByKeyHandler,
  getModuleHandler,
  listModuleChildrenHandler,
  listModulesHandler,
  listRootModulesHandler,
  toggleModuleHandler,
  updateModuleHandler,
} from '../controllers/module.controller';
import {
  bulkUpdatePermissionsHandler,
  checkPermissionHandler,
  createPermissionHandler,
  deletePermissionHandler,
  getPermissionHandler,
  listModulePermissionsHandler,
  listPermissionsHandler,
  listRolePermissionsHandler,
  myPermissionsHandler,
  updatePermissionHandler,
} from '../controllers/permission.controller';
import {
  createRoleHandler,
  deleteRoleHandler,
  getRoleHandler,
  listRolesHandler,
  updateRoleHandler,
} from '../controllers/role.controller';
import { authGuard } from '../hooks/auth.guard';

export async function accessRoutes(app: FastifyInstance) {
  // Countries
  app.get('/countries', { preHandler: [authGuard] }, listCountriesHandler);

  // Roles
  app.get('/roles', { preHandler: [authGuard] }, listRolesHandler);
  app.get('/roles/:id', { preHandler: [authGuard] }, getRoleHandler);
  app.post('/roles', { preHandler: [authGuard] }, createRoleHandler);
  app.put('/roles/:id', { preHandler: [authGuard] }, updateRoleHandler);
  app.delete('/roles/:id', { preHandler: [authGuard] }, deleteRoleHandler);

  // Modules
  app.get('/modules', { preHandler: [authGuard] }, listModulesHandler);
  app.get('/modules/root/all', { preHandler: [authGuard] }, listRootModulesHandler);
  app.get('/modules/by-key/:key', { preHandler: [authGuard] }, getModuleByKeyHandler);
  app.get('/modules/:id', { preHandler: [authGuard] }, getModuleHandler);
  app.get('/modules/:id/children', { preHandler: [authGuard] }, listModuleChildrenHandler);
  app.post('/modules', { preHandler: [authGuard] }, createModuleHandler);
  app.put('/modules/:id', { preHandler: [authGuard] }, updateModuleHandler);
  app.patch('/modules/:id/toggle-active', { preHandler: [authGuard] }, toggleModuleHandler);
  app.delete('/modules/:id', { preHandler: [authGuard] }, deleteModuleHandler);

  // Permissions
  app.get('/permissions/me', { preHandler: [authGuard] }, myPermissionsHandler);
  app.get('/permissions/check/:moduleKey/:action', { preHandler: [authGuard] }, checkPermissionHandler);
  app.get('/permissions', { preHandler: [authGuard] }, listPermissionsHandler);
  app.get('/permissions/role/:roleId', { preHandler: [authGuard] }, listRolePermissionsHandler);
  app.get('/permissions/module/:moduleId', { preHandler: [authGuard] }, listModulePermissionsHandler);
  app.post('/permissions', { preHandler: [authGuard] }, createPermissionHandler);
  app.post('/permissions/bulk-update', { preHandler: [authGuard] }, bulkUpdatePermissionsHandler);
  app.get('/permissions/:roleId/:moduleId', { preHandler: [authGuard] }, getPermissionHandler);
  app.put('/permissions/:roleId/:moduleId', { preHandler: [authGuard] }, updatePermissionHandler);
  app.delete('/permissions/:roleId/:moduleId', { preHandler: [authGuard] }, deletePermissionHandler);
}
