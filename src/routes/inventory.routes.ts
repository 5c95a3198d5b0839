import { FastifyInstance } from 'fastify';
import {
  createHardwareHandler,
  deleteHardwareHandler,
  getHardwareHandler,
  listHardwareHandler,
  updateHardwareHandler,
} from '../controllers/hardware.controller';
import {
  createLicenseHandler,
  deleteLicenseHandler,
  getLicenseHandler,
  listLicensesHandler,
  updateLicenseHandler,
} from '../controllers/license.controller';
import { authGuard } from '../hooks/auth.guard';

export async function inventoryRoutes(app: FastifyInstance) {
  app.get('/licenses', { preHandler: [authGuard] }, listLicensesHandler);
  app.get('/licenses/:id', { preHandler: [authGuard] }, getLicenseHandler);
  app.post('/licenses', { preHandler: [authGuard] }, createLicenseHandler);
  app.put('/licenses/:id', { preHandler: [authGuard] }, updateLicenseHandler);
  app.delete('/licenses/:id', { preHandler: [authGuard] }, deleteLicenseHandler);

  app.get('/hardware', { preHandler: [authGuard] }, listHardwareHandler);
  app.get('/hardware/:id', { preHandler: [authGuard] }, getHardwareHandler);
  app.post('/hardware', { preHandler: [authGuard] }, createHardwareHandler);
  app.put('/hardware/:id', { preHandler: [authGuard] }, updateHardwareHandler);
  app.delete('/hardware/:id', { preHandler: [authGuard] }, deleteHardwareHandler);
}
