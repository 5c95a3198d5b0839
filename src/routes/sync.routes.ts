import { FastifyInstance } from 'fastify';
import { syncStatusHandler, triggerSyncHandler } from '../controllers/sync.controller';
import { requireModulePermission } from '../guards/permission.guard';
import { authGuard } from '../hooks/auth.guard';

export async function syncRoutes(app: FastifyInstance) {
  app.post(
    '/sync/employees',
    {
      preHandler: [authGuard, requireModulePermission('employees', 'adminActions')],
      config: {
        rateLimit: {
          max: 5,
          timeWindow: '1 hour',
        },
      },
    },
    triggerSyncHandler
  );

  app.get('/sync/status', { preHandler: [authGuard] }, syncStatusHandler);
}
