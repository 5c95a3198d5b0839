import { FastifyReply, FastifyRequest } from 'fastify';
import type { DirectorySyncDeps } from '../services/directory-sync.service';
import type { EmployeeSyncScheduler } from '../services/sync.scheduler';
import { AppError } from '../utils/errors';
import { Logger } from '../utils/logger';

class DirectoryDisabledError extends AppError {
  constructor() {
    super('Directory integration is not configured', 503, 'DIRECTORY_DISABLED');
  }
}

export function directorySyncDeps(request: FastifyRequest): DirectorySyncDeps {
  const { directory, db, appConfig } = request.server;
  if (!directory) throw new DirectoryDisabledError();

  return { db, directory, domainToken: appConfig.sync.domainToken, logger: new Logger(request.log) };
}

function requireScheduler(request: FastifyRequest): EmployeeSyncScheduler {
  const scheduler = request.server.syncScheduler;
  if (!scheduler) throw new DirectoryDisabledError();
  return scheduler;
}

export async function triggerSyncHandler(request: FastifyRequest, reply: FastifyReply) {
  const result = await requireScheduler(request).trigger();

  new Logger(request.log).audit({
    employeeId: request.accessContext?.employee.id,
    action: 'SYNC_TRIGGER',
    resource: 'employees',
    status: 'success',
    metadata: { result: result.status },
  });

  if (result.status === 'skipped') {
    return reply.status(202).send({ status: 'skipped', message: 'A sync is already running' });
  }
  return reply.send(result);
}

export async function syncStatusHandler(request: FastifyRequest, reply: FastifyReply) {
  const scheduler = request.server.syncScheduler;
  if (!scheduler) {
    return reply.send({ enabled: false, running: false, periodic: false, intervalHours: null, lastSync: null, lastStats: null });
  }
  return reply.send({ enabled: true, ...scheduler.status() });
}
