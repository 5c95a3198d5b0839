import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import { syncEmployeesFromDirectory } from '../services/directory-sync.service';
import { GraphClient } from '../services/graph/graph.client';
import { EmployeeSyncScheduler } from '../services/sync.scheduler';
import type { DirectoryClient } from '../types/directory.types';
import { Logger } from '../utils/logger';

export interface DirectoryPluginOptions {
  /** Overrides the Graph client; `null` disables directory features. */
  directory?: DirectoryClient | null;
}

export default fp<DirectoryPluginOptions>(
  async function directoryPlugin(fastify: FastifyInstance, opts: DirectoryPluginOptions) {
    const { graph, sync } = fastify.appConfig;
    const logger = new Logger(fastify.log);

    let directory: DirectoryClient | null = null;
    if (opts.directory !== undefined) {
      directory = opts.directory;
    } else if (graph.isConfigured) {
      directory = new GraphClient(graph);
    } else {
      logger.warn('Microsoft Graph credentials missing, directory sync disabled');
    }

    fastify.decorate('directory', directory);

    if (!directory) {
      fastify.decorate('syncScheduler', null);
      return;
    }

    const client = directory;
    const scheduler = new EmployeeSyncScheduler(
      () => syncEmployeesFromDirectory({ db: fastify.db, directory: client, domainToken: sync.domainToken, logger }),
      logger
    );
    fastify.decorate('syncScheduler', scheduler);

    fastify.addHook('onClose', async () => {
      scheduler.stop();
    });
  },
  { name: 'directory', dependencies: ['database'] }
);
