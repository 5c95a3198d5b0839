import { FastifyInstance } from 'fastify';
import fp from 'fastify-plugin';
import { createDatabase } from '../lib/db';
import { createPgRepositories } from '../repositories/pg';
import type { Repositories } from '../repositories/types';

export interface DatabasePluginOptions {
  /** Pre-built repositories (tests); a pg pool is opened otherwise. */
  repositories?: Repositories;
}

export default fp<DatabasePluginOptions>(
  async function databasePlugin(fastify: FastifyInstance, opts: DatabasePluginOptions) {
    if (opts.repositories) {
      fastify.decorate('db', opts.repositories);
      return;
    }

    const database = createDatabase(fastify.appConfig.database);
    fastify.decorate('db', createPgRepositories(database));

    // Graceful shutdown
    fastify.addHook('onClose', async () => {
      fastify.log.info('Closing PG pool');
      await database.close();
    });
  },
  { name: 'database' }
);
