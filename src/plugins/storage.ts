import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';
import { createFileStorage, FileStorage } from '../services/storage';

export interface StoragePluginOptions {
  storage?: FileStorage;
}

export default fp<StoragePluginOptions>(
  async function storagePlugin(fastify: FastifyInstance, opts: StoragePluginOptions) {
    fastify.decorate('storage', opts.storage ?? createFileStorage(fastify.appConfig.storage));
  },
  { name: 'storage' }
);
