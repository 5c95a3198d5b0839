// src/app.ts
import fastify, { FastifyServerOptions } from 'fastify';
import { AppConfig, config as defaultConfig } from './config';
import { errorHandler } from './middleware/errorHandler';
import authPlugin from './plugins/auth.plugin';
import corsPlugin from './plugins/cors';
import databasePlugin from './plugins/database';
import directoryPlugin from './plugins/directory';
import multipartPlugin from './plugins/multipart';
import { rateLimitPlugin } from './plugins/rateLimit';
import requestUserPlugin from './plugins/request-user-plugin';
import storagePlugin from './plugins/storage';
import type { Repositories } from './repositories/types';
import { accessRoutes } from './routes/access.routes';
import { employeeRoutes } from './routes/employee.routes';
import { healthRoutes } from './routes/health.routes';
import { inventoryRoutes } from './routes/inventory.routes';
import { recruitingRoutes } from './routes/recruiting.routes';
import { syncRoutes } from './routes/sync.routes';
import { ticketRoutes } from './routes/ticket.routes';
import type { TokenVerifier } from './services/auth';
import type { FileStorage } from './services/storage';
import type { DirectoryClient } from './types/directory.types';

export interface BuildAppOptions {
  config?: AppConfig;
  logger?: FastifyServerOptions['logger'];
  /** Test seams; production builds leave these unset. */
  repositories?: Repositories;
  directory?: DirectoryClient | null;
  storage?: FileStorage;
  tokenVerifier?: TokenVerifier;
}

export function buildApp(options: BuildAppOptions = {}) {
  const appConfig = options.config ?? defaultConfig;
  const app = fastify({ logger: options.logger ?? { level: appConfig.logLevel } });

  app.decorate('appConfig', appConfig);

  // Runtime decorators / plugins
  app.register(requestUserPlugin);
  app.register(corsPlugin);
  app.register(multipartPlugin);
  app.register(rateLimitPlugin);
  app.register(databasePlugin, { repositories: options.repositories });
  app.register(authPlugin, { tokenVerifier: options.tokenVerifier });
  app.register(storagePlugin, { storage: options.storage });
  app.register(directoryPlugin, { directory: options.directory });

  app.setErrorHandler(errorHandler);

  // Routes
  app.register(healthRoutes);
  app.register(employeeRoutes);
  app.register(syncRoutes);
  app.register(accessRoutes);
  app.register(inventoryRoutes);
  app.register(recruitingRoutes);
  app.register(ticketRoutes);

  return app;
}
