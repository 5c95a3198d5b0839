import 'fastify';
import type { AccessContext } from '../auth/auth.types';
import type { AppConfig } from '../config';
import type { Repositories } from '../repositories/types';
import type { TokenVerifier } from '../services/auth';
import type { FileStorage } from '../services/storage';
import type { EmployeeSyncScheduler } from '../services/sync.scheduler';
import type { AzureTokenClaims } from './auth.types';
import type { DirectoryClient } from './directory.types';

declare module 'fastify' {
  interface FastifyInstance {
    appConfig: AppConfig;
    db: Repositories;
    /** Null when Microsoft Graph credentials are not configured. */
    directory: DirectoryClient | null;
    storage: FileStorage;
    tokenVerifier: TokenVerifier;
    syncScheduler: EmployeeSyncScheduler | null;
  }

  interface FastifyRequest {
    user: AzureTokenClaims | null;
    accessContext: AccessContext | null;
  }
}
