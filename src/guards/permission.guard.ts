import { FastifyRequest } from 'fastify';
import { getAccessContext } from '../auth/current-employee';
import { hasCapability } from '../auth/permission.resolver';
import type { Capability } from '../types/access.types';
import { ForbiddenError } from '../utils/errors';

export function requireModulePermission(moduleKey: string, capability: Capability) {
  return async (request: FastifyRequest) => {
    const context = await getAccessContext(request);
    if (!hasCapability(context, moduleKey, capability)) {
      throw new ForbiddenError(`Missing ${capability} permission on module "${moduleKey}"`);
    }
  };
}
