import { FastifyRequest } from 'fastify';
import { extractBearerToken } from '../services/auth';

/**
 * preHandler for every protected route: verifies the Azure AD bearer token
 * and exposes its claims as `request.user`.
 */
export async function authGuard(request: FastifyRequest) {
  const token = extractBearerToken(request.headers.authorization);
  request.user = await request.server.tokenVerifier.verify(token);
}
