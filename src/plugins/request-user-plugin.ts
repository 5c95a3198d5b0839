import fp from 'fastify-plugin';
import { FastifyInstance } from 'fastify';

export default fp(async function requestUserPlugin(fastify: FastifyInstance) {
  // Guard prevents redeclare (safe even in tests)
  if (!fastify.hasRequestDecorator('user')) {
    fastify.decorateRequest('user', null);
  }
  if (!fastify.hasRequestDecorator('accessContext')) {
    fastify.decorateRequest('accessContext', null);
  }
});
