import fp from 'fastify-plugin';
import rateLimit from '@fastify/rate-limit';

const MINUTE_MS = 60 * 1000;

/**
 * Nothing is limited globally. Routes opt in with `config.rateLimit`, which
 * overrides the defaults below. The builder's object is thrown, so the
 * shared error handler renders it.
 */
export const rateLimitPlugin = fp(async (fastify) => {
  await fastify.register(rateLimit, {
    global: false,
    max: 30,
    timeWindow: MINUTE_MS,
    keyGenerator: (req) => req.headers['x-forwarded-for']?.toString().split(',')[0].trim() || req.ip,
    errorResponseBuilder: (_req, context) => ({
      statusCode: 429,
      code: 'RATE_LIMITED',
      message: `Too many requests, retry in ${Math.ceil(context.ttl / 1000)}s`,
      details: { max: context.max, retryAfterSeconds: Math.ceil(context.ttl / 1000) },
    }),
  });
});
