import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '../utils/errors';
import { Logger } from '../utils/logger';

interface ErrorBody {
  error: string;
  code: string;
  details?: unknown;
}

function send(reply: FastifyReply, statusCode: number, body: ErrorBody) {
  return reply.status(statusCode).send(body.details === undefined ? { error: body.error, code: body.code } : body);
}

/**
 * Errors thrown by Fastify itself or its plugins (body parsing, payload
 * limits, rate limiting) carry a numeric statusCode.
 */
function statusOf(error: Error): number | undefined {
  if (!('statusCode' in error) || typeof error.statusCode !== 'number') return undefined;
  return error.statusCode;
}

export function errorHandler(error: FastifyError | AppError | Error, request: FastifyRequest, reply: FastifyReply) {
  const logger = new Logger(request.log);
  const where = { method: request.method, url: request.url };

  if (error instanceof ZodError) {
    logger.warn('Request validation failed', { ...where, issues: error.issues });
    return send(reply, 422, { error: 'Validation Error', code: 'VALIDATION_ERROR', details: error.issues });
  }

  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error(error.message, error, { ...where, code: error.code, details: error.details });
    } else {
      logger.warn(error.message, { ...where, code: error.code, statusCode: error.statusCode });
    }
    return send(reply, error.statusCode, { error: error.message, code: error.code, details: error.details });
  }

  const statusCode = statusOf(error);
  if (statusCode !== undefined) {
    const code = 'code' in error && typeof error.code === 'string' ? error.code : 'HTTP_ERROR';
    const details = 'details' in error ? error.details : undefined;

    logger.warn(error.message, { ...where, statusCode, code });
    return send(reply, statusCode, { error: error.message || 'Request failed', code, details });
  }

  logger.error('Unhandled error', error, where);
  return send(reply, 500, { error: 'Internal Server Error', code: 'INTERNAL_ERROR' });
}
