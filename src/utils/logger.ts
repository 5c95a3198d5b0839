import { FastifyBaseLogger } from 'fastify';

type Context = Record<string, unknown>;

export interface AuditLogData {
  employeeId?: number;
  action: string;
  resource: string;
  resourceId?: string | number;
  status: 'success' | 'failure';
  metadata?: Context;
}

/** Structured logging on top of the request or instance pino logger. */
export class Logger {
  constructor(private readonly base: FastifyBaseLogger) {}

  private write(level: 'debug' | 'info' | 'warn' | 'error', message: string, context: Context = {}) {
    this.base[level](context, message);
  }

  debug(message: string, context?: Context) {
    this.write('debug', message, context);
  }

  info(message: string, context?: Context) {
    this.write('info', message, context);
  }

  warn(message: string, context?: Context) {
    this.write('warn', message, context);
  }

  /** `error` may be anything a promise rejected with. */
  error(message: string, error?: unknown, context?: Context) {
    const err = error instanceof Error ? error : undefined;
    this.write('error', message, {
      ...context,
      err,
      errorMessage: err ? err.message : error === undefined ? undefined : String(error),
    });
  }

  audit(data: AuditLogData) {
    this.write('info', `Audit: ${data.action} on ${data.resource}`, {
      type: 'AUDIT',
      at: new Date().toISOString(),
      ...data,
    });
  }
}
