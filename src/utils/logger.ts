import pino, { Logger } from 'pino';
import type { FastifyRequest } from 'fastify';

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL || 'info',
  transport: process.env.NODE_ENV === 'development' ? {
    target: 'pino-pretty',
    options: {
      colorize: true
    }
  } : undefined,
  base: {
    service: process.env.SERVICE_NAME || 'ticketing-service',
    environment: process.env.NODE_ENV || 'development'
  },
  timestamp: pino.stdTimeFunctions.isoTime,
  formatters: {
    level: (label) => {
      return { level: label };
    }
  }
});

/**
 * Create a child logger with correlation context from request
 */
export function createRequestLogger(request: FastifyRequest): Logger {
  return logger.child({
    requestId: request.id,
    method: request.method,
    url: request.url,
    ip: request.ip,
  });
}

/**
 * Create a child logger for a component (services, models, middleware)
 */
export function createContextLogger(context: Record<string, unknown>): Logger {
  return logger.child(context);
}
