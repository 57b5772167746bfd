import { FastifyError, FastifyRequest, FastifyReply } from 'fastify';
import { createRequestLogger } from '../utils/logger';
import { DomainError, ValidationError } from '../errors/domain-errors';

export interface ErrorResponseBody {
  error: string;
  code: string;
  requestId: string;
  details?: unknown[];
}

export async function errorHandler(
  error: FastifyError,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const log = createRequestLogger(request);

  // Our ValidationError carries per-field details
  if (error instanceof ValidationError) {
    log.warn({ details: error.details }, error.message);
    const body: ErrorResponseBody = {
      error: error.message,
      code: error.code,
      requestId: request.id,
      details: error.details,
    };
    return reply.status(error.statusCode).send(body);
  }

  if (error instanceof DomainError) {
    if (error.statusCode >= 500) {
      log.error({ err: error }, error.message);
    } else {
      log.warn({ code: error.code }, error.message);
    }
    const body: ErrorResponseBody = {
      error: error.message,
      code: error.code,
      requestId: request.id,
    };
    return reply.status(error.statusCode).send(body);
  }

  // Fastify schema validation errors
  if (error.validation) {
    log.warn({ validation: error.validation }, 'Request validation failed');
    const body: ErrorResponseBody = {
      error: 'Validation failed',
      code: 'VALIDATION_ERROR',
      requestId: request.id,
      details: error.validation,
    };
    return reply.status(400).send(body);
  }

  // Client errors raised by Fastify or its plugins (bad JSON, rate limit, ...)
  const statusCode = error.statusCode ?? 500;
  if (statusCode >= 400 && statusCode < 500) {
    log.warn({ code: error.code }, error.message);
    const body: ErrorResponseBody = {
      error: error.message,
      code: error.code ?? 'BAD_REQUEST',
      requestId: request.id,
    };
    return reply.status(statusCode).send(body);
  }

  log.error({ err: error }, 'Unhandled error');
  const body: ErrorResponseBody = {
    error: 'Internal server error',
    code: 'INTERNAL_ERROR',
    requestId: request.id,
  };
  return reply.status(500).send(body);
}
