import { FastifyRequest, FastifyReply } from 'fastify';
import Joi from 'joi';
import { ValidationError } from '../errors/domain-errors';
import { toValidationDetails } from '../utils/validators';

/**
 * Validation Middleware Factory
 * Validates request data against Joi schemas and replaces it with the
 * converted value (defaults applied, query strings coerced to numbers).
 * Failures are thrown as ValidationError for the shared error handler.
 */
export interface ValidationOptions {
  body?: Joi.Schema;
  params?: Joi.Schema;
  query?: Joi.Schema;
  abortEarly?: boolean;
}

export function validate(options: ValidationOptions) {
  return async (request: FastifyRequest, _reply: FastifyReply): Promise<void> => {
    const { body, params, query, abortEarly = false } = options;

    if (body) {
      const { error, value } = body.validate(request.body ?? {}, { abortEarly });
      if (error) {
        throw new ValidationError('Request body validation failed', toValidationDetails(error));
      }
      request.body = value;
    }

    if (params) {
      const { error, value } = params.validate(request.params, { abortEarly });
      if (error) {
        throw new ValidationError('Path parameters validation failed', toValidationDetails(error));
      }
      request.params = value;
    }

    if (query) {
      const { error, value } = query.validate(request.query, { abortEarly });
      if (error) {
        throw new ValidationError('Query parameters validation failed', toValidationDetails(error));
      }
      request.query = value;
    }
  };
}
