import Joi from 'joi';
import { ValidationError, ValidationDetail } from '../errors/domain-errors';

export function toValidationDetails(error: Joi.ValidationError): ValidationDetail[] {
  return error.details.map((detail) => ({
    field: detail.path.join('.'),
    message: detail.message,
    type: detail.type,
  }));
}

/**
 * Validate data against a Joi schema and return the converted value
 * (defaults applied). Throws ValidationError on failure.
 */
export function validateWith<T>(
  schema: Joi.AnySchema<T>,
  data: unknown,
  label: string,
  abortEarly = false
): T {
  const result = schema.validate(data, { abortEarly });
  if (result.error !== undefined) {
    throw new ValidationError(`${label} validation failed`, toValidationDetails(result.error));
  }
  return result.value;
}
