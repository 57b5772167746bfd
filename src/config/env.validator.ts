import Joi from 'joi';
import { logger } from '../utils/logger';

const envSchema = Joi.object({
  // Core
  NODE_ENV: Joi.string()
    .valid('development', 'test', 'staging', 'production')
    .default('development'),
  PORT: Joi.number().port().default(3000),
  HOST: Joi.string().default('0.0.0.0'),
  SERVICE_NAME: Joi.string().default('ticketing-service'),

  // Database: either a connection string or discrete settings
  DATABASE_URL: Joi.string().uri({ scheme: ['postgres', 'postgresql'] }).optional(),
  DB_HOST: Joi.string().when('DATABASE_URL', {
    is: Joi.exist(),
    then: Joi.optional(),
    otherwise: Joi.required(),
  }),
  DB_PORT: Joi.number().port().default(5432),
  DB_NAME: Joi.string().default('ticketing'),
  DB_USER: Joi.string().default('postgres'),
  DB_PASSWORD: Joi.string().allow('').default('postgres'),
  DB_POOL_MAX: Joi.number().integer().min(1).default(10),
  DB_STATEMENT_TIMEOUT: Joi.number().integer().positive().default(30000),

  // Idempotency
  IDEMPOTENCY_TTL_MINUTES: Joi.number().integer().positive().default(60),

  // HTTP
  ALLOWED_ORIGINS: Joi.string().optional(),

  // Logging
  LOG_LEVEL: Joi.string()
    .valid('trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent')
    .default('info'),
}).unknown(true);

export function validateEnv(env: NodeJS.ProcessEnv = process.env): void {
  const { error, value } = envSchema.validate(env, {
    abortEarly: false,
    stripUnknown: false,
  });

  if (error) {
    const errors = error.details.map((detail) => detail.message).join('; ');
    logger.error({ errors }, 'Environment validation failed');
    throw new Error(`Environment validation failed: ${errors}`);
  }

  // Override env with validated values (defaults applied)
  for (const [key, val] of Object.entries(value)) {
    if (val !== undefined) {
      env[key] = String(val);
    }
  }

  logger.info('Environment variables validated successfully');
}
