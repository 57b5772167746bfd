export * from './idempotency.middleware';
export * from './validation.middleware';
export { errorHandler } from './error-handler.middleware';
