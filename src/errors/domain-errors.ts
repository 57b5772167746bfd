/**
 * Domain-specific error types for the ticketing service
 * Provides type-safe error handling with structured error codes
 */

export interface ValidationDetail {
  field: string;
  message: string;
  type: string;
}

export class DomainError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 400
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

export class ValidationError extends DomainError {
  constructor(message: string, public details: ValidationDetail[] = []) {
    super(message, 'VALIDATION_ERROR', 400);
  }
}

export class TicketNotFoundError extends DomainError {
  constructor(ticketId: string) {
    super(`Ticket not found: ${ticketId}`, 'TICKET_NOT_FOUND', 404);
  }
}

export class IdempotencyConflictError extends DomainError {
  constructor(idempotencyKey: string) {
    super(
      `Idempotency key ${idempotencyKey} was already used with a different request body`,
      'IDEMPOTENCY_KEY_CONFLICT',
      409
    );
  }
}

export class IdempotencyInProgressError extends DomainError {
  constructor(idempotencyKey: string) {
    super(
      `A request with idempotency key ${idempotencyKey} is currently being processed`,
      'DUPLICATE_IN_PROGRESS',
      409
    );
  }
}

export class InvalidStatusTransitionError extends DomainError {
  constructor(from: string, to: string) {
    super(
      `Invalid ticket status transition from ${from} to ${to}`,
      'INVALID_STATUS_TRANSITION',
      409
    );
  }
}

export class StorageFailureError extends DomainError {
  constructor(operation: string, public originalError?: unknown) {
    super(`Storage failure during ${operation}`, 'STORAGE_FAILURE', 500);
    if (originalError instanceof Error && originalError.stack) {
      this.stack = originalError.stack;
    }
  }
}
