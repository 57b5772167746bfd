import {
  DomainError,
  IdempotencyConflictError,
  IdempotencyInProgressError,
  InvalidStatusTransitionError,
  StorageFailureError,
  TicketNotFoundError,
  ValidationError,
} from '../../src/errors/domain-errors';

describe('Domain errors', () => {
  it.each([
    [new ValidationError('bad input'), 'VALIDATION_ERROR', 400],
    [new TicketNotFoundError('t-1'), 'TICKET_NOT_FOUND', 404],
    [new IdempotencyConflictError('k-1'), 'IDEMPOTENCY_KEY_CONFLICT', 409],
    [new IdempotencyInProgressError('k-1'), 'DUPLICATE_IN_PROGRESS', 409],
    [new InvalidStatusTransitionError('canceled', 'issued'), 'INVALID_STATUS_TRANSITION', 409],
    [new StorageFailureError('ticket refund'), 'STORAGE_FAILURE', 500],
  ])('%p carries its code and status', (error, code, statusCode) => {
    expect(error).toBeInstanceOf(DomainError);
    expect(error).toBeInstanceOf(Error);
    expect(error.code).toBe(code);
    expect(error.statusCode).toBe(statusCode);
  });

  it('names errors after their class', () => {
    expect(new TicketNotFoundError('t-1').name).toBe('TicketNotFoundError');
  });

  it('includes the ticket id in the not-found message', () => {
    expect(new TicketNotFoundError('t-1').message).toBe('Ticket not found: t-1');
  });

  it('keeps the underlying error of a storage failure', () => {
    const original = new Error('connection reset');
    const error = new StorageFailureError('ticket issuance', original);

    expect(error.message).toBe('Storage failure during ticket issuance');
    expect(error.originalError).toBe(original);
    expect(error.stack).toBe(original.stack);
  });

  it('defaults validation details to an empty list', () => {
    expect(new ValidationError('bad input').details).toEqual([]);
  });
});
