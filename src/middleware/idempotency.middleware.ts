import { FastifyRequest, FastifyReply } from 'fastify';
import { ValidationError } from '../errors/domain-errors';
import { idempotencyKeySchema } from '../validators/ticket.schemas';
import { validateWith } from '../utils/validators';

export const IDEMPOTENCY_HEADER = 'idempotency-key';
export const REPLAY_HEADER = 'X-Idempotent-Replay';

/**
 * Read the optional Idempotency-Key header.
 * Returns undefined when absent; throws ValidationError when malformed.
 */
export function getIdempotencyKey(request: FastifyRequest): string | undefined {
  const header = request.headers[IDEMPOTENCY_HEADER];

  if (header === undefined) {
    return undefined;
  }

  if (Array.isArray(header)) {
    throw new ValidationError('Idempotency-Key must be sent once', [
      { field: 'Idempotency-Key', message: 'Idempotency-Key must be sent once', type: 'any.duplicate' },
    ]);
  }

  return validateWith(idempotencyKeySchema, header, 'Idempotency-Key');
}

/**
 * Rejects a malformed key before the body is validated or any work starts.
 * Deduplication itself happens in the ticket engine's cache.
 */
export async function idempotencyKeyMiddleware(
  request: FastifyRequest,
  _reply: FastifyReply
): Promise<void> {
  const key = getIdempotencyKey(request);
  if (key !== undefined) {
    request.log.debug({ idempotencyKey: key }, 'Idempotency key received');
  }
}
