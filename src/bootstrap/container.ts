import { TicketStore } from '../models/ticket.model';
import { IdempotencyCache, IdempotencyCacheOptions } from '../services/idempotency-cache.service';
import { TicketService } from '../services/ticket.service';
import { IssueTicketResponse } from '../types/ticket.types';
import { ticketConfig } from '../config/ticket.config';
import { logger } from '../utils/logger';

export interface Container {
  store: TicketStore;
  cache: IdempotencyCache<IssueTicketResponse>;
  ticketService: TicketService;
}

/**
 * Wire the engine once per process. The store is passed in so tests can
 * substitute an in-process implementation for the pg-backed model.
 */
export function buildContainer(
  store: TicketStore,
  cacheOptions: IdempotencyCacheOptions = { ttlMinutes: ticketConfig.idempotency.ttlMinutes }
): Container {
  const cache = new IdempotencyCache<IssueTicketResponse>(cacheOptions);
  const ticketService = new TicketService(store, cache);

  return { store, cache, ticketService };
}

// Boot-time validation
export function validateContainer(container: Container): void {
  if (!container.ticketService) {
    throw new Error('TicketService not initialized');
  }

  logger.info(
    { idempotencyTtlMinutes: ticketConfig.idempotency.ttlMinutes },
    'Ticketing service container initialized successfully'
  );
}
