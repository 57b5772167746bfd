import { TicketStore } from '../models/ticket.model';
import { IdempotencyCache } from './idempotency-cache.service';
import {
  IssueTicketRequest,
  IssueTicketResponse,
  IssueTicketResult,
  ListTicketsQuery,
  RefundTicketRequest,
  RefundTicketResponse,
  Ticket,
  TicketListResponse,
  TicketStatus,
} from '../types/ticket.types';
import {
  DomainError,
  IdempotencyConflictError,
  IdempotencyInProgressError,
  StorageFailureError,
  TicketNotFoundError,
} from '../errors/domain-errors';
import {
  idempotencyKeySchema,
  issueTicketSchema,
  listTicketsQuerySchema,
  refundTicketSchema,
} from '../validators/ticket.schemas';
import { validateWith } from '../utils/validators';
import { ticketConfig } from '../config/ticket.config';
import { TicketStateMachine } from '../utils/ticket-state-machine';
import { ticketMetrics } from '../utils/metrics';
import { createContextLogger } from '../utils/logger';

const log = createContextLogger({ component: 'TicketService' });

function toDomainError(error: unknown, operation: string): DomainError {
  if (error instanceof DomainError) {
    return error;
  }
  return new StorageFailureError(operation, error);
}

export class TicketService {
  constructor(
    private store: TicketStore,
    private idempotencyCache: IdempotencyCache<IssueTicketResponse>,
    private clock: () => Date = () => new Date()
  ) {}

  /**
   * Issue `quantity` tickets in one transaction.
   *
   * With an idempotency key, a repeated identical request returns the
   * response of the first one and creates nothing. A failed attempt releases
   * the key so the client can retry with it.
   */
  async issueTickets(
    request: IssueTicketRequest,
    idempotencyKey?: string
  ): Promise<IssueTicketResult> {
    const input = validateWith(issueTicketSchema, request, 'Issue request');
    const key =
      idempotencyKey === undefined
        ? undefined
        : validateWith(idempotencyKeySchema, idempotencyKey, 'Idempotency-Key');

    const normalized: Required<IssueTicketRequest> = {
      theaterName: input.theaterName,
      userId: input.userId,
      movieTitle: input.movieTitle,
      priceKrw: input.priceKrw,
      quantity: input.quantity ?? 1,
      memo: input.memo ? input.memo : null,
    };

    if (key !== undefined) {
      const outcome = this.idempotencyCache.checkAndReserve(key, normalized);
      ticketMetrics.idempotencyOutcomes.inc({ outcome: outcome.type });

      switch (outcome.type) {
        case 'replay':
          log.info(
            { idempotencyKey: key, ticketIds: outcome.response.ticketIds },
            'Returning cached issuance response'
          );
          return { response: outcome.response, replayed: true };
        case 'conflict':
          throw new IdempotencyConflictError(key);
        case 'in_progress':
          throw new IdempotencyInProgressError(key);
        case 'no_key':
          break;
      }
    }

    const endTimer = ticketMetrics.issuanceDuration.startTimer();

    try {
      const tickets = await this.store.transaction(async (uow) => {
        const created = await uow.insertMany(
          {
            theaterName: normalized.theaterName,
            userId: normalized.userId,
            movieTitle: normalized.movieTitle,
            priceKrw: normalized.priceKrw,
            memo: normalized.memo,
          },
          normalized.quantity
        );

        if (created.length !== normalized.quantity) {
          throw new StorageFailureError(
            `ticket issuance (expected ${normalized.quantity} rows, wrote ${created.length})`
          );
        }
        return created;
      });

      const response: IssueTicketResponse = {
        ticketIds: tickets.map((ticket) => ticket.id),
        count: tickets.length,
        summary: {
          theaterName: normalized.theaterName,
          movieTitle: normalized.movieTitle,
          priceKrw: normalized.priceKrw,
        },
      };

      if (key !== undefined) {
        this.idempotencyCache.attachResponse(key, response);
      }

      ticketMetrics.ticketsIssued.inc(response.count);
      log.info(
        { idempotencyKey: key, userId: normalized.userId, count: response.count },
        'Tickets issued'
      );

      return { response, replayed: false };
    } catch (error) {
      if (key !== undefined) {
        this.idempotencyCache.release(key);
      }
      log.error({ err: error, idempotencyKey: key }, 'Ticket issuance failed');
      throw toDomainError(error, 'ticket issuance');
    } finally {
      endTimer();
    }
  }

  /**
   * Cancel issued tickets in one transaction and classify every requested id.
   * A repeated id sees the state left by its earlier occurrence in the call.
   */
  async refundTickets(request: RefundTicketRequest): Promise<RefundTicketResponse> {
    const input = validateWith(refundTicketSchema, request, 'Refund request');
    const reason = input.reason ? input.reason : null;

    try {
      const result = await this.store.transaction(async (uow) => {
        const found = await uow.findByIds(input.ticketIds);
        const statusById = new Map(found.map((ticket) => [ticket.id, ticket.status]));

        const outcome: RefundTicketResponse = { refunded: [], alreadyCanceled: [], notFound: [] };
        const toCancel: string[] = [];

        for (const ticketId of input.ticketIds) {
          const status = statusById.get(ticketId);

          if (status === undefined) {
            outcome.notFound.push(ticketId);
          } else if (TicketStateMachine.isTerminalState(status)) {
            outcome.alreadyCanceled.push(ticketId);
          } else {
            TicketStateMachine.validateTransition(status, TicketStatus.CANCELED);
            statusById.set(ticketId, TicketStatus.CANCELED);
            toCancel.push(ticketId);
            outcome.refunded.push(ticketId);
          }
        }

        if (toCancel.length > 0) {
          const canceled = await uow.cancelMany(toCancel, this.clock(), reason);
          if (canceled.length !== toCancel.length) {
            throw new StorageFailureError(
              `ticket refund (expected ${toCancel.length} rows, updated ${canceled.length})`
            );
          }
        }

        return outcome;
      });

      ticketMetrics.ticketsRefunded.inc({ outcome: 'refunded' }, result.refunded.length);
      ticketMetrics.ticketsRefunded.inc({ outcome: 'already_canceled' }, result.alreadyCanceled.length);
      ticketMetrics.ticketsRefunded.inc({ outcome: 'not_found' }, result.notFound.length);

      log.info(
        {
          refunded: result.refunded.length,
          alreadyCanceled: result.alreadyCanceled.length,
          notFound: result.notFound.length,
          reason,
        },
        'Refund processed'
      );

      return result;
    } catch (error) {
      log.error({ err: error }, 'Ticket refund failed');
      throw toDomainError(error, 'ticket refund');
    }
  }

  async getTicket(ticketId: string): Promise<Ticket> {
    let ticket: Ticket | null;
    try {
      ticket = await this.store.findById(ticketId);
    } catch (error) {
      throw toDomainError(error, 'ticket lookup');
    }

    if (!ticket) {
      throw new TicketNotFoundError(ticketId);
    }
    return ticket;
  }

  async listTickets(query: ListTicketsQuery = {}): Promise<TicketListResponse> {
    const { limit, offset, ...filters } = validateWith(
      listTicketsQuerySchema,
      query,
      'List query'
    );
    const pagination = {
      limit: limit ?? ticketConfig.listing.defaultLimit,
      offset: offset ?? 0,
    };

    try {
      const page = await this.store.list(filters, pagination);
      return { ...page, ...pagination };
    } catch (error) {
      throw toDomainError(error, 'ticket listing');
    }
  }
}
