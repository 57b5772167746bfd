import { FastifyRequest, FastifyReply } from 'fastify';
import { TicketService } from '../services/ticket.service';
import { getIdempotencyKey, REPLAY_HEADER } from '../middleware/idempotency.middleware';
import {
  IssueTicketRequest,
  ListTicketsQuery,
  RefundTicketRequest,
} from '../types/ticket.types';

type IssueRequest = FastifyRequest<{ Body: IssueTicketRequest }>;
type RefundRequest = FastifyRequest<{ Body: RefundTicketRequest }>;
type GetTicketRequest = FastifyRequest<{ Params: { ticketId: string } }>;
type ListTicketsRequest = FastifyRequest<{ Querystring: ListTicketsQuery }>;

/**
 * Thin HTTP layer over TicketService. Domain errors propagate to the
 * shared error handler.
 */
export class TicketController {
  constructor(private ticketService: TicketService) {}

  async issueTickets(request: IssueRequest, reply: FastifyReply) {
    const idempotencyKey = getIdempotencyKey(request);
    const { response, replayed } = await this.ticketService.issueTickets(
      request.body,
      idempotencyKey
    );

    if (replayed) {
      return reply.status(200).header(REPLAY_HEADER, 'true').send(response);
    }
    return reply.status(201).send(response);
  }

  async refundTickets(request: RefundRequest, reply: FastifyReply) {
    const result = await this.ticketService.refundTickets(request.body);
    return reply.status(200).send(result);
  }

  async getTicket(request: GetTicketRequest, reply: FastifyReply) {
    const ticket = await this.ticketService.getTicket(request.params.ticketId);
    return reply.status(200).send(ticket);
  }

  async listTickets(request: ListTicketsRequest, reply: FastifyReply) {
    const page = await this.ticketService.listTickets(request.query);
    return reply.status(200).send(page);
  }
}
