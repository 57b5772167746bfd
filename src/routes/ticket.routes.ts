import { FastifyInstance } from 'fastify';
import type {} from '@fastify/rate-limit';
import { TicketController } from '../controllers/ticket.controller';
import { TicketService } from '../services/ticket.service';
import { idempotencyKeyMiddleware, validate } from '../middleware';
import {
  issueTicketSchema,
  listTicketsQuerySchema,
  refundTicketSchema,
  ticketIdParamSchema,
} from '../validators/ticket.schemas';
import {
  IssueTicketRequest,
  ListTicketsQuery,
  RefundTicketRequest,
} from '../types/ticket.types';

export interface TicketRoutesOptions {
  ticketService: TicketService;
}

export async function ticketRoutes(fastify: FastifyInstance, options: TicketRoutesOptions) {
  const controller = new TicketController(options.ticketService);

  // Issue tickets (idempotent with Idempotency-Key)
  fastify.post<{ Body: IssueTicketRequest }>(
    '/issue',
    {
      preHandler: [
        idempotencyKeyMiddleware, // Key format checked BEFORE body validation
        validate({ body: issueTicketSchema }),
      ],
      config: {
        rateLimit: {
          max: 30,
          timeWindow: '1 minute',
        },
      },
    },
    async (request, reply) => controller.issueTickets(request, reply)
  );

  // Refund tickets (batch, all-or-nothing)
  fastify.post<{ Body: RefundTicketRequest }>(
    '/refund',
    {
      preHandler: [validate({ body: refundTicketSchema })],
      config: {
        rateLimit: {
          max: 30,
          timeWindow: '1 minute',
        },
      },
    },
    async (request, reply) => controller.refundTickets(request, reply)
  );

  fastify.get<{ Params: { ticketId: string } }>(
    '/:ticketId',
    {
      preHandler: [validate({ params: ticketIdParamSchema })],
    },
    async (request, reply) => controller.getTicket(request, reply)
  );

  fastify.get<{ Querystring: ListTicketsQuery }>(
    '/',
    {
      preHandler: [validate({ query: listTicketsQuerySchema })],
    },
    async (request, reply) => controller.listTickets(request, reply)
  );
}
