import client from 'prom-client';

// Create a Registry
export const register = new client.Registry();

// Add default metrics (CPU, memory, etc.)
client.collectDefaultMetrics({ register });

// Custom metrics for the ticketing service
export const ticketMetrics = {
  // Counter: Tickets persisted by issuance
  ticketsIssued: new client.Counter({
    name: 'tickets_issued_total',
    help: 'Total number of tickets issued',
    registers: [register],
  }),

  // Counter: Refund classification per requested ticket id
  ticketsRefunded: new client.Counter({
    name: 'tickets_refunded_total',
    help: 'Refund outcomes per requested ticket id',
    labelNames: ['outcome'],
    registers: [register],
  }),

  // Counter: Idempotency cache decisions
  idempotencyOutcomes: new client.Counter({
    name: 'idempotency_outcomes_total',
    help: 'Idempotency cache outcomes on issuance',
    labelNames: ['outcome'],
    registers: [register],
  }),

  // Histogram: Issuance duration
  issuanceDuration: new client.Histogram({
    name: 'ticket_issuance_duration_seconds',
    help: 'Duration of ticket issuance in seconds',
    buckets: [0.01, 0.05, 0.1, 0.5, 1, 2],
    registers: [register],
  }),
};
