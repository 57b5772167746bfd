import { FastifyInstance } from 'fastify';
import { TicketStore } from '../models/ticket.model';

export interface HealthRoutesOptions {
  store: TicketStore;
  cache: { size(): number };
}

export async function healthRoutes(fastify: FastifyInstance, options: HealthRoutesOptions) {
  const { store, cache } = options;

  // Liveness probe - check if service is alive
  fastify.get('/health/live', async (_request, reply) => {
    reply.send({ status: 'ok', timestamp: new Date().toISOString() });
  });

  // Readiness probe - check if service is ready to accept traffic
  fastify.get('/health/ready', async (_request, reply) => {
    const checks = {
      database: false,
    };

    try {
      await store.ping();
      checks.database = true;
    } catch (error) {
      fastify.log.error({ err: error }, 'Database health check failed');
    }

    const statusCode = checks.database ? 200 : 503;

    reply.status(statusCode).send({
      status: checks.database ? 'ready' : 'not ready',
      checks,
      idempotencyCache: { entries: cache.size() },
      timestamp: new Date().toISOString(),
    });
  });
}
