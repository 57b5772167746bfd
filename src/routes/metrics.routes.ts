import { FastifyInstance } from 'fastify';
import { register } from '../utils/metrics';

export async function metricsRoutes(fastify: FastifyInstance) {
  // Prometheus metrics endpoint
  fastify.get('/metrics', async (_request, reply) => {
    const metrics = await register.metrics();

    reply
      .header('Content-Type', register.contentType)
      .send(metrics);
  });
}
