import fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import cors from '@fastify/cors';
import { v4 as uuidv4 } from 'uuid';
import { ticketRoutes, healthRoutes, metricsRoutes } from './routes';
import { errorHandler } from './middleware';
import { Container } from './bootstrap/container';

const SERVICE_NAME = process.env.SERVICE_NAME || 'ticketing-service';

export async function createApp(container: Container): Promise<FastifyInstance> {
  const app = fastify({
    logger: false,
    trustProxy: true,
    requestIdHeader: 'x-request-id',
    genReqId: () => uuidv4(),
    bodyLimit: 1048576, // 1MB limit
  });

  // Register security plugins
  await app.register(helmet, {
    contentSecurityPolicy: false,
  });

  // Register CORS with proper origin validation
  await app.register(cors, {
    origin: (origin, callback) => {
      const allowedOrigins = process.env.ALLOWED_ORIGINS?.split(',') || [
        'http://localhost:3000',
      ];
      // Allow requests with no origin (curl, server-to-server)
      if (!origin) {
        callback(null, true);
        return;
      }
      if (allowedOrigins.includes(origin) || process.env.NODE_ENV === 'development') {
        callback(null, true);
      } else {
        callback(new Error('Not allowed by CORS'), false);
      }
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'X-Request-ID', 'Idempotency-Key'],
    exposedHeaders: ['X-Request-ID', 'X-Idempotent-Replay', 'X-RateLimit-Limit', 'X-RateLimit-Remaining'],
    maxAge: 86400, // 24 hours
  });

  // Register rate limiting (in-memory)
  await app.register(rateLimit, {
    max: 100,
    timeWindow: '1 minute',
  });

  app.setErrorHandler(errorHandler);

  // Register routes
  await app.register(healthRoutes, { store: container.store, cache: container.cache });
  await app.register(metricsRoutes);
  await app.register(ticketRoutes, {
    prefix: '/tickets',
    ticketService: container.ticketService,
  });

  // Service info endpoint
  app.get('/', async () => {
    return {
      service: SERVICE_NAME,
      version: process.env.npm_package_version || '1.0.0',
      status: 'running',
    };
  });

  return app;
}
