import 'dotenv/config';
import { validateEnv } from './config/env.validator';
import { createApp } from './app';
import { logger } from './utils/logger';
import { initializeDatabase, closeDatabase } from './config/database';
import { TicketModel } from './models/ticket.model';
import { buildContainer, validateContainer } from './bootstrap/container';

async function startService() {
  validateEnv();

  const SERVICE_NAME = process.env.SERVICE_NAME || 'ticketing-service';
  const PORT = parseInt(process.env.PORT || '3000', 10);
  const HOST = process.env.HOST || '0.0.0.0';

  logger.info(`Starting ${SERVICE_NAME}...`);

  // Initialize database connection with retry logic
  const pool = await initializeDatabase();
  logger.info('Database connection established');

  const container = buildContainer(new TicketModel(pool));
  validateContainer(container);

  const app = await createApp(container);
  await app.listen({ port: PORT, host: HOST });

  logger.info(`${SERVICE_NAME} running on ${HOST}:${PORT}`);

  // Graceful shutdown
  const shutdown = async (signal: string) => {
    logger.info(`${signal} received, shutting down ${SERVICE_NAME}...`);

    await app.close();
    await closeDatabase();
    container.cache.clear();

    logger.info(`${SERVICE_NAME} shut down successfully`);
    process.exit(0);
  };

  const onSignal = (signal: string) => {
    shutdown(signal).catch((error: unknown) => {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    });
  };

  process.on('SIGTERM', () => onSignal('SIGTERM'));
  process.on('SIGINT', () => onSignal('SIGINT'));
}

// Start the service
startService().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Failed to start service');
  process.exit(1);
});
