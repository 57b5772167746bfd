import { Pool, PoolConfig } from 'pg';
import { logger } from '../utils/logger';

let pool: Pool | null = null;

function buildPoolConfig(): PoolConfig {
  const shared: PoolConfig = {
    max: parseInt(process.env.DB_POOL_MAX || '10', 10),
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
    // Kill runaway queries and idle transactions
    statement_timeout: parseInt(process.env.DB_STATEMENT_TIMEOUT || '30000', 10),
    idle_in_transaction_session_timeout: 60000,
  };

  if (process.env.DATABASE_URL) {
    return { ...shared, connectionString: process.env.DATABASE_URL };
  }

  return {
    ...shared,
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    database: process.env.DB_NAME || 'ticketing',
    user: process.env.DB_USER || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
  };
}

export async function initializeDatabase(): Promise<Pool> {
  if (pool) {
    return pool;
  }

  const MAX_RETRIES = 5;
  const RETRY_DELAY = 2000; // Base delay in milliseconds

  for (let attempt = 1; attempt <= MAX_RETRIES; attempt++) {
    const candidate = new Pool(buildPoolConfig());

    try {
      logger.info(`Database connection attempt ${attempt}/${MAX_RETRIES}...`);

      candidate.on('error', (err) => {
        logger.error({ err }, 'Unexpected database error');
      });

      await candidate.query('SELECT 1');

      pool = candidate;
      logger.info('Database connection pool initialized successfully');
      return pool;
    } catch (error) {
      logger.error({ err: error }, `Connection attempt ${attempt} failed`);

      await candidate.end().catch((endError: unknown) => {
        logger.warn({ err: endError }, 'Failed to close pool after failed attempt');
      });

      if (attempt === MAX_RETRIES) {
        logger.error('Failed to connect to database after all retries');
        throw error;
      }

      const delayMs = RETRY_DELAY * attempt;
      logger.info(`Waiting ${delayMs}ms before retry...`);
      await new Promise((resolve) => setTimeout(resolve, delayMs));
    }
  }

  throw new Error('Failed to initialize database');
}

export async function closeDatabase(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
    logger.info('Database connection pool closed');
  }
}
