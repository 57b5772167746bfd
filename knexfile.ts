import type { Knex } from 'knex';
import dotenv from 'dotenv';

dotenv.config();

const migrations: Knex.MigratorConfig = {
  tableName: 'knex_migrations_ticketing',
  directory: './src/migrations',
  extension: 'ts',
  loadExtensions: ['.ts'],
};

const config: { [key: string]: Knex.Config } = {
  development: {
    client: 'postgresql',
    connection: process.env.DATABASE_URL || {
      host: process.env.DB_HOST || 'localhost',
      port: parseInt(process.env.DB_PORT || '5432', 10),
      database: process.env.DB_NAME || 'ticketing',
      user: process.env.DB_USER || 'postgres',
      password: process.env.DB_PASSWORD || 'postgres',
    },
    pool: {
      min: 2,
      max: 10,
    },
    migrations,
  },
  production: {
    client: 'postgresql',
    connection: process.env.DATABASE_URL,
    pool: {
      min: 2,
      max: 10,
    },
    migrations,
  },
};

export default config;
