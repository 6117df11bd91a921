// src/db/knexfile.ts
import type { Knex } from 'knex';

const connection = {
  host: process.env.DB_HOST || '127.0.0.1',
  port: Number(process.env.DB_PORT || 3306),
  user: process.env.DB_USER || 'jobs',
  password: process.env.DB_PASSWORD || '',
  database: process.env.DB_NAME || 'jobs'
};

export const knexConfig: Record<string, Knex.Config> = {
  development: {
    client: 'mysql2',
    connection,
    pool: { min: 0, max: 10 }
  },

  production: {
    client: 'mysql2',
    connection,
    pool: { min: 2, max: 20 }
  },

  // In-process store; one connection, since each :memory: connection is its own database
  test: {
    client: 'better-sqlite3',
    connection: { filename: ':memory:' },
    useNullAsDefault: true,
    pool: { min: 1, max: 1 }
  }
};
