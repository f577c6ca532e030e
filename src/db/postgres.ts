/**
 * PostgreSQL connection and migrations for the shared identity cache.
 *
 * A PostgreSQL-backed cache lets several proxy replicas share validated
 * tokens. Tables are created on startup when the user has CREATE rights.
 */

import pg from 'pg';
import type { Pool } from 'pg';
import { drizzle, type NodePgDatabase } from 'drizzle-orm/node-postgres';
import type { PostgresConfig } from '../config/index.js';
import * as schema from './schema.postgres.js';
import type { Logger } from 'pino';

export { schema };

export type PostgresDb = NodePgDatabase<typeof schema>;

let pool: Pool | null = null;

/**
 * PostgreSQL error codes
 * @see https://www.postgresql.org/docs/current/errcodes-appendix.html
 */
const PG_ERROR_CODES = {
  INSUFFICIENT_PRIVILEGE: '42501',
};

function isPermissionError(err: unknown): boolean {
  return (
    err !== null &&
    typeof err === 'object' &&
    'code' in err &&
    err.code === PG_ERROR_CODES.INSUFFICIENT_PRIVILEGE
  );
}

export const POSTGRES_MIGRATIONS = `
  CREATE TABLE IF NOT EXISTS identity_cache (
    id SERIAL PRIMARY KEY,
    token_hash TEXT NOT NULL UNIQUE,
    identity TEXT NOT NULL,
    stored_at TEXT NOT NULL,
    expires_at TEXT NOT NULL
  );

  CREATE INDEX IF NOT EXISTS idx_ic_expires_at ON identity_cache(expires_at);
`;

/**
 * Open the connection pool and create the cache table.
 *
 * @throws Error when the server is unreachable or the user lacks CREATE rights
 */
export async function initializePostgres(
  config: PostgresConfig,
  logger: Logger
): Promise<PostgresDb> {
  pool = new pg.Pool({
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl ? { rejectUnauthorized: config.ssl_reject_unauthorized } : false,
    max: config.pool_size,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 5000,
  });

  try {
    const client = await pool.connect();
    client.release();
    logger.debug('PostgreSQL connection test successful');
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`Failed to connect to PostgreSQL: ${message}`, { cause: err });
  }

  try {
    await pool.query(POSTGRES_MIGRATIONS);
    logger.info('PostgreSQL identity cache table initialized');
  } catch (err) {
    if (isPermissionError(err)) {
      logger.error(
        'PostgreSQL permission denied. The database user does not have CREATE TABLE rights.\n' +
          'Either grant CREATE permissions to the user, or create the identity_cache table manually.'
      );
      throw new Error('PostgreSQL initialization failed: insufficient permissions', { cause: err });
    }
    throw err;
  }

  return drizzle(pool, { schema });
}

export async function closePostgres(): Promise<void> {
  if (pool) {
    await pool.end();
    pool = null;
  }
}
