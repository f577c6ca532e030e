import Database from 'better-sqlite3';
import { drizzle, type BetterSQLite3Database } from 'drizzle-orm/better-sqlite3';
import * as sqliteSchema from './schema.js';
import { initializePostgres, closePostgres, type PostgresDb } from './postgres.js';
import type { CacheConfig } from '../config/index.js';
import type { Logger } from 'pino';
import fs from 'fs';
import path from 'path';

export type SQLiteDb = BetterSQLite3Database<typeof sqliteSchema>;
export type { PostgresDb };

export type DatabaseContext =
  | { type: 'sqlite'; db: SQLiteDb }
  | { type: 'postgres'; db: PostgresDb };

const IN_MEMORY = ':memory:';

let sqlite: Database.Database | null = null;
let currentType: DatabaseContext['type'] | null = null;

/**
 * SQLite migrations (create tables if not exist)
 */
function runSQLiteMigrations(connection: Database.Database): void {
  connection.exec(`
    CREATE TABLE IF NOT EXISTS identity_cache (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      token_hash TEXT NOT NULL UNIQUE,
      identity TEXT NOT NULL,
      stored_at TEXT NOT NULL,
      expires_at TEXT NOT NULL
    );

    -- Note: token_hash already has implicit index from UNIQUE constraint
    CREATE INDEX IF NOT EXISTS idx_ic_expires_at ON identity_cache(expires_at);
  `);
}

/**
 * Open (or create) the SQLite cache database. `:memory:` gives a private,
 * process-local database.
 */
export function initializeSQLite(dbPath: string, logger: Logger): SQLiteDb {
  if (dbPath !== IN_MEMORY) {
    // Ensure data directory exists with restrictive permissions
    const dataDir = path.dirname(dbPath);
    if (!fs.existsSync(dataDir)) {
      fs.mkdirSync(dataDir, { recursive: true, mode: 0o700 });
    }
  }

  sqlite = new Database(dbPath);
  if (dbPath !== IN_MEMORY) {
    sqlite.pragma('journal_mode = WAL');
  }
  sqlite.pragma('busy_timeout = 5000');

  // Cached identities are credentials in all but name
  if (dbPath !== IN_MEMORY) {
    try {
      fs.chmodSync(dbPath, 0o600);
    } catch (err) {
      // On Windows, chmod may not be supported; ignore errors there.
      if (process.platform !== 'win32') {
        logger.warn({ err, dbPath }, 'Failed to set restrictive permissions (0600) on database file');
      }
    }
  }

  runSQLiteMigrations(sqlite);
  currentType = 'sqlite';

  return drizzle(sqlite, { schema: sqliteSchema });
}

/**
 * Initialize the database backing a persistent identity cache.
 */
export async function initializeDatabase(
  config: CacheConfig,
  logger: Logger
): Promise<DatabaseContext> {
  if (config.type === 'postgres') {
    if (!config.postgres) {
      throw new Error(
        'PostgreSQL configuration missing. Set POSTGRES_HOST, POSTGRES_DATABASE, etc.'
      );
    }
    const db = await initializePostgres(config.postgres, logger);
    currentType = 'postgres';
    logger.info('Database initialized: PostgreSQL');
    return { type: 'postgres', db };
  }

  const db = initializeSQLite(config.path, logger);
  logger.info({ path: config.path }, 'Database initialized: SQLite');
  return { type: 'sqlite', db };
}

/**
 * Close whichever connection is open; a no-op when none is.
 */
export async function closeDatabase(): Promise<void> {
  if (currentType === 'postgres') {
    await closePostgres();
  } else if (sqlite) {
    sqlite.close();
    sqlite = null;
  }
  currentType = null;
}

export { sqliteSchema as schema };
export { schema as postgresSchema } from './postgres.js';
