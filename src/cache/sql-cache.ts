import { and, eq, gt, lte } from 'drizzle-orm';
import type { PgDatabase, PgQueryResultHKT } from 'drizzle-orm/pg-core';
import type { Logger } from 'pino';
import type { SQLiteDb } from '../db/index.js';
import { schema as sqliteSchema, postgresSchema } from '../db/index.js';
import { sha256 } from '../identity/fingerprint.js';
import { IdentityRecordSchema } from '../identity/schema.js';
import type { IdentityRecord } from '../identity/types.js';
import type { ExpiringIdentityCache } from './types.js';

interface StoredRow {
  tokenHash: string;
  identity: string;
  storedAt: string;
  expiresAt: string;
}

function toRow(token: string, identity: IdentityRecord, ttlMs: number): StoredRow {
  const now = new Date();
  return {
    tokenHash: sha256(token),
    identity: JSON.stringify(identity),
    storedAt: now.toISOString(),
    expiresAt: new Date(now.getTime() + ttlMs).toISOString(),
  };
}

function parseIdentity(raw: string, logger: Logger): IdentityRecord | undefined {
  try {
    const parsed = IdentityRecordSchema.safeParse(JSON.parse(raw));
    if (parsed.success) {
      return parsed.data;
    }
    logger.warn({ issues: parsed.error.issues.length }, 'Discarding malformed identity cache row');
  } catch (err) {
    logger.warn({ err }, 'Discarding unreadable identity cache row');
  }
  return undefined;
}

/**
 * Identity cache stored in SQLite. Tokens are stored as SHA-256 digests,
 * never in the clear.
 */
export class SqliteIdentityCache implements ExpiringIdentityCache {
  constructor(
    private readonly db: SQLiteDb,
    private readonly logger: Logger
  ) {}

  async get(token: string): Promise<IdentityRecord | undefined> {
    const { identityCache } = sqliteSchema;
    const row = this.db
      .select({ identity: identityCache.identity })
      .from(identityCache)
      .where(
        and(eq(identityCache.tokenHash, sha256(token)), gt(identityCache.expiresAt, new Date().toISOString()))
      )
      .get();

    return row ? parseIdentity(row.identity, this.logger) : undefined;
  }

  async set(token: string, identity: IdentityRecord, ttlMs: number): Promise<void> {
    const { identityCache } = sqliteSchema;
    const row = toRow(token, identity, ttlMs);

    this.db
      .insert(identityCache)
      .values(row)
      .onConflictDoUpdate({
        target: identityCache.tokenHash,
        set: { identity: row.identity, storedAt: row.storedAt, expiresAt: row.expiresAt },
      })
      .run();
  }

  async cleanupExpired(): Promise<number> {
    const { identityCache } = sqliteSchema;
    const result = this.db
      .delete(identityCache)
      .where(lte(identityCache.expiresAt, new Date().toISOString()))
      .run();
    return result.changes;
  }
}

/** Any drizzle PostgreSQL database over the cache schema, whatever its driver. */
export type PostgresCacheDb = PgDatabase<PgQueryResultHKT, typeof postgresSchema>;

/**
 * Identity cache shared by every replica connected to the same PostgreSQL
 * database.
 */
export class PostgresIdentityCache implements ExpiringIdentityCache {
  constructor(
    private readonly db: PostgresCacheDb,
    private readonly logger: Logger
  ) {}

  async get(token: string): Promise<IdentityRecord | undefined> {
    const { identityCache } = postgresSchema;
    const rows = await this.db
      .select({ identity: identityCache.identity })
      .from(identityCache)
      .where(
        and(eq(identityCache.tokenHash, sha256(token)), gt(identityCache.expiresAt, new Date().toISOString()))
      )
      .limit(1);

    return rows.length > 0 ? parseIdentity(rows[0].identity, this.logger) : undefined;
  }

  async set(token: string, identity: IdentityRecord, ttlMs: number): Promise<void> {
    const { identityCache } = postgresSchema;
    const row = toRow(token, identity, ttlMs);

    await this.db
      .insert(identityCache)
      .values(row)
      .onConflictDoUpdate({
        target: identityCache.tokenHash,
        set: { identity: row.identity, storedAt: row.storedAt, expiresAt: row.expiresAt },
      });
  }

  async cleanupExpired(): Promise<number> {
    const { identityCache } = postgresSchema;
    const deleted = await this.db
      .delete(identityCache)
      .where(lte(identityCache.expiresAt, new Date().toISOString()))
      .returning({ id: identityCache.id });
    return deleted.length;
  }
}
