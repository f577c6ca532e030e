import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { PGlite } from '@electric-sql/pglite';
import { drizzle, type PgliteDatabase } from 'drizzle-orm/pglite';
import { PostgresIdentityCache } from '../src/cache/sql-cache.js';
import { POSTGRES_MIGRATIONS, schema } from '../src/db/postgres.js';
import { sha256 } from '../src/identity/fingerprint.js';
import { makeIdentity, silentLogger } from './helpers.js';

const alice = makeIdentity();
const bob = makeIdentity({ roles: [{ id: 'r1', name: 'admin' }] });

describe('PostgresIdentityCache', () => {
  let client: PGlite;
  let db: PgliteDatabase<typeof schema>;
  let cache: PostgresIdentityCache;

  beforeEach(async () => {
    client = new PGlite();
    await client.exec(POSTGRES_MIGRATIONS);
    db = drizzle(client, { schema });
    cache = new PostgresIdentityCache(db, silentLogger);
  });

  afterEach(async () => {
    await client.close();
  });

  it('should round-trip an identity', async () => {
    await cache.set('token-a', alice, 60000);

    expect(await cache.get('token-a')).toEqual(alice);
  });

  it('should return undefined for unknown tokens', async () => {
    expect(await cache.get('unknown')).toBeUndefined();
  });

  it('should store a digest of the token, never the token', async () => {
    await cache.set('test-secret-token', alice, 60000);

    const rows = await db.select().from(schema.identityCache);
    expect(rows).toHaveLength(1);
    expect(rows[0].tokenHash).toBe(sha256('test-secret-token'));
    expect(rows[0].identity).not.toContain('test-secret-token');
  });

  it('should upsert on rewrite', async () => {
    await cache.set('token-a', alice, 60000);
    await cache.set('token-a', bob, 60000);

    expect(await db.select().from(schema.identityCache)).toHaveLength(1);
    expect(await cache.get('token-a')).toEqual(bob);
  });

  it('should ignore and sweep expired rows', async () => {
    await cache.set('token-expired', alice, -1000);
    await cache.set('token-live', bob, 60000);

    expect(await cache.get('token-expired')).toBeUndefined();
    expect(await cache.cleanupExpired()).toBe(1);
    expect(await cache.cleanupExpired()).toBe(0);
    expect(await cache.get('token-live')).toEqual(bob);
  });

  it('should discard rows that do not hold an identity', async () => {
    await db.insert(schema.identityCache).values({
      tokenHash: sha256('token-broken'),
      identity: '{"user":null}',
      storedAt: new Date().toISOString(),
      expiresAt: new Date(Date.now() + 60000).toISOString(),
    });

    expect(await cache.get('token-broken')).toBeUndefined();
  });
});
