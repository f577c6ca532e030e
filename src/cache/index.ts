import type { Logger } from 'pino';
import type { CacheConfig } from '../config/index.js';
import { initializeDatabase } from '../db/index.js';
import { MemoryIdentityCache } from './memory-cache.js';
import { SqliteIdentityCache, PostgresIdentityCache } from './sql-cache.js';
import type { ExpiringIdentityCache } from './types.js';

export { MemoryIdentityCache } from './memory-cache.js';
export { SqliteIdentityCache, PostgresIdentityCache } from './sql-cache.js';
export type { IdentityCache, ExpiringIdentityCache, CacheEntry } from './types.js';

/**
 * Build the cache selected by `cache.type`; `none` disables caching.
 */
export async function createIdentityCache(
  config: CacheConfig,
  logger: Logger
): Promise<ExpiringIdentityCache | null> {
  switch (config.type) {
    case 'none':
      return null;

    case 'memory':
      return new MemoryIdentityCache(config.max_memory_entries);

    case 'sqlite':
    case 'postgres': {
      const context = await initializeDatabase(config, logger);
      return context.type === 'postgres'
        ? new PostgresIdentityCache(context.db, logger)
        : new SqliteIdentityCache(context.db, logger);
    }
  }
}
