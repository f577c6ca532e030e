import type { IdentityRecord } from '../identity/types.js';

/**
 * Token → identity memo consumed by the middleware. Implementations own
 * storage and eviction and must tolerate concurrent callers.
 */
export interface IdentityCache {
  get(token: string): Promise<IdentityRecord | undefined>;
  set(token: string, identity: IdentityRecord, ttlMs: number): Promise<void>;
}

/** Caches that can be swept for expired entries by the cleanup job. */
export interface ExpiringIdentityCache extends IdentityCache {
  cleanupExpired(): Promise<number>;
}

export interface CacheEntry {
  identity: IdentityRecord;
  expiresAt: number;
}
