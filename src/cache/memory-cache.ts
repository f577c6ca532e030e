import type { IdentityRecord } from '../identity/types.js';
import type { CacheEntry, ExpiringIdentityCache } from './types.js';

export class MemoryIdentityCache implements ExpiringIdentityCache {
  private cache: Map<string, CacheEntry>;
  private maxSize: number;

  constructor(maxSize: number) {
    this.cache = new Map();
    this.maxSize = maxSize;
  }

  async get(token: string): Promise<IdentityRecord | undefined> {
    const entry = this.cache.get(token);
    if (!entry) return undefined;

    if (entry.expiresAt <= Date.now()) {
      this.cache.delete(token);
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(token);
    this.cache.set(token, entry);
    return entry.identity;
  }

  async set(token: string, identity: IdentityRecord, ttlMs: number): Promise<void> {
    const entry: CacheEntry = { identity, expiresAt: Date.now() + ttlMs };

    if (this.cache.has(token)) {
      this.cache.delete(token);
      this.cache.set(token, entry);
      return;
    }

    if (this.cache.size >= this.maxSize) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }

    this.cache.set(token, entry);
  }

  size(): number {
    return this.cache.size;
  }

  clear(): void {
    this.cache.clear();
  }

  async cleanupExpired(): Promise<number> {
    const now = Date.now();
    let deleted = 0;

    for (const [key, entry] of this.cache) {
      if (entry.expiresAt <= now) {
        this.cache.delete(key);
        deleted++;
      }
    }

    return deleted;
  }
}
