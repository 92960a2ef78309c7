import { createHash } from 'crypto';
import { LRUCache } from './memory-cache.js';
import type { CacheEntry } from './types.js';

export type CacheLookup = { hit: true; entry: CacheEntry } | { hit: false };

/**
 * Derive the cache key for a (client address, raw credential token) pair.
 * The token is hashed so cleartext credentials never sit in the key space.
 */
export function cacheKey(clientAddress: string, token: string): string {
  return createHash('sha256').update(clientAddress).update('\0').update(token).digest('hex');
}

/**
 * In-memory store of positive validation results. Entries expire after their
 * TTL and the store is capped by least-recently-used eviction.
 */
export class ValidationCache {
  private entries: LRUCache<CacheEntry>;

  constructor(maxEntries: number) {
    this.entries = new LRUCache(maxEntries);
  }

  lookup(key: string): CacheLookup {
    const entry = this.entries.get(key);
    return entry ? { hit: true, entry } : { hit: false };
  }

  put(key: string, ttlSeconds: number, username?: string): void {
    const expiresAt = new Date(Date.now() + ttlSeconds * 1000);
    this.entries.set(key, { expiresAt, username });
  }

  cleanupExpired(): number {
    return this.entries.cleanupExpired();
  }

  size(): number {
    return this.entries.size();
  }
}
