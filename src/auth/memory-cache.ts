export interface Expiring {
  expiresAt: Date;
}

export class LRUCache<V extends Expiring> {
  private cache: Map<string, V>;
  private maxSize: number;

  constructor(maxSize: number) {
    this.cache = new Map();
    this.maxSize = maxSize;
  }

  /**
   * Returns the live entry for a key. Expired entries are dropped on read and
   * never returned.
   */
  get(key: string, now: Date = new Date()): V | undefined {
    const entry = this.cache.get(key);
    if (!entry) {
      return undefined;
    }

    if (entry.expiresAt <= now) {
      this.cache.delete(key);
      return undefined;
    }

    // Move to end (most recently used)
    this.cache.delete(key);
    this.cache.set(key, entry);
    return entry;
  }

  set(key: string, entry: V): void {
    if (this.cache.has(key)) {
      this.cache.delete(key);
      this.cache.set(key, entry);
      return;
    }

    // New key: evict oldest entry if at capacity
    if (this.cache.size >= this.maxSize) {
      const firstKey = this.cache.keys().next().value;
      if (firstKey !== undefined) {
        this.cache.delete(firstKey);
      }
    }

    this.cache.set(key, entry);
  }

  size(): number {
    return this.cache.size;
  }

  cleanupExpired(now: Date = new Date()): number {
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
