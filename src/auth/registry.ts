import { LRUCache } from './memory-cache.js';
import type { ConnectionRecord } from './types.js';

export function connectionId(clientAddress: string, clientPort: number): string {
  return `${clientAddress}:${clientPort}`;
}

/**
 * Last authenticated username per client connection. Observational only; the
 * engine never reads it to make a decision.
 */
export class ConnectionRegistry {
  private records: LRUCache<ConnectionRecord>;
  private ttlSeconds: number;

  constructor(maxEntries: number, ttlSeconds: number) {
    this.records = new LRUCache(maxEntries);
    this.ttlSeconds = ttlSeconds;
  }

  record(id: string, username: string): void {
    this.records.set(id, {
      username,
      expiresAt: new Date(Date.now() + this.ttlSeconds * 1000),
    });
  }

  get(id: string): string | undefined {
    return this.records.get(id)?.username;
  }

  cleanupExpired(): number {
    return this.records.cleanupExpired();
  }

  size(): number {
    return this.records.size();
  }
}
