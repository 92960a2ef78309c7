import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { LRUCache } from '../src/auth/memory-cache.js';
import { ValidationCache, cacheKey } from '../src/auth/cache.js';
import { ConnectionRegistry, connectionId } from '../src/auth/registry.js';
import type { CacheEntry } from '../src/auth/types.js';

const future = () => new Date(Date.now() + 60000);

describe('LRUCache', () => {
  let cache: LRUCache<CacheEntry>;

  beforeEach(() => {
    cache = new LRUCache(3);
  });

  describe('basic operations', () => {
    it('should store and retrieve entries', () => {
      const entry: CacheEntry = { expiresAt: future(), username: 'alice' };

      cache.set('key1', entry);

      expect(cache.get('key1')).toEqual(entry);
    });

    it('should return undefined for non-existent keys', () => {
      expect(cache.get('nonexistent')).toBeUndefined();
    });
  });

  describe('LRU eviction', () => {
    it('should evict oldest entry when at capacity', () => {
      cache.set('key1', { expiresAt: future() });
      cache.set('key2', { expiresAt: future() });
      cache.set('key3', { expiresAt: future() });
      cache.set('key4', { expiresAt: future() });

      expect(cache.size()).toBe(3);
      expect(cache.get('key1')).toBeUndefined();
      expect(cache.get('key4')).toBeDefined();
    });

    it('should move accessed entry to end (most recently used)', () => {
      cache.set('key1', { expiresAt: future() });
      cache.set('key2', { expiresAt: future() });
      cache.set('key3', { expiresAt: future() });

      cache.get('key1');
      cache.set('key4', { expiresAt: future() });

      expect(cache.get('key1')).toBeDefined();
      expect(cache.get('key2')).toBeUndefined();
    });

    it('should not evict when updating existing key', () => {
      cache.set('key1', { expiresAt: future() });
      cache.set('key2', { expiresAt: future() });
      cache.set('key3', { expiresAt: future() });

      const updated: CacheEntry = { expiresAt: future(), username: 'bob' };
      cache.set('key1', updated);

      expect(cache.size()).toBe(3);
      expect(cache.get('key1')).toEqual(updated);
    });
  });

  describe('expiration', () => {
    it('should never return an expired entry', () => {
      cache.set('stale', { expiresAt: new Date(Date.now() - 1000) });

      expect(cache.get('stale')).toBeUndefined();
      expect(cache.size()).toBe(0);
    });

    it('should treat an entry expiring exactly now as expired', () => {
      const now = new Date();
      cache.set('edge', { expiresAt: now });

      expect(cache.get('edge', now)).toBeUndefined();
    });

    it('should remove expired entries in a sweep', () => {
      const past = new Date(Date.now() - 1000);

      cache.set('expired1', { expiresAt: past });
      cache.set('valid', { expiresAt: future() });
      cache.set('expired2', { expiresAt: past });

      expect(cache.cleanupExpired()).toBe(2);
      expect(cache.size()).toBe(1);
      expect(cache.get('valid')).toBeDefined();
    });

    it('should return 0 for an empty cache', () => {
      expect(cache.cleanupExpired()).toBe(0);
    });
  });
});

describe('cacheKey', () => {
  it('should be stable for the same pair', () => {
    expect(cacheKey('10.0.0.1', 'YWxpY2U6c2VjcmV0')).toBe(cacheKey('10.0.0.1', 'YWxpY2U6c2VjcmV0'));
  });

  it('should differ per client address', () => {
    expect(cacheKey('10.0.0.1', 'YWxpY2U6c2VjcmV0')).not.toBe(
      cacheKey('10.0.0.2', 'YWxpY2U6c2VjcmV0')
    );
  });

  it('should differ per token', () => {
    expect(cacheKey('10.0.0.1', 'YWxpY2U6c2VjcmV0')).not.toBe(
      cacheKey('10.0.0.1', 'YWxpY2U6d3Jvbmc=')
    );
  });

  it('should not confuse address and token boundaries', () => {
    expect(cacheKey('10.0.0.1', '1abc')).not.toBe(cacheKey('10.0.0.11', 'abc'));
  });

  it('should not contain the raw token', () => {
    const key = cacheKey('10.0.0.1', 'YWxpY2U6c2VjcmV0');
    expect(key).toMatch(/^[0-9a-f]{64}$/);
  });
});

describe('ValidationCache', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should miss for unknown keys', () => {
    const cache = new ValidationCache(10);
    expect(cache.lookup('unknown')).toEqual({ hit: false });
  });

  it('should hit within the TTL', () => {
    const cache = new ValidationCache(10);
    cache.put('k', 300, 'alice');

    vi.advanceTimersByTime(299_000);

    expect(cache.lookup('k')).toEqual({
      hit: true,
      entry: { expiresAt: new Date('2026-01-01T00:05:00Z'), username: 'alice' },
    });
  });

  it('should miss once the TTL has elapsed', () => {
    const cache = new ValidationCache(10);
    cache.put('k', 300);

    vi.advanceTimersByTime(300_000);

    expect(cache.lookup('k')).toEqual({ hit: false });
    expect(cache.size()).toBe(0);
  });

  it('should reset expiry when an entry is written again', () => {
    const cache = new ValidationCache(10);
    cache.put('k', 300);
    vi.advanceTimersByTime(200_000);
    cache.put('k', 300);
    vi.advanceTimersByTime(200_000);

    expect(cache.lookup('k').hit).toBe(true);
  });

  it('should sweep expired entries', () => {
    const cache = new ValidationCache(10);
    cache.put('short', 10);
    cache.put('long', 600);

    vi.advanceTimersByTime(60_000);

    expect(cache.cleanupExpired()).toBe(1);
    expect(cache.size()).toBe(1);
  });

  it('should respect the entry cap', () => {
    const cache = new ValidationCache(2);
    cache.put('a', 300);
    cache.put('b', 300);
    cache.put('c', 300);

    expect(cache.size()).toBe(2);
    expect(cache.lookup('a').hit).toBe(false);
  });
});

describe('ConnectionRegistry', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('should build connection ids from address and port', () => {
    expect(connectionId('10.0.0.1', 51234)).toBe('10.0.0.1:51234');
  });

  it('should keep the most recent username per connection', () => {
    const registry = new ConnectionRegistry(10, 3600);
    registry.record('10.0.0.1:51234', 'alice');
    registry.record('10.0.0.1:51234', 'bob');

    expect(registry.get('10.0.0.1:51234')).toBe('bob');
    expect(registry.size()).toBe(1);
  });

  it('should forget connections after the TTL', () => {
    const registry = new ConnectionRegistry(10, 60);
    registry.record('10.0.0.1:51234', 'alice');

    vi.advanceTimersByTime(61_000);

    expect(registry.cleanupExpired()).toBe(1);
    expect(registry.get('10.0.0.1:51234')).toBeUndefined();
  });

  it('should cap the number of tracked connections', () => {
    const registry = new ConnectionRegistry(2, 3600);
    registry.record('a:1', 'alice');
    registry.record('b:2', 'bob');
    registry.record('c:3', 'carol');

    expect(registry.size()).toBe(2);
    expect(registry.get('a:1')).toBeUndefined();
    expect(registry.get('c:3')).toBe('carol');
  });
});
