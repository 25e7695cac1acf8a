/**
 * Memoization cache and content fingerprints
 * Backs per-reference resolution so repeated lookups skip the scope search
 */

import * as crypto from 'crypto';

export interface CacheStats {
  hits: number;
  misses: number;
  size: number;
}

/**
 * Map-backed cache that computes missing entries on demand
 */
export class MemoCache<K, V> {
  private cache = new Map<K, V>();
  private hits = 0;
  private misses = 0;

  /**
   * Get a value from the cache
   * @returns The cached value or undefined if not found
   */
  get(key: K): V | undefined {
    return this.cache.get(key);
  }

  set(key: K, value: V): void {
    this.cache.set(key, value);
  }

  has(key: K): boolean {
    return this.cache.has(key);
  }

  /**
   * Return the cached value for `key`, computing and storing it on a miss.
   * A throwing `compute` stores nothing.
   */
  getOrCompute(key: K, compute: (key: K) => V): V {
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      this.hits++;
      return cached;
    }

    this.misses++;
    const value = compute(key);
    this.cache.set(key, value);
    return value;
  }

  clear(): void {
    this.cache.clear();
    this.hits = 0;
    this.misses = 0;
  }

  get size(): number {
    return this.cache.size;
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, size: this.cache.size };
  }
}

/**
 * SHA-256 fingerprint of a string, used to tell whether an output unit changed
 * @returns Lowercase hex digest
 */
export function contentHash(text: string): string {
  const hash = crypto.createHash('sha256');
  hash.update(text);
  return hash.digest('hex');
}
