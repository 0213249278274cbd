/**
 * Bounded LRU cache with optional TTL
 * Holds the last observed status per transaction hash and the per-account tracker state.
 */

import type { Clock } from './clock.js';
import { systemClock } from './clock.js';

interface CacheEntry<V> {
  value: V;
  expiresAt: number;
}

export interface LRUCacheOptions {
  maxSize?: number;
  /** Entry lifetime in ms; `Infinity` keeps entries until evicted */
  ttl?: number;
  clock?: Clock;
}

export class LRUCache<K, V> {
  private readonly entries = new Map<K, CacheEntry<V>>();
  private readonly maxSize: number;
  private readonly ttl: number;
  private readonly clock: Clock;

  constructor(options: LRUCacheOptions = {}) {
    this.maxSize = options.maxSize ?? 1000;
    this.ttl = options.ttl ?? Number.POSITIVE_INFINITY;
    this.clock = options.clock ?? systemClock;
    if (!Number.isInteger(this.maxSize) || this.maxSize < 1) {
      throw new Error(`Cache size must be a positive integer, got ${this.maxSize}`);
    }
  }

  /**
   * Returns undefined if missing or expired; refreshes recency on hit
   */
  get(key: K): V | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;

    if (this.clock.now() > entry.expiresAt) {
      this.entries.delete(key);
      return undefined;
    }

    this.entries.delete(key);
    this.entries.set(key, entry);
    return entry.value;
  }

  has(key: K): boolean {
    return this.get(key) !== undefined;
  }

  set(key: K, value: V, ttl?: number): void {
    this.entries.delete(key);

    while (this.entries.size >= this.maxSize) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }

    this.entries.set(key, { value, expiresAt: this.clock.now() + (ttl ?? this.ttl) });
  }

  delete(key: K): boolean {
    return this.entries.delete(key);
  }

  clear(): void {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}
