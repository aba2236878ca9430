import type { CacheEntry, CacheStats } from '../types/cache.js';

type NowFn = () => number;

/**
 * Result of checking a cached value, shaped like zod's `safeParse`.
 */
export type DecodeResult<T> = { success: true; data: T } | { success: false };

const defaultNow: NowFn = () => Date.now();

export const DEFAULT_CACHE_CAPACITY = 50;

/**
 * Options for a `TtlLruCache` instance.
 */
export interface TtlLruCacheOptions {
  /** Maximum number of entries. Defaults to 50. */
  capacity?: number;

  /**
   * Time source override used in tests.
   *
   * Defaults to `Date.now`.
   */
  now?: NowFn;
}

/**
 * In-memory cache with a global LRU bound and read-time TTLs.
 *
 * The TTL is passed to `get` rather than stored with the entry, so datasets
 * with different freshness requirements can share one instance. Stale entries
 * are removed lazily, on the read that finds them stale.
 *
 * All methods are synchronous: on Node's single thread each call runs to
 * completion before another can observe the map or the counters.
 */
export class TtlLruCache {
  readonly capacity: number;
  private readonly store = new Map<string, CacheEntry<unknown>>();
  private readonly now: NowFn;
  private hits = 0;
  private misses = 0;
  private clears = 0;

  constructor(options: TtlLruCacheOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_CACHE_CAPACITY;
    if (!Number.isInteger(capacity) || capacity <= 0) {
      throw new RangeError(`Cache capacity must be a positive integer, got ${capacity}`);
    }
    this.capacity = capacity;
    this.now = options.now ?? defaultNow;
  }

  /**
   * Incremented by every `clear()`. Lets callers tell whether a value they
   * started loading belongs to the cache as it is now.
   */
  get generation(): number {
    return this.clears;
  }

  get(key: string, ttlSeconds: number): unknown {
    const entry = this.fresh(key, ttlSeconds);
    if (!entry) {
      this.misses += 1;
      return undefined;
    }
    this.touch(key, entry);
    this.hits += 1;
    return entry.value;
  }

  /**
   * Like `get`, but only a value accepted by `decode` counts as a hit. A
   * rejected value is dropped and counted as a miss.
   */
  getDecoded<T>(
    key: string,
    ttlSeconds: number,
    decode: (value: unknown) => DecodeResult<T>,
  ): T | undefined {
    const entry = this.fresh(key, ttlSeconds);
    if (entry) {
      const decoded = decode(entry.value);
      if (decoded.success) {
        this.touch(key, entry);
        this.hits += 1;
        return decoded.data;
      }
      this.store.delete(key);
    }
    this.misses += 1;
    return undefined;
  }

  set(key: string, value: unknown): void {
    this.store.delete(key);
    this.store.set(key, { value, storedAt: this.now() });

    while (this.store.size > this.capacity) {
      const oldest = this.store.keys().next();
      if (oldest.done) break;
      this.store.delete(oldest.value);
    }
  }

  clear(): void {
    this.store.clear();
    this.hits = 0;
    this.misses = 0;
    this.clears += 1;
  }

  stats(): CacheStats {
    const total = this.hits + this.misses;
    const hitRate = total > 0 ? (this.hits / total) * 100 : 0;

    return {
      size: this.store.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: `${hitRate.toFixed(1)}%`,
      keys: [...this.store.keys()],
    };
  }

  private fresh(key: string, ttlSeconds: number): CacheEntry<unknown> | undefined {
    const entry = this.store.get(key);
    if (!entry) return undefined;

    const ageSeconds = (this.now() - entry.storedAt) / 1000;
    if (ageSeconds > ttlSeconds) {
      this.store.delete(key);
      return undefined;
    }
    return entry;
  }

  // Map iteration order is insertion order; re-inserting marks most recent.
  private touch(key: string, entry: CacheEntry<unknown>): void {
    this.store.delete(key);
    this.store.set(key, entry);
  }
}
