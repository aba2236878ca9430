import type { ZodType, ZodTypeDef } from 'zod';

/**
 * Cache entry wrapper. Private to `TtlLruCache`.
 */
export interface CacheEntry<T> {
  /** Cached value. */
  value: T;

  /** Write timestamp in milliseconds since epoch. */
  storedAt: number;
}

/**
 * Point-in-time cache statistics.
 */
export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;

  /** `hits / (hits + misses)` as a percentage with one decimal, e.g. `"66.7%"`. */
  hitRate: string;

  /** Keys from least to most recently used. */
  keys: string[];
}

/**
 * Describes one cached dataset: where it lives, how long it stays fresh and
 * what shape a cached value must have to be served.
 */
export interface Dataset<T> {
  key: string;
  ttlSeconds: number;
  schema: ZodType<T, ZodTypeDef, unknown>;
}
