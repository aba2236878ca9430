import type { Dataset } from '../types/cache.js';

import type { TtlLruCache } from './cache.js';

interface PendingLoad {
  /** `cache.generation` when the load started. */
  generation: number;
  promise: Promise<unknown>;
}

const pendingByCache = new WeakMap<TtlLruCache, Map<string, PendingLoad>>();

function pendingLoads(cache: TtlLruCache): Map<string, PendingLoad> {
  let pending = pendingByCache.get(cache);
  if (!pending) {
    pending = new Map();
    pendingByCache.set(cache, pending);
  }
  return pending;
}

/**
 * Where a read-through value came from.
 *
 * - `cache`: a fresh cached value
 * - `load`: this call ran `load`
 * - `shared`: this call waited on a `load` started by a concurrent caller
 */
export type ReadSource = 'cache' | 'load' | 'shared';

export interface ReadResult<T> {
  value: T;
  source: ReadSource;
}

/**
 * `readThrough`, also reporting whether the value came from the cache.
 */
export async function readThroughWithSource<T>(
  cache: TtlLruCache,
  dataset: Dataset<T>,
  load: () => Promise<T>,
): Promise<ReadResult<T>> {
  const cached = cache.getDecoded(dataset.key, dataset.ttlSeconds, (value) =>
    dataset.schema.safeParse(value),
  );
  if (cached !== undefined) return { value: cached, source: 'cache' };

  const pending = pendingLoads(cache);
  const shared = pending.get(dataset.key);
  if (shared && shared.generation === cache.generation) {
    const parsed = dataset.schema.safeParse(await shared.promise);
    if (parsed.success) return { value: parsed.data, source: 'shared' };
  }

  const generation = cache.generation;
  const promise = load().then((value) => {
    // A clear() while loading means the caller gets the value but the cache does not.
    if (cache.generation === generation) cache.set(dataset.key, value);
    return value;
  });
  const entry: PendingLoad = { generation, promise };
  pending.set(dataset.key, entry);

  try {
    return { value: await promise, source: 'load' };
  } finally {
    if (pending.get(dataset.key) === entry) pending.delete(dataset.key);
  }
}

/**
 * Serve `dataset` from `cache`, calling `load` on a miss and storing its result.
 *
 * - A cached value is only served if it matches `dataset.schema`; one that
 *   does not is dropped and counted as a miss.
 * - A rejected `load` stores nothing and the rejection reaches every caller
 *   waiting on it.
 * - Concurrent misses on the same key share one `load` call.
 * - A load still running when the cache is cleared is not written back.
 */
export async function readThrough<T>(
  cache: TtlLruCache,
  dataset: Dataset<T>,
  load: () => Promise<T>,
): Promise<T> {
  const { value } = await readThroughWithSource(cache, dataset, load);
  return value;
}
