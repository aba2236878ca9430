import { describe, expect, it } from 'vitest';

import { TtlLruCache } from './cache.js';

function clock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (seconds: number) => {
      now += seconds * 1000;
    },
  };
}

describe('TtlLruCache', () => {
  it('keeps only the most recently inserted keys, evicting oldest first', () => {
    const cache = new TtlLruCache({ capacity: 3 });
    for (const key of ['a', 'b', 'c', 'd', 'e']) cache.set(key, key.toUpperCase());

    expect(cache.stats().keys).toEqual(['c', 'd', 'e']);
    expect(cache.get('a', 60)).toBeUndefined();
    expect(cache.get('e', 60)).toBe('E');
  });

  it('moves an entry to the most recent position when read', () => {
    const cache = new TtlLruCache({ capacity: 2 });
    cache.set('a', 1);
    cache.set('b', 2);

    expect(cache.get('a', 60)).toBe(1);
    cache.set('c', 3);

    expect(cache.stats().keys).toEqual(['a', 'c']);
  });

  it('resets recency when an existing key is overwritten', () => {
    const cache = new TtlLruCache({ capacity: 2 });
    cache.set('a', 1);
    cache.set('b', 2);
    cache.set('a', 10);
    cache.set('c', 3);

    expect(cache.stats().keys).toEqual(['a', 'c']);
    expect(cache.get('a', 60)).toBe(10);
  });

  it('evicts a stale entry on read even if a longer ttl would accept a fresh write', () => {
    const time = clock();
    const cache = new TtlLruCache({ capacity: 5, now: time.now });
    cache.set('kp', [1, 2]);
    cache.set('grid', { coordinates: [] });

    time.advance(181);
    expect(cache.get('kp', 180)).toBeUndefined();

    const stats = cache.stats();
    expect(stats.size).toBe(1);
    expect(stats.keys).toEqual(['grid']);
    expect(cache.get('kp', 3600)).toBeUndefined();
  });

  it('serves an entry exactly at its ttl', () => {
    const time = clock();
    const cache = new TtlLruCache({ now: time.now });
    cache.set('k', 'v');
    time.advance(300);

    expect(cache.get('k', 300)).toBe('v');
  });

  it('lets different readers apply different ttls to the same entry', () => {
    const time = clock();
    const cache = new TtlLruCache({ now: time.now });
    cache.set('k', 'v');
    time.advance(200);

    expect(cache.get('k', 3600)).toBe('v');
    expect(cache.get('k', 100)).toBeUndefined();
  });

  it('reports hit rate with one decimal', () => {
    const cache = new TtlLruCache();
    cache.set('a', 1);
    cache.get('a', 60);
    cache.get('a', 60);
    cache.get('missing', 60);

    expect(cache.stats()).toEqual({
      size: 1,
      capacity: 50,
      hits: 2,
      misses: 1,
      hitRate: '66.7%',
      keys: ['a'],
    });
  });

  it('reports 0.0% before any request', () => {
    expect(new TtlLruCache().stats().hitRate).toBe('0.0%');
  });

  it('clears entries and counters', () => {
    const cache = new TtlLruCache();
    cache.set('a', 1);
    cache.get('a', 60);
    cache.get('b', 60);
    cache.clear();

    expect(cache.stats()).toMatchObject({ size: 0, hits: 0, misses: 0, hitRate: '0.0%', keys: [] });
  });

  it('counts a value rejected by the decoder as a miss and drops it', () => {
    const cache = new TtlLruCache();
    cache.set('n', 'seven');
    cache.set('m', 7);
    const decodeNumber = (value: unknown) =>
      typeof value === 'number' ? { success: true as const, data: value } : { success: false as const };

    expect(cache.getDecoded('n', 60, decodeNumber)).toBeUndefined();
    expect(cache.getDecoded('m', 60, decodeNumber)).toBe(7);
    expect(cache.stats()).toMatchObject({ hits: 1, misses: 1, keys: ['m'] });
  });

  it('bumps the generation on every clear', () => {
    const cache = new TtlLruCache();
    expect(cache.generation).toBe(0);
    cache.clear();
    cache.clear();
    expect(cache.generation).toBe(2);
  });

  it('rejects a non-positive capacity', () => {
    expect(() => new TtlLruCache({ capacity: 0 })).toThrow(RangeError);
    expect(() => new TtlLruCache({ capacity: 1.5 })).toThrow(RangeError);
  });
});
