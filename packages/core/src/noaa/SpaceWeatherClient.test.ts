import { describe, expect, it, vi } from 'vitest';

import { NetworkError } from '../errors.js';
import { TtlLruCache } from '../utils/cache.js';
import type { FetchLike } from '../utils/http.js';

import { SpaceWeatherClient } from './SpaceWeatherClient.js';

const BASE = 'https://noaa.test/json';

function routes(table: Record<string, { status?: number; body: unknown }>) {
  return vi.fn<FetchLike>(async (url) => {
    const route = table[url];
    if (!route) throw new TypeError(`fetch failed: ${url}`);
    return new Response(JSON.stringify(route.body), { status: route.status ?? 200 });
  });
}

describe('SpaceWeatherClient', () => {
  it('fetches each dataset from its SWPC path and caches it under its own key', async () => {
    const fetch = routes({
      [`${BASE}/ovation_aurora_latest.json`]: { body: { coordinates: [[0, 0, 5]] } },
      [`${BASE}/planetary_k_index_1m.json`]: {
        body: [{ time_tag: '2026-10-18T06:00:00', kp_index: 3, kp: '3M' }],
      },
      [`${BASE}/enlil_time_series.json`]: { body: [{}, {}, {}] },
      [`${BASE}/solar_probabilities.json`]: { body: [{ c_class_1_day: 45 }] },
    });
    const cache = new TtlLruCache();
    const client = new SpaceWeatherClient({ cache, baseUrl: `${BASE}/`, fetch });

    await expect(client.fetchAuroraGrid()).resolves.toEqual({ coordinates: [[0, 0, 5]] });
    await expect(client.fetchKpIndex()).resolves.toEqual([
      { time_tag: '2026-10-18T06:00:00', kp_index: 3, kp: '3M' },
    ]);
    await expect(client.fetchSolarWind()).resolves.toHaveLength(3);
    await expect(client.fetchFlareProbabilities()).resolves.toEqual([{ c_class_1_day: 45 }]);

    await client.fetchKpIndex();

    expect(fetch).toHaveBeenCalledTimes(4);
    expect(cache.stats().keys).toEqual([
      'ovation_data',
      'enlil_data',
      'solar_probabilities',
      'kp_index',
    ]);
  });

  it.each([
    { method: 'fetchAuroraGrid', path: 'ovation_aurora_latest.json', ttl: 300 },
    { method: 'fetchKpIndex', path: 'planetary_k_index_1m.json', ttl: 180 },
    { method: 'fetchSolarWind', path: 'enlil_time_series.json', ttl: 3600 },
    { method: 'fetchFlareProbabilities', path: 'solar_probabilities.json', ttl: 3600 },
  ] as const)('$method serves its cached copy for $ttl seconds', async ({ method, path, ttl }) => {
    let now = 0;
    const fetch = routes({ [`${BASE}/${path}`]: { body: [] } });
    const client = new SpaceWeatherClient({
      cache: new TtlLruCache({ now: () => now }),
      baseUrl: BASE,
      fetch,
    });

    await client[method]();
    now = ttl * 1000;
    await client[method]();
    expect(fetch).toHaveBeenCalledTimes(1);

    now = (ttl + 1) * 1000;
    await client[method]();
    expect(fetch).toHaveBeenCalledTimes(2);
  });

  it('surfaces a non-2xx status as a NetworkError naming the dataset', async () => {
    const fetch = routes({ [`${BASE}/planetary_k_index_1m.json`]: { status: 503, body: {} } });
    const client = new SpaceWeatherClient({ cache: new TtlLruCache(), baseUrl: BASE, fetch });

    const error = await client.fetchKpIndex().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(NetworkError);
    if (error instanceof NetworkError) {
      expect(error.message).toBe('Could not fetch Kp index: HTTP 503');
      expect(error.dataset).toBe('Kp index');
    }
  });

  it('wraps transport faults and does not retry', async () => {
    const fetch = routes({});
    const cache = new TtlLruCache();
    const client = new SpaceWeatherClient({ cache, baseUrl: BASE, fetch });

    await expect(client.fetchSolarWind()).rejects.toThrow(
      `Could not fetch ENLIL data: fetch failed: ${BASE}/enlil_time_series.json`,
    );
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(cache.stats().size).toBe(0);
  });

  it('rejects a solar wind payload that is not a list', async () => {
    const fetch = routes({ [`${BASE}/enlil_time_series.json`]: { body: { oops: true } } });
    const client = new SpaceWeatherClient({ cache: new TtlLruCache(), baseUrl: BASE, fetch });

    await expect(client.fetchSolarWind()).rejects.toThrow(
      'Could not fetch ENLIL data: expected a JSON array',
    );
  });

  it('times out a stalled request', async () => {
    const fetch = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    vi.useFakeTimers();
    try {
      const client = new SpaceWeatherClient({ cache: new TtlLruCache(), baseUrl: BASE, fetch });
      const settled = client.fetchAuroraGrid().then(
        () => ({ ok: true as const }),
        (err: unknown) => ({ ok: false as const, err }),
      );
      await vi.advanceTimersByTimeAsync(10_001);

      const result = await settled;
      expect(result.ok).toBe(false);
      if (result.ok === false) {
        expect(result.err).toBeInstanceOf(NetworkError);
        expect(String(result.err)).toBe(
          'NetworkError: Could not fetch OVATION data: request timed out after 10000ms',
        );
      }
    } finally {
      vi.useRealTimers();
    }
  });
});
