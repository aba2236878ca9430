import {
  ENLIL_DATASET,
  KP_INDEX_DATASET,
  OVATION_DATASET,
  SOLAR_PROBABILITIES_DATASET,
  kpSeriesSchema,
} from '../datasets.js';
import { NetworkError } from '../errors.js';
import type { Dataset } from '../types/cache.js';
import type { KpReading } from '../types/spaceWeather.js';
import type { TtlLruCache } from '../utils/cache.js';
import { type FetchLike, fetchJson } from '../utils/http.js';
import { readThrough } from '../utils/readThrough.js';

export const DEFAULT_NOAA_BASE_URL = 'https://services.swpc.noaa.gov/json';

const DEFAULT_TIMEOUT_MS = 10_000;
const ENLIL_TIMEOUT_MS = 15_000;

export interface SpaceWeatherClientOptions {
  cache: TtlLruCache;

  /** Override for mirrors and tests. Defaults to the SWPC JSON service. */
  baseUrl?: string;

  fetch?: FetchLike;
}

interface DatasetSource<T> {
  dataset: Dataset<T>;
  path: string;
  label: string;
  timeoutMs: number;
}

const SOURCES = {
  ovation: {
    dataset: OVATION_DATASET,
    path: 'ovation_aurora_latest.json',
    label: 'OVATION data',
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  kpIndex: {
    dataset: KP_INDEX_DATASET,
    path: 'planetary_k_index_1m.json',
    label: 'Kp index',
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
  enlil: {
    dataset: ENLIL_DATASET,
    path: 'enlil_time_series.json',
    label: 'ENLIL data',
    timeoutMs: ENLIL_TIMEOUT_MS,
  },
  solarProbabilities: {
    dataset: SOLAR_PROBABILITIES_DATASET,
    path: 'solar_probabilities.json',
    label: 'solar probabilities',
    timeoutMs: DEFAULT_TIMEOUT_MS,
  },
} satisfies Record<string, DatasetSource<unknown>>;

/**
 * NOAA Space Weather Prediction Center datasets, each cached under its own TTL.
 *
 * Payloads are passed through mostly unprocessed; only the Kp series is
 * checked record by record. Failures become `NetworkError` and are not retried.
 */
export class SpaceWeatherClient {
  private readonly cache: TtlLruCache;
  private readonly baseUrl: string;
  private readonly fetchImpl: FetchLike | undefined;

  constructor(options: SpaceWeatherClientOptions) {
    this.cache = options.cache;
    this.baseUrl = (options.baseUrl ?? DEFAULT_NOAA_BASE_URL).replace(/\/$/, '');
    this.fetchImpl = options.fetch;
  }

  /** OVATION aurora probability grid (`{ coordinates: [[lon, lat, p], ...] }`). */
  async fetchAuroraGrid(): Promise<unknown> {
    return await this.load(SOURCES.ovation, (body) => body);
  }

  /** 1-minute planetary K-index series, oldest first as published. */
  async fetchKpIndex(): Promise<KpReading[]> {
    return await this.load(SOURCES.kpIndex, (body) => kpSeriesSchema.parse(body));
  }

  /** ENLIL solar wind model time series. */
  async fetchSolarWind(): Promise<unknown[]> {
    return await this.load(SOURCES.enlil, (body) => {
      if (!Array.isArray(body)) throw new Error('expected a JSON array');
      return body;
    });
  }

  /** Solar flare probabilities. */
  async fetchFlareProbabilities(): Promise<unknown> {
    return await this.load(SOURCES.solarProbabilities, (body) => body);
  }

  private async load<T>(source: DatasetSource<T>, decode: (body: unknown) => T): Promise<T> {
    return await readThrough(this.cache, source.dataset, async () => {
      try {
        const res = await fetchJson(`${this.baseUrl}/${source.path}`, {
          timeoutMs: source.timeoutMs,
          fetch: this.fetchImpl,
        });
        if (!res.ok) throw new Error(`HTTP ${res.status}`);
        return decode(res.body);
      } catch (error) {
        throw new NetworkError(source.label, error);
      }
    });
  }
}
