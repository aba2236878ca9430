import { EventEmitter } from 'node:events';

import { snapshotDataset } from '../datasets.js';
import { nearestProbability } from '../grid/nearest.js';
import type { Coordinate } from '../types/location.js';
import type { AuroraSnapshot, KpReading } from '../types/spaceWeather.js';
import type { TtlLruCache } from '../utils/cache.js';
import { readThroughWithSource } from '../utils/readThrough.js';

/**
 * The datasets a forecaster needs. `SpaceWeatherClient` satisfies this.
 */
export interface AuroraDataSource {
  fetchAuroraGrid(): Promise<unknown>;
  fetchKpIndex(): Promise<KpReading[]>;
}

export interface AuroraForecasterOptions {
  cache: TtlLruCache;
  source: AuroraDataSource;
}

/**
 * Last element of the series as published; no ordering is assumed.
 */
export function latestKp(series: readonly KpReading[]): string | number {
  const last = series[series.length - 1];
  return last ? last.kp : 'Unknown';
}

/**
 * Combines the OVATION grid and the Kp series into a per-location snapshot.
 *
 * Snapshots are cached per 0.5° cell. A cached snapshot keeps the coordinate
 * of the request that created it, so nearby callers may see a slightly
 * different coordinate than they asked for.
 *
 * Emits `snapshot:hit` / `snapshot:miss` with the cache key. A call that waits
 * on another caller's in-flight load for the same cell reports a miss.
 */
export class AuroraForecaster extends EventEmitter {
  private readonly cache: TtlLruCache;
  private readonly source: AuroraDataSource;

  constructor(options: AuroraForecasterOptions) {
    super();
    this.cache = options.cache;
    this.source = options.source;
  }

  async snapshot(coordinate: Coordinate): Promise<AuroraSnapshot> {
    const dataset = snapshotDataset(coordinate);

    const { value: snapshot, source: origin } = await readThroughWithSource(this.cache, dataset, async () => {
      const grid = await this.source.fetchAuroraGrid();
      const series = await this.source.fetchKpIndex();
      return {
        probability: nearestProbability(coordinate, grid),
        kpIndex: latestKp(series),
        coordinate: { latitude: coordinate.latitude, longitude: coordinate.longitude },
      };
    });

    this.emit(origin === 'cache' ? 'snapshot:hit' : 'snapshot:miss', dataset.key);
    return snapshot;
  }
}
