import type { Coordinate } from './location.js';

/**
 * One OVATION grid sample: `[longitude, latitude, probability]`.
 */
export type GridPoint = readonly [longitude: number, latitude: number, probability: number];

/**
 * One record of the NOAA 1-minute planetary K-index series.
 *
 * Only `time_tag` and `kp` are relied upon; other fields pass through.
 */
export interface KpReading {
  time_tag: string;
  kp: string | number;
  kp_index?: number;
  estimated_kp?: number;
}

/**
 * Cached aurora conditions for one 0.5° cell.
 */
export interface AuroraSnapshot {
  /** Aurora probability (0..100) at the nearest grid point. */
  probability: number;

  /** Latest Kp value, or `"Unknown"` when the series was empty. */
  kpIndex: string | number;

  /** Coordinate of the request that populated the cache entry. */
  coordinate: Coordinate;
}
