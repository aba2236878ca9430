import { z } from 'zod';

import type { Dataset } from './types/cache.js';
import type { AuroraSnapshot, KpReading } from './types/spaceWeather.js';
import type { Coordinate, IpLocation } from './types/location.js';

/**
 * Freshness per dataset, in seconds.
 */
export const CACHE_TTL = {
  location: 3600,
  ovation: 300,
  kpIndex: 180,
  enlil: 3600,
  solarProbabilities: 3600,
  snapshot: 300,
} as const;

export const coordinateSchema: z.ZodType<Coordinate> = z.object({
  latitude: z.number(),
  longitude: z.number(),
});

export const ipLocationSchema: z.ZodType<IpLocation> = z.object({
  coordinate: coordinateSchema,
  city: z.string(),
  region: z.string(),
  country: z.string(),
});

export const kpReadingSchema: z.ZodType<KpReading, z.ZodTypeDef, unknown> = z
  .object({
    time_tag: z.string(),
    kp: z.union([z.string(), z.number()]),
    kp_index: z.number().optional(),
    estimated_kp: z.number().optional(),
  })
  .passthrough();

export const kpSeriesSchema = z.array(kpReadingSchema);

export const auroraSnapshotSchema: z.ZodType<AuroraSnapshot> = z.object({
  probability: z.number(),
  kpIndex: z.union([z.string(), z.number()]),
  coordinate: coordinateSchema,
});

export const LOCATION_DATASET: Dataset<IpLocation> = {
  key: 'user_location',
  ttlSeconds: CACHE_TTL.location,
  schema: ipLocationSchema,
};

// The grid is passed through as-is; `nearestProbability` copes with any shape.
export const OVATION_DATASET: Dataset<unknown> = {
  key: 'ovation_data',
  ttlSeconds: CACHE_TTL.ovation,
  schema: z.unknown(),
};

export const KP_INDEX_DATASET: Dataset<KpReading[]> = {
  key: 'kp_index',
  ttlSeconds: CACHE_TTL.kpIndex,
  schema: kpSeriesSchema,
};

export const ENLIL_DATASET: Dataset<unknown[]> = {
  key: 'enlil_data',
  ttlSeconds: CACHE_TTL.enlil,
  schema: z.array(z.unknown()),
};

export const SOLAR_PROBABILITIES_DATASET: Dataset<unknown> = {
  key: 'solar_probabilities',
  ttlSeconds: CACHE_TTL.solarProbabilities,
  schema: z.unknown(),
};

/**
 * Round to the nearest half degree. Exact quarter-degree ties go to the
 * neighbour whose doubled value is even (60.25 -> 60, 60.75 -> 61).
 */
export function roundToHalfDegree(value: number): number {
  const doubled = value * 2;
  const rounded = Math.round(doubled);
  const tie = Math.abs(doubled % 1) === 0.5;
  return (tie && rounded % 2 !== 0 ? rounded - 1 : rounded) / 2;
}

/**
 * Per-cell snapshot dataset. Coordinates in the same 0.5° cell share a key.
 */
export function snapshotDataset(coordinate: Coordinate): Dataset<AuroraSnapshot> {
  const lat = roundToHalfDegree(coordinate.latitude);
  const lon = roundToHalfDegree(coordinate.longitude);
  return {
    key: `aurora_${lat}_${lon}`,
    ttlSeconds: CACHE_TTL.snapshot,
    schema: auroraSnapshotSchema,
  };
}
