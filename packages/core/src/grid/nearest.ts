import type { Coordinate } from '../types/location.js';
import type { GridPoint } from '../types/spaceWeather.js';

function isGridPoint(value: unknown): value is GridPoint {
  return (
    Array.isArray(value) &&
    value.length >= 3 &&
    typeof value[0] === 'number' &&
    typeof value[1] === 'number' &&
    typeof value[2] === 'number' &&
    Number.isFinite(value[0]) &&
    Number.isFinite(value[1]) &&
    Number.isFinite(value[2])
  );
}

/**
 * Return the probability of the grid point closest to `coordinate`.
 *
 * `grid` is the raw OVATION document (`{ coordinates: [[lon, lat, p], ...] }`).
 * Distance is Euclidean in degree space. The first point at the minimum
 * distance wins. Anything that is not a usable grid yields `0`.
 */
export function nearestProbability(coordinate: Coordinate, grid: unknown): number {
  if (grid === null || typeof grid !== 'object' || !('coordinates' in grid)) return 0;

  const points = grid.coordinates;
  if (!Array.isArray(points)) return 0;

  let minDistance = Number.POSITIVE_INFINITY;
  let nearest = 0;

  for (const point of points) {
    if (!isGridPoint(point)) continue;
    const [lon, lat, probability] = point;
    const distance = Math.hypot(coordinate.latitude - lat, coordinate.longitude - lon);
    if (distance < minDistance) {
      minDistance = distance;
      nearest = probability;
    }
  }

  return nearest;
}
