export * from './types/index.js';
export * from './errors.js';
export * from './datasets.js';
export { TtlLruCache, DEFAULT_CACHE_CAPACITY } from './utils/cache.js';
export type { DecodeResult, TtlLruCacheOptions } from './utils/cache.js';
export { readThrough, readThroughWithSource } from './utils/readThrough.js';
export type { ReadResult, ReadSource } from './utils/readThrough.js';
export { fetchJson, RequestTimeoutError } from './utils/http.js';
export type { FetchJsonOptions, FetchLike, JsonResponse } from './utils/http.js';
export { nearestProbability } from './grid/nearest.js';
export {
  LocationResolver,
  PARTIAL_COORDINATES_NOTE,
  validateCoordinate,
} from './location/LocationResolver.js';
export type { LocationResolverOptions } from './location/LocationResolver.js';
export { SpaceWeatherClient, DEFAULT_NOAA_BASE_URL } from './noaa/SpaceWeatherClient.js';
export type { SpaceWeatherClientOptions } from './noaa/SpaceWeatherClient.js';
export { AuroraForecaster, latestKp } from './forecast/AuroraForecaster.js';
export type { AuroraDataSource, AuroraForecasterOptions } from './forecast/AuroraForecaster.js';
