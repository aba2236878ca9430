import { EventEmitter } from 'node:events';

import { LOCATION_DATASET } from '../datasets.js';
import { LocationUnavailableError, ValidationError, describeError } from '../errors.js';
import type { Coordinate, IpLocation, LocationProvider, ResolvedLocation } from '../types/location.js';
import type { TtlLruCache } from '../utils/cache.js';
import { readThrough } from '../utils/readThrough.js';

export const PARTIAL_COORDINATES_NOTE =
  'Only one coordinate was provided; falling back to IP-based location.';

/**
 * Throw a `ValidationError` unless both values are within bounds.
 *
 * Latitude is checked first. `NaN` fails both checks.
 */
export function validateCoordinate(latitude: number, longitude: number): Coordinate {
  if (!(latitude >= -90 && latitude <= 90)) {
    throw new ValidationError('Latitude must be between -90 and 90');
  }
  if (!(longitude >= -180 && longitude <= 180)) {
    throw new ValidationError('Longitude must be between -180 and 180');
  }
  return { latitude, longitude };
}

export interface LocationResolverOptions {
  cache: TtlLruCache;

  /** Providers in the order they are tried. */
  providers: readonly LocationProvider[];
}

/**
 * Turns optional user coordinates into one authoritative location.
 *
 * Emits:
 * - `provider:failure` `{ provider, reason }` for every provider that failed
 * - `provider:success` `{ provider }` for the provider that answered
 */
export class LocationResolver extends EventEmitter {
  private readonly cache: TtlLruCache;
  private readonly providers: readonly LocationProvider[];

  constructor(options: LocationResolverOptions) {
    super();
    this.cache = options.cache;
    this.providers = options.providers;
  }

  /**
   * Use the caller's coordinates when both are given, otherwise the IP location.
   *
   * A lone latitude or longitude is ignored and reported through `note`.
   */
  async resolve(latitude?: number, longitude?: number): Promise<ResolvedLocation> {
    const hasLat = latitude !== undefined;
    const hasLon = longitude !== undefined;

    if (latitude !== undefined && longitude !== undefined) {
      const coordinate = validateCoordinate(latitude, longitude);
      return {
        coordinate,
        displayName: `${latitude.toFixed(2)}°, ${longitude.toFixed(2)}°`,
        source: 'user',
      };
    }

    const note = hasLat !== hasLon ? PARTIAL_COORDINATES_NOTE : undefined;
    const location = await this.lookupIp();

    const resolved: ResolvedLocation = {
      coordinate: location.coordinate,
      displayName: `${location.city}, ${location.region}, ${location.country}`,
      source: 'ip',
      rawIpRecord: location,
    };
    if (note) resolved.note = note;
    return resolved;
  }

  /**
   * Location of this process's public IP, cached for an hour.
   */
  async lookupIp(): Promise<IpLocation> {
    return await readThrough(this.cache, LOCATION_DATASET, () => this.queryProviders());
  }

  private async queryProviders(): Promise<IpLocation> {
    const failures: string[] = [];

    for (const provider of this.providers) {
      try {
        const location = await provider.lookup();
        this.emit('provider:success', { provider: provider.name });
        return location;
      } catch (error) {
        const reason = describeError(error);
        const entry = reason.startsWith(`${provider.name}:`) ? reason : `${provider.name}: ${reason}`;
        failures.push(entry);
        this.emit('provider:failure', { provider: provider.name, reason: entry });
      }
    }

    throw new LocationUnavailableError(failures);
  }
}
