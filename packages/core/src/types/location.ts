/**
 * A validated latitude/longitude pair in decimal degrees.
 */
export interface Coordinate {
  /** Latitude in degrees, within [-90, 90]. */
  readonly latitude: number;

  /** Longitude in degrees, within [-180, 180]. */
  readonly longitude: number;
}

/**
 * Location reported by an IP geolocation provider.
 *
 * Text fields are `"Unknown"` when the provider omitted them.
 */
export interface IpLocation {
  coordinate: Coordinate;
  city: string;
  region: string;
  country: string;
}

/**
 * Where a resolved coordinate came from.
 */
export type LocationSource = 'user' | 'ip';

/**
 * Result of `LocationResolver.resolve`.
 */
export interface ResolvedLocation {
  coordinate: Coordinate;

  /** Human-readable label: `"64.84°, -147.72°"` or `"City, Region, Country"`. */
  displayName: string;

  source: LocationSource;

  /** Set when the caller's input was adjusted, e.g. partial coordinates ignored. */
  note?: string;

  /** The provider record, present only for `source: 'ip'`. */
  rawIpRecord?: IpLocation;
}

/**
 * A single IP geolocation backend.
 *
 * `lookup` either resolves to a location or rejects; the resolver treats any
 * rejection as "try the next provider".
 */
export interface LocationProvider {
  /** Short identifier used as the prefix of failure reasons (e.g. `ipapi.co`). */
  readonly name: string;

  lookup(): Promise<IpLocation>;
}
