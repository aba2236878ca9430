import type { LocationProvider } from '@aurora-mcp/core';

import type { GeoProviderConfig } from './base.js';
import { IpapiProvider } from './providers/ipapi.js';
import { IpwhoisProvider } from './providers/ipwhois.js';
import { MockLocationProvider } from './providers/mock.js';

export const PROVIDER_IDS = ['ipapi', 'ipwhois', 'mock'] as const;

export type ProviderId = (typeof PROVIDER_IDS)[number];

export const DEFAULT_PROVIDER_CHAIN: readonly ProviderId[] = ['ipapi', 'ipwhois'];

export function isProviderId(value: string): value is ProviderId {
  return PROVIDER_IDS.some((id) => id === value);
}

/**
 * Create one provider adapter from its id.
 *
 * - `ipapi` / `ipwhois`: direct HTTP calls
 * - `mock`: fixed location, for offline runs
 */
export function createLocationProvider(id: ProviderId, config: GeoProviderConfig = {}): LocationProvider {
  switch (id) {
    case 'ipapi':
      return new IpapiProvider(config);
    case 'ipwhois':
      return new IpwhoisProvider(config);
    case 'mock':
      return new MockLocationProvider();
  }
}

/**
 * Create the ordered provider chain. Unknown ids are rejected.
 */
export function createLocationProviders(
  ids: readonly string[] = DEFAULT_PROVIDER_CHAIN,
  config: GeoProviderConfig = {},
): LocationProvider[] {
  return ids.map((id) => {
    if (!isProviderId(id)) {
      throw new Error(`Unknown location provider "${id}". Expected one of: ${PROVIDER_IDS.join(', ')}`);
    }
    return createLocationProvider(id, config);
  });
}
