import {
  AuroraForecaster,
  LocationResolver,
  SpaceWeatherClient,
  TtlLruCache,
  type FetchLike,
  type LocationProvider,
} from '@aurora-mcp/core';
import { createLocationProviders } from '@aurora-mcp/geo-providers';

import type { AuroraConfig } from './lib/config.js';

/**
 * Everything the tools need, sharing one process-wide cache.
 */
export interface AuroraContext {
  cache: TtlLruCache;
  resolver: LocationResolver;
  client: SpaceWeatherClient;
  forecaster: AuroraForecaster;
}

export interface AuroraContextOverrides {
  /** `fetch` used for NOAA and the HTTP providers. */
  fetch?: FetchLike;

  /** Replaces the provider chain built from `config.providers`. */
  providers?: LocationProvider[];

  now?: () => number;
}

export function createAuroraContext(
  config: AuroraConfig,
  overrides: AuroraContextOverrides = {},
): AuroraContext {
  const cache = new TtlLruCache({ capacity: config.cacheSize, now: overrides.now });
  const providers =
    overrides.providers ??
    createLocationProviders(config.providers, {
      timeoutMs: config.providerTimeoutMs,
      fetch: overrides.fetch,
    });

  const client = new SpaceWeatherClient({
    cache,
    baseUrl: config.noaaBaseUrl,
    fetch: overrides.fetch,
  });

  return {
    cache,
    resolver: new LocationResolver({ cache, providers }),
    client,
    forecaster: new AuroraForecaster({ cache, source: client }),
  };
}
