import type { IpLocation, LocationProvider } from '@aurora-mcp/core';

import { RecoverableProviderError } from '../errors.js';

export const MOCK_LOCATION: IpLocation = {
  coordinate: { latitude: 64.84, longitude: -147.72 },
  city: 'Fairbanks',
  region: 'Alaska',
  country: 'United States',
};

export interface MockProviderConfig {
  name?: string;

  /** Location to return. Defaults to `MOCK_LOCATION`. */
  location?: IpLocation;

  /** When set, every lookup fails with this reason instead. */
  failWith?: string;
}

/**
 * Deterministic provider for tests and offline runs. No network access.
 */
export class MockLocationProvider implements LocationProvider {
  readonly name: string;
  private readonly config: MockProviderConfig;
  private calls = 0;

  constructor(config: MockProviderConfig = {}) {
    this.config = config;
    this.name = config.name ?? 'mock';
  }

  /** Number of lookups performed so far. */
  get lookups(): number {
    return this.calls;
  }

  async lookup(): Promise<IpLocation> {
    this.calls += 1;
    if (this.config.failWith !== undefined) {
      throw new RecoverableProviderError(this.name, this.config.failWith);
    }
    return this.config.location ?? MOCK_LOCATION;
  }
}
