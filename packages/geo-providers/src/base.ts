import {
  RequestTimeoutError,
  describeError,
  fetchJson,
  type FetchLike,
  type IpLocation,
  type JsonResponse,
  type LocationProvider,
} from '@aurora-mcp/core';

import { ProviderTimeoutError, RecoverableProviderError } from './errors.js';

const DEFAULT_TIMEOUT_MS = 5_000;

/**
 * Settings shared by every HTTP-backed provider.
 */
export interface GeoProviderConfig {
  /** Per-request timeout in milliseconds. Defaults to 5s. */
  timeoutMs?: number;

  /** Endpoint override for proxies and tests. */
  url?: string;

  /** `fetch` implementation. Defaults to the global `fetch`. */
  fetch?: FetchLike;
}

/**
 * What a provider made of one HTTP response.
 */
export type ProviderOutcome = { ok: true; location: IpLocation } | { ok: false; reason: string };

/**
 * Build an `IpLocation`, filling absent text fields with `"Unknown"`.
 */
export function toIpLocation(fields: {
  latitude: number;
  longitude: number;
  city?: string | null;
  region?: string | null;
  country?: string | null;
}): IpLocation {
  return {
    coordinate: { latitude: fields.latitude, longitude: fields.longitude },
    city: fields.city ?? 'Unknown',
    region: fields.region ?? 'Unknown',
    country: fields.country ?? 'Unknown',
  };
}

/**
 * Base implementation shared by all HTTP providers.
 *
 * - Timeout: per request via `timeoutMs` (default 5s)
 * - No retry: a failed call rejects once and the chain moves on
 * - Errors: every failure is a `RecoverableProviderError` prefixed with `name`
 */
export abstract class BaseLocationProvider implements LocationProvider {
  abstract readonly name: string;
  protected readonly config: GeoProviderConfig;
  private readonly timeoutMs: number;

  constructor(config: GeoProviderConfig = {}) {
    this.config = config;
    this.timeoutMs = config.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  }

  /** Endpoint used when `config.url` is not set. */
  protected abstract readonly defaultUrl: string;

  /**
   * Implemented by concrete providers to decide whether a decoded response
   * carries a usable location.
   */
  protected abstract interpret(response: JsonResponse): ProviderOutcome;

  async lookup(): Promise<IpLocation> {
    let response: JsonResponse;
    try {
      response = await fetchJson(this.config.url ?? this.defaultUrl, {
        timeoutMs: this.timeoutMs,
        fetch: this.config.fetch,
      });
    } catch (error) {
      if (error instanceof RequestTimeoutError) {
        throw new ProviderTimeoutError(this.name, this.timeoutMs);
      }
      throw new RecoverableProviderError(this.name, describeError(error), { cause: error });
    }

    const outcome = this.interpret(response);
    if (!outcome.ok) throw new RecoverableProviderError(this.name, outcome.reason);
    return outcome.location;
  }
}
