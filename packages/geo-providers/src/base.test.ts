import { describe, expect, it, vi } from 'vitest';

import { LocationResolver, TtlLruCache, type FetchLike } from '@aurora-mcp/core';

import { ProviderTimeoutError, RecoverableProviderError } from './errors.js';
import { createLocationProviders } from './factory.js';
import { IpapiProvider } from './providers/ipapi.js';
import { IpwhoisProvider } from './providers/ipwhois.js';

function respondWith(body: unknown, status = 200) {
  return vi.fn<FetchLike>(async () => new Response(JSON.stringify(body), { status }));
}

describe('IpapiProvider', () => {
  it('maps a successful response', async () => {
    const fetch = respondWith({
      latitude: 69.65,
      longitude: 18.96,
      city: 'Tromsø',
      region: 'Troms',
      country_name: 'Norway',
      country: 'NO',
    });

    await expect(new IpapiProvider({ fetch }).lookup()).resolves.toEqual({
      coordinate: { latitude: 69.65, longitude: 18.96 },
      city: 'Tromsø',
      region: 'Troms',
      country: 'Norway',
    });
    expect(fetch).toHaveBeenCalledWith('https://ipapi.co/json/', expect.anything());
  });

  it('fills absent text fields with Unknown', async () => {
    const fetch = respondWith({ latitude: 1, longitude: 2, country: 'XX' });
    await expect(new IpapiProvider({ fetch }).lookup()).resolves.toEqual({
      coordinate: { latitude: 1, longitude: 2 },
      city: 'Unknown',
      region: 'Unknown',
      country: 'XX',
    });
  });

  it('keeps text fields that are present but empty', async () => {
    const fetch = respondWith({ latitude: 1, longitude: 2, city: '', region: 'R', country_name: 'C' });
    await expect(new IpapiProvider({ fetch }).lookup()).resolves.toEqual({
      coordinate: { latitude: 1, longitude: 2 },
      city: '',
      region: 'R',
      country: 'C',
    });
  });

  it('reports the explicit error payload', async () => {
    const fetch = respondWith(
      { error: true, reason: 'RateLimited', message: 'Too many requests' },
      429,
    );
    await expect(new IpapiProvider({ fetch }).lookup()).rejects.toThrow(
      'ipapi.co: RateLimited (Too many requests)',
    );
  });

  it('defaults missing error details', async () => {
    const fetch = respondWith({ error: true });
    await expect(new IpapiProvider({ fetch }).lookup()).rejects.toThrow(
      'ipapi.co: error (no message)',
    );
  });

  it('rejects coordinates that arrive with a non-200 status', async () => {
    const fetch = respondWith({ latitude: 1, longitude: 2 }, 203);
    await expect(new IpapiProvider({ fetch }).lookup()).rejects.toThrow(
      'ipapi.co: unexpected response (status=203)',
    );
  });

  it('treats a malformed body as a recoverable failure', async () => {
    const fetch = vi.fn<FetchLike>(async () => new Response('<html>busy</html>', { status: 200 }));
    const error = await new IpapiProvider({ fetch }).lookup().catch((err: unknown) => err);

    expect(error).toBeInstanceOf(RecoverableProviderError);
    expect(String(error)).toMatch(/^RecoverableProviderError: ipapi\.co: /);
  });
});

describe('IpwhoisProvider', () => {
  it('maps a successful response', async () => {
    const fetch = respondWith({
      success: true,
      latitude: 64.15,
      longitude: -21.94,
      city: 'Reykjavik',
      region: 'Capital Region',
      country: 'Iceland',
    });

    const location = await new IpwhoisProvider({ fetch }).lookup();
    expect(location.city).toBe('Reykjavik');
    expect(location.coordinate).toEqual({ latitude: 64.15, longitude: -21.94 });
  });

  it('reports the explicit failure flag even with a 200 status', async () => {
    const fetch = respondWith({ success: false, message: 'Reserved range' });
    await expect(new IpwhoisProvider({ fetch }).lookup()).rejects.toThrow(
      'ipwho.is: Reserved range',
    );
  });

  it('reports missing coordinates as an unexpected response', async () => {
    const fetch = respondWith({ success: true, city: 'Nowhere' });
    await expect(new IpwhoisProvider({ fetch }).lookup()).rejects.toThrow(
      'ipwho.is: unexpected response (status=200)',
    );
  });
});

describe('BaseLocationProvider', () => {
  it('enforces the timeout for a stalled request and does not retry', async () => {
    const fetch = vi.fn<FetchLike>(
      (_url, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        }),
    );

    vi.useFakeTimers();
    try {
      const provider = new IpwhoisProvider({ fetch, timeoutMs: 50 });
      const settled = provider.lookup().then(
        () => ({ ok: true as const }),
        (err: unknown) => ({ ok: false as const, err }),
      );
      await vi.advanceTimersByTimeAsync(60);

      const result = await settled;
      expect(result.ok).toBe(false);
      if (result.ok === false) {
        expect(result.err).toBeInstanceOf(ProviderTimeoutError);
        expect(String(result.err)).toBe(
          'ProviderTimeoutError: ipwho.is: request timed out after 50ms',
        );
      }
      expect(fetch).toHaveBeenCalledTimes(1);
    } finally {
      vi.useRealTimers();
    }
  });
});

describe('provider chain', () => {
  it('falls back from ipapi.co to ipwho.is', async () => {
    const fetch = vi.fn<FetchLike>(async (url) =>
      url.startsWith('https://ipapi.co')
        ? new Response(JSON.stringify({ error: true, reason: 'RateLimited', message: 'slow down' }), {
            status: 429,
          })
        : new Response(
            JSON.stringify({ success: true, latitude: 60.17, longitude: 24.94, country: 'Finland' }),
            { status: 200 },
          ),
    );
    const resolver = new LocationResolver({
      cache: new TtlLruCache(),
      providers: createLocationProviders(['ipapi', 'ipwhois'], { fetch }),
    });
    const failures: string[] = [];
    resolver.on('provider:failure', (event: { reason: string }) => failures.push(event.reason));

    const resolved = await resolver.resolve();

    expect(resolved.displayName).toBe('Unknown, Unknown, Finland');
    expect(resolved.coordinate).toEqual({ latitude: 60.17, longitude: 24.94 });
    expect(failures).toEqual(['ipapi.co: RateLimited (slow down)']);
  });

  it('joins both reasons when every provider fails', async () => {
    const fetch = vi.fn<FetchLike>(async (url) =>
      url.startsWith('https://ipapi.co')
        ? new Response(JSON.stringify({}), { status: 500 })
        : new Response(JSON.stringify({ success: false, message: 'Invalid IP address' })),
    );
    const resolver = new LocationResolver({
      cache: new TtlLruCache(),
      providers: createLocationProviders(undefined, { fetch }),
    });

    await expect(resolver.resolve()).rejects.toThrow(
      'Could not determine location from IP. ipapi.co: unexpected response (status=500); ipwho.is: Invalid IP address',
    );
  });
});

describe('createLocationProviders', () => {
  it('builds the chain in the given order', () => {
    expect(createLocationProviders(['ipwhois', 'mock', 'ipapi']).map((p) => p.name)).toEqual([
      'ipwho.is',
      'mock',
      'ipapi.co',
    ]);
  });

  it('rejects unknown provider ids', () => {
    expect(() => createLocationProviders(['geoip'])).toThrow('Unknown location provider "geoip"');
  });
});
