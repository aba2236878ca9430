import type { JsonResponse } from '@aurora-mcp/core';
import { z } from 'zod';

import { BaseLocationProvider, toIpLocation, type ProviderOutcome } from '../base.js';

const ipwhoisResponseSchema = z.object({
  success: z.boolean().optional(),
  message: z.string().optional(),
  latitude: z.number().min(-90).max(90).nullish(),
  longitude: z.number().min(-180).max(180).nullish(),
  city: z.string().nullish(),
  region: z.string().nullish(),
  country: z.string().nullish(),
});

/**
 * ipwho.is: free, no key. The `fields` query trims the payload to what we use.
 *
 * Failures are reported in the body as `{ "success": false, "message": "..." }`,
 * often with a 200 status.
 */
export class IpwhoisProvider extends BaseLocationProvider {
  readonly name = 'ipwho.is';
  protected readonly defaultUrl =
    'https://ipwho.is/?fields=success,message,latitude,longitude,city,region,country';

  protected interpret(response: JsonResponse): ProviderOutcome {
    const parsed = ipwhoisResponseSchema.safeParse(response.body);
    const data = parsed.success ? parsed.data : undefined;

    if (data?.success === false) {
      return { ok: false, reason: data.message ?? 'error' };
    }

    if (data && typeof data.latitude === 'number' && typeof data.longitude === 'number') {
      return {
        ok: true,
        location: toIpLocation({
          latitude: data.latitude,
          longitude: data.longitude,
          city: data.city,
          region: data.region,
          country: data.country,
        }),
      };
    }

    return { ok: false, reason: `unexpected response (status=${response.status})` };
  }
}
