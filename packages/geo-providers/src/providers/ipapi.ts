import type { JsonResponse } from '@aurora-mcp/core';
import { z } from 'zod';

import { BaseLocationProvider, toIpLocation, type ProviderOutcome } from '../base.js';

const ipapiResponseSchema = z.object({
  latitude: z.number().min(-90).max(90).nullish(),
  longitude: z.number().min(-180).max(180).nullish(),
  city: z.string().nullish(),
  region: z.string().nullish(),
  country_name: z.string().nullish(),
  country: z.string().nullish(),
  error: z.boolean().optional(),
  reason: z.string().optional(),
  message: z.string().optional(),
});

/**
 * ipapi.co: free tier, no key, rate-limits aggressively.
 *
 * Errors arrive as `{ "error": true, "reason": "RateLimited", "message": "..." }`.
 */
export class IpapiProvider extends BaseLocationProvider {
  readonly name = 'ipapi.co';
  protected readonly defaultUrl = 'https://ipapi.co/json/';

  protected interpret(response: JsonResponse): ProviderOutcome {
    const parsed = ipapiResponseSchema.safeParse(response.body);
    const data = parsed.success ? parsed.data : undefined;

    if (response.status === 200 && data && typeof data.latitude === 'number' && typeof data.longitude === 'number') {
      return {
        ok: true,
        location: toIpLocation({
          latitude: data.latitude,
          longitude: data.longitude,
          city: data.city,
          region: data.region,
          country: data.country_name ?? data.country,
        }),
      };
    }

    if (data?.error === true) {
      return {
        ok: false,
        reason: `${data.reason ?? 'error'} (${data.message ?? 'no message'})`,
      };
    }

    return { ok: false, reason: `unexpected response (status=${response.status})` };
  }
}
