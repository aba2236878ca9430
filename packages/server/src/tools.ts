import type { CallToolResult, Tool } from '@modelcontextprotocol/sdk/types.js';
import { describeError } from '@aurora-mcp/core';
import { z } from 'zod';

import type { AuroraContext } from './context.js';
import {
  formatAuroraForecast,
  formatAuroraPrediction,
  formatCacheStats,
  formatIpLocation,
  formatKpIndex,
} from './format.js';

export type ToolExecutor = (args: Record<string, unknown>) => Promise<CallToolResult>;

export function toTextResult(text: string, isError = false): CallToolResult {
  return { content: [{ type: 'text', text }], ...(isError ? { isError: true } : {}) };
}

function formatZodIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'arguments'}: ${issue.message}`)
    .join('; ');
}

function parseArguments<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, args: unknown): T {
  const result = schema.safeParse(args);
  if (!result.success) throw new Error(formatZodIssues(result.error));
  return result.data;
}

// `null` counts as "not provided". Range checks stay with the resolver so that
// out-of-range input reports the same error everywhere.
const optionalDegrees = z
  .number()
  .nullish()
  .transform((value) => value ?? undefined);

const coordinateArguments = z.object({
  latitude: optionalDegrees,
  longitude: optionalDegrees,
});

const predictionArguments = coordinateArguments.extend({
  hours_ahead: z.number().int().positive().default(24),
});

const noArguments = z.object({});

const coordinateProperties = {
  latitude: {
    type: 'number',
    minimum: -90,
    maximum: 90,
    description: 'Latitude in degrees (-90 to 90). Must be provided with longitude.',
  },
  longitude: {
    type: 'number',
    minimum: -180,
    maximum: 180,
    description: 'Longitude in degrees (-180 to 180). Must be provided with latitude.',
  },
} as const;

const emptyInputSchema: Tool['inputSchema'] = { type: 'object', properties: {} };

export const toolDefinitions: Tool[] = [
  {
    name: 'get_aurora_forecast',
    description:
      'Get aurora forecast using provided coordinates, or IP-based location fallback.',
    inputSchema: { type: 'object', properties: coordinateProperties },
  },
  {
    name: 'get_aurora_forecast_auto',
    description: 'Get aurora forecast for your current location (detected from IP).',
    inputSchema: emptyInputSchema,
  },
  {
    name: 'get_current_kp_index',
    description: 'Get current planetary K-index (geomagnetic activity level).',
    inputSchema: emptyInputSchema,
  },
  {
    name: 'get_aurora_prediction',
    description: 'Get aurora predictions for the next 24-48 hours.',
    inputSchema: {
      type: 'object',
      properties: {
        ...coordinateProperties,
        hours_ahead: {
          type: 'integer',
          minimum: 1,
          default: 24,
          description: 'How many hours ahead to predict.',
        },
      },
    },
  },
  {
    name: 'verify_my_location',
    description: 'Check what location was detected from your IP address.',
    inputSchema: emptyInputSchema,
  },
  {
    name: 'get_cache_stats',
    description: 'Show cache statistics including hit rate and current size.',
    inputSchema: emptyInputSchema,
  },
  {
    name: 'clear_cache',
    description: 'Clear all cached data to force fresh data fetch.',
    inputSchema: emptyInputSchema,
  },
];

/**
 * Tool implementations keyed by tool name. Handlers throw on failure; the
 * dispatcher in `server.ts` turns errors into MCP error results.
 */
export function createToolHandlers(context: AuroraContext): Record<string, ToolExecutor> {
  const { cache, client, forecaster, resolver } = context;

  const forecast = async (latitude?: number, longitude?: number): Promise<CallToolResult> => {
    const location = await resolver.resolve(latitude, longitude);
    const snapshot = await forecaster.snapshot(location.coordinate);
    return toTextResult(formatAuroraForecast(location, snapshot));
  };

  return {
    get_aurora_forecast: async (args) => {
      const { latitude, longitude } = parseArguments(coordinateArguments, args);
      return await forecast(latitude, longitude);
    },

    get_aurora_forecast_auto: async (args) => {
      parseArguments(noArguments, args);
      return await forecast();
    },

    get_current_kp_index: async () => {
      const series = await client.fetchKpIndex();
      const latest = series[series.length - 1];
      if (!latest) throw new Error('NOAA returned an empty Kp index series');
      return toTextResult(formatKpIndex(latest));
    },

    get_aurora_prediction: async (args) => {
      const { latitude, longitude, hours_ahead } = parseArguments(predictionArguments, args);
      const location = await resolver.resolve(latitude, longitude);
      const solarWind = await client.fetchSolarWind();
      // Loaded so the data is warm in the cache; not rendered yet.
      await client.fetchFlareProbabilities();
      return toTextResult(formatAuroraPrediction(location, solarWind, hours_ahead));
    },

    verify_my_location: async () => {
      return toTextResult(formatIpLocation(await resolver.lookupIp()));
    },

    get_cache_stats: async () => toTextResult(formatCacheStats(cache.stats())),

    clear_cache: async () => {
      cache.clear();
      return toTextResult('Cache cleared. Next requests will fetch fresh data from NOAA.');
    },
  };
}

/**
 * Run one tool by name, converting failures into an error result.
 */
export async function callTool(
  handlers: Record<string, ToolExecutor>,
  name: string,
  args: Record<string, unknown>,
): Promise<CallToolResult> {
  const handler = handlers[name];
  if (!handler) return toTextResult(`Unknown tool: ${name}`, true);

  try {
    return await handler(args);
  } catch (error) {
    return toTextResult(`Tool '${name}' failed: ${describeError(error)}`, true);
  }
}
