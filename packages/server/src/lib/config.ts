import { existsSync, readFileSync } from 'node:fs';
import path from 'node:path';
import { pathToFileURL } from 'node:url';

import { DEFAULT_CACHE_CAPACITY, DEFAULT_NOAA_BASE_URL } from '@aurora-mcp/core';
import { DEFAULT_PROVIDER_CHAIN, PROVIDER_IDS } from '@aurora-mcp/geo-providers';
import { z } from 'zod';

/**
 * Config file names (searched upwards from cwd).
 */
export const CONFIG_FILES = ['.aurorarc.json', 'aurora-mcp.config.js'] as const;

export const configFileSchema = z
  .object({
    /** Maximum number of cache entries. */
    cacheSize: z.number().int().positive().optional(),

    /** Geolocation providers in the order they are tried. */
    providers: z.array(z.enum(PROVIDER_IDS)).optional(),

    /** Per-request timeout for geolocation providers, in milliseconds. */
    providerTimeoutMs: z.number().int().positive().optional(),

    /** NOAA SWPC JSON service root. */
    noaaBaseUrl: z.string().url().optional(),

    /** Log cache and provider activity to stderr. */
    verbose: z.boolean().optional(),
  })
  .strict();

/**
 * Settings as they may appear in a config file, the environment or CLI flags.
 */
export type AuroraConfigFile = z.infer<typeof configFileSchema>;

/**
 * Fully resolved settings.
 */
export type AuroraConfig = Required<AuroraConfigFile>;

export const DEFAULT_CONFIG: AuroraConfig = {
  cacheSize: DEFAULT_CACHE_CAPACITY,
  providers: [...DEFAULT_PROVIDER_CHAIN],
  providerTimeoutMs: 5_000,
  noaaBaseUrl: DEFAULT_NOAA_BASE_URL,
  verbose: false,
};

/**
 * Find a config file by walking up from the starting directory.
 */
export function findConfigFile(startDir: string): string | null {
  let dir = path.resolve(startDir);
  while (true) {
    for (const name of CONFIG_FILES) {
      const full = path.join(dir, name);
      if (existsSync(full)) return full;
    }
    const parent = path.dirname(dir);
    if (parent === dir) return null;
    dir = parent;
  }
}

/**
 * Load and validate a config file. Supports:
 * - `.aurorarc.json`
 * - `aurora-mcp.config.js` (default export or module.exports)
 */
export async function loadConfigFile(filePath: string): Promise<AuroraConfigFile> {
  let raw: unknown = {};

  if (filePath.endsWith('.json')) {
    raw = JSON.parse(readFileSync(filePath, 'utf8'));
  } else if (filePath.endsWith('.js')) {
    const mod: { default?: unknown } = await import(pathToFileURL(filePath).href);
    raw = mod.default ?? mod;
  }

  const parsed = configFileSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid config file ${filePath}: ${issues}`);
  }
  return parsed.data;
}

/**
 * Read overrides from `AURORA_*` environment variables.
 */
export function configFromEnv(env: NodeJS.ProcessEnv): AuroraConfigFile {
  const config: AuroraConfigFile = {};

  if (env.AURORA_CACHE_SIZE) {
    config.cacheSize = configFileSchema.shape.cacheSize.parse(Number(env.AURORA_CACHE_SIZE));
  }
  if (env.AURORA_PROVIDERS) {
    config.providers = configFileSchema.shape.providers.parse(
      env.AURORA_PROVIDERS.split(',')
        .map((id) => id.trim())
        .filter((id) => id.length > 0),
    );
  }
  if (env.AURORA_VERBOSE) {
    config.verbose = env.AURORA_VERBOSE === '1' || env.AURORA_VERBOSE.toLowerCase() === 'true';
  }

  return config;
}

/**
 * Merge config objects with precedence: base < overrides.
 *
 * `undefined` values in `overrides` do not erase values from `base`.
 */
export function mergeConfig<T extends AuroraConfigFile>(base: T, overrides: AuroraConfigFile): T {
  const merged = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) Object.assign(merged, { [key]: value });
  }
  return merged;
}
