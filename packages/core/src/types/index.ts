/**
 * Public type exports for `@aurora-mcp/core`.
 *
 * Keep this file as the single place to export types so consumers can import
 * from the package root without reaching into internal paths.
 */
export * from './cache.js';
export * from './location.js';
export * from './spaceWeather.js';
