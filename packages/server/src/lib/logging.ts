import type { AuroraContext } from '../context.js';

export type LogFn = (message: string) => void;

/**
 * Write `[aurora-mcp] ...` lines to stderr. stdout is reserved for the MCP protocol.
 */
export const stderrLog: LogFn = (message) => {
  console.error(`[aurora-mcp] ${message}`);
};

/**
 * Forward resolver and forecaster events to `log`.
 */
export function attachLogging(context: AuroraContext, log: LogFn): void {
  context.resolver.on('provider:failure', (event: { provider: string; reason: string }) => {
    log(`location provider failed: ${event.reason}`);
  });
  context.resolver.on('provider:success', (event: { provider: string }) => {
    log(`location resolved by ${event.provider}`);
  });
  context.forecaster.on('snapshot:hit', (key: string) => {
    log(`cache hit ${key}`);
  });
  context.forecaster.on('snapshot:miss', (key: string) => {
    log(`cache miss ${key}, fetching OVATION and Kp data`);
  });
}
