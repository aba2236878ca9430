#!/usr/bin/env -S npx tsx
import path from 'node:path';

import type { CallToolResult } from '@modelcontextprotocol/sdk/types.js';
import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';

import { createAuroraContext } from './context.js';
import {
  DEFAULT_CONFIG,
  configFileSchema,
  configFromEnv,
  findConfigFile,
  loadConfigFile,
  mergeConfig,
  type AuroraConfig,
  type AuroraConfigFile,
} from './lib/config.js';
import { attachLogging, stderrLog } from './lib/logging.js';
import { SERVER_VERSION, serveStdio } from './server.js';
import { callTool, createToolHandlers } from './tools.js';

type GlobalOptions = {
  config?: string;
  cacheSize?: number;
  providers?: string;
  verbose?: boolean;
};

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (!Number.isFinite(parsed)) throw new InvalidArgumentError('Not a number.');
  return parsed;
}

function parsePositiveInt(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

async function loadSettings(options: GlobalOptions): Promise<AuroraConfig> {
  const cwd = process.cwd();
  const cfgPath = options.config ? path.resolve(cwd, options.config) : findConfigFile(cwd);
  const fromFile = cfgPath ? await loadConfigFile(cfgPath) : {};

  const fromFlags: AuroraConfigFile = {
    cacheSize: options.cacheSize,
    providers: options.providers
      ? configFileSchema.shape.providers.parse(options.providers.split(',').map((id) => id.trim()))
      : undefined,
    verbose: options.verbose,
  };

  const fromEnv = configFromEnv(process.env);
  return mergeConfig(mergeConfig(mergeConfig(DEFAULT_CONFIG, fromFile), fromEnv), fromFlags);
}

function resultText(result: CallToolResult): string {
  return result.content
    .map((item) => (item.type === 'text' ? item.text : ''))
    .filter((text) => text.length > 0)
    .join('\n');
}

async function runTool(
  program: Command,
  name: string,
  args: Record<string, unknown>,
  label: string,
): Promise<void> {
  const config = await loadSettings(program.opts<GlobalOptions>());
  const context = createAuroraContext(config);
  if (config.verbose) attachLogging(context, stderrLog);

  const spinner = ora({ text: label, stream: process.stderr }).start();
  const result = await callTool(createToolHandlers(context), name, args);

  if (result.isError) {
    spinner.fail();
    console.error(resultText(result));
    process.exitCode = 1;
    return;
  }

  spinner.stop();
  process.stdout.write(resultText(result) + '\n');
}

async function main(): Promise<void> {
  const program = new Command();
  program
    .name('aurora-mcp')
    .description('Aurora and space-weather forecasts over the Model Context Protocol')
    .version(SERVER_VERSION)
    .option('--config <file>', 'Path to a .aurorarc.json config file')
    .option('--cache-size <n>', 'Maximum number of cache entries', parsePositiveInt)
    .option('--providers <list>', 'Comma-separated geolocation providers: ipapi,ipwhois,mock')
    .option('--verbose', 'Log cache and provider activity to stderr');

  program
    .command('serve', { isDefault: true })
    .description('Start the MCP server on stdio')
    .action(async () => {
      const config = await loadSettings(program.opts<GlobalOptions>());
      const context = createAuroraContext(config);
      if (config.verbose) attachLogging(context, stderrLog);
      await serveStdio(context);
      stderrLog('server running on stdio');
    });

  program
    .command('forecast')
    .description('Aurora probability and Kp index for a location')
    .option('--lat <degrees>', 'Latitude (-90 to 90)', parseNumber)
    .option('--lon <degrees>', 'Longitude (-180 to 180)', parseNumber)
    .action(async (opts: { lat?: number; lon?: number }) => {
      await runTool(
        program,
        'get_aurora_forecast',
        { latitude: opts.lat, longitude: opts.lon },
        'Fetching aurora forecast...',
      );
    });

  program
    .command('prediction')
    .description('Solar wind outlook for a location')
    .option('--lat <degrees>', 'Latitude (-90 to 90)', parseNumber)
    .option('--lon <degrees>', 'Longitude (-180 to 180)', parseNumber)
    .option('--hours <n>', 'Hours ahead', parsePositiveInt, 24)
    .action(async (opts: { lat?: number; lon?: number; hours: number }) => {
      await runTool(
        program,
        'get_aurora_prediction',
        { latitude: opts.lat, longitude: opts.lon, hours_ahead: opts.hours },
        'Fetching solar wind data...',
      );
    });

  program
    .command('kp')
    .description('Current planetary K-index')
    .action(async () => {
      await runTool(program, 'get_current_kp_index', {}, 'Fetching Kp index...');
    });

  program
    .command('location')
    .description('Location detected from your IP address')
    .action(async () => {
      await runTool(program, 'verify_my_location', {}, 'Looking up IP location...');
    });

  await program.parseAsync(process.argv);
}

main().catch((err: unknown) => {
  stderrLog(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
