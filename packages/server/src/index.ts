export { createAuroraContext } from './context.js';
export type { AuroraContext, AuroraContextOverrides } from './context.js';
export { createAuroraServer, serveStdio, SERVER_NAME, SERVER_VERSION } from './server.js';
export { callTool, createToolHandlers, toolDefinitions, toTextResult } from './tools.js';
export type { ToolExecutor } from './tools.js';
export * from './format.js';
export * from './lib/config.js';
export { attachLogging, stderrLog } from './lib/logging.js';
export type { LogFn } from './lib/logging.js';
