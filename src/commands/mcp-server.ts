/**
 * MCP Server command — serves the calculator tools via stdin/stdout JSON-RPC.
 *
 * Configure in an editor or agent (e.g. mcp.json):
 * { "calculator": { "command": "reckon-mcp", "args": ["serve"] } }
 */

import { loadConfig } from '../config/config.js';
import { MCPServer } from '../mcp/server.js';
import { runStdioServer } from '../mcp/stdio-transport.js';
import { encodeResponse, errorResponse } from '../mcp/codec.js';
import { toRpcError } from '../mcp/errors.js';
import * as log from '../utils/logger.js';

export interface ServeOptions {
  version: string;
  debug?: boolean;
  logLevel?: log.LogLevel;
  requireInitialize?: boolean;
}

export function cliOverrides(opts: ServeOptions): Record<string, unknown> {
  const level = opts.debug ? 'debug' : opts.logLevel;
  return {
    ...(level ? { logging: { level } } : {}),
    ...(opts.requireInitialize ? { server: { requireInitialize: true } } : {}),
  };
}

export async function startMcpServer(opts: ServeOptions): Promise<void> {
  const config = await loadConfig(cliOverrides(opts), {
    defaults: { server: { version: opts.version } },
  });
  log.setLogLevel(config.logging.level);

  const server = new MCPServer(config.server);

  // Last resort: tell the client something went wrong before dying.
  process.on('uncaughtException', (err) => {
    log.error('Uncaught exception', err);
    process.stdout.write(encodeResponse(errorResponse(null, toRpcError(err))), () => process.exit(1));
  });

  const ac = new AbortController();
  process.on('SIGINT', () => ac.abort());
  process.on('SIGTERM', () => ac.abort());

  log.info(`${config.server.name} ${config.server.version} started with ${server.getToolCount()} tools: ${server.getToolNames().join(', ')}`);
  if (config.server.requireInitialize) {
    log.info('Strict initialization: tools are rejected until initialize succeeds');
  }

  await runStdioServer(server, { signal: ac.signal });
}
