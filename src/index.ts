#!/usr/bin/env node
/**
 * reckon-mcp — calculator tools over the Model Context Protocol
 *
 * Entry point: commander-based CLI with subcommands.
 */

import { createRequire } from 'node:module';
import { Command, Option } from 'commander';
import { z } from 'zod';
import { startMcpServer } from './commands/mcp-server.js';
import { printTools } from './commands/tools.js';
import type { LogLevel } from './utils/logger.js';

const require = createRequire(import.meta.url);
const { version } = z.object({ version: z.string() }).parse(require('../package.json'));

const program = new Command();

program
  .name('reckon-mcp')
  .description('Arithmetic tools for AI agents, served as MCP over stdio')
  .version(version);

program
  .command('serve', { isDefault: true })
  .description('Start MCP server (JSON-RPC over stdio)')
  .option('-d, --debug', 'Enable debug logging')
  .addOption(new Option('--log-level <level>', 'Log level').choices(['debug', 'info', 'warn', 'error']))
  .option('--require-initialize', 'Reject tools/list and tools/call until initialize succeeds')
  .action(async (opts: { debug?: boolean; logLevel?: LogLevel; requireInitialize?: boolean }) => {
    await startMcpServer({ version, ...opts });
  });

program
  .command('tools')
  .description('Print the tool table as JSON')
  .action(() => {
    printTools();
  });

program.parseAsync().catch((err) => {
  console.error('Fatal:', err instanceof Error ? err.message : String(err));
  process.exit(1);
});
