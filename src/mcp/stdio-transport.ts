/**
 * MCP Stdio Transport — JSONL over stdin/stdout.
 * One request per line in, one response per line out, strictly in order.
 */

import { createInterface } from 'node:readline';
import type { MCPServer } from './server.js';
import type { JsonRpcResponse } from './types.js';
import { decodeLine, encodeResponse, errorResponse } from './codec.js';
import { toRpcError } from './errors.js';
import * as log from '../utils/logger.js';

export interface StdioTransportOptions {
  input?: NodeJS.ReadableStream;
  output?: NodeJS.WritableStream;
  /** Aborting closes the reader; the loop then resolves like end of input. */
  signal?: AbortSignal;
}

/**
 * Serve requests until the input ends. Rejects only when a response cannot
 * be written, since nothing could reach the client after that.
 */
export async function runStdioServer(
  server: MCPServer,
  options: StdioTransportOptions = {},
): Promise<void> {
  const input = options.input ?? process.stdin;
  const output = options.output ?? process.stdout;
  const rl = createInterface({ input, crlfDelay: Infinity });

  const onAbort = (): void => rl.close();
  options.signal?.addEventListener('abort', onAbort, { once: true });

  try {
    for await (const line of rl) {
      const trimmed = line.trim();
      if (!trimmed) continue;

      let response: JsonRpcResponse | null;
      try {
        response = await handleLine(server, trimmed);
      } catch (err) {
        log.error('Unexpected error while handling a line', err);
        response = errorResponse(null, toRpcError(err));
      }

      if (response) {
        await writeMessage(output, response);
      }
    }
  } finally {
    options.signal?.removeEventListener('abort', onAbort);
    rl.close();
  }

  log.info('Input closed, stdio transport stopped');
}

/** Decode and dispatch one non-blank line; null means nothing is sent back. */
export async function handleLine(server: MCPServer, line: string): Promise<JsonRpcResponse | null> {
  const decoded = decodeLine(line);
  if (decoded.kind === 'error') {
    log.warn(`Rejected input: ${decoded.error.message} (${String(decoded.error.data)})`);
    return errorResponse(decoded.id, decoded.error);
  }
  return server.handleRequest(decoded.request);
}

/** Write one newline-terminated message and wait until the stream accepts it. */
export function writeMessage(output: NodeJS.WritableStream, response: JsonRpcResponse): Promise<void> {
  return new Promise((resolve, reject) => {
    output.write(encodeResponse(response), (err?: Error | null) => {
      if (err) reject(err);
      else resolve();
    });
  });
}
