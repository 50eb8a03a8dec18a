/**
 * MCP Server — dispatches JSON-RPC requests to the calculator tool table.
 *
 * Session lifecycle: uninitialized → initialized. Only `initialize` moves the
 * state; repeating it returns the first negotiated result unchanged.
 */

import type {
  JsonRpcRequest,
  JsonRpcResponse,
  MCPServerConfig,
  ServerInfo,
  InitializeResult,
  MethodKind,
  SessionState,
  ToolCallEntry,
  ToolCallRequest,
  ToolsCallResult,
  ToolsListResult,
} from './types.js';
import { DEFAULT_SERVER_CONFIG, JSON_RPC_ERRORS, METHODS } from './types.js';
import { RpcError, toRpcError } from './errors.js';
import { errorResponse } from './codec.js';
import { calculatorTools, type ToolTable } from '../calculator/tools.js';
import { ToolError } from '../calculator/errors.js';
import { formatResult } from '../calculator/operations.js';
import * as log from '../utils/logger.js';

/** Keys searched, in order, for the invocation list of a tools/call request. */
const CALL_LIST_KEYS = ['calls', 'toolCalls', 'tool_calls'] as const;

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function invalidParams(message: string): RpcError {
  return new RpcError(JSON_RPC_ERRORS.INVALID_PARAMS, 'Invalid params', message);
}

export function classifyMethod(method: string): MethodKind {
  switch (method) {
    case METHODS.INITIALIZE:
      return 'initialize';
    case METHODS.INITIALIZED:
      return 'initialized';
    case METHODS.TOOLS_LIST:
      return 'tools/list';
    case METHODS.TOOLS_CALL:
      return 'tools/call';
    default:
      return 'unknown';
  }
}

export class MCPServer {
  private readonly config: MCPServerConfig;
  private readonly tools: ToolTable;
  private state: SessionState = 'uninitialized';
  private negotiated?: InitializeResult;

  constructor(config: Partial<MCPServerConfig> = {}, tools: ToolTable = calculatorTools) {
    this.config = { ...DEFAULT_SERVER_CONFIG, ...config };
    this.tools = tools;
  }

  /**
   * Handle one decoded request. Resolves to null for notifications, which
   * are processed but never answered.
   */
  async handleRequest(request: JsonRpcRequest): Promise<JsonRpcResponse | null> {
    const id = request.id ?? null;
    log.debug(`Handling request: ${request.method}`, request);

    let response: JsonRpcResponse;
    try {
      const result = await this.processRequest(request);
      response = { jsonrpc: '2.0', id, result };
    } catch (error) {
      const rpcError = toRpcError(error);
      if (rpcError.code === JSON_RPC_ERRORS.INTERNAL_ERROR) {
        log.error(`Error handling request ${request.method}: ${String(rpcError.data)}`);
      } else {
        log.warn(`${request.method} failed: ${rpcError.message}`);
      }
      response = errorResponse(id, rpcError);
    }

    if (request.id === undefined) {
      log.debug(`Notification ${request.method} processed, no response sent`);
      return null;
    }
    return response;
  }

  private async processRequest(request: JsonRpcRequest): Promise<unknown> {
    const kind = classifyMethod(request.method);

    switch (kind) {
      case 'initialize':
        return this.handleInitialize(request.params);

      case 'initialized':
        log.info('Client confirmed initialization');
        return {};

      case 'tools/list':
        this.assertInitialized(request.method);
        return this.handleToolsList();

      case 'tools/call':
        this.assertInitialized(request.method);
        return this.handleToolsCall(request.params);

      case 'unknown':
        throw new RpcError(
          JSON_RPC_ERRORS.METHOD_NOT_FOUND,
          `Method not found: ${request.method}`,
        );

      default: {
        const unreachable: never = kind;
        throw new Error(`Unhandled method kind: ${String(unreachable)}`);
      }
    }
  }

  private assertInitialized(method: string): void {
    if (this.config.requireInitialize && this.state === 'uninitialized') {
      throw new RpcError(
        JSON_RPC_ERRORS.SERVER_NOT_INITIALIZED,
        'Server not initialized',
        `${method} requires a successful initialize first`,
      );
    }
  }

  private handleInitialize(params: unknown): InitializeResult {
    if (params !== undefined && !isObject(params)) {
      throw invalidParams('initialize params must be an object');
    }

    if (this.negotiated) {
      log.debug('Repeated initialize, returning the negotiated session');
      return this.negotiated;
    }

    const fields: Record<string, unknown> = isObject(params) ? params : {};
    const requested = fields.protocolVersion;
    const protocolVersion = typeof requested === 'string' && requested.length > 0
      ? requested
      : this.config.protocolVersion;

    const clientInfo = fields.clientInfo;
    const clientName = isObject(clientInfo) && typeof clientInfo.name === 'string'
      ? clientInfo.name
      : 'unknown client';
    log.info(`Initializing session for ${clientName} (protocol ${protocolVersion})`);

    this.negotiated = {
      protocolVersion,
      capabilities: { tools: {} },
      serverInfo: this.getServerInfo(),
    };
    this.state = 'initialized';
    return this.negotiated;
  }

  private handleToolsList(): ToolsListResult {
    return { tools: this.tools.list() };
  }

  private handleToolsCall(params: unknown): ToolsCallResult {
    const calls = extractCalls(params);
    log.debug(`Received ${calls.length} tool call(s)`);
    return { content: calls.map(call => this.runCall(call)) };
  }

  private runCall(call: ToolCallRequest): ToolCallEntry {
    const args = call.arguments === undefined ? {} : call.arguments;
    try {
      const result = this.tools.call(call.name, args);
      return { name: call.name, content: [{ type: 'text', text: formatResult(result) }] };
    } catch (error) {
      if (error instanceof ToolError) {
        log.warn(`Tool "${call.name}" failed: ${error.message}`);
        return { name: call.name, error: error.message };
      }
      const msg = error instanceof Error ? error.message : String(error);
      log.error(`Error executing tool ${call.name}: ${msg}`);
      return { name: call.name, error: `internal error: ${msg}` };
    }
  }

  getServerInfo(): ServerInfo {
    return {
      name: this.config.name,
      version: this.config.version,
    };
  }

  getState(): SessionState {
    return this.state;
  }

  isInitialized(): boolean {
    return this.state === 'initialized';
  }

  getToolCount(): number {
    return this.tools.names().length;
  }

  getToolNames(): string[] {
    return this.tools.names();
  }
}

/**
 * Pull the invocation list out of tools/call params. The first non-empty
 * list among `calls`, `toolCalls` and `tool_calls` wins; with none, a
 * single `{name, arguments}` call given directly in params is used.
 */
export function extractCalls(params: unknown): ToolCallRequest[] {
  if (!isObject(params)) {
    throw invalidParams('tools/call params must be an object');
  }

  const fields: Record<string, unknown> = params;
  const lists: Array<{ key: string; items: unknown[] }> = [];
  for (const key of CALL_LIST_KEYS) {
    const value = fields[key];
    if (value === undefined) continue;
    if (!Array.isArray(value)) {
      throw invalidParams(`${key} must be an array`);
    }
    lists.push({ key, items: value });
  }

  const chosen = lists.find(list => list.items.length > 0);
  if (chosen) {
    return chosen.items.map((item, index) => toCallRequest(item, `${chosen.key}[${index}]`));
  }
  if (typeof fields.name === 'string') {
    return [{ name: fields.name, arguments: fields.arguments }];
  }
  if (lists.length > 0) {
    return [];
  }
  throw invalidParams('tools/call params must include a calls list');
}

function toCallRequest(item: unknown, path: string): ToolCallRequest {
  if (!isObject(item) || typeof item.name !== 'string') {
    throw invalidParams(`${path} must be an object with a string name`);
  }
  return { name: item.name, arguments: item.arguments };
}
