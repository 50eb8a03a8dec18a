/**
 * MCP (Model Context Protocol) types
 *
 * The subset of JSON-RPC 2.0 and MCP shapes spoken by the calculator server.
 */

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  /** Absent for notifications. */
  id?: JsonRpcId;
  method: string;
  params?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcError;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export interface JsonRpcError {
  code: number;
  message: string;
  data?: unknown;
}

export const JSON_RPC_ERRORS = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  SERVER_NOT_INITIALIZED: -32002,
} as const;

export type JsonRpcErrorCode = typeof JSON_RPC_ERRORS[keyof typeof JSON_RPC_ERRORS];

export interface ServerInfo {
  name: string;
  version: string;
}

export interface Capabilities {
  tools?: {
    listChanged?: boolean;
  };
}

export interface InitializeResult {
  protocolVersion: string;
  capabilities: Capabilities;
  serverInfo: ServerInfo;
}

export interface Tool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
}

export interface ToolInputSchema {
  type: 'object';
  properties?: Record<string, ToolProperty>;
  required?: string[];
  additionalProperties?: boolean;
}

export interface ToolProperty {
  type: string;
  description?: string;
}

export interface ToolCallRequest {
  name: string;
  arguments?: unknown;
}

export interface TextContent {
  type: 'text';
  text: string;
}

export interface ToolCallSuccess {
  name: string;
  content: TextContent[];
}

export interface ToolCallFailure {
  name: string;
  error: string;
}

export type ToolCallEntry = ToolCallSuccess | ToolCallFailure;

export interface ToolsCallResult {
  content: ToolCallEntry[];
}

export interface ToolsListResult {
  tools: Tool[];
}

export type SessionState = 'uninitialized' | 'initialized';

export const METHODS = {
  INITIALIZE: 'initialize',
  INITIALIZED: 'notifications/initialized',
  TOOLS_LIST: 'tools/list',
  TOOLS_CALL: 'tools/call',
} as const;

export type MethodKind =
  | 'initialize'
  | 'initialized'
  | 'tools/list'
  | 'tools/call'
  | 'unknown';

export interface MCPServerConfig {
  name: string;
  version: string;
  /** Used when the client's initialize names no protocol version. */
  protocolVersion: string;
  requireInitialize: boolean;
}

export const DEFAULT_SERVER_CONFIG: MCPServerConfig = {
  name: 'reckon-mcp',
  version: '0.1.0',
  protocolVersion: '2024-11-05',
  requireInitialize: false,
};
