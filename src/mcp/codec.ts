/**
 * JSON-RPC line codec — one JSON document per line.
 */

import { RpcError } from './errors.js';
import {
  JSON_RPC_ERRORS,
  type JsonRpcId,
  type JsonRpcRequest,
  type JsonRpcResponse,
} from './types.js';

export type DecodedLine =
  | { kind: 'request'; request: JsonRpcRequest }
  | { kind: 'error'; id: JsonRpcId; error: RpcError };

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isJsonRpcId(value: unknown): value is JsonRpcId {
  return value === null || typeof value === 'string' || typeof value === 'number';
}

/**
 * Decode a single line. Malformed JSON is a parse error with a null id;
 * well-formed JSON that is not a request is an invalid request, keeping
 * the id when one can be recovered.
 */
export function decodeLine(line: string): DecodedLine {
  let message: unknown;
  try {
    message = JSON.parse(line);
  } catch (err) {
    return {
      kind: 'error',
      id: null,
      error: new RpcError(
        JSON_RPC_ERRORS.PARSE_ERROR,
        'Parse error',
        err instanceof Error ? err.message : String(err),
      ),
    };
  }

  if (!isObject(message)) {
    const detail = Array.isArray(message) ? 'batch requests are not supported' : 'request must be an object';
    return invalidRequest(null, detail);
  }

  const { method, params, jsonrpc } = message;
  let id: JsonRpcId | undefined;
  if ('id' in message) {
    const rawId = message.id;
    if (!isJsonRpcId(rawId)) {
      return invalidRequest(null, 'id must be a string, number or null');
    }
    id = rawId;
  }

  // A missing version is read as 2.0; only a different one is rejected.
  if (jsonrpc !== undefined && jsonrpc !== '2.0') {
    return invalidRequest(id ?? null, 'jsonrpc must be "2.0"');
  }
  if (typeof method !== 'string' || method.length === 0) {
    return invalidRequest(id ?? null, 'method must be a non-empty string');
  }

  const request: JsonRpcRequest = { jsonrpc: '2.0', method };
  if (id !== undefined) request.id = id;
  if (params !== undefined) request.params = params;

  return { kind: 'request', request };
}

function invalidRequest(id: JsonRpcId, detail: string): DecodedLine {
  return {
    kind: 'error',
    id,
    error: new RpcError(JSON_RPC_ERRORS.INVALID_REQUEST, 'Invalid Request', detail),
  };
}

export function encodeResponse(response: JsonRpcResponse): string {
  return JSON.stringify(response) + '\n';
}

export function errorResponse(id: JsonRpcId, error: RpcError): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: error.toJSON() };
}
