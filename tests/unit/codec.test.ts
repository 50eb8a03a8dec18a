import { describe, it, expect } from 'vitest';
import { decodeLine, encodeResponse, errorResponse } from '../../src/mcp/codec.js';
import { RpcError } from '../../src/mcp/errors.js';
import { JSON_RPC_ERRORS } from '../../src/mcp/types.js';

describe('decodeLine', () => {
  it('should decode a request', () => {
    const decoded = decodeLine('{"jsonrpc":"2.0","id":7,"method":"tools/list","params":{}}');
    expect(decoded).toEqual({
      kind: 'request',
      request: { jsonrpc: '2.0', id: 7, method: 'tools/list', params: {} },
    });
  });

  it('should decode a notification without an id', () => {
    const decoded = decodeLine('{"jsonrpc":"2.0","method":"notifications/initialized"}');
    expect(decoded.kind).toBe('request');
    if (decoded.kind === 'request') {
      expect('id' in decoded.request).toBe(false);
      expect(decoded.request.params).toBeUndefined();
    }
  });

  it('should keep string and null ids', () => {
    const withString = decodeLine('{"jsonrpc":"2.0","id":"abc","method":"x"}');
    const withNull = decodeLine('{"jsonrpc":"2.0","id":null,"method":"x"}');
    expect(withString.kind === 'request' && withString.request.id).toBe('abc');
    expect(withNull.kind === 'request' && withNull.request.id).toBeNull();
  });

  it('should report malformed JSON as a parse error with a null id', () => {
    const decoded = decodeLine('{"jsonrpc":"2.0","id":1,');
    expect(decoded.kind).toBe('error');
    if (decoded.kind === 'error') {
      expect(decoded.id).toBeNull();
      expect(decoded.error.code).toBe(JSON_RPC_ERRORS.PARSE_ERROR);
      expect(decoded.error.message).toBe('Parse error');
    }
  });

  it('should reject a missing method and keep the id', () => {
    const decoded = decodeLine('{"jsonrpc":"2.0","id":3}');
    expect(decoded).toMatchObject({ kind: 'error', id: 3 });
    if (decoded.kind === 'error') {
      expect(decoded.error.code).toBe(JSON_RPC_ERRORS.INVALID_REQUEST);
      expect(decoded.error.data).toBe('method must be a non-empty string');
    }
  });

  it('should read a missing jsonrpc field as 2.0', () => {
    expect(decodeLine('{"id":2,"method":"tools/list"}')).toEqual({
      kind: 'request',
      request: { jsonrpc: '2.0', id: 2, method: 'tools/list' },
    });
  });

  it('should reject a wrong jsonrpc version', () => {
    const decoded = decodeLine('{"jsonrpc":"1.0","id":"a","method":"initialize"}');
    expect(decoded).toMatchObject({ kind: 'error', id: 'a' });
    if (decoded.kind === 'error') {
      expect(decoded.error.data).toBe('jsonrpc must be "2.0"');
    }
  });

  it('should reject non-object messages with a null id', () => {
    for (const line of ['[1,2]', '42', '"hello"', 'null']) {
      const decoded = decodeLine(line);
      expect(decoded).toMatchObject({ kind: 'error', id: null });
      if (decoded.kind === 'error') {
        expect(decoded.error.code).toBe(JSON_RPC_ERRORS.INVALID_REQUEST);
      }
    }
  });

  it('should reject an id of the wrong type', () => {
    const decoded = decodeLine('{"jsonrpc":"2.0","id":{"n":1},"method":"tools/list"}');
    expect(decoded).toMatchObject({ kind: 'error', id: null });
  });
});

describe('encodeResponse', () => {
  it('should write one JSON document terminated by a newline', () => {
    const line = encodeResponse({ jsonrpc: '2.0', id: 1, result: { ok: true } });
    expect(line).toBe('{"jsonrpc":"2.0","id":1,"result":{"ok":true}}\n');
  });

  it('should omit data when an error carries none', () => {
    const response = errorResponse(5, new RpcError(JSON_RPC_ERRORS.METHOD_NOT_FOUND, 'Method not found: x'));
    expect(encodeResponse(response)).toBe(
      '{"jsonrpc":"2.0","id":5,"error":{"code":-32601,"message":"Method not found: x"}}\n',
    );
  });
});
