import { JSON_RPC_ERRORS, type JsonRpcError, type JsonRpcErrorCode } from './types.js';

/** A protocol-level failure that becomes a top-level JSON-RPC error. */
export class RpcError extends Error {
  constructor(
    readonly code: JsonRpcErrorCode,
    message: string,
    readonly data?: unknown,
  ) {
    super(message);
    this.name = 'RpcError';
  }

  toJSON(): JsonRpcError {
    return this.data === undefined
      ? { code: this.code, message: this.message }
      : { code: this.code, message: this.message, data: this.data };
  }
}

export function toRpcError(error: unknown): RpcError {
  if (error instanceof RpcError) {
    return error;
  }
  return new RpcError(
    JSON_RPC_ERRORS.INTERNAL_ERROR,
    'Internal error',
    error instanceof Error ? error.message : String(error),
  );
}
