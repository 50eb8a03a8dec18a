/**
 * Tool-level failures. Their messages are reported inline in a tools/call
 * batch and never become JSON-RPC errors.
 */

export class ToolError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ToolError';
  }
}

export class UnknownToolError extends ToolError {
  constructor(readonly toolName: string) {
    super('unknown tool');
    this.name = 'UnknownToolError';
  }
}

export class InvalidArgumentsError extends ToolError {
  constructor(readonly detail: string) {
    super(`invalid arguments: ${detail}`);
    this.name = 'InvalidArgumentsError';
  }
}

export class DivisionByZeroError extends ToolError {
  constructor() {
    super('division by zero');
    this.name = 'DivisionByZeroError';
  }
}

export class ResultOutOfRangeError extends ToolError {
  constructor() {
    super('result out of range');
    this.name = 'ResultOutOfRangeError';
  }
}
