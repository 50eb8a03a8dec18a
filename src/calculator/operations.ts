import { DivisionByZeroError, ResultOutOfRangeError } from './errors.js';

export const OPERATION_TAGS = ['add', 'subtract', 'multiply', 'divide'] as const;

export type OperationTag = typeof OPERATION_TAGS[number];

/**
 * Apply a binary operation. Throws DivisionByZeroError for `divide` with a
 * zero divisor and ResultOutOfRangeError when the result overflows to
 * ±Infinity.
 */
export function applyOperation(op: OperationTag, a: number, b: number): number {
  const result = compute(op, a, b);
  if (!Number.isFinite(result)) {
    throw new ResultOutOfRangeError();
  }
  return result;
}

function compute(op: OperationTag, a: number, b: number): number {
  switch (op) {
    case 'add':
      return a + b;
    case 'subtract':
      return a - b;
    case 'multiply':
      return a * b;
    case 'divide':
      if (b === 0) throw new DivisionByZeroError();
      return a / b;
    default: {
      const unreachable: never = op;
      throw new Error(`Unhandled operation: ${String(unreachable)}`);
    }
  }
}

/** Render a result as tool text: 42 / 7 gives "6", never "6.0". */
export function formatResult(value: number): string {
  return String(value);
}
