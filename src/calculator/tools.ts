/**
 * Calculator tool table — the fixed set of tools advertised over MCP.
 * Built once at load and frozen; declaration order is the tools/list order.
 */

import type { Tool } from '../mcp/types.js';
import { UnknownToolError } from './errors.js';
import { applyOperation, type OperationTag } from './operations.js';
import { validateBinaryArguments } from './validator.js';
import * as log from '../utils/logger.js';

interface ToolEntry {
  readonly definition: Readonly<Tool>;
  readonly operation: OperationTag;
}

function defineTool(
  operation: OperationTag,
  description: string,
  aDescription: string,
  bDescription: string,
): ToolEntry {
  const definition: Tool = {
    name: operation,
    description,
    inputSchema: {
      type: 'object',
      properties: {
        a: { type: 'number', description: aDescription },
        b: { type: 'number', description: bDescription },
      },
      required: ['a', 'b'],
      additionalProperties: false,
    },
  };
  return Object.freeze({ definition: deepFreeze(definition), operation });
}

function deepFreeze<T extends object>(value: T): T {
  const children: unknown[] = Object.values(value);
  for (const child of children) {
    if (typeof child === 'object' && child !== null) deepFreeze(child);
  }
  return Object.freeze(value);
}

const ENTRIES: readonly ToolEntry[] = Object.freeze([
  defineTool('add', 'Add two numbers', 'First number', 'Second number'),
  defineTool('subtract', 'Subtract second number from first', 'First number', 'Second number'),
  defineTool('multiply', 'Multiply two numbers', 'First number', 'Second number'),
  defineTool('divide', 'Divide first number by second', 'Numerator', 'Denominator'),
]);

const TOOL_TABLE: ReadonlyMap<string, ToolEntry> = new Map(
  ENTRIES.map(entry => [entry.definition.name, entry]),
);

export function listTools(): Tool[] {
  return ENTRIES.map(entry => entry.definition);
}

export function toolNames(): string[] {
  return ENTRIES.map(entry => entry.definition.name);
}

/**
 * Run a calculator tool. Throws a ToolError subclass for unknown names,
 * invalid arguments, division by zero and overflow.
 */
export function callTool(name: string, args: unknown): number {
  const entry = TOOL_TABLE.get(name);
  if (!entry) {
    throw new UnknownToolError(name);
  }

  const { a, b } = validateBinaryArguments(args);
  const result = applyOperation(entry.operation, a, b);
  log.info(`${entry.operation}: ${a}, ${b} = ${result}`);
  return result;
}

export interface ToolTable {
  list(): Tool[];
  names(): string[];
  call(name: string, args: unknown): number;
}

export const calculatorTools: ToolTable = Object.freeze({
  list: listTools,
  names: toolNames,
  call: callTool,
});
