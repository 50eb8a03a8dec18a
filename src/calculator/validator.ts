import { z } from 'zod';
import { InvalidArgumentsError } from './errors.js';
import * as log from '../utils/logger.js';

const DECIMAL_PATTERN = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

/** Accepts a JSON number or a decimal string such as "4.5"; rejects NaN and ±Infinity. */
const NumericArgumentSchema = z.unknown().transform((value, ctx) => {
  if (value === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'is required' });
    return z.NEVER;
  }

  const n = toNumber(value);
  if (n === undefined) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a number' });
    return z.NEVER;
  }
  if (!Number.isFinite(n)) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'must be a finite number' });
    return z.NEVER;
  }
  return n;
});

export const BinaryArgumentsSchema = z.object(
  {
    a: NumericArgumentSchema,
    b: NumericArgumentSchema,
  },
  { invalid_type_error: 'arguments must be an object' },
).strict();

export type BinaryArguments = z.infer<typeof BinaryArgumentsSchema>;

function toNumber(value: unknown): number | undefined {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return DECIMAL_PATTERN.test(trimmed) ? Number(trimmed) : undefined;
  }
  return undefined;
}

function describeIssue(issue: z.ZodIssue): string {
  if (issue.code === z.ZodIssueCode.unrecognized_keys) {
    const noun = issue.keys.length > 1 ? 'arguments' : 'argument';
    return `unexpected ${noun}: ${issue.keys.join(', ')}`;
  }
  return issue.path.length > 0 ? `${issue.path.join('.')} ${issue.message}` : issue.message;
}

/**
 * Validate the `{a, b}` argument object of a calculator tool.
 * Throws InvalidArgumentsError carrying every issue found.
 */
export function validateBinaryArguments(args: unknown): BinaryArguments {
  const parsed = BinaryArgumentsSchema.safeParse(args);
  if (!parsed.success) {
    throw new InvalidArgumentsError(parsed.error.issues.map(describeIssue).join('; '));
  }

  log.debug(`Validated inputs: a=${parsed.data.a}, b=${parsed.data.b}`);
  return parsed.data;
}
