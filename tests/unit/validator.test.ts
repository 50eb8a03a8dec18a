import { describe, it, expect } from 'vitest';
import { validateBinaryArguments } from '../../src/calculator/validator.js';
import { InvalidArgumentsError } from '../../src/calculator/errors.js';

function rejection(args: unknown): string {
  try {
    validateBinaryArguments(args);
  } catch (err) {
    expect(err).toBeInstanceOf(InvalidArgumentsError);
    return err instanceof Error ? err.message : String(err);
  }
  throw new Error('expected validation to fail');
}

describe('validateBinaryArguments', () => {
  it('should accept two numbers', () => {
    expect(validateBinaryArguments({ a: 5, b: 3 })).toEqual({ a: 5, b: 3 });
    expect(validateBinaryArguments({ a: -0.5, b: 1e3 })).toEqual({ a: -0.5, b: 1000 });
  });

  it('should coerce decimal strings', () => {
    expect(validateBinaryArguments({ a: '4.5', b: ' 2 ' })).toEqual({ a: 4.5, b: 2 });
    expect(validateBinaryArguments({ a: '-1e2', b: '.5' })).toEqual({ a: -100, b: 0.5 });
  });

  it('should report missing arguments', () => {
    expect(rejection({ a: 5 })).toBe('invalid arguments: b is required');
    expect(rejection({})).toBe('invalid arguments: a is required; b is required');
  });

  it('should reject non-numeric values', () => {
    expect(rejection({ a: 'five', b: 1 })).toBe('invalid arguments: a must be a number');
    expect(rejection({ a: true, b: 1 })).toBe('invalid arguments: a must be a number');
    expect(rejection({ a: 1, b: null })).toBe('invalid arguments: b must be a number');
    expect(rejection({ a: 1, b: '0x10' })).toBe('invalid arguments: b must be a number');
    expect(rejection({ a: 'Infinity', b: 1 })).toBe('invalid arguments: a must be a number');
  });

  it('should reject values that are not finite', () => {
    expect(rejection({ a: '1e400', b: 1 })).toBe('invalid arguments: a must be a finite number');
  });

  it('should reject extra arguments', () => {
    expect(rejection({ a: 1, b: 2, c: 3 })).toBe('invalid arguments: unexpected argument: c');
  });

  it('should reject arguments that are not an object', () => {
    expect(rejection('1, 2')).toBe('invalid arguments: arguments must be an object');
    expect(rejection([1, 2])).toBe('invalid arguments: arguments must be an object');
    expect(rejection(null)).toBe('invalid arguments: arguments must be an object');
  });
});
