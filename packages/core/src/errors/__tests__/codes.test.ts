import { describe, test, expect } from 'vitest';
import { ErrorCode, EXIT_CODES, getExitCode } from '../codes.js';

describe('Error Code Infrastructure', () => {
  test('all error codes are unique', () => {
    const codes = Object.values(ErrorCode);
    expect(new Set(codes).size).toBe(codes.length);
  });

  test('EXIT_CODES covers every ErrorCode', () => {
    const enumCodes = Object.values(ErrorCode);
    expect(Object.keys(EXIT_CODES)).toHaveLength(enumCodes.length);
    for (const code of enumCodes) {
      expect(EXIT_CODES[code]).toBeTypeOf('number');
    }
  });

  test('exit codes are distinct and within 1-255', () => {
    const exits = Object.values(EXIT_CODES);
    expect(new Set(exits).size).toBe(exits.length);
    for (const exit of exits) {
      expect(exit).toBeWithinRange(1, 255);
    }
  });

  test('codes map to their documented exit codes', () => {
    expect(getExitCode(ErrorCode.INVALID_DIFFICULTY)).toBe(10);
    expect(getExitCode(ErrorCode.INVALID_COEFFICIENT_RANGE)).toBe(11);
    expect(getExitCode(ErrorCode.INVARIANT_VIOLATION)).toBe(30);
    expect(getExitCode(ErrorCode.PARSE_ERROR)).toBe(50);
    expect(getExitCode(ErrorCode.INTERNAL_ERROR)).toBe(99);
  });
});
