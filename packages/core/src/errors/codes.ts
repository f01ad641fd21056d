/**
 * Error Code Infrastructure
 * Stable error codes and CLI exit-code mappings.
 */

// Severity levels used across the system
export type Severity = 'info' | 'warn' | 'error';

// Stable error codes grouped by domain
export enum ErrorCode {
  // Input Errors (E001–E099)
  INVALID_DIFFICULTY = 'E001',
  INVALID_COEFFICIENT_RANGE = 'E002',
  INVALID_SEED = 'E003',
  INVALID_COUNT = 'E004',

  // Sampling Errors (E100–E199)
  INFEASIBLE_SHAPE = 'E100',
  INFEASIBLE_BUDGET = 'E101',

  // Consistency Errors (E200–E299)
  INVARIANT_VIOLATION = 'E200',

  // Configuration Errors (E300–E399)
  CONFIGURATION_ERROR = 'E300',

  // Parse Errors (E400–E499)
  PARSE_ERROR = 'E400',

  // Internal Errors (E500–E599)
  INTERNAL_ERROR = 'E500',
}

// CLI exit codes mapping
export const EXIT_CODES = {
  [ErrorCode.INVALID_DIFFICULTY]: 10,
  [ErrorCode.INVALID_COEFFICIENT_RANGE]: 11,
  [ErrorCode.INVALID_SEED]: 12,
  [ErrorCode.INVALID_COUNT]: 13,
  [ErrorCode.INFEASIBLE_SHAPE]: 20,
  [ErrorCode.INFEASIBLE_BUDGET]: 21,
  [ErrorCode.INVARIANT_VIOLATION]: 30,
  [ErrorCode.CONFIGURATION_ERROR]: 40,
  [ErrorCode.PARSE_ERROR]: 50,
  [ErrorCode.INTERNAL_ERROR]: 99,
} satisfies Record<ErrorCode, number>;

export function getExitCode(code: ErrorCode): number {
  return EXIT_CODES[code];
}
