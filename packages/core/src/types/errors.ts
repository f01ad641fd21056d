/**
 * Error hierarchy for polybench
 * Every failure names the invariant it violated and the values involved.
 */

import {
  ErrorCode,
  type Severity,
  getExitCode as _getExitCode,
} from '../errors/codes.js';

/**
 * Typed error context shared across error types
 */
export interface ErrorContext {
  delta?: number;
  m?: number;
  n?: number;
  setting?: string; // Configuration key, e.g. 'shape.alphaRange'
  pointer?: string; // JSON Pointer into a serialized instance
  valueExcerpt?: string; // Safe excerpt of the offending value
  suggestion?: string;
  [key: string]: unknown;
}

export interface SerializedError {
  name: string;
  message: string;
  errorCode: ErrorCode;
  severity: Severity;
  context?: ErrorContext;
  stack?: string;
  cause?: { name: string; message: string } | undefined;
}

export interface PolyErrorParams {
  message: string;
  errorCode: ErrorCode;
  severity?: Severity;
  context?: ErrorContext;
  cause?: Error;
}

/**
 * Base error class for all polybench errors
 */
export abstract class PolyError extends Error {
  public readonly errorCode: ErrorCode;
  public readonly severity: Severity;
  public readonly context?: ErrorContext;
  public readonly cause?: Error;

  public suggestions?: string[];

  constructor(params: PolyErrorParams) {
    const { message, errorCode, severity = 'error', context, cause } = params;
    super(message, { cause });
    this.name = this.constructor.name;
    this.errorCode = errorCode;
    this.severity = severity;
    this.context = context;
    this.cause = cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }

  /**
   * Serialize error to JSON for logging and debugging
   * - dev: includes stack
   * - prod: stack omitted
   */
  toJSON(env: 'dev' | 'prod' = 'dev'): SerializedError {
    const base: SerializedError = {
      name: this.name,
      message: this.message,
      errorCode: this.errorCode,
      severity: this.severity,
      context: this.context,
      cause: this.cause
        ? { name: this.cause.name, message: this.cause.message }
        : undefined,
    };

    if (env !== 'prod') {
      base.stack = this.stack;
    }
    return base;
  }

  /** Resolve the process exit code associated with this error */
  getExitCode(): number {
    return _getExitCode(this.errorCode);
  }
}

type SubclassParams<C extends ErrorContext = ErrorContext> = Omit<
  PolyErrorParams,
  'errorCode' | 'context'
> & { errorCode?: ErrorCode; context?: C };

/**
 * Caller-supplied parameters rejected before any sampling happens
 * (difficulty below 1, coefficient range without a nonzero value).
 */
export class InputError extends PolyError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVALID_DIFFICULTY,
    });
  }
}

/**
 * Derived (m, n) fails feasibility. Signals a misconfigured parameter range.
 */
export class ShapeError extends PolyError {
  constructor(
    params: SubclassParams<
      ErrorContext & { delta: number; m: number; n: number }
    >
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INFEASIBLE_SHAPE,
    });
  }

  get shape(): { m: number; n: number } | undefined {
    const { m, n } = this.context ?? {};
    return m !== undefined && n !== undefined ? { m, n } : undefined;
  }
}

/**
 * A composition of `total` into `parts` positive integers does not exist.
 */
export class BudgetError extends PolyError {
  constructor(
    params: SubclassParams<ErrorContext & { total: number; parts: number }>
  ) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INFEASIBLE_BUDGET,
    });
  }
}

/**
 * A recomputed invariant does not hold on an assembled instance.
 * Always a defect signal; never retried or tolerated.
 */
export class ConsistencyError extends PolyError {
  constructor(params: SubclassParams<ErrorContext & { invariant: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.INVARIANT_VIOLATION,
    });
  }

  get invariant(): string | undefined {
    const invariant = this.context?.invariant;
    return typeof invariant === 'string' ? invariant : undefined;
  }
}

/**
 * Invalid configuration override
 */
export class ConfigError extends PolyError {
  constructor(params: SubclassParams<ErrorContext & { setting: string }>) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.CONFIGURATION_ERROR,
    });
  }

  get setting(): string | undefined {
    return this.context?.setting;
  }
}

/**
 * Malformed serialized instance or command-line value
 */
export class ParseError extends PolyError {
  constructor(params: SubclassParams) {
    super({
      ...params,
      errorCode: params.errorCode ?? ErrorCode.PARSE_ERROR,
    });
  }
}

export function isPolyError(error: unknown): error is PolyError {
  return error instanceof PolyError;
}
