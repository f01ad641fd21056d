import { ErrorCode } from '../errors/codes.js';
import { InputError } from '../types/errors.js';
import {
  DEFAULT_COEFFICIENT_RANGE,
  type CoefficientKind,
  type CoefficientRange,
} from '../types/options.js';
import type { RandomSource } from '../util/rng.js';
import { uniform, uniformInt } from '../util/sampling.js';

/** A validated range: bounds are the values actually drawable. */
export interface ResolvedCoefficientRange {
  min: number;
  max: number;
  kind: CoefficientKind;
}

export interface CoefficientDraw {
  coefficients: number[];
  /** Draws discarded for landing exactly on zero */
  rejections: number;
}

function rangeError(range: CoefficientRange, reason: string): InputError {
  return new InputError({
    message: `Coefficient range [${String(range.min)}, ${String(range.max)}] ${reason}`,
    errorCode: ErrorCode.INVALID_COEFFICIENT_RANGE,
    context: {
      value: { ...range },
      suggestion: 'Use bounds with min < max that include a nonzero value',
    },
  });
}

/**
 * Checks that the range can produce at least one nonzero coefficient.
 * Integer ranges are narrowed to [ceil(min), floor(max)].
 */
export function resolveCoefficientRange(
  range: Partial<CoefficientRange> = {}
): ResolvedCoefficientRange {
  const merged = {
    min: range.min ?? DEFAULT_COEFFICIENT_RANGE.min,
    max: range.max ?? DEFAULT_COEFFICIENT_RANGE.max,
    kind: range.kind ?? DEFAULT_COEFFICIENT_RANGE.kind,
  };
  const { min, max, kind } = merged;

  if (kind !== 'integer' && kind !== 'real') {
    throw rangeError(merged, `has unknown kind "${String(kind)}"`);
  }
  if (!Number.isFinite(min) || !Number.isFinite(max)) {
    throw rangeError(merged, 'must have finite bounds');
  }
  if (!(min < max)) {
    throw rangeError(merged, 'contains no eligible nonzero value');
  }
  if (kind === 'real') {
    if (!Number.isFinite(max - min)) {
      throw rangeError(merged, 'is too wide to sample');
    }
    return { min, max, kind };
  }

  const lo = Math.ceil(min);
  const hi = Math.floor(max);
  if (lo > hi || (lo === 0 && hi === 0)) {
    throw rangeError(merged, 'contains no nonzero integer');
  }
  if (!Number.isSafeInteger(lo) || !Number.isSafeInteger(hi)) {
    throw rangeError(merged, 'exceeds the safe integer range');
  }
  return { min: lo, max: hi, kind };
}

function drawOne(rng: RandomSource, range: ResolvedCoefficientRange): number {
  return range.kind === 'integer'
    ? uniformInt(rng, range.min, range.max)
    : uniform(rng, range.min, range.max);
}

/**
 * Draws `count` nonzero coefficients; a draw of exactly zero is discarded and
 * redrawn. The range always holds a nonzero value, so each draw has positive
 * probability of acceptance.
 */
export function sampleCoefficients(
  count: number,
  range: ResolvedCoefficientRange,
  rng: RandomSource
): CoefficientDraw {
  const coefficients: number[] = [];
  let rejections = 0;
  while (coefficients.length < count) {
    const value = drawOne(rng, range);
    if (value === 0) {
      rejections += 1;
      continue;
    }
    coefficients.push(value);
  }
  return { coefficients, rejections };
}
