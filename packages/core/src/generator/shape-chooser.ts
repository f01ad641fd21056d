import { InputError, ShapeError } from '../types/errors.js';
import type { Shape, ShapeSelection } from '../types/instance.js';
import type { ShapeOptions } from '../types/options.js';
import type { RandomSource } from '../util/rng.js';
import { uniform } from '../util/sampling.js';

/**
 * Rejects anything but a positive safe integer difficulty.
 */
export function assertDifficulty(delta: number): void {
  if (!Number.isSafeInteger(delta) || delta < 1) {
    throw new InputError({
      message: `Difficulty must be a positive integer, got ${String(delta)}`,
      context: { delta, suggestion: 'Pass a whole number delta >= 1' },
    });
  }
}

/**
 * Feasibility of a shape for a given difficulty.
 *
 * A budget vector of m entries, each >= 1, summing to delta + m always exists
 * for delta >= 0, and a single variable may carry any exponent, so the check
 * reduces to the floors on m, n and delta.
 */
export function isFeasibleShape(shape: Shape, delta: number): boolean {
  const { m, n } = shape;
  return (
    Number.isSafeInteger(m) &&
    Number.isSafeInteger(n) &&
    m >= 1 &&
    n >= 2 &&
    delta >= 1
  );
}

export function validateShape(shape: Shape, delta: number): void {
  if (!isFeasibleShape(shape, delta)) {
    throw new ShapeError({
      message: `Shape (m=${shape.m}, n=${shape.n}) is infeasible for delta=${delta}`,
      context: { delta, m: shape.m, n: shape.n },
    });
  }
}

/**
 * Picks (m, n) for difficulty delta.
 *
 * Both dimensions scale with √δ: α trades off monomial density, β trades
 * variable width against per-variable exponent depth.
 */
export function selectShape(
  delta: number,
  seed: number,
  rng: RandomSource,
  options: Required<ShapeOptions>
): ShapeSelection {
  assertDifficulty(delta);

  const [alphaLo, alphaHi] = options.alphaRange;
  const [betaLo, betaHi] = options.betaRange;
  const alpha = uniform(rng, alphaLo, alphaHi);
  const beta = uniform(rng, betaLo, betaHi);

  const root = Math.sqrt(delta);
  const m = Math.max(1, Math.floor(alpha * root));
  const n = Math.max(2, Math.floor(root / beta));

  validateShape({ m, n }, delta);
  return { delta, seed, m, n, alpha, beta };
}
