// High-level entry points.
//
// Each stage draws from its own stream derived from (seed, stage label), so a
// stage's output depends only on the seed and its own inputs: changing the
// coefficient range, for instance, never changes the exponent matrix.

import { ErrorCode } from './errors/codes.js';
import {
  resolveCoefficientRange,
  sampleCoefficients,
} from './generator/coefficients.js';
import { sampleDegreeBudgets } from './generator/degree-budget.js';
import { distributeDegree } from './generator/exponent-vector.js';
import { assembleInstance } from './generator/instance-assembler.js';
import { refineExponentMatrix } from './generator/matrix-refine.js';
import { assertDifficulty, selectShape } from './generator/shape-chooser.js';
import { InputError } from './types/errors.js';
import type { PolynomialInstance, ShapeSelection } from './types/instance.js';
import {
  resolveOptions,
  type CoefficientRange,
  type PlanOptions,
} from './types/options.js';
import { MetricsCollector } from './util/metrics.js';
import {
  RNG_STREAMS,
  createStream,
  drawEntropySeed,
  normalizeSeed,
} from './util/rng.js';

export interface GenerateOptions {
  /** Reproducibility seed; a fresh one is drawn (and recorded) when omitted */
  seed?: number;
  /** Coefficient range (default: integers in [-10, 10]) */
  coefficients?: Partial<CoefficientRange>;
  /** Tuning overrides merged over DEFAULT_OPTIONS */
  plan?: Partial<PlanOptions>;
  metrics?: MetricsCollector;
}

function resolveSeed(seed: number | undefined): number {
  if (seed === undefined) return drawEntropySeed();
  if (!Number.isSafeInteger(seed)) {
    throw new InputError({
      message: `Seed must be an integer, got ${String(seed)}`,
      errorCode: ErrorCode.INVALID_SEED,
      context: { value: seed },
    });
  }
  return normalizeSeed(seed);
}

/**
 * Shape selection on its own: the same (m, n) that generateInstance would
 * use for this difficulty and seed.
 */
export function chooseShape(
  delta: number,
  seed?: number,
  plan: Partial<PlanOptions> = {}
): ShapeSelection {
  assertDifficulty(delta);
  const resolved = resolveOptions(plan);
  const effectiveSeed = resolveSeed(seed);
  return selectShape(
    delta,
    effectiveSeed,
    createStream(effectiveSeed, RNG_STREAMS.SHAPE),
    resolved.shape
  );
}

/**
 * Generates a polynomial whose naive evaluation costs exactly `delta`
 * constraints.
 *
 * All caller input is validated before the first random draw. The returned
 * record is frozen and has passed verifyInstance.
 */
export function generateInstance(
  delta: number,
  options: GenerateOptions = {}
): PolynomialInstance {
  assertDifficulty(delta);
  const range = resolveCoefficientRange(options.coefficients);
  const plan = resolveOptions(options.plan);
  const seed = resolveSeed(options.seed);
  const metrics = options.metrics ?? new MetricsCollector({ enabled: false });

  const shape = metrics.time('SHAPE', () =>
    selectShape(
      delta,
      seed,
      createStream(seed, RNG_STREAMS.SHAPE),
      plan.shape
    )
  );
  const { m, n } = shape;

  const budgets = metrics.time('BUDGETS', () =>
    sampleDegreeBudgets(
      delta + m,
      m,
      createStream(seed, RNG_STREAMS.BUDGETS)
    )
  );

  let matrix = metrics.time('EXPONENTS', () => {
    const rng = createStream(seed, RNG_STREAMS.EXPONENTS);
    return budgets.map((degree) => {
      const { exponents, steps } = distributeDegree(
        degree,
        n,
        rng,
        plan.exponents.concentration
      );
      metrics.increment('repairSteps', steps);
      return exponents;
    });
  });

  if (plan.refine.distinctRows || plan.refine.coverVariables) {
    const refined = metrics.time('REFINE', () =>
      refineExponentMatrix(matrix, plan.refine)
    );
    metrics.increment('refineMoves', refined.moves);
    matrix = refined.matrix;
  }

  const { coefficients, rejections } = metrics.time('COEFFICIENTS', () =>
    sampleCoefficients(m, range, createStream(seed, RNG_STREAMS.COEFFICIENTS))
  );
  metrics.increment('coefficientRejections', rejections);

  const instance = metrics.time('VERIFY', () =>
    assembleInstance({ delta, seed, m, n, budgets, matrix, coefficients })
  );
  metrics.increment('instances');
  return instance;
}

/**
 * `count` instances at the same difficulty; instance i uses seed
 * (seed + i) mod 2^32, so any single member can be regenerated alone.
 */
export function generateInstances(
  delta: number,
  count: number,
  options: GenerateOptions = {}
): PolynomialInstance[] {
  assertDifficulty(delta);
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new InputError({
      message: `Instance count must be a positive integer, got ${String(count)}`,
      errorCode: ErrorCode.INVALID_COUNT,
      context: { value: count },
    });
  }
  const baseSeed = resolveSeed(options.seed);
  return Array.from({ length: count }, (_, i) =>
    generateInstance(delta, { ...options, seed: (baseSeed + i) >>> 0 })
  );
}
