/**
 * Configuration options for the polybench generation pipeline
 *
 * All options are optional. The numeric values below are tuning knobs that
 * shape the distribution of generated instances; none of them affects the
 * baseline-cost guarantee.
 */

import { ConfigError } from './errors.js';

/** Closed-open sampling interval [lo, hi). */
export type Interval = readonly [lo: number, hi: number];

/**
 * Shape selection tuning
 */
export interface ShapeOptions {
  /** Monomial density factor α; m = floor(α·√δ) (default: [0.6, 1.5]) */
  alphaRange?: Interval;
  /** Width/depth factor β; n = floor(√δ / β) (default: [0.2, 0.8]) */
  betaRange?: Interval;
}

/**
 * Exponent distribution tuning
 */
export interface ExponentOptions {
  /**
   * Symmetric Dirichlet concentration (default: 2.0).
   * Near 0 concentrates a monomial's degree on few variables; large values
   * spread it evenly.
   */
  concentration?: number;
}

/**
 * Optional post-pass over the exponent matrix. Row sums are preserved.
 */
export interface RefineOptions {
  /** Break duplicate rows (default: false) */
  distinctRows?: boolean;
  /** Give every variable a nonzero exponent somewhere (default: false) */
  coverVariables?: boolean;
}

export interface PlanOptions {
  shape?: ShapeOptions;
  exponents?: ExponentOptions;
  refine?: RefineOptions;
}

export interface ResolvedOptions {
  shape: Required<ShapeOptions>;
  exponents: Required<ExponentOptions>;
  refine: Required<RefineOptions>;
}

export const DEFAULT_OPTIONS: ResolvedOptions = {
  shape: {
    alphaRange: [0.6, 1.5],
    betaRange: [0.2, 0.8],
  },
  exponents: {
    concentration: 2.0,
  },
  refine: {
    distinctRows: false,
    coverVariables: false,
  },
};

export type CoefficientKind = 'integer' | 'real';

export interface CoefficientRange {
  min: number;
  max: number;
  /** 'integer' draws whole numbers in [ceil(min), floor(max)]; 'real' draws in [min, max) */
  kind?: CoefficientKind;
}

export const DEFAULT_COEFFICIENT_RANGE: Required<CoefficientRange> = {
  min: -10,
  max: 10,
  kind: 'integer',
};

/**
 * Merge user options over defaults and validate the result.
 */
export function resolveOptions(
  userOptions: Partial<PlanOptions> = {}
): ResolvedOptions {
  // Field by field: an explicit `undefined` falls back to the default.
  const { shape, exponents, refine } = userOptions;
  const resolved: ResolvedOptions = {
    shape: {
      alphaRange: shape?.alphaRange ?? DEFAULT_OPTIONS.shape.alphaRange,
      betaRange: shape?.betaRange ?? DEFAULT_OPTIONS.shape.betaRange,
    },
    exponents: {
      concentration:
        exponents?.concentration ?? DEFAULT_OPTIONS.exponents.concentration,
    },
    refine: {
      distinctRows: refine?.distinctRows ?? DEFAULT_OPTIONS.refine.distinctRows,
      coverVariables:
        refine?.coverVariables ?? DEFAULT_OPTIONS.refine.coverVariables,
    },
  };

  validateInterval('shape.alphaRange', resolved.shape.alphaRange);
  validateInterval('shape.betaRange', resolved.shape.betaRange);

  const { concentration } = resolved.exponents;
  if (!Number.isFinite(concentration) || concentration <= 0) {
    throw new ConfigError({
      message: `exponents.concentration must be a positive finite number, got ${String(concentration)}`,
      context: { setting: 'exponents.concentration', value: concentration },
    });
  }

  return resolved;
}

function validateInterval(setting: string, interval: Interval): void {
  if (typeof interval !== 'object' || interval === null) {
    throw new ConfigError({
      message: `${setting} must be a [lo, hi] pair, got ${JSON.stringify(interval)}`,
      context: { setting, value: interval },
    });
  }
  const [lo, hi] = interval;
  if (!Number.isFinite(lo) || !Number.isFinite(hi) || lo <= 0 || hi < lo) {
    throw new ConfigError({
      message: `${setting} must satisfy 0 < lo <= hi, got [${String(lo)}, ${String(hi)}]`,
      context: { setting, value: [lo, hi] },
    });
  }
}
