/**
 * Row i holds the per-variable exponents of monomial i.
 */
export type ExponentMatrix = ReadonlyArray<readonly number[]>;

export interface Shape {
  /** Monomial count, >= 1 */
  m: number;
  /** Variable count, >= 2 */
  n: number;
}

export interface ShapeSelection extends Shape {
  delta: number;
  seed: number;
  /** Density factor drawn for this selection */
  alpha: number;
  /** Width/depth factor drawn for this selection */
  beta: number;
}

/**
 * Anything a renderer can print: an exponent matrix and one coefficient per row.
 */
export interface PolynomialTerms {
  matrix: ExponentMatrix;
  coefficients: readonly number[];
}

/**
 * A generated polynomial whose naive evaluation costs exactly `delta`
 * constraints. Frozen once returned.
 */
export interface PolynomialInstance extends PolynomialTerms {
  readonly delta: number;
  /** Seed that reproduces this instance */
  readonly seed: number;
  readonly m: number;
  readonly n: number;
  /** Total degree of each monomial; sums to delta + m */
  readonly budgets: readonly number[];
  readonly matrix: ExponentMatrix;
  readonly coefficients: readonly number[];
  /** Σ (rowDegree − 1); always equal to delta */
  readonly baseline: number;
}
