import { ConsistencyError } from '../types/errors.js';
import type {
  ExponentMatrix,
  PolynomialInstance,
} from '../types/instance.js';

export interface InstanceDraft {
  delta: number;
  seed: number;
  m: number;
  n: number;
  budgets: readonly number[];
  matrix: ExponentMatrix;
  coefficients: readonly number[];
}

export function rowDegrees(matrix: ExponentMatrix): number[] {
  return matrix.map((row) => row.reduce((acc, k) => acc + k, 0));
}

/**
 * Naive evaluation cost: a monomial of total degree d takes d - 1
 * multiplications. Constant monomials cost nothing.
 */
export function computeBaselineCost(matrix: ExponentMatrix): number {
  return rowDegrees(matrix).reduce(
    (acc, degree) => acc + Math.max(0, degree - 1),
    0
  );
}

function fail(
  invariant: string,
  message: string,
  context: Record<string, unknown>
): never {
  throw new ConsistencyError({
    message,
    context: { invariant, ...context },
  });
}

/**
 * Re-derives every invariant of an instance from its parts.
 * Throws ConsistencyError naming the first invariant that does not hold.
 */
export function verifyInstance(draft: InstanceDraft): number {
  const { delta, m, n, budgets, matrix, coefficients } = draft;

  if (
    matrix.length !== m ||
    budgets.length !== m ||
    coefficients.length !== m
  ) {
    fail(
      'shape',
      `Expected ${m} rows, budgets and coefficients; got ${matrix.length}, ${budgets.length}, ${coefficients.length}`,
      {
        m,
        rows: matrix.length,
        budgets: budgets.length,
        coefficients: coefficients.length,
      }
    );
  }
  if (m < 1 || n < 2) {
    fail('shape', `Shape (m=${m}, n=${n}) violates m >= 1, n >= 2`, { m, n });
  }

  matrix.forEach((row, i) => {
    if (row.length !== n) {
      fail('shape', `Row ${i} has ${row.length} exponents, expected ${n}`, {
        row: i,
        n,
      });
    }
    const bad = row.find((k) => !Number.isSafeInteger(k) || k < 0);
    if (bad !== undefined) {
      fail('exponents', `Row ${i} holds invalid exponent ${String(bad)}`, {
        row: i,
        value: bad,
      });
    }
  });

  const degrees = rowDegrees(matrix);
  degrees.forEach((degree, i) => {
    if (degree !== budgets[i]) {
      fail(
        'row-sum',
        `Row ${i} sums to ${degree} but its degree budget is ${String(budgets[i])}`,
        { row: i, degree, budget: budgets[i] }
      );
    }
  });

  const zeroAt = coefficients.findIndex(
    (c) => c === 0 || !Number.isFinite(c)
  );
  if (zeroAt !== -1) {
    fail(
      'coefficients',
      `Coefficient ${zeroAt} is ${String(coefficients[zeroAt])}; coefficients must be nonzero`,
      { index: zeroAt }
    );
  }

  const baseline = computeBaselineCost(matrix);
  if (baseline !== delta) {
    fail(
      'baseline',
      `Baseline cost ${baseline} does not match difficulty ${delta}`,
      { delta, baseline, degrees }
    );
  }
  return baseline;
}

/**
 * Freezes a verified draft into the public instance record.
 */
export function assembleInstance(draft: InstanceDraft): PolynomialInstance {
  const baseline = verifyInstance(draft);
  return Object.freeze({
    delta: draft.delta,
    seed: draft.seed,
    m: draft.m,
    n: draft.n,
    budgets: Object.freeze(draft.budgets.slice()),
    matrix: Object.freeze(
      draft.matrix.map((row) => Object.freeze(row.slice()))
    ),
    coefficients: Object.freeze(draft.coefficients.slice()),
    baseline,
  });
}
