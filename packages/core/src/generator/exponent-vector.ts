import { BudgetError } from '../types/errors.js';
import type { RandomSource } from '../util/rng.js';
import { symmetricDirichlet } from '../util/sampling.js';

export interface ExponentRepair {
  exponents: number[];
  /** Unit increments/decrements applied to close the residual */
  steps: number;
}

function assertBudget(degree: number, variables: number): void {
  if (!Number.isSafeInteger(variables) || variables < 1) {
    throw new BudgetError({
      message: `Variable count must be a positive integer, got ${String(variables)}`,
      context: { total: degree, parts: variables },
    });
  }
  if (!Number.isSafeInteger(degree) || degree < 0) {
    throw new BudgetError({
      message: `Degree budget must be a non-negative integer, got ${String(degree)}`,
      context: { total: degree, parts: variables },
    });
  }
}

/**
 * Stochastic half: Dirichlet proportions scaled by the budget and rounded.
 * The sum may miss `degree` by up to ⌈variables / 2⌉.
 */
export function proposeExponentVector(
  degree: number,
  variables: number,
  rng: RandomSource,
  concentration: number
): number[] {
  const proportions = symmetricDirichlet(rng, variables, concentration);
  return proportions.map((p) => Math.round(p * degree));
}

function indexOfLargest(values: readonly number[]): number {
  let best = 0;
  let bestValue = -Infinity;
  values.forEach((value, idx) => {
    if (value > bestValue) {
      best = idx;
      bestValue = value;
    }
  });
  return best;
}

/**
 * Deterministic half: nudges the current-largest entry one unit at a time
 * until the vector sums to `degree`.
 *
 * Each step moves the residual one unit toward zero. A decrement only happens
 * while the sum exceeds `degree >= 0`, so the largest entry is positive at
 * that point and no entry goes negative. Ties go to the lowest index.
 */
export function repairExponentVector(
  proposal: readonly number[],
  degree: number
): ExponentRepair {
  if (proposal.some((value) => !Number.isSafeInteger(value) || value < 0)) {
    throw new BudgetError({
      message: `Exponent proposal must hold non-negative integers, got [${proposal.join(', ')}]`,
      context: { total: degree, parts: proposal.length },
    });
  }

  const exponents = proposal.slice();
  let residual = degree - exponents.reduce((acc, value) => acc + value, 0);
  let steps = 0;
  while (residual !== 0) {
    const idx = indexOfLargest(exponents);
    const current = exponents[idx] ?? 0;
    if (residual > 0) {
      exponents[idx] = current + 1;
      residual -= 1;
    } else {
      exponents[idx] = current - 1;
      residual += 1;
    }
    steps += 1;
  }
  return { exponents, steps };
}

/**
 * Splits a monomial's total degree across `variables` variables.
 * A zero budget short-circuits to the zero vector without touching the RNG.
 */
export function distributeDegree(
  degree: number,
  variables: number,
  rng: RandomSource,
  concentration: number
): ExponentRepair {
  assertBudget(degree, variables);
  if (degree === 0) {
    return { exponents: new Array<number>(variables).fill(0), steps: 0 };
  }
  const proposal = proposeExponentVector(degree, variables, rng, concentration);
  return repairExponentVector(proposal, degree);
}

export function sampleExponentVector(
  degree: number,
  variables: number,
  rng: RandomSource,
  concentration = 2.0
): number[] {
  return distributeDegree(degree, variables, rng, concentration).exponents;
}
