import { BudgetError } from '../types/errors.js';
import type { RandomSource } from '../util/rng.js';
import { sampleDistinctIntegers } from '../util/sampling.js';

/**
 * Random composition of `total` into `parts` positive integers.
 *
 * Draws parts - 1 distinct cut points from {1, ..., total - 1}; consecutive
 * gaps (with boundaries 0 and total) are the parts. Distinct cuts mean no
 * part is ever zero.
 */
export function sampleDegreeBudgets(
  total: number,
  parts: number,
  rng: RandomSource
): number[] {
  if (!Number.isSafeInteger(parts) || parts < 1) {
    throw new BudgetError({
      message: `Budget part count must be a positive integer, got ${String(parts)}`,
      context: { total, parts },
    });
  }
  if (!Number.isSafeInteger(total) || total < parts) {
    throw new BudgetError({
      message: `Cannot split ${String(total)} into ${parts} positive parts`,
      context: { total, parts },
    });
  }
  if (parts === 1) {
    return [total];
  }

  const cuts = sampleDistinctIntegers(rng, parts - 1, 1, total - 1);
  const budgets: number[] = [];
  let previous = 0;
  for (const cut of cuts) {
    budgets.push(cut - previous);
    previous = cut;
  }
  budgets.push(total - previous);
  return budgets;
}
