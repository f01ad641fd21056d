/**
 * INVARIANT TESTING PATTERN
 *
 * Properties that hold for every generated instance, whatever the difficulty,
 * seed or coefficient range:
 * - baseline cost equals delta
 * - row i of the exponent matrix sums to budget i, and the budgets sum to delta + m
 * - m >= 1, n >= 2, every exponent a non-negative integer
 * - coefficients nonzero and inside the requested range
 * - the same seed yields the same instance
 */

import { describe, test, expect } from 'vitest';
import fc from 'fast-check';
import {
  generateInstance,
  parseInstance,
  resolveCoefficientRange,
  serializeInstance,
} from '@polybench/core';
import { generationRequestArbitrary } from '../arbitraries/instance.js';
import { getTestConfig } from '../setup.js';

describe('Invariant Testing Pattern', () => {
  const config = getTestConfig();

  test('uses the fixed property seed', () => {
    expect(config.seed).toBe(424242);
  });

  test('INVARIANT: baseline cost equals delta', () => {
    fc.assert(
      fc.property(generationRequestArbitrary(), ({ delta, seed, coefficients }) => {
        const instance = generateInstance(delta, { seed, coefficients });
        expect(instance.baseline).toBe(delta);
        expect(instance.matrix).toHaveBaselineCost(delta);
      })
    );
  });

  test('INVARIANT: rows sum to their degree budgets', () => {
    fc.assert(
      fc.property(generationRequestArbitrary(), ({ delta, seed }) => {
        const instance = generateInstance(delta, { seed });
        expect(instance.matrix).toHaveRowSums(instance.budgets);
        expect(instance.budgets.reduce((acc, b) => acc + b, 0)).toBe(
          delta + instance.m
        );
        expect(Math.min(...instance.budgets)).toBeGreaterThanOrEqual(1);
      })
    );
  });

  test('INVARIANT: shape and exponents are well formed', () => {
    fc.assert(
      fc.property(generationRequestArbitrary(400), ({ delta, seed }) => {
        const instance = generateInstance(delta, { seed });
        expect(instance.m).toBeGreaterThanOrEqual(1);
        expect(instance.n).toBeGreaterThanOrEqual(2);
        expect(instance.matrix).toHaveLength(instance.m);
        for (const row of instance.matrix) {
          expect(row).toHaveLength(instance.n);
          expect(row.every((k) => Number.isSafeInteger(k) && k >= 0)).toBe(
            true
          );
        }
      })
    );
  });

  test('INVARIANT: coefficients are nonzero and in range', () => {
    fc.assert(
      fc.property(generationRequestArbitrary(), ({ delta, seed, coefficients }) => {
        const range = resolveCoefficientRange(coefficients);
        const instance = generateInstance(delta, { seed, coefficients });
        expect(instance.coefficients).toHaveLength(instance.m);
        for (const c of instance.coefficients) {
          expect(c).not.toBe(0);
          expect(c).toBeWithinRange(range.min, range.max);
          if (range.kind === 'integer') {
            expect(Number.isInteger(c)).toBe(true);
          }
        }
      })
    );
  });

  test('INVARIANT: the same seed yields the same instance', () => {
    fc.assert(
      fc.property(generationRequestArbitrary(), ({ delta, seed, coefficients }) => {
        const instance = generateInstance(delta, { seed, coefficients });
        expect(instance).toBeGeneratedWithSeed({
          seed,
          generate: (s) => generateInstance(delta, { seed: s, coefficients }),
        });
      }),
      { numRuns: Math.min(config.numRuns, 50) }
    );
  });

  test('INVARIANT: serialized instances reload unchanged', () => {
    fc.assert(
      fc.property(generationRequestArbitrary(), ({ delta, seed, coefficients }) => {
        const instance = generateInstance(delta, { seed, coefficients });
        expect(parseInstance(serializeInstance(instance))).toEqual(instance);
      }),
      { numRuns: Math.min(config.numRuns, 50) }
    );
  });

  test('INVARIANT: refinement never changes the cost', () => {
    fc.assert(
      fc.property(
        generationRequestArbitrary(),
        fc.boolean(),
        fc.boolean(),
        ({ delta, seed }, distinctRows, coverVariables) => {
          const plain = generateInstance(delta, { seed });
          const refined = generateInstance(delta, {
            seed,
            plan: { refine: { distinctRows, coverVariables } },
          });
          expect(refined.baseline).toBe(delta);
          expect(refined.budgets).toEqual(plain.budgets);
          expect(refined.matrix).toHaveRowSums(plain.budgets);
        }
      )
    );
  });
});
