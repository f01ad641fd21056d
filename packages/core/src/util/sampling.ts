import type { RandomSource } from './rng.js';

/** Uniform float in [lo, hi). */
export function uniform(rng: RandomSource, lo: number, hi: number): number {
  return lo + rng.nextFloat01() * (hi - lo);
}

/** Uniform integer in [lo, hi], both inclusive. */
export function uniformInt(rng: RandomSource, lo: number, hi: number): number {
  const span = hi - lo + 1;
  return lo + Math.min(span - 1, Math.floor(rng.nextFloat01() * span));
}

/** Uniform float in (0, 1]; safe to take the log of. */
function openUnit(rng: RandomSource): number {
  return 1 - rng.nextFloat01();
}

/** Standard normal variate (Box–Muller, cosine branch). */
export function standardNormal(rng: RandomSource): number {
  const u1 = openUnit(rng);
  const u2 = rng.nextFloat01();
  return Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
}

/**
 * Gamma(shape, 1) variate.
 *
 * Marsaglia & Tsang (2000) for shape >= 1; shapes below 1 are boosted to
 * shape + 1 and scaled back by U^(1/shape).
 */
export function gammaVariate(rng: RandomSource, shape: number): number {
  if (shape < 1) {
    const boosted = gammaVariate(rng, shape + 1);
    return boosted * Math.pow(openUnit(rng), 1 / shape);
  }

  const d = shape - 1 / 3;
  const c = 1 / Math.sqrt(9 * d);
  for (;;) {
    let x: number;
    let v: number;
    do {
      x = standardNormal(rng);
      v = 1 + c * x;
    } while (v <= 0);
    v = v * v * v;
    const u = openUnit(rng);
    if (u < 1 - 0.0331 * x * x * x * x) return d * v;
    if (Math.log(u) < 0.5 * x * x + d * (1 - v + Math.log(v))) return d * v;
  }
}

/**
 * Symmetric Dirichlet draw of length n.
 *
 * With a very small concentration every gamma variate can underflow to 0;
 * the draw then collapses onto a single uniformly chosen coordinate, which is
 * the limit the distribution approaches anyway.
 */
export function symmetricDirichlet(
  rng: RandomSource,
  n: number,
  concentration: number
): number[] {
  const gammas = Array.from({ length: n }, () =>
    gammaVariate(rng, concentration)
  );
  const total = gammas.reduce((acc, g) => acc + g, 0);
  if (!(total > 0) || !Number.isFinite(total)) {
    const winner = uniformInt(rng, 0, n - 1);
    return gammas.map((_, idx) => (idx === winner ? 1 : 0));
  }
  return gammas.map((g) => g / total);
}

/**
 * Uniform random k-subset of {lo, ..., hi} (Floyd's algorithm).
 * Runs in O(k) draws however wide the range is. Result is sorted ascending.
 */
export function sampleDistinctIntegers(
  rng: RandomSource,
  k: number,
  lo: number,
  hi: number
): number[] {
  const size = hi - lo + 1;
  if (k > size) {
    throw new RangeError(
      `Cannot draw ${k} distinct integers from a range of ${size}`
    );
  }
  const chosen = new Set<number>();
  for (let j = size - k; j < size; j++) {
    const t = uniformInt(rng, 0, j);
    chosen.add(chosen.has(t) ? j : t);
  }
  return Array.from(chosen, (offset) => lo + offset).sort((a, b) => a - b);
}
