import { randomInt } from 'node:crypto';

/**
 * Anything that yields uniform floats in [0, 1).
 * Every sampling stage takes one explicitly; there is no global stream.
 */
export interface RandomSource {
  nextFloat01(): number;
}

/**
 * 32-bit FNV-1a hash of a string over UTF-16 code units.
 * offset-basis: 2166136261, prime: 16777619, modulo 2^32
 */
export function fnv1a32(s: string): number {
  let x = 2166136261 >>> 0;
  for (let i = 0; i < s.length; i++) {
    x ^= s.charCodeAt(i);
    x = Math.imul(x, 16777619) >>> 0;
  }
  return x >>> 0;
}

/**
 * murmur3 32-bit finalizer. Spreads a one-bit seed difference over the whole
 * word; raw xorshift keeps nearby seeds correlated for the first draws.
 */
export function mix32(h: number): number {
  let x = h >>> 0;
  x ^= x >>> 16;
  x = Math.imul(x, 0x85ebca6b) >>> 0;
  x ^= x >>> 13;
  x = Math.imul(x, 0xc2b2ae35) >>> 0;
  x ^= x >>> 16;
  return x >>> 0;
}

// Any non-zero state works; zero is the one fixed point of xorshift.
const ZERO_STATE_REPLACEMENT = 0x9e3779b9;

/**
 * xorshift32 RNG with uint32 state.
 * Initialization: x = mix32((seed >>> 0) ^ fnv1a32(stream))
 * Step: x ^= x << 13; x ^= x >>> 17; x ^= x << 5; (all masked to uint32)
 */
export class XorShift32 implements RandomSource {
  private x: number;

  constructor(seed: number, stream: string) {
    const initial = mix32((seed >>> 0) ^ fnv1a32(stream));
    this.x = initial === 0 ? ZERO_STATE_REPLACEMENT : initial;
  }

  /** Returns the next uint32 value. */
  next(): number {
    let x = this.x >>> 0;
    x ^= (x << 13) >>> 0;
    x ^= x >>> 17;
    x ^= (x << 5) >>> 0;
    this.x = x >>> 0;
    return this.x;
  }

  /** Returns a deterministic float in [0, 1). */
  nextFloat01(): number {
    return (this.next() >>> 0) / 0x100000000;
  }
}

/** Stream labels, one per pipeline stage. */
export const RNG_STREAMS = {
  SHAPE: '/shape',
  BUDGETS: '/budgets',
  EXPONENTS: '/exponents',
  COEFFICIENTS: '/coefficients',
} as const;

export type RngStream = (typeof RNG_STREAMS)[keyof typeof RNG_STREAMS];

export function createStream(seed: number, stream: RngStream): XorShift32 {
  return new XorShift32(seed, stream);
}

/** Coerces a caller seed to uint32 so that -1 and 2^32 - 1 name the same run. */
export function normalizeSeed(seed: number): number {
  return seed >>> 0;
}

/** Fresh uint32 seed for unseeded runs; recorded on the instance for replay. */
export function drawEntropySeed(): number {
  return randomInt(0, 0x100000000);
}
