import { describe, it, expect } from 'vitest';
import { ErrorCode } from '../../errors/codes.js';
import { SequenceSource } from '../../test-utils/sequence-source.js';
import { InputError } from '../../types/errors.js';
import type { CoefficientRange } from '../../types/options.js';
import { RNG_STREAMS, createStream } from '../../util/rng.js';
import {
  resolveCoefficientRange,
  sampleCoefficients,
} from '../coefficients.js';

describe('resolveCoefficientRange', () => {
  it('defaults to integers in [-10, 10]', () => {
    expect(resolveCoefficientRange()).toEqual({
      min: -10,
      max: 10,
      kind: 'integer',
    });
  });

  it('narrows integer bounds to the drawable values', () => {
    expect(resolveCoefficientRange({ min: -2.5, max: 3.7 })).toEqual({
      min: -2,
      max: 3,
      kind: 'integer',
    });
  });

  it('keeps real bounds as given', () => {
    expect(
      resolveCoefficientRange({ min: -0.5, max: 0.5, kind: 'real' })
    ).toEqual({ min: -0.5, max: 0.5, kind: 'real' });
  });

  it('falls back to the default kind when kind is undefined', () => {
    expect(
      resolveCoefficientRange({ min: -3, max: 3, kind: undefined })
    ).toEqual({ min: -3, max: 3, kind: 'integer' });
  });

  it('rejects a real range whose span overflows', () => {
    let caught: unknown;
    try {
      resolveCoefficientRange({ min: -1e308, max: 1e308, kind: 'real' });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InputError);
    expect(caught).toMatchObject({
      errorCode: ErrorCode.INVALID_COEFFICIENT_RANGE,
      message: 'Coefficient range [-1e+308, 1e+308] is too wide to sample',
    });
  });

  it('keeps a wide real range whose span is finite', () => {
    const range = resolveCoefficientRange({
      min: -1e307,
      max: 1e307,
      kind: 'real',
    });
    const { coefficients } = sampleCoefficients(
      10,
      range,
      createStream(4, RNG_STREAMS.COEFFICIENTS)
    );
    for (const c of coefficients) {
      expect(Number.isFinite(c)).toBe(true);
      expect(c).toBeWithinRange(-1e307, 1e307);
    }
  });

  it.each<[string, Partial<CoefficientRange>]>([
    ['an empty range', { min: 0, max: 0 }],
    ['inverted bounds', { min: 3, max: -3 }],
    ['no integer inside', { min: 0.2, max: 0.8 }],
    ['only zero inside', { min: -0.5, max: 0.5 }],
    ['a non-finite bound', { min: Number.NEGATIVE_INFINITY, max: 1 }],
  ])('rejects %s', (_label, range) => {
    let caught: unknown;
    try {
      resolveCoefficientRange(range);
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(InputError);
    expect(caught).toMatchObject({
      errorCode: ErrorCode.INVALID_COEFFICIENT_RANGE,
    });
  });

  it('rejects an unknown kind', () => {
    const range: Partial<CoefficientRange> = { min: -1, max: 1 };
    Object.assign(range, { kind: 'complex' });
    expect(() => resolveCoefficientRange(range)).toThrow(
      'Coefficient range [-1, 1] has unknown kind "complex"'
    );
  });
});

describe('sampleCoefficients', () => {
  it('redraws integer zeros', () => {
    const rng = new SequenceSource([0.5, 0, 0.9]);
    const draw = sampleCoefficients(2, { min: -1, max: 1, kind: 'integer' }, rng);
    expect(draw).toEqual({ coefficients: [-1, 1], rejections: 1 });
    expect(rng.consumed).toBe(3);
  });

  it('redraws a real draw of exactly zero', () => {
    const rng = new SequenceSource([0.5, 0.75]);
    const draw = sampleCoefficients(1, { min: -2, max: 2, kind: 'real' }, rng);
    expect(draw).toEqual({ coefficients: [1], rejections: 1 });
  });

  it('returns nothing for a zero count', () => {
    const draw = sampleCoefficients(
      0,
      { min: -1, max: 1, kind: 'integer' },
      new SequenceSource([])
    );
    expect(draw).toEqual({ coefficients: [], rejections: 0 });
  });

  it('stays inside the range and never returns zero', () => {
    const range = resolveCoefficientRange({ min: -3, max: 2 });
    for (let seed = 0; seed < 100; seed++) {
      const { coefficients } = sampleCoefficients(
        20,
        range,
        createStream(seed, RNG_STREAMS.COEFFICIENTS)
      );
      expect(coefficients).toHaveLength(20);
      for (const c of coefficients) {
        expect(Number.isInteger(c)).toBe(true);
        expect(c).not.toBe(0);
        expect(c).toBeWithinRange(-3, 2);
      }
    }
  });

  it('draws reals from [min, max)', () => {
    const range = resolveCoefficientRange({ min: 0.25, max: 0.5, kind: 'real' });
    const { coefficients, rejections } = sampleCoefficients(
      50,
      range,
      createStream(9, RNG_STREAMS.COEFFICIENTS)
    );
    expect(rejections).toBe(0);
    for (const c of coefficients) {
      expect(c).toBeGreaterThanOrEqual(0.25);
      expect(c).toBeLessThan(0.5);
    }
  });
});
