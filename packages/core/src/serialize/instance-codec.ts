import AjvModule, { type ErrorObject, type ValidateFunction } from 'ajv';

import { assembleInstance } from '../generator/instance-assembler.js';
import { ConsistencyError, ParseError } from '../types/errors.js';
import type { PolynomialInstance } from '../types/instance.js';

// ajv is CommonJS; under ESM its default export is module.exports.
const Ajv = AjvModule.default;

export interface SerializedInstance {
  delta: number;
  seed: number;
  m: number;
  n: number;
  budgets: number[];
  matrix: number[][];
  coefficients: number[];
  baseline: number;
}

/**
 * Structural schema for a serialized instance. Cross-field invariants
 * (row sums, baseline) are checked by the assembler afterwards.
 */
export const INSTANCE_JSON_SCHEMA = {
  type: 'object',
  additionalProperties: false,
  required: [
    'delta',
    'seed',
    'm',
    'n',
    'budgets',
    'matrix',
    'coefficients',
    'baseline',
  ],
  properties: {
    delta: { type: 'integer', minimum: 1 },
    seed: { type: 'integer', minimum: 0, maximum: 4294967295 },
    m: { type: 'integer', minimum: 1 },
    n: { type: 'integer', minimum: 2 },
    budgets: {
      type: 'array',
      items: { type: 'integer', minimum: 1 },
    },
    matrix: {
      type: 'array',
      items: {
        type: 'array',
        items: { type: 'integer', minimum: 0 },
      },
    },
    coefficients: {
      type: 'array',
      items: { type: 'number', not: { const: 0 } },
    },
    baseline: { type: 'integer', minimum: 0 },
  },
} as const;

let cachedValidator: ValidateFunction<SerializedInstance> | undefined;

function getValidator(): ValidateFunction<SerializedInstance> {
  if (!cachedValidator) {
    const ajv = new Ajv({ allErrors: false, strict: true });
    cachedValidator = ajv.compile<SerializedInstance>(INSTANCE_JSON_SCHEMA);
  }
  return cachedValidator;
}

function describeAjvError(error: ErrorObject): string {
  const location = error.instancePath === '' ? '/' : error.instancePath;
  return `${location} ${error.message ?? 'is invalid'}`;
}

/** Plain, mutable copy of an instance in document field order. */
export function toSerializedInstance(
  instance: PolynomialInstance
): SerializedInstance {
  return {
    delta: instance.delta,
    seed: instance.seed,
    m: instance.m,
    n: instance.n,
    budgets: [...instance.budgets],
    matrix: instance.matrix.map((row) => [...row]),
    coefficients: [...instance.coefficients],
    baseline: instance.baseline,
  };
}

export function serializeInstance(
  instance: PolynomialInstance,
  space?: number
): string {
  return JSON.stringify(toSerializedInstance(instance), null, space);
}

/**
 * Loads an instance from JSON text (or an already-parsed value).
 *
 * Structural problems raise ParseError; a well-formed document whose numbers
 * break an invariant raises ConsistencyError, as does a recorded baseline that
 * disagrees with the recomputed one.
 */
export function parseInstance(input: unknown): PolynomialInstance {
  let document: unknown = input;
  if (typeof input === 'string') {
    try {
      document = JSON.parse(input);
    } catch (cause) {
      throw new ParseError({
        message: 'Instance document is not valid JSON',
        context: { valueExcerpt: input.slice(0, 80) },
        cause: cause instanceof Error ? cause : undefined,
      });
    }
  }

  const validate = getValidator();
  if (!validate(document)) {
    const first = validate.errors?.[0];
    throw new ParseError({
      message: first
        ? `Invalid instance document: ${describeAjvError(first)}`
        : 'Invalid instance document',
      context: { pointer: first?.instancePath },
    });
  }

  const instance = assembleInstance(document);
  if (instance.baseline !== document.baseline) {
    throw new ConsistencyError({
      message: `Recorded baseline ${document.baseline} differs from recomputed ${instance.baseline}`,
      context: { invariant: 'baseline', pointer: '/baseline' },
    });
  }
  return instance;
}
