import {
  ParseError,
  isPolynomialFormat,
  type CoefficientKind,
  type CoefficientRange,
  type PlanOptions,
  type PolynomialFormat,
} from '@polybench/core';

export type OutputFormat = 'report' | 'json' | 'ndjson';

/**
 * CLI options interface matching Commander.js option structure
 */
export interface CliOptions {
  delta?: string;
  seed?: string;
  count?: string;
  coeffMin?: string;
  coeffMax?: string;
  coeffKind?: string;
  concentration?: string;
  distinctRows?: boolean;
  coverVariables?: boolean;
  format?: string;
  out?: string;
  verbose?: boolean;
  printMetrics?: boolean;
  debug?: boolean;
}

function invalidFlag(flag: string, value: unknown, expected: string): ParseError {
  return new ParseError({
    message: `Invalid ${flag} value "${String(value)}". Expected ${expected}.`,
    context: { setting: flag, valueExcerpt: String(value) },
  });
}

/**
 * Parse a decimal integer flag. Range checks (δ >= 1, count >= 1) belong to
 * the core so that the same errors surface from the API and the CLI.
 */
export function parseIntegerFlag(flag: string, value: unknown): number {
  const raw = String(value).trim();
  if (!/^[+-]?\d+$/.test(raw)) {
    throw invalidFlag(flag, value, 'an integer');
  }
  return Number(raw);
}

export function parseNumberFlag(flag: string, value: unknown): number {
  const raw = String(value).trim();
  const num = raw === '' ? Number.NaN : Number(raw);
  if (!Number.isFinite(num)) {
    throw invalidFlag(flag, value, 'a finite number');
  }
  return num;
}

/**
 * Resolve --coeff-min/--coeff-max/--coeff-kind into a partial range; omitted
 * flags fall back to the core defaults.
 */
export function parseCoefficientRange(
  options: Pick<CliOptions, 'coeffMin' | 'coeffMax' | 'coeffKind'>
): Partial<CoefficientRange> {
  const range: Partial<CoefficientRange> = {};
  if (options.coeffMin !== undefined) {
    range.min = parseNumberFlag('--coeff-min', options.coeffMin);
  }
  if (options.coeffMax !== undefined) {
    range.max = parseNumberFlag('--coeff-max', options.coeffMax);
  }
  if (options.coeffKind !== undefined) {
    range.kind = resolveCoefficientKind(options.coeffKind);
  }
  return range;
}

export function resolveCoefficientKind(value: unknown): CoefficientKind {
  const raw = String(value).toLowerCase();
  if (raw === 'integer' || raw === 'real') {
    return raw;
  }
  throw invalidFlag('--coeff-kind', value, '"integer" or "real"');
}

/**
 * Parse CLI options into PlanOptions configuration
 */
export function parsePlanOptions(
  options: Pick<CliOptions, 'concentration' | 'distinctRows' | 'coverVariables'>
): Partial<PlanOptions> {
  const planOptions: Partial<PlanOptions> = {};

  if (options.concentration !== undefined) {
    planOptions.exponents = {
      concentration: parseNumberFlag('--concentration', options.concentration),
    };
  }

  if (
    options.distinctRows !== undefined ||
    options.coverVariables !== undefined
  ) {
    planOptions.refine = {};
    if (options.distinctRows !== undefined) {
      planOptions.refine.distinctRows = options.distinctRows;
    }
    if (options.coverVariables !== undefined) {
      planOptions.refine.coverVariables = options.coverVariables;
    }
  }

  return planOptions;
}

/**
 * Resolve output format flag into a known format or throw.
 */
export function resolveOutputFormat(value: unknown): OutputFormat {
  if (value === undefined || value === null || value === '') {
    return 'report';
  }
  const raw = String(value).toLowerCase();
  if (raw === 'report' || raw === 'json' || raw === 'ndjson') {
    return raw;
  }
  throw invalidFlag('--out', value, '"report", "json" or "ndjson"');
}

export function resolveRenderFormat(value: unknown): PolynomialFormat {
  if (value === undefined || value === null || value === '') {
    return 'text';
  }
  const raw = String(value).toLowerCase();
  if (isPolynomialFormat(raw)) {
    return raw;
  }
  throw invalidFlag('--format', value, '"text" or "latex"');
}
