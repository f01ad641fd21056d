import type { PolynomialTerms } from '../types/instance.js';

export interface RenderOptions {
  /** Variable name stem (default: 'x') */
  variablePrefix?: string;
  /** Index of the first variable (default: 1, giving x1..xn) */
  indexBase?: number;
  /** Significant digits for non-integer coefficients (default: 6) */
  precision?: number;
}

export type PolynomialRenderer = (
  terms: PolynomialTerms,
  options?: RenderOptions
) => string;

interface TermSyntax {
  factor(name: string, index: number, exponent: number): string;
  product: string;
  scale: string;
}

const TEXT_SYNTAX: TermSyntax = {
  factor: (name, index, exponent) =>
    exponent === 1 ? `${name}${index}` : `${name}${index}^${exponent}`,
  product: '*',
  scale: '*',
};

const LATEX_SYNTAX: TermSyntax = {
  factor: (name, index, exponent) =>
    exponent === 1
      ? `${name}_{${index}}`
      : `${name}_{${index}}^{${exponent}}`,
  product: ' ',
  scale: ' ',
};

export function formatCoefficient(value: number, precision = 6): string {
  if (Number.isInteger(value)) return String(value);
  return String(Number(value.toPrecision(precision)));
}

function renderWith(
  syntax: TermSyntax,
  terms: PolynomialTerms,
  options: RenderOptions
): string {
  const prefix = options.variablePrefix ?? 'x';
  const base = options.indexBase ?? 1;
  const precision = options.precision ?? 6;

  const parts = terms.matrix.map((row, i) => {
    const coefficient = terms.coefficients[i] ?? 0;
    const factors = row
      .map((exponent, j) =>
        exponent > 0 ? syntax.factor(prefix, j + base, exponent) : ''
      )
      .filter((factor) => factor !== '')
      .join(syntax.product);
    const magnitude = formatCoefficient(Math.abs(coefficient), precision);
    let body: string;
    if (factors === '') {
      body = magnitude;
    } else if (magnitude === '1') {
      body = factors;
    } else {
      body = `${magnitude}${syntax.scale}${factors}`;
    }
    return { negative: coefficient < 0, body };
  });

  if (parts.length === 0) return '0';
  return parts
    .map(({ negative, body }, idx) => {
      if (idx === 0) return negative ? `-${body}` : body;
      return negative ? ` - ${body}` : ` + ${body}`;
    })
    .join('');
}

/** `3*x1^2*x2 - x3` */
export const renderPolynomialText: PolynomialRenderer = (terms, options = {}) =>
  renderWith(TEXT_SYNTAX, terms, options);

/** `3 x_{1}^{2} x_{2} - x_{3}` */
export const renderPolynomialLatex: PolynomialRenderer = (
  terms,
  options = {}
) => renderWith(LATEX_SYNTAX, terms, options);

export const POLYNOMIAL_RENDERERS = {
  text: renderPolynomialText,
  latex: renderPolynomialLatex,
} satisfies Record<string, PolynomialRenderer>;

export type PolynomialFormat = keyof typeof POLYNOMIAL_RENDERERS;

export function isPolynomialFormat(value: string): value is PolynomialFormat {
  return Object.prototype.hasOwnProperty.call(POLYNOMIAL_RENDERERS, value);
}
