import {
  POLYNOMIAL_RENDERERS,
  formatCoefficient,
  rowDegrees,
  type ExponentMatrix,
  type PolynomialFormat,
  type PolynomialInstance,
} from '@polybench/core';

export interface ReportOptions {
  format?: PolynomialFormat;
  verbose?: boolean;
}

const RULE = '='.repeat(50);

/**
 * Right-aligned rows, one bracketed line each: `  [2  1  0]`
 */
export function formatMatrix(matrix: ExponentMatrix): string[] {
  if (matrix.length === 0) return ['  (empty matrix)'];
  const width = Math.max(
    ...matrix.flatMap((row) => row.map((value) => String(value).length))
  );
  return matrix.map(
    (row) =>
      `  [${row.map((value) => String(value).padStart(width)).join('  ')}]`
  );
}

export function formatVerification(instance: PolynomialInstance): string {
  return instance.baseline === instance.delta
    ? `✓ Baseline ${instance.baseline} matches target δ = ${instance.delta}`
    : `✗ Baseline ${instance.baseline} differs from target δ = ${instance.delta}`;
}

export function renderReport(
  instance: PolynomialInstance,
  options: ReportOptions = {}
): string {
  const render = POLYNOMIAL_RENDERERS[options.format ?? 'text'];
  const coefficients = instance.coefficients
    .map((c) => formatCoefficient(c))
    .join(', ');

  const lines: string[] = [
    RULE,
    'POLYNOMIAL INSTANCE',
    RULE,
    `δ (difficulty): ${instance.delta}`,
    `Seed: ${instance.seed}`,
    `Shape (m, n): (${instance.m}, ${instance.n})`,
    `Degree budgets: [${instance.budgets.join(', ')}]`,
    '',
    `Exponent matrix K (${instance.m}×${instance.n}):`,
    ...formatMatrix(instance.matrix),
    '',
    `Coefficients: [${coefficients}]`,
    '',
    `P(x) = ${render(instance)}`,
    '',
    `Baseline Kbase(P): ${instance.baseline}`,
    formatVerification(instance),
  ];

  if (options.verbose) {
    const degrees = rowDegrees(instance.matrix);
    const contributions = degrees.map((d) => Math.max(0, d - 1));
    lines.push(
      '',
      `Row degrees: [${degrees.join(', ')}]`,
      `Contributions (degree - 1): [${contributions.join(', ')}]`,
      `Total: ${contributions.reduce((acc, c) => acc + c, 0)}`
    );
  }

  return lines.join('\n');
}
