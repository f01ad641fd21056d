import {
  ParseError,
  formatCoefficient,
  parseInstance,
  type PolynomialInstance,
} from '@polybench/core';
import { formatVerification } from './report.js';

function isJsonLine(line: string): boolean {
  return line.startsWith('{') && line.endsWith('}');
}

/**
 * Load every instance in a file written by `generate`: a single JSON
 * document, a JSON array (--out json) or one document per line (--out ndjson).
 */
export function loadInstances(text: string): PolynomialInstance[] {
  const trimmed = text.trim();
  if (trimmed === '') {
    throw new ParseError({ message: 'Instance file is empty' });
  }

  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (cause) {
      throw new ParseError({
        message: 'Instance file is not valid JSON',
        context: { valueExcerpt: trimmed.slice(0, 80) },
        cause: cause instanceof Error ? cause : undefined,
      });
    }
    if (!Array.isArray(parsed)) {
      throw new ParseError({ message: 'Expected a JSON array of instances' });
    }
    return parsed.map((document: unknown) => parseInstance(document));
  }

  const lines = trimmed
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line !== '');
  if (lines.length > 1 && lines.every(isJsonLine)) {
    return lines.map((line) => parseInstance(line));
  }
  return [parseInstance(trimmed)];
}

export function describeVerified(instance: PolynomialInstance): string {
  const coefficients = instance.coefficients
    .map((c) => formatCoefficient(c))
    .join(', ');
  return `${formatVerification(instance)} (seed=${instance.seed}, m=${instance.m}, n=${instance.n}, coefficients=[${coefficients}])`;
}
