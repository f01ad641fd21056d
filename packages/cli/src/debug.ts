import type {
  MetricsSnapshot,
  ResolvedCoefficientRange,
  ResolvedOptions,
} from '@polybench/core';

/**
 * Diagnostics go to stderr with a fixed prefix so stdout stays parseable.
 */
export function logLine(message: string): void {
  process.stderr.write(`[polybench] ${message}\n`);
}

export interface EffectiveConfig {
  delta: number;
  seed?: number;
  count: number;
  coefficients: ResolvedCoefficientRange;
  plan: ResolvedOptions;
}

/**
 * Print the configuration a generate run resolved to.
 * Intended to be used behind the --debug flag.
 */
export function printEffectiveConfig(config: EffectiveConfig): void {
  logLine(`effective config: ${JSON.stringify(config, null, 2)}`);
}

export function printMetrics(snapshot: MetricsSnapshot): void {
  logLine(`metrics: ${JSON.stringify(snapshot)}`);
}
