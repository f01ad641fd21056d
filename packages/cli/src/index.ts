#!/usr/bin/env node

// CLI entry point
// - Command name: `polybench` with subcommands `generate`, `shape` and `verify`.
// - `generate` validates flags, calls generateInstances from @polybench/core
//   and prints a human-readable report (default), JSON or NDJSON to stdout.
// - Diagnostics (--debug, --print-metrics) go to stderr with a `[polybench]`
//   prefix; errors are rendered through ErrorPresenter and exit with the
//   code mapped from their ErrorCode.

import { Command } from 'commander';
import fs from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import {
  ErrorPresenter,
  ErrorCode,
  MetricsCollector,
  ParseError,
  PolyError,
  chooseShape,
  generateInstances,
  isPolyError,
  resolveCoefficientRange,
  resolveOptions,
  serializeInstance,
  toSerializedInstance,
  type PolynomialInstance,
} from '@polybench/core';
import { renderCLIView } from './render.js';
import {
  parseCoefficientRange,
  parseIntegerFlag,
  parsePlanOptions,
  resolveOutputFormat,
  resolveRenderFormat,
  type CliOptions,
  type OutputFormat,
} from './flags.js';
import { printEffectiveConfig, printMetrics } from './debug.js';
import { renderReport } from './report.js';
import { describeVerified, loadInstances } from './verify.js';

export function createProgram(): Command {
  const program = new Command();

  program
    .name('polybench')
    .description(
      'Generate polynomial benchmark instances with a known naive evaluation cost'
    )
    .version('0.1.0');

  program
    .command('generate')
    .description('Generate polynomial instances for a difficulty δ')
    .requiredOption('-d, --delta <number>', 'Difficulty δ (baseline cost)')
    .option('--seed <number>', 'Deterministic seed (drawn when omitted)')
    .option('-c, --count <number>', 'Number of instances to generate', '1')
    .option('--coeff-min <number>', 'Lower coefficient bound (default: -10)')
    .option('--coeff-max <number>', 'Upper coefficient bound (default: 10)')
    .option('--coeff-kind <kind>', 'Coefficient kind: integer|real')
    .option(
      '--concentration <number>',
      'Dirichlet concentration for exponent spread (default: 2)'
    )
    .option('--distinct-rows', 'Refine the matrix so no two monomials repeat')
    .option(
      '--cover-variables',
      'Refine the matrix so every variable appears in some monomial'
    )
    .option('--format <format>', 'Polynomial notation: text|latex', 'text')
    .option('--out <format>', 'Output format: report|json|ndjson', 'report')
    .option('-v, --verbose', 'Add row degrees and contributions to the report')
    .option('--print-metrics', 'Print generation metrics as JSON to stderr')
    .option('--debug', 'Print effective configuration to stderr')
    .action(async (options: CliOptions) => {
      try {
        runGenerate(options);
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  program
    .command('shape')
    .description('Print the (m, n) shape chosen for a difficulty and seed')
    .requiredOption('-d, --delta <number>', 'Difficulty δ')
    .option('--seed <number>', 'Deterministic seed (drawn when omitted)')
    .action(async (options: Pick<CliOptions, 'delta' | 'seed'>) => {
      try {
        const delta = parseIntegerFlag('--delta', options.delta);
        const seed =
          options.seed === undefined
            ? undefined
            : parseIntegerFlag('--seed', options.seed);
        const selection = chooseShape(delta, seed);
        process.stdout.write(JSON.stringify(selection) + '\n');
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  program
    .command('verify')
    .description('Check serialized instances against every invariant')
    .requiredOption('-f, --file <path>', 'Instance file (json or ndjson)')
    .action(async (options: { file: string }) => {
      try {
        const abs = path.resolve(process.cwd(), options.file);
        if (!fs.existsSync(abs)) {
          throw new ParseError({
            message: `Instance file not found: ${abs}`,
            context: { setting: '--file' },
          });
        }
        const instances = loadInstances(fs.readFileSync(abs, 'utf8'));
        process.stdout.write(instances.map(describeVerified).join('\n') + '\n');
      } catch (err: unknown) {
        await handleCliError(err);
      }
    });

  return program;
}

function runGenerate(options: CliOptions): void {
  const delta = parseIntegerFlag('--delta', options.delta);
  const count = parseIntegerFlag('--count', options.count ?? '1');
  const seed =
    options.seed === undefined
      ? undefined
      : parseIntegerFlag('--seed', options.seed);
  const coefficients = parseCoefficientRange(options);
  const plan = parsePlanOptions(options);
  const outFormat = resolveOutputFormat(options.out);
  const renderFormat = resolveRenderFormat(options.format);

  if (options.debug) {
    printEffectiveConfig({
      delta,
      seed,
      count,
      coefficients: resolveCoefficientRange(coefficients),
      plan: resolveOptions(plan),
    });
  }

  const metrics = new MetricsCollector({
    enabled: options.printMetrics === true,
  });
  const instances = generateInstances(delta, count, {
    seed,
    coefficients,
    plan,
    metrics,
  });

  writeInstances(instances, outFormat, (instance) =>
    renderReport(instance, {
      format: renderFormat,
      verbose: options.verbose === true,
    })
  );

  if (metrics.isEnabled()) {
    printMetrics(metrics.snapshotMetrics());
  }
}

function writeInstances(
  instances: PolynomialInstance[],
  outFormat: OutputFormat,
  report: (instance: PolynomialInstance) => string
): void {
  if (outFormat === 'ndjson') {
    const lines = instances.map((instance) => serializeInstance(instance));
    if (lines.length > 0) {
      process.stdout.write(lines.join('\n') + '\n');
    }
  } else if (outFormat === 'json') {
    process.stdout.write(
      JSON.stringify(instances.map(toSerializedInstance), null, 2) + '\n'
    );
  } else {
    process.stdout.write(instances.map(report).join('\n\n') + '\n');
  }
}

class InternalError extends PolyError {}

async function handleCliError(err: unknown): Promise<never> {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });

  let error: PolyError;
  if (isPolyError(err)) {
    error = err;
  } else {
    const message = err instanceof Error ? err.message : String(err);
    error = new InternalError({
      message: message || 'Unexpected error',
      errorCode: ErrorCode.INTERNAL_ERROR,
      cause: err instanceof Error ? err : undefined,
    });
  }

  const view = presenter.formatForCLI(error);
  console.error(renderCLIView(view));

  process.exit(error.getExitCode());
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await createProgram().parseAsync(argv).catch(handleCliError);
}

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
