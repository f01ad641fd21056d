// @polybench/core entry point
//
// Public API:
// - generateInstance / generateInstances / chooseShape from ./api.js are the
//   preferred entry points; they run shape, budgets, exponents, optional
//   refinement, coefficients and verification in that order.
// - The individual stages, the renderers, the JSON codec, errors and metrics
//   are re-exported for callers that compose their own pipeline.

export * from './api.js';

// Domain types
export type {
  ExponentMatrix,
  Shape,
  ShapeSelection,
  PolynomialTerms,
  PolynomialInstance,
} from './types/instance.js';

// Options
export {
  DEFAULT_OPTIONS,
  DEFAULT_COEFFICIENT_RANGE,
  resolveOptions,
  type Interval,
  type ShapeOptions,
  type ExponentOptions,
  type RefineOptions,
  type PlanOptions,
  type ResolvedOptions,
  type CoefficientKind,
  type CoefficientRange,
} from './types/options.js';

// Generator stages
export {
  assertDifficulty,
  isFeasibleShape,
  validateShape,
  selectShape,
} from './generator/shape-chooser.js';
export { sampleDegreeBudgets } from './generator/degree-budget.js';
export {
  proposeExponentVector,
  repairExponentVector,
  distributeDegree,
  sampleExponentVector,
  type ExponentRepair,
} from './generator/exponent-vector.js';
export {
  refineExponentMatrix,
  type RefineResult,
} from './generator/matrix-refine.js';
export {
  resolveCoefficientRange,
  sampleCoefficients,
  type ResolvedCoefficientRange,
  type CoefficientDraw,
} from './generator/coefficients.js';
export {
  rowDegrees,
  computeBaselineCost,
  verifyInstance,
  assembleInstance,
  type InstanceDraft,
} from './generator/instance-assembler.js';

// Rendering
export {
  formatCoefficient,
  renderPolynomialText,
  renderPolynomialLatex,
  POLYNOMIAL_RENDERERS,
  isPolynomialFormat,
  type RenderOptions,
  type PolynomialRenderer,
  type PolynomialFormat,
} from './render/polynomial.js';

// Serialization
export {
  INSTANCE_JSON_SCHEMA,
  toSerializedInstance,
  serializeInstance,
  parseInstance,
  type SerializedInstance,
} from './serialize/instance-codec.js';

// Errors
export {
  ErrorCode,
  EXIT_CODES,
  type Severity,
  getExitCode,
} from './errors/codes.js';
export {
  ErrorPresenter,
  type CLIErrorView,
  type PresenterOptions,
} from './errors/presenter.js';
export {
  PolyError,
  InputError,
  ShapeError,
  BudgetError,
  ConsistencyError,
  ConfigError,
  ParseError,
  isPolyError,
  type ErrorContext,
  type SerializedError,
  type PolyErrorParams,
} from './types/errors.js';

// Metrics
export {
  METRIC_PHASES,
  MetricsCollector,
  type MetricPhase,
  type MetricCounter,
  type MetricsSnapshot,
  type MetricsCollectorOptions,
} from './util/metrics.js';

// Randomness
export {
  XorShift32,
  RNG_STREAMS,
  createStream,
  fnv1a32,
  mix32,
  normalizeSeed,
  drawEntropySeed,
  type RandomSource,
  type RngStream,
} from './util/rng.js';
export {
  uniform,
  uniformInt,
  standardNormal,
  gammaVariate,
  symmetricDirichlet,
  sampleDistinctIntegers,
} from './util/sampling.js';
