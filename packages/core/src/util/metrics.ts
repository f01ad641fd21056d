import { performance } from 'node:perf_hooks';

export const METRIC_PHASES = {
  SHAPE: 'shapeMs',
  BUDGETS: 'budgetsMs',
  EXPONENTS: 'exponentsMs',
  REFINE: 'refineMs',
  COEFFICIENTS: 'coefficientsMs',
  VERIFY: 'verifyMs',
} as const;

export type MetricPhase = keyof typeof METRIC_PHASES;

export interface MetricsSnapshot {
  shapeMs: number;
  budgetsMs: number;
  exponentsMs: number;
  refineMs: number;
  coefficientsMs: number;
  verifyMs: number;
  instances: number;
  /** Unit moves spent closing the rounding residual of exponent vectors */
  repairSteps: number;
  /** Coefficient draws discarded for landing on zero */
  coefficientRejections: number;
  /** Unit moves applied by the matrix refinement pass */
  refineMoves: number;
}

type MetricsPhaseKey = (typeof METRIC_PHASES)[MetricPhase];

interface IdleTimerState {
  total: number;
  startedAt?: undefined;
}

interface ActiveTimerState {
  total: number;
  startedAt: number;
}

type TimerState = IdleTimerState | ActiveTimerState;

const DEFAULT_COUNTERS: MetricsSnapshot = {
  shapeMs: 0,
  budgetsMs: 0,
  exponentsMs: 0,
  refineMs: 0,
  coefficientsMs: 0,
  verifyMs: 0,
  instances: 0,
  repairSteps: 0,
  coefficientRejections: 0,
  refineMoves: 0,
};

export type MetricCounter =
  | 'instances'
  | 'repairSteps'
  | 'coefficientRejections'
  | 'refineMoves';

export interface MetricsCollectorOptions {
  now?: () => number;
  enabled?: boolean;
}

export class MetricsCollector {
  private readonly now: () => number;
  private readonly enabled: boolean;
  private readonly timers: Record<MetricsPhaseKey, TimerState>;
  private snapshot: MetricsSnapshot;

  constructor(options: MetricsCollectorOptions = {}) {
    this.now = options.now ?? (() => performance.now());
    this.enabled = options.enabled ?? true;
    this.snapshot = { ...DEFAULT_COUNTERS };
    this.timers = {
      shapeMs: { total: 0 },
      budgetsMs: { total: 0 },
      exponentsMs: { total: 0 },
      refineMs: { total: 0 },
      coefficientsMs: { total: 0 },
      verifyMs: { total: 0 },
    };
  }

  public isEnabled(): boolean {
    return this.enabled;
  }

  public begin(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} already started`);
    }

    this.timers[key] = { total: current.total, startedAt: this.now() };
  }

  public end(phase: MetricPhase): void {
    if (!this.enabled) {
      return;
    }
    const key = METRIC_PHASES[phase];
    const current = this.timers[key];
    if (!isActiveTimerState(current)) {
      throw new Error(`Metrics timer for ${phase} was not started`);
    }

    this.accumulateDuration(key, this.now() - current.startedAt);
    this.timers[key] = { total: this.snapshot[key] };
  }

  /** Runs fn inside begin/end; the timer is closed even when fn throws. */
  public time<T>(phase: MetricPhase, fn: () => T): T {
    this.begin(phase);
    try {
      return fn();
    } finally {
      this.end(phase);
    }
  }

  public recordDuration(phase: MetricPhase, durationMs: number): void {
    if (!this.enabled) {
      return;
    }
    this.accumulateDuration(METRIC_PHASES[phase], durationMs);
  }

  public increment(counter: MetricCounter, count = 1): void {
    if (!this.enabled) {
      return;
    }
    this.snapshot[counter] += count;
  }

  public snapshotMetrics(): MetricsSnapshot {
    return { ...this.snapshot };
  }

  private accumulateDuration(key: MetricsPhaseKey, durationMs: number): void {
    const safeDuration = Number.isFinite(durationMs)
      ? Math.max(0, durationMs)
      : 0;
    this.snapshot[key] += safeDuration;
  }
}

function isActiveTimerState(state: TimerState): state is ActiveTimerState {
  return typeof state.startedAt === 'number';
}
