import { describe, expect, it } from 'vitest';

import { MetricsCollector } from '../metrics.js';

describe('MetricsCollector', () => {
  it('tracks phase durations using injected clock', () => {
    let now = 0;
    const collector = new MetricsCollector({ now: () => now });
    expect(collector.isEnabled()).toBe(true);

    collector.begin('SHAPE');
    now += 5;
    collector.end('SHAPE');

    collector.recordDuration('BUDGETS', 7);

    collector.begin('EXPONENTS');
    now += 3;
    collector.end('EXPONENTS');

    const snapshot = collector.snapshotMetrics();
    expect(snapshot.shapeMs).toBe(5);
    expect(snapshot.budgetsMs).toBe(7);
    expect(snapshot.exponentsMs).toBe(3);
    expect(snapshot.refineMs).toBe(0);
    expect(snapshot.coefficientsMs).toBe(0);
    expect(snapshot.verifyMs).toBe(0);
  });

  it('accumulates repeated phases', () => {
    let now = 0;
    const collector = new MetricsCollector({ now: () => now });
    for (let i = 0; i < 3; i++) {
      collector.time('VERIFY', () => {
        now += 2;
      });
    }
    expect(collector.snapshotMetrics().verifyMs).toBe(6);
  });

  it('closes the timer when the timed function throws', () => {
    let now = 0;
    const collector = new MetricsCollector({ now: () => now });
    expect(() =>
      collector.time('COEFFICIENTS', () => {
        now += 4;
        throw new Error('boom');
      })
    ).toThrow('boom');
    expect(collector.snapshotMetrics().coefficientsMs).toBe(4);
    // a second begin would throw if the timer were still open
    expect(() => collector.time('COEFFICIENTS', () => 1)).not.toThrow();
  });

  it('increments counters', () => {
    const collector = new MetricsCollector({ now: () => 0 });
    collector.increment('instances');
    collector.increment('instances');
    collector.increment('repairSteps', 4);
    collector.increment('coefficientRejections', 2);
    collector.increment('refineMoves', 3);

    const snapshot = collector.snapshotMetrics();
    expect(snapshot.instances).toBe(2);
    expect(snapshot.repairSteps).toBe(4);
    expect(snapshot.coefficientRejections).toBe(2);
    expect(snapshot.refineMoves).toBe(3);
  });

  it('ignores negative and non-finite durations', () => {
    const collector = new MetricsCollector({ now: () => 0 });
    collector.recordDuration('REFINE', -5);
    collector.recordDuration('REFINE', Number.NaN);
    expect(collector.snapshotMetrics().refineMs).toBe(0);
  });

  it('guards against unbalanced begin/end', () => {
    const collector = new MetricsCollector({ now: () => 0 });
    expect(() => collector.end('SHAPE')).toThrow(
      'Metrics timer for SHAPE was not started'
    );
    collector.begin('SHAPE');
    expect(() => collector.begin('SHAPE')).toThrow(
      'Metrics timer for SHAPE already started'
    );
  });

  it('records nothing when disabled', () => {
    let now = 0;
    const collector = new MetricsCollector({ now: () => now, enabled: false });
    collector.time('SHAPE', () => {
      now += 10;
    });
    collector.increment('instances', 5);
    collector.end('BUDGETS');

    const snapshot = collector.snapshotMetrics();
    expect(collector.isEnabled()).toBe(false);
    expect(snapshot.shapeMs).toBe(0);
    expect(snapshot.instances).toBe(0);
  });

  it('returns snapshots detached from the collector', () => {
    const collector = new MetricsCollector({ now: () => 0 });
    const before = collector.snapshotMetrics();
    collector.increment('instances');
    expect(before.instances).toBe(0);
    expect(collector.snapshotMetrics().instances).toBe(1);
  });
});
