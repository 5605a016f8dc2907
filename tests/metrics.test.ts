import { describe, expect, it } from 'vitest';
import { MetricsRegistry } from '../src/metrics/index.js';

describe('MetricsRegistry', () => {
  it('counts windows, outcomes and calibration commands', () => {
    const metrics = new MetricsRegistry();

    metrics.recordWindow(1);
    metrics.recordWindow(null);
    metrics.recordInvalidWindow();
    metrics.recordOutcome('candidate', 'candidate');
    metrics.recordOutcome('confirmed', 'persisted');
    metrics.recordOutcome('none', 'cooldown');
    metrics.recordCalibrationBlock();
    metrics.recordCalibrationCommand('set', true);
    metrics.recordCalibrationCommand('set', false);
    metrics.recordSessionStart('phase2');

    const snapshot = metrics.snapshot();

    expect(snapshot.windows.total).toBe(2);
    expect(snapshot.windows.invalid).toBe(1);
    expect(snapshot.windows.lastWindowId).toBe(1);
    expect(snapshot.outcomes.byKind).toEqual({ candidate: 1, confirmed: 1, none: 1 });
    expect(snapshot.outcomes.byReason).toEqual({ candidate: 1, cooldown: 1, persisted: 1 });
    expect(snapshot.outcomes.blockedByCalibration).toBe(1);
    expect(snapshot.calibration.commands).toEqual({ set: 2 });
    expect(snapshot.calibration.errors).toEqual({ set: 1 });
    expect(snapshot.calibration.sessionsStarted).toEqual({ phase2: 1 });
  });

  it('tracks notification retries and the last dispatch failure', () => {
    const metrics = new MetricsRegistry();

    metrics.recordNotification(true, 2);
    metrics.recordNotification(false, 2);
    metrics.recordDispatchFailure('notify', 'HTTP 500');

    const { dispatch } = metrics.snapshot();

    expect(dispatch.notified).toBe(1);
    expect(dispatch.notifyFailures).toBe(1);
    expect(dispatch.notifyRetries).toBe(2);
    expect(dispatch.storeFailures).toBe(0);
    expect(dispatch.lastFailure?.message).toBe('HTTP 500');
  });

  it('aggregates latency observations', () => {
    const metrics = new MetricsRegistry();

    metrics.observeLatency('gating.evaluate', 2);
    metrics.observeLatency('gating.evaluate', 6);

    expect(metrics.snapshot().latencies['gating.evaluate']).toEqual({
      count: 2,
      totalMs: 8,
      minMs: 2,
      maxMs: 6,
      averageMs: 4
    });
  });

  it('renders Prometheus text with sorted labels', () => {
    const metrics = new MetricsRegistry();
    metrics.recordWindow(4);
    metrics.recordWindow(5);
    metrics.recordChannelFailure('read', new Error('EACCES'));

    const lines = metrics.exportPrometheus({ labels: { site: 'nursery' } }).split('\n');

    expect(lines).toContain('# HELP lullwatch_windows_total Audio windows evaluated by the gating engine');
    expect(lines).toContain('# TYPE lullwatch_windows_total counter');
    expect(lines).toContain('lullwatch_windows_total{site="nursery"} 2');
    expect(lines).toContain('lullwatch_state_channel_failures_total{operation="read",site="nursery"} 1');
    expect(lines).toContain('lullwatch_state_channel_failures_total{operation="publish",site="nursery"} 0');
  });

  it('clears every counter on reset', () => {
    const metrics = new MetricsRegistry();
    let resets = 0;
    metrics.onReset(() => {
      resets += 1;
    });
    metrics.recordWindow(1);
    metrics.recordWatchEmission();

    metrics.reset();

    expect(resets).toBe(1);
    expect(metrics.snapshot().windows.total).toBe(0);
    expect(metrics.snapshot().calibration.watchEmissions).toBe(0);
  });
});
