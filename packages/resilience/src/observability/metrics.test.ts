import { describe, it, expect, vi } from 'vitest';
import { ResilienceMetrics } from './metrics.js';

describe('ResilienceMetrics', () => {
  it('increments counters', () => {
    const metrics = new ResilienceMetrics();
    metrics.increment('router.attempts');
    metrics.increment('router.attempts');
    metrics.increment('router.fallbacks');

    const snap = metrics.snapshot();
    expect(snap.counters['router.attempts']).toBe(2);
    expect(snap.counters['router.fallbacks']).toBe(1);
  });

  it('keeps the latest gauge value', () => {
    const metrics = new ResilienceMetrics();
    metrics.gauge('limiter.trackedKeys', 40);
    metrics.gauge('limiter.trackedKeys', 12);

    expect(metrics.snapshot().gauges['limiter.trackedKeys']).toBe(12);
  });

  it('summarizes durations per name', () => {
    const metrics = new ResilienceMetrics();
    metrics.recordDuration('provider.openai', 100);
    metrics.recordDuration('provider.openai', 300);
    metrics.recordDuration('provider.google', 50);

    const snap = metrics.snapshot();
    expect(snap.durations['provider.openai']).toEqual({
      count: 2,
      min: 100,
      max: 300,
      avg: 200,
      total: 400,
    });
    expect(snap.durations['provider.google']?.count).toBe(1);
  });

  it('summarizes a long-running series without retaining samples', () => {
    const metrics = new ResilienceMetrics();
    for (let index = 0; index < 500_000; index += 1) {
      metrics.recordDuration('provider.google', (index % 1000) + 1);
    }

    expect(metrics.snapshot().durations['provider.google']).toEqual({
      count: 500_000,
      min: 1,
      max: 1000,
      avg: 500.5,
      total: 250_250_000,
    });
  });

  it('log writes the snapshot as structured fields', () => {
    const metrics = new ResilienceMetrics();
    metrics.increment('limiter.denied');
    const logger = { info: vi.fn() };

    metrics.log(logger);

    expect(logger.info).toHaveBeenCalledWith('Metrics snapshot', {
      counters: { 'limiter.denied': 1 },
      gauges: {},
      durations: {},
    });
  });

  it('reset clears state', () => {
    const metrics = new ResilienceMetrics();
    metrics.increment('x');
    metrics.gauge('y', 5);
    metrics.recordDuration('z', 100);

    metrics.reset();

    const snap = metrics.snapshot();
    expect(Object.keys(snap.counters)).toHaveLength(0);
    expect(Object.keys(snap.gauges)).toHaveLength(0);
    expect(Object.keys(snap.durations)).toHaveLength(0);
  });
});
