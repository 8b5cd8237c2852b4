import type { Logger } from '@workspace/logger';

type DurationSummary = {
  count: number;
  min: number;
  max: number;
  avg: number;
  total: number;
};

type DurationSeries = {
  count: number;
  min: number;
  max: number;
  total: number;
};

type MetricSnapshot = {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  durations: Record<string, DurationSummary>;
};

export class ResilienceMetrics {
  private readonly counters: Map<string, number>;
  private readonly gauges: Map<string, number>;
  private readonly durations: Map<string, DurationSeries>;

  constructor() {
    this.counters = new Map();
    this.gauges = new Map();
    this.durations = new Map();
  }

  increment(counter: string, amount = 1): void {
    const current = this.counters.get(counter) ?? 0;
    this.counters.set(counter, current + amount);
  }

  gauge(name: string, value: number): void {
    this.gauges.set(name, value);
  }

  recordDuration(name: string, ms: number): void {
    const series = this.durations.get(name);

    if (!series) {
      this.durations.set(name, { count: 1, min: ms, max: ms, total: ms });
      return;
    }

    series.count += 1;
    series.min = Math.min(series.min, ms);
    series.max = Math.max(series.max, ms);
    series.total += ms;
  }

  snapshot(): MetricSnapshot {
    const durations: Record<string, DurationSummary> = {};
    for (const [name, series] of this.durations) {
      durations[name] = {
        count: series.count,
        min: series.min,
        max: series.max,
        avg: series.total / series.count,
        total: series.total,
      };
    }

    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      durations,
    };
  }

  log(logger: Pick<Logger, 'info'>): void {
    logger.info('Metrics snapshot', this.snapshot());
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.durations.clear();
  }
}

export type { MetricSnapshot, DurationSummary };
