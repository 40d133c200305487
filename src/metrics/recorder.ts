/**
 * @fileoverview Metrics sink contract and the in-memory recorder.
 *
 * The pipeline emits through {@link MetricsSink}; exporting to a real
 * backend is the caller's concern.
 */

export const METRIC_NAMES = {
  harmonyScore: 'concord.harmony_score',
  resolutionFailures: 'concord.resolution.failures',
  scorerThroughput: 'concord.scorer.throughput',
  cacheHits: 'concord.cache.hits',
  cacheMisses: 'concord.cache.misses',
} as const;

export type MetricName = (typeof METRIC_NAMES)[keyof typeof METRIC_NAMES];

export type MetricTags = Readonly<Record<string, string>>;

export interface MetricsSink {
  increment(name: string, value?: number, tags?: MetricTags): void;
  gauge(name: string, value: number, tags?: MetricTags): void;
  /** Record one observation of a distribution. */
  observe(name: string, value: number, tags?: MetricTags): void;
}

export const noopMetrics: MetricsSink = {
  increment: () => {},
  gauge: () => {},
  observe: () => {},
};

export interface DistributionSummary {
  count: number;
  sum: number;
  min: number;
  max: number;
  mean: number;
}

export interface MetricsSnapshot {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  distributions: Record<string, DistributionSummary>;
}

function seriesKey(name: string, tags?: MetricTags): string {
  if (!tags) return name;
  const parts = Object.keys(tags)
    .sort()
    .map((key) => `${key}=${tags[key]}`);
  return parts.length > 0 ? `${name}{${parts.join(',')}}` : name;
}

/**
 * Keeps every series in memory. Tagged series are keyed as
 * `name{key=value,...}` with tag keys sorted.
 */
export class InMemoryMetricsRecorder implements MetricsSink {
  private readonly counters = new Map<string, number>();
  private readonly gauges = new Map<string, number>();
  private readonly observations = new Map<string, number[]>();

  increment(name: string, value = 1, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    this.counters.set(key, (this.counters.get(key) ?? 0) + value);
  }

  gauge(name: string, value: number, tags?: MetricTags): void {
    this.gauges.set(seriesKey(name, tags), value);
  }

  observe(name: string, value: number, tags?: MetricTags): void {
    const key = seriesKey(name, tags);
    const values = this.observations.get(key) ?? [];
    values.push(value);
    this.observations.set(key, values);
  }

  counter(name: string, tags?: MetricTags): number {
    return this.counters.get(seriesKey(name, tags)) ?? 0;
  }

  gaugeValue(name: string, tags?: MetricTags): number | undefined {
    return this.gauges.get(seriesKey(name, tags));
  }

  values(name: string, tags?: MetricTags): number[] {
    return [...(this.observations.get(seriesKey(name, tags)) ?? [])];
  }

  snapshot(): MetricsSnapshot {
    const distributions: Record<string, DistributionSummary> = {};
    for (const [key, values] of this.observations) {
      const sum = values.reduce((total, value) => total + value, 0);
      distributions[key] = {
        count: values.length,
        sum,
        min: values.reduce((lowest, value) => Math.min(lowest, value), Number.POSITIVE_INFINITY),
        max: values.reduce((highest, value) => Math.max(highest, value), Number.NEGATIVE_INFINITY),
        mean: sum / values.length,
      };
    }
    return {
      counters: Object.fromEntries(this.counters),
      gauges: Object.fromEntries(this.gauges),
      distributions,
    };
  }

  reset(): void {
    this.counters.clear();
    this.gauges.clear();
    this.observations.clear();
  }
}
