export type MetricTags = Record<string, string>;

/**
 * Counter and timer hooks. Optional everywhere: a missing collector leaves
 * orchestration behaviour unchanged.
 */
export interface MetricsCollector {
  recordMetric(name: string, value: number, tags?: MetricTags): void;
  /** Starts a timer; the returned function records `<name>.duration_ms` and returns the elapsed ms. */
  startTimer(name: string, tags?: MetricTags): () => number;
}

export interface MetricAggregate {
  name: string;
  count: number;
  sum: number;
  min: number;
  max: number;
}

export interface MetricsSummary {
  startTime: string;
  endTime: string;
  metrics: Record<string, MetricAggregate>;
}
