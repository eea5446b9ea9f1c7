import type {
  MetricAggregate,
  MetricsCollector,
  MetricsSummary,
  MetricTags,
} from '../types/metrics.js';

interface MetricEntry {
  timestamp: number;
  value: number;
  tags: MetricTags;
}

export interface InMemoryMetricsCollectorOptions {
  now?: () => number;
  /** Oldest entries are dropped per metric beyond this count. */
  maxEntriesPerMetric?: number;
}

const DEFAULT_MAX_ENTRIES_PER_METRIC = 1_000;

export class InMemoryMetricsCollector implements MetricsCollector {
  readonly #entries: Map<string, MetricEntry[]> = new Map();
  readonly #now: () => number;
  readonly #maxEntriesPerMetric: number;

  constructor(options: InMemoryMetricsCollectorOptions = {}) {
    this.#now = options.now ?? Date.now;
    this.#maxEntriesPerMetric = Math.max(
      1,
      Number(options.maxEntriesPerMetric ?? DEFAULT_MAX_ENTRIES_PER_METRIC),
    );
  }

  recordMetric(name: string, value: number, tags: MetricTags = {}): void {
    const entries = this.#entries.get(name) ?? [];
    entries.push({ timestamp: this.#now(), value, tags });
    if (entries.length > this.#maxEntriesPerMetric) {
      entries.splice(0, entries.length - this.#maxEntriesPerMetric);
    }
    this.#entries.set(name, entries);
  }

  startTimer(name: string, tags: MetricTags = {}): () => number {
    const startedAt = this.#now();
    let stopped = false;
    return () => {
      const elapsed = this.#now() - startedAt;
      if (!stopped) {
        stopped = true;
        this.recordMetric(`${name}.duration_ms`, elapsed, tags);
      }
      return elapsed;
    };
  }

  /** Raw values recorded for a metric, oldest first. */
  values(name: string): number[] {
    return (this.#entries.get(name) ?? []).map((entry) => entry.value);
  }

  /** Aggregate every metric recorded within the last `windowMs` (all entries when omitted). */
  getSummary(windowMs?: number): MetricsSummary {
    const endTime = this.#now();
    const startTime = windowMs === undefined ? 0 : endTime - windowMs;
    const metrics: Record<string, MetricAggregate> = {};

    for (const [name, entries] of this.#entries) {
      const values = entries
        .filter((entry) => entry.timestamp >= startTime && entry.timestamp <= endTime)
        .map((entry) => entry.value);
      if (values.length === 0) continue;

      metrics[name] = {
        name,
        count: values.length,
        sum: values.reduce((total, value) => total + value, 0),
        min: Math.min(...values),
        max: Math.max(...values),
      };
    }

    return {
      startTime: new Date(startTime).toISOString(),
      endTime: new Date(endTime).toISOString(),
      metrics,
    };
  }

  reset(): void {
    this.#entries.clear();
  }
}
