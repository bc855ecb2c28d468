import type { MetricsJson, TimingSummary } from '@vaultwatch/shared';

export const DEFAULT_TIMING_WINDOW = 100;
export const DEFAULT_METRICS_PREFIX = 'vaultwatch';

export interface MetricsTrackerOptions {
  /** Samples retained per timing series */
  timingWindow?: number;
  /** Namespace for Prometheus metric names */
  prefix?: string;
  now?: () => number;
}

/** The subset of the tracker a handler or subsystem may write through. */
export interface MetricsSink {
  incrementCounter(name: string, by?: number): void;
  setGauge(name: string, value: number): void;
  recordTiming(name: string, seconds: number): void;
  getCounter(name: string): number;
  getGauge(name: string): number | undefined;
}

/** Fixed-capacity buffer keeping the most recent samples. */
class TimingRing {
  private samples: number[] = [];
  private cursor = 0;

  constructor(private capacity: number) {}

  push(value: number) {
    if (this.samples.length < this.capacity) {
      this.samples.push(value);
    } else {
      this.samples[this.cursor] = value;
    }
    this.cursor = (this.cursor + 1) % this.capacity;
  }

  values(): number[] {
    return [...this.samples];
  }
}

interface Snapshot {
  counters: Map<string, number>;
  gauges: Map<string, number>;
  timings: Map<string, TimingSummary>;
  at: number;
}

function summarize(samples: number[]): TimingSummary {
  if (samples.length === 0) return { count: 0, avg: 0, min: 0, max: 0 };
  let sum = 0;
  let min = Infinity;
  let max = -Infinity;
  for (const s of samples) {
    sum += s;
    if (s < min) min = s;
    if (s > max) max = s;
  }
  return { count: samples.length, avg: sum / samples.length, min, max };
}

function sortedEntries<T>(map: Map<string, T>): Array<[string, T]> {
  return [...map.entries()].sort(([a], [b]) => a.localeCompare(b));
}

const TIMING_SUFFIXES = ['count', 'avg', 'min', 'max'] as const;

type SeriesKind = 'counter' | 'gauge' | 'timing';

export function prometheusName(prefix: string, name: string): string {
  return `${prefix}_${name}`.replace(/[^a-zA-Z0-9_]/g, '_');
}

function formatValue(value: number): string {
  if (Number.isNaN(value)) return 'NaN';
  if (value === Infinity) return '+Inf';
  if (value === -Infinity) return '-Inf';
  return String(value);
}

/**
 * In-memory counters, gauges and timing series.
 *
 * Counters are monotonic non-negative integers. Timing aggregates are
 * computed from the retained samples at export time, and both export
 * formats render the same snapshot.
 */
export class MetricsTracker implements MetricsSink {
  readonly prefix: string;
  private counters = new Map<string, number>();
  private gauges = new Map<string, number>();
  private timings = new Map<string, TimingRing>();
  /** Exposition name to the series that renders it */
  private exposedBy = new Map<string, string>();
  private timingWindow: number;
  private now: () => number;

  constructor(options: MetricsTrackerOptions = {}) {
    this.timingWindow = Math.max(1, options.timingWindow ?? DEFAULT_TIMING_WINDOW);
    this.prefix = options.prefix ?? DEFAULT_METRICS_PREFIX;
    this.now = options.now ?? Date.now;
  }

  incrementCounter(name: string, by = 1) {
    if (!Number.isInteger(by) || by < 0) {
      throw new RangeError(`Counter ${name} can only grow by a non-negative integer, got ${by}`);
    }
    const current = this.counters.get(name);
    if (current === undefined) this.claim('counter', name);
    this.counters.set(name, (current ?? 0) + by);
  }

  setGauge(name: string, value: number) {
    if (!this.gauges.has(name)) this.claim('gauge', name);
    this.gauges.set(name, value);
  }

  recordTiming(name: string, seconds: number) {
    let ring = this.timings.get(name);
    if (!ring) {
      this.claim('timing', name);
      ring = new TimingRing(this.timingWindow);
      this.timings.set(name, ring);
    }
    ring.push(seconds);
  }

  getCounter(name: string): number {
    return this.counters.get(name) ?? 0;
  }

  getGauge(name: string): number | undefined {
    return this.gauges.get(name);
  }

  getTiming(name: string): TimingSummary | undefined {
    const ring = this.timings.get(name);
    return ring ? summarize(ring.values()) : undefined;
  }

  /** Same API with every name namespaced as `<prefix>.<name>`. */
  scoped(prefix: string): MetricsSink {
    const key = (name: string) => `${prefix}.${name}`;
    return {
      incrementCounter: (name, by) => this.incrementCounter(key(name), by),
      setGauge: (name, value) => this.setGauge(key(name), value),
      recordTiming: (name, seconds) => this.recordTiming(key(name), seconds),
      getCounter: (name) => this.getCounter(key(name)),
      getGauge: (name) => this.getGauge(key(name)),
    };
  }

  exportJson(): MetricsJson {
    return MetricsTracker.toJson(this.snapshot());
  }

  exportPrometheus(): string {
    return this.toPrometheus(this.snapshot());
  }

  /** Both views at one instant, for callers that must compare them. */
  exportBoth(): { json: MetricsJson; prometheus: string } {
    const snap = this.snapshot();
    return { json: MetricsTracker.toJson(snap), prometheus: this.toPrometheus(snap) };
  }

  /**
   * Reserve the exposition names of a new series. Names differing only in
   * characters Prometheus does not allow (`a.b`, `a_b`) would render as one
   * metric, so the second series is rejected.
   */
  private claim(kind: SeriesKind, name: string) {
    const owner = `${kind} ${name}`;
    const base = prometheusName(this.prefix, name);
    const names =
      kind === 'counter' ? [`${base}_total`] : kind === 'gauge' ? [base] : TIMING_SUFFIXES.map((s) => `${base}_${s}`);
    for (const metric of names) {
      const existing = this.exposedBy.get(metric);
      if (existing !== undefined) {
        throw new RangeError(`${owner} would be exported as ${metric}, which ${existing} already uses`);
      }
    }
    for (const metric of names) this.exposedBy.set(metric, owner);
  }

  private snapshot(): Snapshot {
    const timings = new Map<string, TimingSummary>();
    for (const [name, ring] of this.timings) {
      timings.set(name, summarize(ring.values()));
    }
    return {
      counters: new Map(this.counters),
      gauges: new Map(this.gauges),
      timings,
      at: this.now(),
    };
  }

  private static toJson(snap: Snapshot): MetricsJson {
    return {
      counters: Object.fromEntries(sortedEntries(snap.counters)),
      gauges: Object.fromEntries(sortedEntries(snap.gauges)),
      timings: Object.fromEntries(sortedEntries(snap.timings)),
      collected_at: new Date(snap.at).toISOString(),
    };
  }

  private toPrometheus(snap: Snapshot): string {
    const lines: string[] = [];
    const emit = (metric: string, type: 'counter' | 'gauge', help: string, value: number) => {
      lines.push(`# HELP ${metric} ${help}`);
      lines.push(`# TYPE ${metric} ${type}`);
      lines.push(`${metric} ${formatValue(value)}`);
    };

    for (const [name, value] of sortedEntries(snap.counters)) {
      emit(`${prometheusName(this.prefix, name)}_total`, 'counter', `Counter ${name}`, value);
    }
    for (const [name, value] of sortedEntries(snap.gauges)) {
      emit(prometheusName(this.prefix, name), 'gauge', `Gauge ${name}`, value);
    }
    for (const [name, summary] of sortedEntries(snap.timings)) {
      const base = prometheusName(this.prefix, name);
      emit(`${base}_count`, 'gauge', `Retained samples of ${name}`, summary.count);
      emit(`${base}_avg`, 'gauge', `Average of ${name} over retained samples`, summary.avg);
      emit(`${base}_min`, 'gauge', `Minimum of ${name} over retained samples`, summary.min);
      emit(`${base}_max`, 'gauge', `Maximum of ${name} over retained samples`, summary.max);
    }
    return lines.join('\n') + '\n';
  }
}
