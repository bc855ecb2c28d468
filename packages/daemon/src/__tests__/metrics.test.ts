import { describe, it, expect } from 'vitest';
import { MetricsTracker, prometheusName } from '../metrics';

const FIXED_NOW = Date.parse('2026-03-01T10:00:00.000Z');

function counterFromPrometheus(text: string, metric: string): number | undefined {
  const line = text.split('\n').find((l) => l.startsWith(`${metric} `));
  return line === undefined ? undefined : Number(line.split(' ')[1]);
}

describe('MetricsTracker counters', () => {
  it('starts at zero and increments', () => {
    const m = new MetricsTracker();
    expect(m.getCounter('events_processed')).toBe(0);
    m.incrementCounter('events_processed');
    m.incrementCounter('events_processed', 2);
    expect(m.getCounter('events_processed')).toBe(3);
  });

  it('rejects negative and fractional increments', () => {
    const m = new MetricsTracker();
    expect(() => m.incrementCounter('events_processed', -1)).toThrow(RangeError);
    expect(() => m.incrementCounter('events_processed', 0.5)).toThrow(RangeError);
    expect(m.getCounter('events_processed')).toBe(0);
  });

  it('never decreases across a mixed sequence of operations', () => {
    const m = new MetricsTracker();
    let previous = 0;
    const ops = [
      () => m.incrementCounter('events_processed'),
      () => m.setGauge('healthy', 0),
      () => m.recordTiming('transcript.processing_seconds', 1.5),
      () => m.incrementCounter('events_failed'),
      () => m.incrementCounter('events_processed', 0),
      () => m.exportJson(),
      () => m.incrementCounter('events_processed', 4),
    ];
    for (const op of ops) {
      op();
      const current = m.getCounter('events_processed');
      expect(current).toBeGreaterThanOrEqual(previous);
      previous = current;
    }
    expect(previous).toBe(5);
  });
});

describe('MetricsTracker timings', () => {
  it('computes aggregates at read time from the retained samples', () => {
    const m = new MetricsTracker({ timingWindow: 3 });
    for (const s of [10, 1, 2, 3]) m.recordTiming('t', s);
    // 10 fell out of the window
    expect(m.getTiming('t')).toEqual({ count: 3, avg: 2, min: 1, max: 3 });
  });

  it('returns undefined for an unknown series', () => {
    expect(new MetricsTracker().getTiming('nope')).toBeUndefined();
  });
});

describe('MetricsTracker scoped', () => {
  it('namespaces every name with the prefix', () => {
    const m = new MetricsTracker();
    const scoped = m.scoped('transcript');
    scoped.incrementCounter('events_failed');
    scoped.setGauge('queue', 2);
    scoped.recordTiming('processing_seconds', 0.25);
    expect(m.getCounter('transcript.events_failed')).toBe(1);
    expect(scoped.getCounter('events_failed')).toBe(1);
    expect(m.getGauge('transcript.queue')).toBe(2);
    expect(m.getTiming('transcript.processing_seconds')?.count).toBe(1);
  });
});

describe('MetricsTracker export', () => {
  it('renders JSON sorted by name with an ISO timestamp', () => {
    const m = new MetricsTracker({ now: () => FIXED_NOW });
    m.incrementCounter('events_processed', 2);
    m.incrementCounter('events_failed');
    m.setGauge('healthy', 1);
    m.recordTiming('transcript.processing_seconds', 2);
    m.recordTiming('transcript.processing_seconds', 4);

    expect(m.exportJson()).toEqual({
      counters: { events_failed: 1, events_processed: 2 },
      gauges: { healthy: 1 },
      timings: { 'transcript.processing_seconds': { count: 2, avg: 3, min: 2, max: 4 } },
      collected_at: '2026-03-01T10:00:00.000Z',
    });
  });

  it('renders Prometheus text with HELP and TYPE for every metric', () => {
    const m = new MetricsTracker();
    m.incrementCounter('link-suggestion.events_processed', 3);
    m.setGauge('healthy', 0);
    m.recordTiming('link-suggestion.processing_seconds', 0.5);

    expect(m.exportPrometheus()).toBe(
      [
        '# HELP vaultwatch_link_suggestion_events_processed_total Counter link-suggestion.events_processed',
        '# TYPE vaultwatch_link_suggestion_events_processed_total counter',
        'vaultwatch_link_suggestion_events_processed_total 3',
        '# HELP vaultwatch_healthy Gauge healthy',
        '# TYPE vaultwatch_healthy gauge',
        'vaultwatch_healthy 0',
        '# HELP vaultwatch_link_suggestion_processing_seconds_count Retained samples of link-suggestion.processing_seconds',
        '# TYPE vaultwatch_link_suggestion_processing_seconds_count gauge',
        'vaultwatch_link_suggestion_processing_seconds_count 1',
        '# HELP vaultwatch_link_suggestion_processing_seconds_avg Average of link-suggestion.processing_seconds over retained samples',
        '# TYPE vaultwatch_link_suggestion_processing_seconds_avg gauge',
        'vaultwatch_link_suggestion_processing_seconds_avg 0.5',
        '# HELP vaultwatch_link_suggestion_processing_seconds_min Minimum of link-suggestion.processing_seconds over retained samples',
        '# TYPE vaultwatch_link_suggestion_processing_seconds_min gauge',
        'vaultwatch_link_suggestion_processing_seconds_min 0.5',
        '# HELP vaultwatch_link_suggestion_processing_seconds_max Maximum of link-suggestion.processing_seconds over retained samples',
        '# TYPE vaultwatch_link_suggestion_processing_seconds_max gauge',
        'vaultwatch_link_suggestion_processing_seconds_max 0.5',
        '',
      ].join('\n')
    );
  });

  it('reports identical counter values in both formats at the same instant', () => {
    const m = new MetricsTracker();
    m.incrementCounter('events_processed', 7);
    m.incrementCounter('transcript.events_failed', 2);

    const { json, prometheus } = m.exportBoth();
    for (const [name, value] of Object.entries(json.counters)) {
      expect(counterFromPrometheus(prometheus, `${prometheusName('vaultwatch', name)}_total`)).toBe(value);
    }
    expect(json.counters).toEqual({ events_processed: 7, 'transcript.events_failed': 2 });
  });

  it('rejects a series whose exported name another series already renders', () => {
    const m = new MetricsTracker();
    m.incrementCounter('transcript.quotes');
    expect(() => m.incrementCounter('transcript_quotes')).toThrow(
      'counter transcript_quotes would be exported as vaultwatch_transcript_quotes_total, which counter transcript.quotes already uses'
    );
    m.recordTiming('scan', 1);
    expect(() => m.setGauge('scan_count', 3)).toThrow(RangeError);
    m.setGauge('scan', 3);

    expect(m.getCounter('transcript_quotes')).toBe(0);
    expect(m.getGauge('scan_count')).toBeUndefined();
    const typeLines = m.exportPrometheus().split('\n').filter((l) => l.startsWith('# TYPE'));
    expect(new Set(typeLines).size).toBe(typeLines.length);
  });

  it('uses the configured prefix', () => {
    const m = new MetricsTracker({ prefix: 'vw' });
    m.incrementCounter('events_dropped');
    expect(m.exportPrometheus()).toContain('\nvw_events_dropped_total 1\n');
  });
});
