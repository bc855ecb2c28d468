import { describe, it, expect } from 'vitest';
import { DEFAULT_HEALTH_THRESHOLDS, HandlerHealthRegistry, HealthAggregator } from '../health';
import { MetricsTracker } from '../metrics';
import { makeClock } from './helpers';

describe('HandlerHealthRegistry', () => {
  it('reports a registered handler with no samples as healthy', () => {
    const registry = new HandlerHealthRegistry();
    registry.register('transcript');
    expect(registry.get('transcript')).toEqual({
      status: 'healthy',
      is_healthy: true,
      consecutive_failures: 0,
      failure_rate: 0,
      samples: 0,
      last_success_at: null,
      last_failure_at: null,
    });
  });

  it('becomes unhealthy at the consecutive failure threshold', () => {
    const registry = new HandlerHealthRegistry();
    registry.record('transcript', false);
    registry.record('transcript', false);
    expect(registry.get('transcript')?.is_healthy).toBe(true);
    registry.record('transcript', false);
    expect(registry.get('transcript')?.status).toBe('unhealthy');
    expect(registry.get('transcript')?.consecutive_failures).toBe(3);
  });

  it('resets the consecutive count on success', () => {
    const registry = new HandlerHealthRegistry();
    registry.record('transcript', false);
    registry.record('transcript', false);
    registry.record('transcript', true);
    registry.record('transcript', false);
    const health = registry.get('transcript');
    expect(health?.consecutive_failures).toBe(1);
    expect(health?.failure_rate).toBe(0.75);
    // Rate is high but below minSamples, so only degraded
    expect(health?.status).toBe('degraded');
  });

  it('becomes unhealthy on failure rate once enough samples exist', () => {
    const registry = new HandlerHealthRegistry();
    for (const ok of [false, true, false, true, false, false, true, false]) registry.record('links', ok);
    // 5 failures of 8, at most 2 in a row
    const health = registry.get('links');
    expect(health?.consecutive_failures).toBe(1);
    expect(health?.failure_rate).toBe(0.625);
    expect(health?.status).toBe('unhealthy');
  });

  it('drops outcomes older than the window', () => {
    const registry = new HandlerHealthRegistry({ ...DEFAULT_HEALTH_THRESHOLDS, windowSize: 4 });
    registry.record('t', false);
    registry.record('t', false);
    for (let i = 0; i < 4; i++) registry.record('t', true);
    expect(registry.get('t')).toMatchObject({ samples: 4, failure_rate: 0, status: 'healthy' });
  });

  it('timestamps the latest success and failure', () => {
    const clock = makeClock();
    const registry = new HandlerHealthRegistry(DEFAULT_HEALTH_THRESHOLDS, clock.now);
    registry.record('t', true);
    clock.advance(1000);
    registry.record('t', false);
    expect(registry.get('t')?.last_success_at).toBe('2026-03-01T10:00:00.000Z');
    expect(registry.get('t')?.last_failure_at).toBe('2026-03-01T10:00:01.000Z');
  });
});

describe('HealthAggregator', () => {
  function setup() {
    const clock = makeClock();
    const handlers = new HandlerHealthRegistry(DEFAULT_HEALTH_THRESHOLDS, clock.now);
    const metrics = new MetricsTracker();
    const aggregator = new HealthAggregator({
      handlers,
      metrics,
      startedAt: () => Date.parse('2026-03-01T09:59:00.000Z'),
      now: clock.now,
    });
    return { handlers, metrics, aggregator };
  }

  it('is healthy with 200 when every check passes', () => {
    const { aggregator, handlers, metrics } = setup();
    aggregator.registerCheck('watcher', () => true);
    aggregator.registerCheck('router', () => true);
    handlers.register('transcript');

    const health = aggregator.daemonHealth();
    expect(health.is_healthy).toBe(true);
    expect(health.status_code).toBe(200);
    expect(health.checks).toEqual({ watcher: true, router: true });
    expect(health.uptime_seconds).toBe(60);
    expect(health.emergency_disabled).toBe(false);
    expect(metrics.getGauge('healthy')).toBe(1);
  });

  it('is unhealthy with 503 when a subsystem check fails', () => {
    const { aggregator, metrics } = setup();
    aggregator.registerCheck('watcher', () => false);
    aggregator.registerCheck('router', () => true);
    const health = aggregator.daemonHealth();
    expect(health.is_healthy).toBe(false);
    expect(health.status_code).toBe(503);
    expect(metrics.getGauge('healthy')).toBe(0);
  });

  it('treats a throwing check as failed', () => {
    const { aggregator } = setup();
    aggregator.registerCheck('scheduler', () => {
      throw new Error('boom');
    });
    expect(aggregator.daemonHealth().checks.scheduler).toBe(false);
  });

  it('is unhealthy after consecutive handler failures reach the threshold', () => {
    const { aggregator, handlers } = setup();
    aggregator.registerCheck('watcher', () => true);
    for (let i = 0; i < DEFAULT_HEALTH_THRESHOLDS.maxConsecutiveFailures; i++) handlers.record('transcript', false);

    const health = aggregator.daemonHealth();
    expect(health.status_code).toBe(503);
    expect(health.per_handler.transcript.status).toBe('unhealthy');
  });

  it('stays healthy while a handler is only degraded', () => {
    const { aggregator, handlers } = setup();
    handlers.record('links', true);
    handlers.record('links', false);
    const health = aggregator.daemonHealth();
    expect(health.per_handler.links.status).toBe('degraded');
    expect(health.is_healthy).toBe(true);
  });
});
