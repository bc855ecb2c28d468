import type { HandlerHealth, HandlerHealthLevel, HealthStatus } from '@vaultwatch/shared';
import { errorMessage } from './errors';
import type { MetricsSink } from './metrics';

export interface HealthThresholds {
  /** Consecutive failures at which a handler is unhealthy */
  maxConsecutiveFailures: number;
  /** Failure rate above which a handler is unhealthy, once minSamples is reached */
  failureRateThreshold: number;
  /** Failure rate above which a handler is degraded */
  degradedRateThreshold: number;
  /** Outcomes kept per handler */
  windowSize: number;
  minSamples: number;
}

export const DEFAULT_HEALTH_THRESHOLDS: HealthThresholds = {
  maxConsecutiveFailures: 3,
  failureRateThreshold: 0.5,
  degradedRateThreshold: 0.2,
  windowSize: 20,
  minSamples: 5,
};

interface HandlerWindow {
  outcomes: boolean[];
  consecutiveFailures: number;
  lastSuccessAt: number | null;
  lastFailureAt: number | null;
}

const isoOrNull = (ms: number | null) => (ms === null ? null : new Date(ms).toISOString());

/** Rolling window of success/failure outcomes per handler. */
export class HandlerHealthRegistry {
  private windows = new Map<string, HandlerWindow>();

  constructor(
    private thresholds: HealthThresholds = DEFAULT_HEALTH_THRESHOLDS,
    private now: () => number = Date.now
  ) {}

  /** Make a handler visible in health output before its first invocation. */
  register(handler: string) {
    if (!this.windows.has(handler)) {
      this.windows.set(handler, { outcomes: [], consecutiveFailures: 0, lastSuccessAt: null, lastFailureAt: null });
    }
  }

  record(handler: string, success: boolean) {
    this.register(handler);
    const win = this.windows.get(handler);
    if (!win) return;

    win.outcomes.push(success);
    if (win.outcomes.length > this.thresholds.windowSize) win.outcomes.shift();

    if (success) {
      win.consecutiveFailures = 0;
      win.lastSuccessAt = this.now();
    } else {
      win.consecutiveFailures++;
      win.lastFailureAt = this.now();
    }
  }

  get(handler: string): HandlerHealth | undefined {
    const win = this.windows.get(handler);
    return win ? this.evaluate(win) : undefined;
  }

  all(): Record<string, HandlerHealth> {
    const result: Record<string, HandlerHealth> = {};
    for (const [name, win] of this.windows) {
      result[name] = this.evaluate(win);
    }
    return result;
  }

  private evaluate(win: HandlerWindow): HandlerHealth {
    const samples = win.outcomes.length;
    const failures = win.outcomes.filter((ok) => !ok).length;
    const failureRate = samples === 0 ? 0 : failures / samples;
    const t = this.thresholds;

    let status: HandlerHealthLevel = 'healthy';
    if (
      win.consecutiveFailures >= t.maxConsecutiveFailures ||
      (samples >= t.minSamples && failureRate > t.failureRateThreshold)
    ) {
      status = 'unhealthy';
    } else if (failureRate > t.degradedRateThreshold) {
      status = 'degraded';
    }

    return {
      status,
      is_healthy: status !== 'unhealthy',
      consecutive_failures: win.consecutiveFailures,
      failure_rate: failureRate,
      samples,
      last_success_at: isoOrNull(win.lastSuccessAt),
      last_failure_at: isoOrNull(win.lastFailureAt),
    };
  }
}

export type HealthCheck = () => boolean;

export interface HealthAggregatorOptions {
  handlers: HandlerHealthRegistry;
  metrics?: MetricsSink;
  /** Reports whether the operator kill switch is engaged */
  isEmergencyDisabled?: () => boolean;
  startedAt?: () => number | null;
  now?: () => number;
}

/**
 * Combines subsystem checks and per-handler health into one status.
 * Recomputed on every query; nothing is cached.
 */
export class HealthAggregator {
  private checks = new Map<string, HealthCheck>();
  private handlers: HandlerHealthRegistry;
  private metrics?: MetricsSink;
  private isEmergencyDisabled: () => boolean;
  private startedAt: () => number | null;
  private now: () => number;

  constructor(options: HealthAggregatorOptions) {
    this.handlers = options.handlers;
    this.metrics = options.metrics;
    this.isEmergencyDisabled = options.isEmergencyDisabled ?? (() => false);
    this.startedAt = options.startedAt ?? (() => null);
    this.now = options.now ?? Date.now;
  }

  registerCheck(name: string, check: HealthCheck) {
    this.checks.set(name, check);
  }

  unregisterCheck(name: string) {
    this.checks.delete(name);
  }

  daemonHealth(): HealthStatus {
    const checks: Record<string, boolean> = {};
    for (const [name, check] of this.checks) {
      try {
        checks[name] = check();
      } catch (err) {
        console.warn(`[health] Check ${name} threw:`, errorMessage(err));
        checks[name] = false;
      }
    }

    const perHandler = this.handlers.all();
    const isHealthy =
      Object.values(checks).every(Boolean) && Object.values(perHandler).every((h) => h.is_healthy);

    this.metrics?.setGauge('healthy', isHealthy ? 1 : 0);

    const startedAt = this.startedAt();
    return {
      is_healthy: isHealthy,
      status_code: isHealthy ? 200 : 503,
      checks,
      per_handler: perHandler,
      emergency_disabled: this.isEmergencyDisabled(),
      uptime_seconds: startedAt === null ? 0 : Math.max(0, (this.now() - startedAt) / 1000),
    };
  }
}
