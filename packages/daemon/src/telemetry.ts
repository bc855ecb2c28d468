import { errorMessage } from './errors';
import type { HandlerHealthRegistry } from './health';
import type { MetricsTracker } from './metrics';
import type { HandlerResult, RoutedResult } from './handlers/types';

/**
 * Invocation plumbing shared by the EventRouter and the Scheduler: timing,
 * error containment, outcome counters and handler health.
 */
export class HandlerTelemetry {
  constructor(
    private metrics: MetricsTracker,
    private health: HandlerHealthRegistry,
    private clock: () => number = () => performance.now()
  ) {}

  /**
   * Run one handler invocation. Never rejects: a thrown error becomes a
   * failed result.
   */
  async invoke(handler: string, label: string, run: () => Promise<HandlerResult>): Promise<RoutedResult> {
    const startedAt = this.clock();
    let result: HandlerResult;
    try {
      result = await run();
    } catch (err) {
      result = { success: false, message: `Unhandled error: ${errorMessage(err)}` };
    }
    const durationSeconds = Math.max(0, (this.clock() - startedAt) / 1000);

    this.record(handler, result, durationSeconds);

    const summary = `[handler:${handler}] ${label}: ${result.message} (${durationSeconds.toFixed(3)}s)`;
    if (result.skipped) console.debug(summary);
    else if (result.success) console.log(summary);
    else console.warn(summary);

    return { ...result, handler, durationSeconds };
  }

  private record(handler: string, result: HandlerResult, durationSeconds: number) {
    const scoped = this.metrics.scoped(handler);
    const outcome = result.skipped ? 'events_skipped' : result.success ? 'events_processed' : 'events_failed';
    this.metrics.incrementCounter(outcome);
    scoped.incrementCounter(outcome);
    scoped.recordTiming('processing_seconds', durationSeconds);

    for (const [key, value] of Object.entries(result.metricsDelta ?? {})) {
      if (Number.isInteger(value) && value >= 0) {
        try {
          scoped.incrementCounter(key, value);
        } catch (err) {
          console.warn(`[handler:${handler}] Ignoring metric delta ${key}:`, errorMessage(err));
        }
      } else {
        console.warn(`[handler:${handler}] Ignoring invalid metric delta ${key}=${value}`);
      }
    }

    if (!result.skipped) this.health.record(handler, result.success);
  }
}
