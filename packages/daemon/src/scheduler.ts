import { errorMessage } from './errors';
import type { KillSwitch } from './killSwitch';
import type { MetricsSink } from './metrics';
import type { HandlerTelemetry } from './telemetry';
import type { FeatureHandler, RoutedResult } from './handlers/types';

interface ScheduledJob {
  run: () => Promise<RoutedResult | null>;
  intervalMs: number;
  timer: ReturnType<typeof setInterval> | null;
  inFlight: Promise<RoutedResult | null> | null;
}

/**
 * Timer-driven caller for handlers that implement `runScheduled`. Shares
 * the router's telemetry so scheduled runs are counted the same way.
 */
export class Scheduler {
  private jobs = new Map<string, ScheduledJob>();
  private running = false;

  constructor(
    handlers: FeatureHandler[],
    private telemetry: HandlerTelemetry,
    private killSwitch: KillSwitch,
    private metrics: MetricsSink
  ) {
    for (const handler of handlers) {
      const runScheduled = handler.runScheduled?.bind(handler);
      if (!runScheduled) continue;
      const intervalMs = handler.scheduleIntervalMs;
      if (intervalMs === undefined || intervalMs <= 0) {
        console.warn(`[scheduler] ${handler.name} has no positive schedule interval; not scheduled`);
        continue;
      }
      this.jobs.set(handler.name, {
        run: () => this.telemetry.invoke(handler.name, 'scheduled run', runScheduled),
        intervalMs,
        timer: null,
        inFlight: null,
      });
    }
  }

  hasJobs(): boolean {
    return this.jobs.size > 0;
  }

  jobNames(): string[] {
    return [...this.jobs.keys()];
  }

  isRunning(): boolean {
    return this.running;
  }

  start() {
    if (this.running) return;
    this.running = true;
    for (const [name, job] of this.jobs) {
      job.timer = setInterval(() => {
        this.tick(name).catch((err: unknown) => {
          console.warn(`[scheduler] Tick for ${name} failed:`, errorMessage(err));
        });
      }, job.intervalMs);
      console.log(`[scheduler] ${name} every ${Math.round(job.intervalMs / 1000)}s`);
    }
  }

  /** Clear timers and wait up to `graceMs` for runs still in flight. */
  async stop(graceMs: number): Promise<void> {
    this.running = false;
    const pending: Array<Promise<unknown>> = [];
    for (const job of this.jobs.values()) {
      if (job.timer) clearInterval(job.timer);
      job.timer = null;
      if (job.inFlight) pending.push(job.inFlight);
    }
    if (pending.length === 0) return;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timeout = new Promise<void>((resolve) => {
      timer = setTimeout(() => {
        console.warn(`[scheduler] ${pending.length} scheduled run(s) still in flight after ${graceMs}ms`);
        resolve();
      }, graceMs);
    });
    await Promise.race([Promise.allSettled(pending).then(() => undefined), timeout]);
    clearTimeout(timer);
  }

  /** Trigger a run immediately, subject to the same guards as a timer tick. */
  runNow(name: string): Promise<RoutedResult | null> {
    if (!this.jobs.has(name)) {
      return Promise.reject(new Error(`No scheduled handler named ${name}`));
    }
    return this.tick(name);
  }

  private async tick(name: string): Promise<RoutedResult | null> {
    const job = this.jobs.get(name);
    if (!job) return null;

    if (job.inFlight) {
      console.debug(`[scheduler] ${name} still running; skipping tick`);
      return null;
    }
    if (this.killSwitch.isEngaged()) {
      this.metrics.incrementCounter('events_dropped');
      console.warn(`[scheduler] Kill switch engaged; dropped scheduled run of ${name}`);
      return null;
    }

    job.inFlight = job.run();
    try {
      return await job.inFlight;
    } finally {
      job.inFlight = null;
    }
  }
}
