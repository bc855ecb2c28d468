import type { DaemonState, FileEvent, HealthStatus, MetricsJson } from '@vaultwatch/shared';
import { validateConfig, type DaemonConfig } from './config';
import { DaemonError, errorMessage } from './errors';
import { createFeatureHandlers } from './handlers';
import type { FeatureHandler, RoutedResult } from './handlers/types';
import { HandlerHealthRegistry, HealthAggregator } from './health';
import { KillSwitch } from './killSwitch';
import { MetricsTracker } from './metrics';
import type { NoteRepository } from './notes/repository';
import { PidLock } from './pidLock';
import { EventQueue } from './queue';
import { EventRouter } from './router';
import { Scheduler } from './scheduler';
import { MonitoringServer, type MonitoringSource } from './server';
import { HandlerTelemetry } from './telemetry';
import { FileWatcher } from './watcher';
import type { Collaborators } from './collaborators/types';

export const DAEMON_NAME = 'vaultwatch';
export const DAEMON_VERSION = '0.1.0';

export interface DaemonOptions {
  /** Replaces the HTTP collaborator clients */
  collaborators?: Collaborators;
  /** Replaces the configured handler set, in priority order */
  handlers?: FeatureHandler[];
  repository?: NoteRepository;
  now?: () => number;
}

export interface DaemonStatus {
  state: DaemonState;
  uptimeSeconds: number;
  watcherActive: boolean;
  schedulerActive: boolean;
  queueDepth: number;
  handlers: string[];
  monitoring: { host: string; port: number } | null;
}

/** Race a shutdown step against the grace period; never rejects. */
async function withGrace(label: string, graceMs: number, step: () => Promise<unknown>): Promise<boolean> {
  let timer: ReturnType<typeof setTimeout> | undefined;
  const expired = new Promise<false>((resolve) => {
    timer = setTimeout(() => resolve(false), graceMs);
  });
  try {
    const done = await Promise.race([step().then(() => true as const), expired]);
    if (!done) console.warn(`[daemon] ${label} did not stop within ${graceMs}ms; continuing`);
    return done;
  } catch (err) {
    console.warn(`[daemon] ${label} failed to stop:`, errorMessage(err));
    return false;
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Lifecycle owner: builds and starts the watcher, event queue, router,
 * scheduler and monitoring server, and stops them in reverse order.
 */
export class Daemon implements MonitoringSource {
  readonly metrics: MetricsTracker;
  readonly killSwitch: KillSwitch;

  private state: DaemonState = 'stopped';
  private handlerHealth: HandlerHealthRegistry;
  private health: HealthAggregator;
  private telemetry: HandlerTelemetry;
  private now: () => number;

  private handlers: FeatureHandler[] = [];
  private router: EventRouter | null = null;
  private scheduler: Scheduler | null = null;
  private queue: EventQueue<FileEvent> | null = null;
  private watcher: FileWatcher | null = null;
  private server: MonitoringServer | null = null;
  private pidLock: PidLock | null = null;
  private startedAt: number | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    readonly config: DaemonConfig,
    private options: DaemonOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.metrics = new MetricsTracker({
      timingWindow: config.metrics.timingWindow,
      prefix: config.metrics.prefix,
      now: this.now,
    });
    this.killSwitch = new KillSwitch(config.emergencyMarker);
    this.handlerHealth = new HandlerHealthRegistry(config.health, this.now);
    this.health = new HealthAggregator({
      handlers: this.handlerHealth,
      metrics: this.metrics,
      isEmergencyDisabled: () => this.killSwitch.isEngaged(),
      startedAt: () => this.startedAt,
      now: this.now,
    });
    this.telemetry = new HandlerTelemetry(this.metrics, this.handlerHealth);
  }

  getState(): DaemonState {
    return this.state;
  }

  async start(): Promise<void> {
    if (this.state !== 'stopped' && this.state !== 'error') {
      throw new DaemonError(`Daemon is already ${this.state}`);
    }
    this.state = 'starting';

    try {
      const problems = validateConfig(this.config);
      if (problems.length > 0) {
        throw new DaemonError(`Invalid configuration:\n  - ${problems.join('\n  - ')}`);
      }

      if (this.config.pidFile) {
        this.pidLock = new PidLock(this.config.pidFile);
        await this.pidLock.acquire();
      }

      this.handlers =
        this.options.handlers ??
        (await createFeatureHandlers(this.config, {
          collaborators: this.options.collaborators,
          repository: this.options.repository,
          now: this.now,
        }));
      for (const handler of this.handlers) this.handlerHealth.register(handler.name);

      this.router = new EventRouter(this.handlers, this.telemetry, this.metrics);
      this.scheduler = new Scheduler(this.handlers, this.telemetry, this.killSwitch, this.metrics);
      this.queue = new EventQueue<FileEvent>(async (event) => {
        await this.handleFileEvent(event);
      }, 'queue');

      const watcher = new FileWatcher({
        root: this.config.vaultPath,
        debounceMs: this.config.watcher.debounceMs,
        ignorePatterns: this.config.watcher.ignorePatterns,
      });
      this.watcher = watcher;
      watcher.onEvent((event) => this.enqueue(event));
      await watcher.start();

      const queue = this.queue;
      const scheduler = this.scheduler;
      this.health.registerCheck('watcher', () => watcher.isRunning());
      this.health.registerCheck('router', () => queue.isAccepting());
      if (scheduler.hasJobs()) {
        scheduler.start();
        this.health.registerCheck('scheduler', () => scheduler.isRunning());
      }

      if (this.config.monitoring.enabled) {
        this.server = new MonitoringServer(this, {
          host: this.config.monitoring.host,
          port: this.config.monitoring.port,
          authToken: this.config.monitoring.authToken,
          name: DAEMON_NAME,
          version: DAEMON_VERSION,
        });
        await this.server.start();
      }

      this.startedAt = this.now();
      this.state = 'running';
      console.log(
        `[daemon] Running on ${this.config.vaultPath} with handlers: ${this.handlers.map((h) => h.name).join(', ') || 'none'}`
      );
    } catch (err) {
      console.error('[daemon] Start failed:', errorMessage(err));
      await this.teardown();
      this.state = 'error';
      throw err;
    }
  }

  /** Reverse-order shutdown, each step bounded by the grace period. Idempotent. */
  async stop(): Promise<void> {
    if (this.stopping) return this.stopping;
    if (this.state === 'stopped' || this.state === 'error') return;

    this.state = 'stopping';
    this.stopping = this.teardown()
      .then((clean) => {
        this.state = clean ? 'stopped' : 'error';
        console.log(`[daemon] Stopped${clean ? '' : ' with errors'}`);
      })
      .finally(() => {
        this.stopping = null;
      });
    return this.stopping;
  }

  /**
   * Route one debounced event. The kill switch is checked first: while it
   * is engaged the event is dropped and only `events_dropped` changes.
   */
  async handleFileEvent(event: FileEvent): Promise<RoutedResult | null> {
    if (this.killSwitch.isEngaged()) {
      this.metrics.incrementCounter('events_dropped');
      console.warn(`[daemon] Kill switch engaged; dropped ${event.kind} ${event.path}`);
      return null;
    }
    if (!this.router) {
      console.debug(`[daemon] Not running; ignoring ${event.path}`);
      return null;
    }
    return this.router.route(event);
  }

  /** Resolves when every queued event has been handled. */
  async idle(): Promise<void> {
    await this.queue?.idle();
  }

  /** Run a scheduled handler now, outside its timer. */
  runScheduled(name: string): Promise<RoutedResult | null> {
    if (!this.scheduler) return Promise.reject(new DaemonError('Daemon is not running'));
    return this.scheduler.runNow(name);
  }

  getHealth(): HealthStatus {
    return this.health.daemonHealth();
  }

  exportPrometheus(): string {
    this.refreshGauges();
    return this.metrics.exportPrometheus();
  }

  exportMetricsJson(): MetricsJson {
    this.refreshGauges();
    return this.metrics.exportJson();
  }

  status(): DaemonStatus {
    return {
      state: this.state,
      uptimeSeconds: this.uptimeSeconds(),
      watcherActive: this.watcher?.isRunning() ?? false,
      schedulerActive: this.scheduler?.isRunning() ?? false,
      queueDepth: this.queue?.depth() ?? 0,
      handlers: this.handlers.map((h) => h.name),
      monitoring: this.server?.address() ?? null,
    };
  }

  private enqueue(event: FileEvent) {
    if (!this.queue?.push(event)) {
      console.debug(`[daemon] Queue closed; ignoring ${event.path}`);
      return;
    }
    this.metrics.setGauge('queue_depth', this.queue.depth());
  }

  private uptimeSeconds(): number {
    return this.startedAt === null ? 0 : Math.max(0, (this.now() - this.startedAt) / 1000);
  }

  private refreshGauges() {
    // daemonHealth() also refreshes the `healthy` gauge
    const health = this.health.daemonHealth();
    this.metrics.setGauge('uptime_seconds', this.uptimeSeconds());
    this.metrics.setGauge('queue_depth', this.queue?.depth() ?? 0);
    this.metrics.setGauge('emergency_disabled', health.emergency_disabled ? 1 : 0);
  }

  /** Stop whatever was started, newest first. Resolves true when every step finished cleanly. */
  private async teardown(): Promise<boolean> {
    const grace = this.config.shutdownGraceMs;
    let clean = true;

    const server = this.server;
    this.server = null;
    if (server) clean = (await withGrace('monitoring server', grace, () => server.stop())) && clean;

    const scheduler = this.scheduler;
    if (scheduler) clean = (await withGrace('scheduler', grace, () => scheduler.stop(grace))) && clean;

    const watcher = this.watcher;
    if (watcher) clean = (await withGrace('watcher', grace, () => watcher.stop())) && clean;

    const queue = this.queue;
    if (queue) clean = (await withGrace('event queue', grace, () => queue.close(grace))) && clean;

    const pidLock = this.pidLock;
    this.pidLock = null;
    if (pidLock) clean = (await withGrace('pid lock', grace, () => pidLock.release())) && clean;

    this.router = null;
    this.startedAt = null;
    return clean;
  }
}
