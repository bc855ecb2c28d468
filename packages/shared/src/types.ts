export type FileEventKind = 'created' | 'modified';

/** One debounced change to a file inside the watched vault */
export interface FileEvent {
  /** Absolute path of the changed file */
  path: string;
  kind: FileEventKind;
  /** Epoch milliseconds at which the debounce timer fired */
  observedAt: number;
}

export type NoteStatus = 'draft' | 'processing' | 'processed';

export type HandlerHealthLevel = 'healthy' | 'degraded' | 'unhealthy';

/** Rolling-window health of a single feature handler */
export interface HandlerHealth {
  status: HandlerHealthLevel;
  is_healthy: boolean;
  consecutive_failures: number;
  /** Failures divided by samples in the rolling window (0.0 to 1.0) */
  failure_rate: number;
  samples: number;
  /** ISO timestamp of the most recent success, if any */
  last_success_at: string | null;
  last_failure_at: string | null;
}

/** Aggregated daemon health as served by GET /health */
export interface HealthStatus {
  is_healthy: boolean;
  status_code: 200 | 503;
  /** Subsystem checks, e.g. watcher, router, scheduler */
  checks: Record<string, boolean>;
  per_handler: Record<string, HandlerHealth>;
  /** True while the operator kill-switch marker file is present */
  emergency_disabled: boolean;
  uptime_seconds: number;
}

export interface TimingSummary {
  count: number;
  avg: number;
  min: number;
  max: number;
}

/** JSON view of the metrics store */
export interface MetricsJson {
  counters: Record<string, number>;
  gauges: Record<string, number>;
  timings: Record<string, TimingSummary>;
  collected_at: string;
}

/** Response of GET / */
export interface CapabilityDiscovery {
  name: string;
  version: string;
  endpoints: Array<{ method: 'GET'; path: string; description: string }>;
}

export type DaemonState = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';
