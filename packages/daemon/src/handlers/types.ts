import type { FileEvent } from '@vaultwatch/shared';

export interface HandlerResult {
  success: boolean;
  message: string;
  /** The handler declined at execution time (state changed since canHandle) */
  skipped?: boolean;
  /** Handler-specific counters, recorded as `<handler>.<key>` */
  metricsDelta?: Record<string, number>;
}

export interface RoutedResult extends HandlerResult {
  handler: string;
  durationSeconds: number;
}

/**
 * One capability of the daemon. `canHandle` must be read-only and safe to
 * call repeatedly; `handle` performs the side effects. Handlers that only
 * run on a timer return false from `canHandle` and implement `runScheduled`.
 */
export interface FeatureHandler {
  readonly name: string;
  canHandle(event: FileEvent): Promise<boolean>;
  handle(event: FileEvent): Promise<HandlerResult>;
  runScheduled?(): Promise<HandlerResult>;
  /** Interval between scheduled runs; only read when runScheduled exists */
  readonly scheduleIntervalMs?: number;
}

export function succeeded(message: string, metricsDelta?: Record<string, number>): HandlerResult {
  return { success: true, message, metricsDelta };
}

export function failed(message: string, metricsDelta?: Record<string, number>): HandlerResult {
  return { success: false, message, metricsDelta };
}

export function skipped(message: string): HandlerResult {
  return { success: true, skipped: true, message };
}

const APPROVED_STRINGS = new Set(['true', 'yes', 'y']);

/**
 * Reads the user-owned `ready_for_processing` flag. The daemon only ever
 * reads it; a missing or unrecognised value is not approval.
 */
export function isApproved(value: unknown): boolean {
  if (value === true) return true;
  if (typeof value === 'string') return APPROVED_STRINGS.has(value.trim().toLowerCase());
  return false;
}

export function isMarkdown(filePath: string): boolean {
  return filePath.toLowerCase().endsWith('.md');
}
