import { readFile } from 'fs/promises';
import { errorMessage, isNodeError } from '../errors';
import { writeFileAtomic } from '../notes/repository';

export const DEFAULT_GLOBAL_COOLDOWN_SECONDS = 60;
export const MAX_BACKOFF_SECONDS = 240;
/** Persisted timestamps further in the future than this are discarded */
const CLOCK_SKEW_TOLERANCE_MS = 60 * 60 * 1000;

export interface GlobalRateLimiterOptions {
  cooldownSeconds?: number;
  maxBackoffSeconds?: number;
  /** Where the last request time survives restarts; null keeps it in memory */
  trackingFile?: string | null;
  now?: () => number;
}

/**
 * Minimum interval between any two requests to a rate-limited service,
 * regardless of which note asked. Complements the per-note cooldown.
 * After a rate-limit response the interval backs off exponentially
 * (cooldown, 2x, 4x, capped).
 */
export class GlobalRateLimiter {
  readonly cooldownSeconds: number;
  readonly maxBackoffSeconds: number;
  private trackingFile: string | null;
  private now: () => number;
  private lastRequestAt: number | null = null;
  private backoffUntil = 0;
  private rateLimitedStreak = 0;

  constructor(options: GlobalRateLimiterOptions = {}) {
    this.cooldownSeconds = options.cooldownSeconds ?? DEFAULT_GLOBAL_COOLDOWN_SECONDS;
    this.maxBackoffSeconds = options.maxBackoffSeconds ?? MAX_BACKOFF_SECONDS;
    this.trackingFile = options.trackingFile ?? null;
    this.now = options.now ?? Date.now;
  }

  /** Restore the last request time from the tracking file, if any. */
  async load(): Promise<void> {
    if (!this.trackingFile) return;
    let text: string;
    try {
      text = await readFile(this.trackingFile, 'utf-8');
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return;
      throw err;
    }
    const at = Number(text.trim());
    if (!Number.isFinite(at) || at > this.now() + CLOCK_SKEW_TOLERANCE_MS) {
      console.warn(`[ratelimit] Ignoring invalid timestamp in ${this.trackingFile}`);
      return;
    }
    this.lastRequestAt = at;
  }

  canProceed(): boolean {
    return this.secondsUntilNextAllowed() === 0;
  }

  secondsUntilNextAllowed(): number {
    const cooldownEnd = this.lastRequestAt === null ? 0 : this.lastRequestAt + this.cooldownSeconds * 1000;
    const waitMs = Math.max(cooldownEnd, this.backoffUntil) - this.now();
    return waitMs > 0 ? Math.ceil(waitMs / 1000) : 0;
  }

  /** Record that a request is being made now. */
  async recordRequest(): Promise<void> {
    this.lastRequestAt = this.now();
    if (!this.trackingFile) return;
    try {
      await writeFileAtomic(this.trackingFile, `${this.lastRequestAt}\n`);
    } catch (err) {
      console.warn(`[ratelimit] Could not persist ${this.trackingFile}:`, errorMessage(err));
    }
  }

  /** The service answered with a rate limit. Returns the backoff applied, in seconds. */
  recordRateLimited(): number {
    this.rateLimitedStreak++;
    const backoff = Math.min(this.cooldownSeconds * 2 ** (this.rateLimitedStreak - 1), this.maxBackoffSeconds);
    this.backoffUntil = this.now() + backoff * 1000;
    console.warn(`[ratelimit] Rate limited (${this.rateLimitedStreak} in a row); backing off ${backoff}s`);
    return backoff;
  }

  recordSuccess() {
    this.rateLimitedStreak = 0;
  }
}
