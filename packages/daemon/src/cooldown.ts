/**
 * Per-item last-attempt timestamps. Guards rate-limited collaborators
 * against re-trigger storms (repeated saves, retry loops).
 *
 * In memory only: losing it on restart allows at most one extra retry.
 */
export class CooldownStore {
  private lastAttempt = new Map<string, number>();
  private now: () => number;

  constructor(now: () => number = Date.now) {
    this.now = now;
  }

  /** Record an attempt for `itemKey` at the current time, success or not. */
  recordAttempt(itemKey: string) {
    this.lastAttempt.set(itemKey, this.now());
  }

  /** Seconds since the last recorded attempt, or null if never attempted. */
  secondsSinceLast(itemKey: string): number | null {
    const at = this.lastAttempt.get(itemKey);
    if (at === undefined) return null;
    return (this.now() - at) / 1000;
  }

  /** True while fewer than `cooldownSeconds` have passed since the last attempt. */
  isCoolingDown(itemKey: string, cooldownSeconds: number): boolean {
    const elapsed = this.secondsSinceLast(itemKey);
    return elapsed !== null && elapsed <= cooldownSeconds;
  }

  size(): number {
    return this.lastAttempt.size;
  }

  clear() {
    this.lastAttempt.clear();
  }
}
