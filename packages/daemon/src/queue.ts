import { errorMessage } from './errors';

/**
 * Single-consumer FIFO queue. The producer (the watcher callback) only
 * enqueues; one async loop drains items one at a time, so a slow consumer
 * never delays the producer.
 */
export class EventQueue<T> {
  private items: T[] = [];
  private accepting = true;
  private draining: Promise<void> | null = null;

  constructor(
    private consume: (item: T) => Promise<void>,
    private label = 'queue'
  ) {}

  /** Enqueue an item. Returns false once the queue is closed. */
  push(item: T): boolean {
    if (!this.accepting) return false;
    this.items.push(item);
    this.kick();
    return true;
  }

  depth(): number {
    return this.items.length;
  }

  isAccepting(): boolean {
    return this.accepting;
  }

  isBusy(): boolean {
    return this.draining !== null;
  }

  /** Resolves once the queue is empty and nothing is in flight. */
  async idle(): Promise<void> {
    while (this.draining) {
      await this.draining;
    }
  }

  /**
   * Stop accepting items, drop the backlog and wait up to `graceMs` for the
   * in-flight item. Resolves true when the consumer finished in time.
   */
  async close(graceMs: number): Promise<boolean> {
    this.accepting = false;
    const dropped = this.items.length;
    this.items = [];
    if (dropped > 0) {
      console.warn(`[${this.label}] Dropped ${dropped} queued item(s) on close`);
    }

    const inFlight = this.draining;
    if (!inFlight) return true;

    let timer: ReturnType<typeof setTimeout> | undefined;
    const timedOut = new Promise<false>((resolve) => {
      timer = setTimeout(() => resolve(false), graceMs);
    });
    const finished = await Promise.race([inFlight.then(() => true as const), timedOut]);
    clearTimeout(timer);
    if (!finished) {
      console.warn(`[${this.label}] In-flight item still running after ${graceMs}ms; abandoning it`);
    }
    return finished;
  }

  private kick() {
    if (this.draining || this.items.length === 0) return;
    this.draining = this.drain().finally(() => {
      this.draining = null;
      // An item pushed between the last shift and this callback
      this.kick();
    });
  }

  private async drain() {
    let item = this.items.shift();
    while (item !== undefined) {
      try {
        await this.consume(item);
      } catch (err) {
        console.warn(`[${this.label}] Consumer error:`, errorMessage(err));
      }
      item = this.items.shift();
    }
  }
}
