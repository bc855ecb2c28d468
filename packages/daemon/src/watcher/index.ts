/**
 * FileWatcher: turns raw chokidar notifications for the vault into a
 * debounced stream of FileEvents.
 *
 * Editors, sync tools and the note template write a file several times
 * within a second. Every raw notification for a path resets that path's
 * timer; only when the timer fires without an intervening notification is
 * one FileEvent emitted. A path that no longer exists when its timer fires
 * is dropped.
 */

import { watch, type FSWatcher } from 'chokidar';
import { resolve } from 'path';
import type { FileEvent, FileEventKind } from '@vaultwatch/shared';
import { errorMessage } from '../errors';
import { createDebouncer, createIgnoreMatcher, isReadable } from './utils';
import {
  DEFAULT_DEBOUNCE_MS,
  DEFAULT_IGNORE_PATTERNS,
  type Debouncer,
  type FileEventListener,
  type FileWatcherOptions,
  type PendingNotification,
} from './types';

export class FileWatcher {
  readonly root: string;
  readonly debounceMs: number;

  private listeners = new Set<FileEventListener>();
  private pendingByPath = new Map<string, PendingNotification>();
  private debouncer: Debouncer;
  private isIgnored: (filePath: string) => boolean;
  private exists: (filePath: string) => Promise<boolean>;
  private now: () => number;
  private watcher: FSWatcher | null = null;
  private running = false;
  private errorCount = 0;

  constructor(options: FileWatcherOptions) {
    this.root = resolve(options.root);
    this.debounceMs = options.debounceMs ?? DEFAULT_DEBOUNCE_MS;
    this.debouncer = createDebouncer(this.debounceMs);
    this.isIgnored = createIgnoreMatcher(this.root, options.ignorePatterns ?? DEFAULT_IGNORE_PATTERNS);
    this.exists = options.exists ?? isReadable;
    this.now = options.now ?? Date.now;
  }

  /** Subscribe to debounced events. Returns an unsubscribe function. */
  onEvent(listener: FileEventListener) {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  async start(): Promise<void> {
    if (this.watcher) return;

    const watcher = watch(this.root, {
      ignoreInitial: true,
      persistent: true,
      ignored: (filePath: string) => this.isIgnored(filePath),
    });
    this.watcher = watcher;

    watcher.on('add', (fp: string) => this.ingest('created', fp));
    watcher.on('change', (fp: string) => this.ingest('modified', fp));
    watcher.on('unlink', (fp: string) => this.forget(fp));
    watcher.on('error', (err: unknown) => {
      // One failing path must not take the whole watcher down
      this.errorCount++;
      console.warn('[watcher] Watch error:', errorMessage(err));
    });

    await new Promise<void>((resolveReady) => {
      watcher.once('ready', () => resolveReady());
    });
    this.running = true;
    console.log(`[watcher] Watching ${this.root} (debounce ${this.debounceMs}ms)`);
  }

  /** Cancel pending emissions and close the underlying watcher before returning. */
  async stop(): Promise<void> {
    this.running = false;
    this.debouncer.clear();
    this.pendingByPath.clear();
    const watcher = this.watcher;
    this.watcher = null;
    if (watcher) {
      await watcher.close();
      console.log('[watcher] Stopped');
    }
  }

  isRunning(): boolean {
    return this.running;
  }

  pendingCount(): number {
    return this.debouncer.pending();
  }

  getErrorCount(): number {
    return this.errorCount;
  }

  /**
   * Feed one raw notification. Called by the chokidar listeners; also the
   * entry point for callers that source notifications elsewhere.
   */
  ingest(kind: FileEventKind, filePath: string) {
    const absPath = resolve(filePath);
    if (this.isIgnored(absPath)) return;

    const pending = this.pendingByPath.get(absPath);
    if (pending) {
      pending.notifications++;
      if (kind === 'created') pending.kind = 'created';
    } else {
      this.pendingByPath.set(absPath, { kind, firstSeenAt: this.now(), notifications: 1 });
    }

    this.debouncer.debounce(absPath, () => {
      this.flush(absPath).catch((err: unknown) => {
        console.warn(`[watcher] Failed to flush ${absPath}:`, errorMessage(err));
      });
    });
  }

  /** Drop the pending emission for a path that was removed. */
  forget(filePath: string) {
    const absPath = resolve(filePath);
    this.pendingByPath.delete(absPath);
    if (this.debouncer.cancel(absPath)) {
      console.debug(`[watcher] Cancelled pending event for removed file: ${absPath}`);
    }
  }

  private async flush(absPath: string) {
    const pending = this.pendingByPath.get(absPath);
    this.pendingByPath.delete(absPath);
    if (!pending) return;

    if (!(await this.exists(absPath))) {
      console.debug(`[watcher] Dropping event for vanished file: ${absPath}`);
      return;
    }

    const event: FileEvent = { path: absPath, kind: pending.kind, observedAt: this.now() };
    console.debug(
      `[watcher] ${event.kind} ${absPath} (${pending.notifications} notifications over ${event.observedAt - pending.firstSeenAt}ms)`
    );
    for (const listener of this.listeners) {
      try {
        listener(event);
      } catch (err) {
        console.warn('[watcher] Listener error:', errorMessage(err));
      }
    }
  }
}
