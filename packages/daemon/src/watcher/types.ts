import type { FileEvent, FileEventKind } from '@vaultwatch/shared';

// ================================================================
// Defaults
// ================================================================
/** Quiet period before a path's pending notification is emitted (ms) */
export const DEFAULT_DEBOUNCE_MS = 5_000;
/** Globs relative to the watch root: dot-files, dot-directories (.obsidian, .git, state), temp files */
export const DEFAULT_IGNORE_PATTERNS = ['**/.*', '**/.*/**', '**/*.tmp'];

// ================================================================
// Interfaces
// ================================================================

export type FileEventListener = (event: FileEvent) => void;

export interface FileWatcherOptions {
  /** Directory to watch recursively */
  root: string;
  debounceMs?: number;
  ignorePatterns?: string[];
  /** Existence check run when a debounce timer fires. Defaults to fs.access. */
  exists?: (filePath: string) => Promise<boolean>;
  now?: () => number;
}

/** Raw notification waiting out its debounce window */
export interface PendingNotification {
  kind: FileEventKind;
  firstSeenAt: number;
  notifications: number;
}

export interface Debouncer {
  debounce(key: string, fn: () => void): void;
  cancel(key: string): boolean;
  pending(): number;
  clear(): void;
}
