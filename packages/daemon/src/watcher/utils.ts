import { access, constants } from 'fs/promises';
import { relative, sep } from 'path';
import picomatch from 'picomatch';
import type { Debouncer } from './types';

export function createDebouncer(delayMs: number): Debouncer {
  const timers = new Map<string, ReturnType<typeof setTimeout>>();

  function debounce(key: string, fn: () => void) {
    const existing = timers.get(key);
    if (existing) clearTimeout(existing);
    timers.set(
      key,
      setTimeout(() => {
        timers.delete(key);
        fn();
      }, delayMs)
    );
  }

  function cancel(key: string): boolean {
    const existing = timers.get(key);
    if (!existing) return false;
    clearTimeout(existing);
    timers.delete(key);
    return true;
  }

  function clear() {
    for (const timer of timers.values()) clearTimeout(timer);
    timers.clear();
  }

  return { debounce, cancel, pending: () => timers.size, clear };
}

export async function isReadable(filePath: string): Promise<boolean> {
  try {
    await access(filePath, constants.R_OK);
    return true;
  } catch {
    return false;
  }
}

/**
 * Build a predicate over absolute paths from globs relative to `root`.
 * Dot-files match (`**\/.*` covers every dot-directory), and paths outside
 * the root never do.
 */
export function createIgnoreMatcher(root: string, patterns: string[]): (filePath: string) => boolean {
  const isMatch = picomatch(patterns, { dot: true });
  return (filePath: string) => {
    const rel = relative(root, filePath);
    if (!rel || rel.startsWith('..')) return false;
    return isMatch(rel.split(sep).join('/'));
  };
}
