import { readFile } from 'fs/promises';
import { errorMessage, isNodeError } from '../errors';
import { writeFileAtomic } from '../notes/repository';
import type { Transcript } from './types';

export const DEFAULT_CACHE_TTL_DAYS = 7;

interface CacheEntry {
  text: string;
  language?: string;
  /** Epoch milliseconds */
  cachedAt: number;
}

function isCacheEntry(value: unknown): value is CacheEntry {
  if (typeof value !== 'object' || value === null) return false;
  const entry: Record<string, unknown> = { ...value };
  return (
    typeof entry.text === 'string' &&
    typeof entry.cachedAt === 'number' &&
    (entry.language === undefined || typeof entry.language === 'string')
  );
}

export interface TranscriptCacheOptions {
  /** JSON file backing the cache; null keeps it in memory */
  filePath?: string | null;
  ttlDays?: number;
  now?: () => number;
}

/** Fetched transcripts keyed by video id, expiring after a TTL. */
export class TranscriptCache {
  private entries = new Map<string, CacheEntry>();
  private filePath: string | null;
  private ttlMs: number;
  private now: () => number;
  private hits = 0;
  private misses = 0;

  constructor(options: TranscriptCacheOptions = {}) {
    this.filePath = options.filePath ?? null;
    this.ttlMs = (options.ttlDays ?? DEFAULT_CACHE_TTL_DAYS) * 24 * 60 * 60 * 1000;
    this.now = options.now ?? Date.now;
  }

  /** Read the backing file, dropping expired and malformed entries. */
  async load(): Promise<void> {
    if (!this.filePath) return;
    let raw: unknown;
    try {
      raw = JSON.parse(await readFile(this.filePath, 'utf-8'));
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return;
      console.warn(`[cache] Starting with an empty transcript cache; ${this.filePath} unreadable:`, errorMessage(err));
      return;
    }
    if (typeof raw !== 'object' || raw === null) return;

    for (const [videoId, entry] of Object.entries(raw)) {
      if (isCacheEntry(entry) && !this.isExpired(entry)) this.entries.set(videoId, entry);
    }
    console.log(`[cache] Loaded ${this.entries.size} cached transcript(s)`);
  }

  get(videoId: string): Transcript | null {
    const entry = this.entries.get(videoId);
    if (!entry || this.isExpired(entry)) {
      if (entry) this.entries.delete(videoId);
      this.misses++;
      return null;
    }
    this.hits++;
    return { videoId, text: entry.text, language: entry.language };
  }

  async set(transcript: Transcript): Promise<void> {
    this.entries.set(transcript.videoId, {
      text: transcript.text,
      language: transcript.language,
      cachedAt: this.now(),
    });
    await this.persist();
  }

  async invalidate(videoId: string): Promise<boolean> {
    const removed = this.entries.delete(videoId);
    if (removed) await this.persist();
    return removed;
  }

  stats() {
    return { entries: this.entries.size, hits: this.hits, misses: this.misses };
  }

  private isExpired(entry: CacheEntry): boolean {
    return this.now() - entry.cachedAt > this.ttlMs;
  }

  private async persist() {
    if (!this.filePath) return;
    for (const [videoId, entry] of this.entries) {
      if (this.isExpired(entry)) this.entries.delete(videoId);
    }
    await writeFileAtomic(this.filePath, JSON.stringify(Object.fromEntries(this.entries), null, 2));
  }
}
