import { existsSync } from 'fs';
import { basename, extname, join } from 'path';
import type { FileEvent } from '@vaultwatch/shared';
import type { TranscriptConfig } from '../config';
import { CooldownStore } from '../cooldown';
import { CollaboratorError, errorMessage, isCollaboratorError, isNodeError } from '../errors';
import { getString, replaceSection, serializeNote, type NoteRecord } from '../notes/frontmatter';
import { writeFileAtomic, type NoteRepository } from '../notes/repository';
import type { GlobalRateLimiter } from '../collaborators/rateLimiter';
import { withTimeout } from '../collaborators/timeout';
import type { TranscriptCache } from '../collaborators/transcriptCache';
import type { ExtractedQuote, QuoteExtractor, Transcript, TranscriptFetcher } from '../collaborators/types';
import { failed, isApproved, isMarkdown, skipped, succeeded, type FeatureHandler, type HandlerResult } from './types';

const YOUTUBE_URL_RE =
  /(?:youtube\.com\/watch\?(?:[^\s)]*&)?v=|youtu\.be\/|youtube\.com\/(?:embed|shorts|live)\/)([A-Za-z0-9_-]{11})/;
const VIDEO_ID_RE = /^[A-Za-z0-9_-]{11}$/;

export const QUOTES_HEADING = 'Extracted Quotes';

export interface TranscriptHandlerDeps {
  config: TranscriptConfig;
  vaultPath: string;
  repository: NoteRepository;
  fetcher: TranscriptFetcher;
  extractor: QuoteExtractor;
  cache?: TranscriptCache;
  rateLimiter?: GlobalRateLimiter;
  cooldowns?: CooldownStore;
  now?: () => number;
}

/** A video note is one the user created from a YouTube link. */
export function isVideoNote(note: NoteRecord): boolean {
  return note.frontmatter.source === 'youtube' || note.frontmatter.video_id !== undefined;
}

export function resolveVideoId(note: NoteRecord): string | null {
  const explicit = getString(note.frontmatter, 'video_id')?.trim();
  if (explicit && VIDEO_ID_RE.test(explicit)) return explicit;

  for (const text of [getString(note.frontmatter, 'video_url'), note.body]) {
    const match = text ? YOUTUBE_URL_RE.exec(text) : null;
    if (match) return match[1];
  }
  return null;
}

export function formatQuotes(quotes: ExtractedQuote[]): string {
  if (quotes.length === 0) return '_No quotes met the quality threshold._';
  return quotes
    .map((q) => {
      const lines = [`> ${q.text.replace(/\n+/g, ' ').trim()}`];
      if (q.timestamp) lines.push(`> [${q.timestamp}]`);
      if (q.context) lines.push('', `*${q.context.trim()}*`);
      return lines.join('\n');
    })
    .join('\n\n');
}

/**
 * Quote extraction for YouTube notes.
 *
 *   draft --(approved, cooldown elapsed)--> processing --> processed
 *                                                     \--> draft (rollback)
 *
 * The note's frontmatter is the only record of this lifecycle.
 * `ready_for_processing` belongs to the user and is never written.
 */
export class TranscriptHandler implements FeatureHandler {
  readonly name = 'transcript';

  private config: TranscriptConfig;
  private vaultPath: string;
  private repository: NoteRepository;
  private fetcher: TranscriptFetcher;
  private extractor: QuoteExtractor;
  private cache?: TranscriptCache;
  private rateLimiter?: GlobalRateLimiter;
  private cooldowns: CooldownStore;
  private now: () => number;

  constructor(deps: TranscriptHandlerDeps) {
    this.config = deps.config;
    this.vaultPath = deps.vaultPath;
    this.repository = deps.repository;
    this.fetcher = deps.fetcher;
    this.extractor = deps.extractor;
    this.cache = deps.cache;
    this.rateLimiter = deps.rateLimiter;
    this.now = deps.now ?? Date.now;
    this.cooldowns = deps.cooldowns ?? new CooldownStore(this.now);
  }

  async canHandle(event: FileEvent): Promise<boolean> {
    if (!isMarkdown(event.path)) return false;
    const note = await this.loadQuietly(event.path);
    if (!note || !isVideoNote(note)) return false;

    const reason = this.ineligibility(note);
    if (reason) {
      console.debug(`[handler:${this.name}] Not eligible: ${event.path} (${reason})`);
      return false;
    }
    if (this.cooldowns.isCoolingDown(event.path, this.config.cooldownSeconds)) {
      const elapsed = this.cooldowns.secondsSinceLast(event.path) ?? 0;
      console.debug(`[handler:${this.name}] Cooling down: ${event.path} (${Math.round(elapsed)}s since last attempt)`);
      return false;
    }
    return true;
  }

  async handle(event: FileEvent): Promise<HandlerResult> {
    const filePath = event.path;
    // Before any external call, so a hung call cannot reopen the window
    this.cooldowns.recordAttempt(filePath);

    const note = await this.repository.load(filePath);
    if (!note) return skipped('note no longer has frontmatter');
    const reason = this.ineligibility(note);
    if (reason) return skipped(`no longer eligible (${reason})`);
    const videoId = resolveVideoId(note);
    if (!videoId) return skipped('no video id');

    note.frontmatter.status = 'processing';
    note.frontmatter.processing_started_at = this.timestamp();
    await this.repository.save(filePath, note);

    let quotes: ExtractedQuote[];
    let transcriptLink: string | null = null;
    let fromCache = false;
    try {
      const obtained = await this.obtainTranscript(videoId);
      fromCache = obtained.fromCache;
      quotes = await this.extract(obtained.transcript, note);
      if (this.config.transcriptsDir !== null) {
        transcriptLink = await this.archiveTranscript(obtained.transcript, filePath, note);
      }
    } catch (err) {
      return this.rollback(filePath, note, err);
    }

    const current = await this.reload(filePath, note);
    if (!current) return skipped('note was removed while processing');
    current.frontmatter.status = 'processed';
    current.frontmatter.processing_completed_at = this.timestamp();
    current.frontmatter.ai_processed = true;
    current.frontmatter.quote_count = quotes.length;
    if (transcriptLink) current.frontmatter.transcript_file = transcriptLink;
    delete current.frontmatter.processing_error;
    current.body = replaceSection(current.body, QUOTES_HEADING, formatQuotes(quotes));
    try {
      await this.repository.save(filePath, current);
    } catch (err) {
      return this.rollback(filePath, note, err);
    }

    return succeeded(`Extracted ${quotes.length} quote(s) from ${videoId}`, {
      quotes_extracted: quotes.length,
      ...(fromCache ? { transcript_cache_hits: 1 } : {}),
      ...(transcriptLink ? { transcripts_archived: 1 } : {}),
    });
  }

  /** Why a parsed note cannot be processed now, or null when it can. */
  private ineligibility(note: NoteRecord): string | null {
    const fm = note.frontmatter;
    if (!isApproved(fm.ready_for_processing)) return 'not approved';
    if (fm.status === undefined || fm.status === null) return 'missing status';
    if (fm.status !== 'draft') return `status is ${String(fm.status)}`;
    if (fm.ai_processed === true) return 'already processed';
    if (!resolveVideoId(note)) return 'no video id';
    return null;
  }

  private async obtainTranscript(videoId: string): Promise<{ transcript: Transcript; fromCache: boolean }> {
    const cached = this.cache?.get(videoId);
    if (cached) return { transcript: cached, fromCache: true };

    if (this.rateLimiter && !this.rateLimiter.canProceed()) {
      const wait = this.rateLimiter.secondsUntilNextAllowed();
      throw new CollaboratorError('transcript-service', 'rate_limited', `global cooldown active, next request in ${wait}s`);
    }
    await this.rateLimiter?.recordRequest();

    let transcript: Transcript;
    try {
      transcript = await withTimeout('transcript-service', this.timeoutMs(), (signal) =>
        this.fetcher.fetchTranscript(videoId, signal)
      );
    } catch (err) {
      if (isCollaboratorError(err) && err.kind === 'rate_limited') this.rateLimiter?.recordRateLimited();
      throw err;
    }
    this.rateLimiter?.recordSuccess();

    if (this.cache) {
      try {
        await this.cache.set(transcript);
      } catch (err) {
        console.warn(`[handler:${this.name}] Could not cache transcript ${videoId}:`, errorMessage(err));
      }
    }
    return { transcript, fromCache: false };
  }

  private async extract(transcript: Transcript, note: NoteRecord): Promise<ExtractedQuote[]> {
    const quotes = await withTimeout('quote-extractor', this.timeoutMs(), (signal) =>
      this.extractor.extractQuotes(
        {
          transcript: transcript.text,
          maxQuotes: this.config.maxQuotes,
          minQuality: this.config.minQuality,
          title: getString(note.frontmatter, 'title'),
        },
        signal
      )
    );
    return quotes.filter((q) => q.quality >= this.config.minQuality).slice(0, this.config.maxQuotes);
  }

  /** Write the raw transcript beside the vault's media. Returns its wikilink. */
  private async archiveTranscript(transcript: Transcript, notePath: string, note: NoteRecord): Promise<string> {
    const dir = join(this.vaultPath, this.config.transcriptsDir ?? '');
    const stem = `youtube-${transcript.videoId}-${this.timestamp().slice(0, 10)}`;
    const archivePath = join(dir, `${stem}.md`);
    const parent = basename(notePath, extname(notePath));

    if (!existsSync(archivePath)) {
      const title = getString(note.frontmatter, 'title') ?? parent;
      const content = serializeNote({
        frontmatter: {
          type: 'transcript',
          video_id: transcript.videoId,
          video_url: `https://www.youtube.com/watch?v=${transcript.videoId}`,
          language: transcript.language ?? 'unknown',
          parent_note: `[[${parent}]]`,
          created: this.timestamp(),
        },
        body: `# Transcript: ${title}\n\n**Parent Note**: [[${parent}]]\n\n${transcript.text.trim()}\n`,
      });
      await writeFileAtomic(archivePath, content);
    }
    return `[[${stem}]]`;
  }

  private async rollback(filePath: string, written: NoteRecord, err: unknown): Promise<HandlerResult> {
    const message = errorMessage(err);
    const delta: Record<string, number> = {};
    if (isCollaboratorError(err)) delta[`collaborator_${err.kind}`] = 1;

    const current = await this.reload(filePath, written);
    if (!current) return failed(`Note removed before rollback: ${message}`, delta);
    current.frontmatter.status = 'draft';
    delete current.frontmatter.processing_started_at;
    current.frontmatter.processing_error = message;
    await this.repository.save(filePath, current);
    return failed(`Rolled back to draft: ${message}`, delta);
  }

  /**
   * Latest on-disk state, or the record last written when it cannot be read.
   * Null when the note was deleted or moved: it is not written back.
   */
  private async reload(filePath: string, fallback: NoteRecord): Promise<NoteRecord | null> {
    try {
      return (await this.repository.load(filePath)) ?? fallback;
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') {
        console.warn(`[handler:${this.name}] ${filePath} was removed while processing; leaving it gone`);
        return null;
      }
      console.warn(`[handler:${this.name}] Re-read of ${filePath} failed; using last written state:`, errorMessage(err));
      return fallback;
    }
  }

  private async loadQuietly(filePath: string): Promise<NoteRecord | null> {
    try {
      return await this.repository.load(filePath);
    } catch (err) {
      console.warn(`[handler:${this.name}] Skipping unreadable note ${filePath}:`, errorMessage(err));
      return null;
    }
  }

  private timeoutMs(): number {
    return this.config.timeoutSeconds * 1000;
  }

  private timestamp(): string {
    return new Date(this.now()).toISOString();
  }
}
