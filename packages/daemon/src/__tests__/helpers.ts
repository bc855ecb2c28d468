import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { dirname, join } from 'path';
import type { FileEvent } from '@vaultwatch/shared';
import { parseConfig, type DaemonConfig } from '../config';
import { parseNote, serializeNote, type NoteRecord } from '../notes/frontmatter';
import type {
  ExtractedQuote,
  LinkSuggester,
  LinkSuggestion,
  LinkSuggestionRequest,
  OcrResult,
  OcrService,
  QuoteExtractionRequest,
  QuoteExtractor,
  Transcript,
  TranscriptFetcher,
} from '../collaborators/types';

export function makeTempDir(prefix = 'vaultwatch-'): string {
  return mkdtempSync(join(tmpdir(), prefix));
}

export function removeDir(dir: string) {
  rmSync(dir, { recursive: true, force: true });
}

export function writeNote(filePath: string, frontmatter: Record<string, unknown>, body = '') {
  mkdirSync(dirname(filePath), { recursive: true });
  writeFileSync(filePath, serializeNote({ frontmatter, body }), 'utf-8');
}

export function readNote(filePath: string): NoteRecord {
  const note = parseNote(readFileSync(filePath, 'utf-8'));
  if (!note) throw new Error(`${filePath} has no frontmatter`);
  return note;
}

export function fileEvent(path: string, kind: FileEvent['kind'] = 'modified'): FileEvent {
  return { path, kind, observedAt: 0 };
}

/** Configuration for a vault in a temp directory with nothing listening. */
export function testConfig(vaultPath: string, overrides: Record<string, unknown> = {}): DaemonConfig {
  return parseConfig({
    vaultPath,
    pidFile: null,
    monitoring: { enabled: false },
    ...overrides,
  });
}

/** Mutable clock for cooldown and timestamp assertions. */
export function makeClock(start = Date.parse('2026-03-01T10:00:00.000Z')) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

export class FakeTranscriptFetcher implements TranscriptFetcher {
  calls: string[] = [];
  text = 'So the key idea is that small notes compound over time.';
  error: Error | null = null;
  /** Never settles; used to exercise timeouts */
  hang = false;

  async fetchTranscript(videoId: string, _signal: AbortSignal): Promise<Transcript> {
    this.calls.push(videoId);
    if (this.hang) return new Promise<Transcript>(() => {});
    if (this.error) throw this.error;
    return { videoId, text: this.text, language: 'en' };
  }
}

export class FakeQuoteExtractor implements QuoteExtractor {
  requests: QuoteExtractionRequest[] = [];
  quotes: ExtractedQuote[] = [
    { text: 'Small notes compound over time.', quality: 0.9, timestamp: '01:15' },
    { text: 'Link ideas, not folders.', quality: 0.8 },
    { text: 'Um, so, yeah.', quality: 0.3 },
  ];
  error: Error | null = null;

  async extractQuotes(request: QuoteExtractionRequest, _signal: AbortSignal): Promise<ExtractedQuote[]> {
    this.requests.push(request);
    if (this.error) throw this.error;
    return this.quotes;
  }
}

export class FakeOcrService implements OcrService {
  calls: string[] = [];
  result: OcrResult = { text: 'Meeting at 3pm', description: 'A calendar screenshot' };
  error: Error | null = null;

  async recognize(imagePath: string, _signal: AbortSignal): Promise<OcrResult> {
    this.calls.push(imagePath);
    if (this.error) throw this.error;
    return this.result;
  }
}

export class FakeLinkSuggester implements LinkSuggester {
  requests: LinkSuggestionRequest[] = [];
  suggestions: LinkSuggestion[] = [];
  error: Error | null = null;

  async suggestLinks(request: LinkSuggestionRequest, _signal: AbortSignal): Promise<LinkSuggestion[]> {
    this.requests.push(request);
    if (this.error) throw this.error;
    return this.suggestions;
  }
}
