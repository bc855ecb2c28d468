import { CollaboratorError, errorMessage } from '../errors';
import type {
  Collaborators,
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
} from './types';

type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function optionalString(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

/** JSON-over-HTTP transport shared by the collaborator clients. */
export class HttpCollaboratorClient {
  private baseUrl: string;

  constructor(
    readonly name: string,
    baseUrl: string,
    private fetchImpl: FetchLike = fetch
  ) {
    this.baseUrl = baseUrl.replace(/\/+$/, '');
  }

  async request(method: 'GET' | 'POST', path: string, signal: AbortSignal, body?: unknown): Promise<Record<string, unknown>> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        signal,
        headers: body === undefined ? { accept: 'application/json' } : { 'content-type': 'application/json', accept: 'application/json' },
        body: body === undefined ? undefined : JSON.stringify(body),
      });
    } catch (err) {
      throw new CollaboratorError(this.name, 'unavailable', `request failed: ${errorMessage(err)}`);
    }

    if (res.status === 429) {
      throw new CollaboratorError(this.name, 'rate_limited', `${method} ${path} returned 429`);
    }
    if (!res.ok) {
      throw new CollaboratorError(this.name, 'unavailable', `${method} ${path} returned ${res.status}`);
    }

    let data: unknown;
    try {
      data = await res.json();
    } catch (err) {
      throw new CollaboratorError(this.name, 'invalid_response', `malformed JSON: ${errorMessage(err)}`);
    }
    if (!isRecord(data)) {
      throw new CollaboratorError(this.name, 'invalid_response', 'response is not a JSON object');
    }
    return data;
  }

  invalid(reason: string): CollaboratorError {
    return new CollaboratorError(this.name, 'invalid_response', reason);
  }
}

export class HttpTranscriptFetcher implements TranscriptFetcher {
  constructor(private client: HttpCollaboratorClient) {}

  async fetchTranscript(videoId: string, signal: AbortSignal): Promise<Transcript> {
    const data = await this.client.request('GET', `/transcripts/${encodeURIComponent(videoId)}`, signal);
    if (typeof data.text !== 'string' || data.text.trim() === '') {
      throw this.client.invalid('transcript text missing');
    }
    return { videoId, text: data.text, language: optionalString(data.language) };
  }
}

export class HttpQuoteExtractor implements QuoteExtractor {
  constructor(private client: HttpCollaboratorClient) {}

  async extractQuotes(request: QuoteExtractionRequest, signal: AbortSignal): Promise<ExtractedQuote[]> {
    const data = await this.client.request('POST', '/extract', signal, {
      transcript: request.transcript,
      max_quotes: request.maxQuotes,
      min_quality: request.minQuality,
      title: request.title,
    });
    if (!Array.isArray(data.quotes)) throw this.client.invalid('quotes must be an array');

    const quotes: ExtractedQuote[] = [];
    for (const item of data.quotes) {
      if (!isRecord(item) || typeof item.text !== 'string' || typeof item.quality !== 'number') {
        throw this.client.invalid('quote entries need text and quality');
      }
      quotes.push({
        text: item.text,
        quality: item.quality,
        timestamp: optionalString(item.timestamp),
        context: optionalString(item.context),
      });
    }
    return quotes;
  }
}

export class HttpOcrService implements OcrService {
  constructor(private client: HttpCollaboratorClient) {}

  async recognize(imagePath: string, signal: AbortSignal): Promise<OcrResult> {
    const data = await this.client.request('POST', '/ocr', signal, { image_path: imagePath });
    if (typeof data.text !== 'string') throw this.client.invalid('ocr text missing');
    return { text: data.text, description: optionalString(data.description) };
  }
}

export class HttpLinkSuggester implements LinkSuggester {
  constructor(private client: HttpCollaboratorClient) {}

  async suggestLinks(request: LinkSuggestionRequest, signal: AbortSignal): Promise<LinkSuggestion[]> {
    const data = await this.client.request('POST', '/links', signal, request);
    if (!Array.isArray(data.suggestions)) throw this.client.invalid('suggestions must be an array');

    const suggestions: LinkSuggestion[] = [];
    for (const item of data.suggestions) {
      if (!isRecord(item) || typeof item.target !== 'string' || typeof item.score !== 'number') {
        throw this.client.invalid('suggestion entries need target and score');
      }
      suggestions.push({ target: item.target, score: item.score, reason: optionalString(item.reason) });
    }
    return suggestions;
  }
}

export interface CollaboratorUrls {
  transcripts: string;
  ocr: string;
  links: string;
}

export function createHttpCollaborators(urls: CollaboratorUrls, fetchImpl?: FetchLike): Collaborators {
  const transcriptClient = new HttpCollaboratorClient('transcript-service', urls.transcripts, fetchImpl);
  return {
    transcripts: new HttpTranscriptFetcher(transcriptClient),
    extractor: new HttpQuoteExtractor(new HttpCollaboratorClient('quote-extractor', urls.transcripts, fetchImpl)),
    ocr: new HttpOcrService(new HttpCollaboratorClient('ocr-service', urls.ocr, fetchImpl)),
    links: new HttpLinkSuggester(new HttpCollaboratorClient('link-suggester', urls.links, fetchImpl)),
  };
}
