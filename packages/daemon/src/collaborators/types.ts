/**
 * Boundaries of the external services the handlers call. Every call takes
 * an AbortSignal and either resolves with data or rejects, preferably with
 * a CollaboratorError.
 */

export interface Transcript {
  videoId: string;
  text: string;
  language?: string;
}

export interface TranscriptFetcher {
  fetchTranscript(videoId: string, signal: AbortSignal): Promise<Transcript>;
}

export interface QuoteExtractionRequest {
  transcript: string;
  maxQuotes: number;
  /** 0.0 to 1.0 */
  minQuality: number;
  title?: string;
}

export interface ExtractedQuote {
  text: string;
  quality: number;
  timestamp?: string;
  context?: string;
}

export interface QuoteExtractor {
  extractQuotes(request: QuoteExtractionRequest, signal: AbortSignal): Promise<ExtractedQuote[]>;
}

export interface OcrResult {
  text: string;
  description?: string;
}

export interface OcrService {
  recognize(imagePath: string, signal: AbortSignal): Promise<OcrResult>;
}

export interface LinkCandidate {
  title: string;
  path: string;
}

export interface LinkSuggestionRequest {
  title: string;
  content: string;
  candidates: LinkCandidate[];
}

export interface LinkSuggestion {
  /** Title of the note to link to */
  target: string;
  score: number;
  reason?: string;
}

export interface LinkSuggester {
  suggestLinks(request: LinkSuggestionRequest, signal: AbortSignal): Promise<LinkSuggestion[]>;
}

export interface Collaborators {
  transcripts: TranscriptFetcher;
  extractor: QuoteExtractor;
  ocr: OcrService;
  links: LinkSuggester;
}
