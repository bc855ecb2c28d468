import { join } from 'path';
import type { DaemonConfig } from '../config';
import { createHttpCollaborators } from '../collaborators/http';
import { GlobalRateLimiter } from '../collaborators/rateLimiter';
import { TranscriptCache } from '../collaborators/transcriptCache';
import type { Collaborators } from '../collaborators/types';
import { FileNoteRepository, type NoteRepository } from '../notes/repository';
import { DirectoryOrganizer } from './directoryOrganizer';
import { LinkSuggestionHandler } from './linkSuggestion';
import { ScreenshotHandler } from './screenshot';
import { TranscriptHandler } from './transcript';
import type { FeatureHandler } from './types';

export interface HandlerFactoryOptions {
  /** Defaults to HTTP clients against each handler's serviceUrl */
  collaborators?: Collaborators;
  repository?: NoteRepository;
  now?: () => number;
}

/**
 * Build the enabled handlers in routing priority order. The order is the
 * dispatch contract: an event goes to the first handler that claims it.
 */
export async function createFeatureHandlers(
  config: DaemonConfig,
  options: HandlerFactoryOptions = {}
): Promise<FeatureHandler[]> {
  const collaborators =
    options.collaborators ??
    createHttpCollaborators({
      transcripts: config.transcript.serviceUrl,
      ocr: config.screenshot.serviceUrl,
      links: config.linkSuggestion.serviceUrl,
    });
  const repository = options.repository ?? new FileNoteRepository();
  const now = options.now ?? Date.now;
  const vaultPath = config.vaultPath;
  const handlers: FeatureHandler[] = [];

  if (config.transcript.enabled) {
    const cache = new TranscriptCache({
      filePath: join(config.stateDir, 'cache', 'transcripts.json'),
      ttlDays: config.transcript.cacheTtlDays,
      now,
    });
    const rateLimiter = new GlobalRateLimiter({
      cooldownSeconds: config.transcript.globalCooldownSeconds,
      trackingFile: join(config.stateDir, 'cache', 'transcript-last-request.txt'),
      now,
    });
    await Promise.all([cache.load(), rateLimiter.load()]);

    handlers.push(
      new TranscriptHandler({
        config: config.transcript,
        vaultPath,
        repository,
        fetcher: collaborators.transcripts,
        extractor: collaborators.extractor,
        cache,
        rateLimiter,
        now,
      })
    );
  }

  if (config.screenshot.enabled) {
    handlers.push(new ScreenshotHandler({ config: config.screenshot, vaultPath, ocr: collaborators.ocr, now }));
  }

  if (config.linkSuggestion.enabled) {
    handlers.push(
      new LinkSuggestionHandler({
        config: config.linkSuggestion,
        vaultPath,
        repository,
        suggester: collaborators.links,
        now,
      })
    );
  }

  if (config.organizer.enabled) {
    handlers.push(new DirectoryOrganizer({ config: config.organizer, vaultPath, repository }));
  }

  return handlers;
}
