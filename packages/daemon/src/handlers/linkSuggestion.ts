import type { Dirent } from 'fs';
import { readdir } from 'fs/promises';
import { basename, extname, join, resolve } from 'path';
import type { FileEvent } from '@vaultwatch/shared';
import type { LinkSuggestionConfig } from '../config';
import { CooldownStore } from '../cooldown';
import { errorMessage, isCollaboratorError, isNodeError } from '../errors';
import { getString, replaceSection, type NoteRecord } from '../notes/frontmatter';
import type { NoteRepository } from '../notes/repository';
import { withTimeout } from '../collaborators/timeout';
import type { LinkCandidate, LinkSuggester, LinkSuggestion } from '../collaborators/types';
import { isVideoNote } from './transcript';
import { failed, isApproved, isMarkdown, skipped, succeeded, type FeatureHandler, type HandlerResult } from './types';

export const RELATED_HEADING = 'Related';

export interface LinkSuggestionHandlerDeps {
  config: LinkSuggestionConfig;
  vaultPath: string;
  repository: NoteRepository;
  suggester: LinkSuggester;
  cooldowns?: CooldownStore;
  now?: () => number;
}

const noteTitle = (filePath: string) => basename(filePath, extname(filePath));

/**
 * Breadth-first listing of markdown notes under `root`, skipping dot
 * directories, stopping after `limit` entries.
 */
export async function collectCandidates(root: string, exclude: string, limit: number): Promise<LinkCandidate[]> {
  const candidates: LinkCandidate[] = [];
  const dirs = [root];
  const excluded = resolve(exclude);

  for (let i = 0; i < dirs.length && candidates.length < limit; i++) {
    const dir = dirs[i];
    let entries: Dirent[];
    try {
      entries = await readdir(dir, { withFileTypes: true });
    } catch (err) {
      console.warn(`[handler:link-suggestion] Cannot list ${dir}:`, errorMessage(err));
      continue;
    }
    entries.sort((a, b) => a.name.localeCompare(b.name));
    for (const entry of entries) {
      if (entry.name.startsWith('.')) continue;
      const full = join(dir, entry.name);
      if (entry.isDirectory()) {
        dirs.push(full);
      } else if (entry.isFile() && isMarkdown(entry.name) && resolve(full) !== excluded) {
        candidates.push({ title: noteTitle(entry.name), path: full });
        if (candidates.length >= limit) break;
      }
    }
  }
  return candidates;
}

/** Suggests wikilinks to related notes for approved notes. */
export class LinkSuggestionHandler implements FeatureHandler {
  readonly name = 'link-suggestion';

  private config: LinkSuggestionConfig;
  private vaultPath: string;
  private repository: NoteRepository;
  private suggester: LinkSuggester;
  private cooldowns: CooldownStore;
  private now: () => number;

  constructor(deps: LinkSuggestionHandlerDeps) {
    this.config = deps.config;
    this.vaultPath = deps.vaultPath;
    this.repository = deps.repository;
    this.suggester = deps.suggester;
    this.now = deps.now ?? Date.now;
    this.cooldowns = deps.cooldowns ?? new CooldownStore(this.now);
  }

  async canHandle(event: FileEvent): Promise<boolean> {
    if (!isMarkdown(event.path)) return false;
    let note: NoteRecord | null;
    try {
      note = await this.repository.load(event.path);
    } catch (err) {
      console.warn(`[handler:${this.name}] Skipping unreadable note ${event.path}:`, errorMessage(err));
      return false;
    }
    if (!note || this.ineligibility(note)) return false;
    return !this.cooldowns.isCoolingDown(event.path, this.config.cooldownSeconds);
  }

  async handle(event: FileEvent): Promise<HandlerResult> {
    const filePath = event.path;
    this.cooldowns.recordAttempt(filePath);

    const note = await this.repository.load(filePath);
    if (!note) return skipped('note no longer has frontmatter');
    const reason = this.ineligibility(note);
    if (reason) return skipped(`no longer eligible (${reason})`);

    const title = getString(note.frontmatter, 'title') ?? noteTitle(filePath);
    const candidates = await collectCandidates(this.vaultPath, filePath, this.config.maxCandidates);
    if (candidates.length === 0) return skipped('no candidate notes in vault');

    let suggestions: LinkSuggestion[];
    try {
      const raw = await withTimeout('link-suggester', this.config.timeoutSeconds * 1000, (signal) =>
        this.suggester.suggestLinks({ title, content: note.body, candidates }, signal)
      );
      suggestions = this.select(raw, title);
    } catch (err) {
      const delta: Record<string, number> = {};
      if (isCollaboratorError(err)) delta[`collaborator_${err.kind}`] = 1;
      return failed(`Link suggestion failed: ${errorMessage(err)}`, delta);
    }

    let current: NoteRecord;
    try {
      current = (await this.repository.load(filePath)) ?? note;
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return skipped('note was removed while suggesting links');
      throw err;
    }
    const links = suggestions.map((s) => `[[${s.target}]]`);
    current.frontmatter.suggested_links = links;
    current.frontmatter.links_processed = true;
    current.frontmatter.links_suggested_at = new Date(this.now()).toISOString();
    if (this.config.autoInsert && links.length > 0) {
      current.body = replaceSection(current.body, RELATED_HEADING, links.map((l) => `- ${l}`).join('\n'));
    }
    await this.repository.save(filePath, current);

    return succeeded(`Suggested ${links.length} link(s) from ${candidates.length} candidate(s)`, {
      links_suggested: links.length,
      ...(this.config.autoInsert ? { links_inserted: links.length } : {}),
    });
  }

  private ineligibility(note: NoteRecord): string | null {
    const fm = note.frontmatter;
    if (!isApproved(fm.ready_for_processing)) return 'not approved';
    if (fm.links_processed === true) return 'links already suggested';
    if (fm.status === 'processing') return 'another handler is processing it';
    // Video notes get their quotes first
    if (isVideoNote(note) && fm.ai_processed !== true) return 'awaiting quote extraction';
    return null;
  }

  /** Threshold, de-duplicate, best first, capped. */
  private select(suggestions: LinkSuggestion[], ownTitle: string): LinkSuggestion[] {
    const seen = new Set<string>([ownTitle]);
    return suggestions
      .filter((s) => s.score >= this.config.similarityThreshold)
      .sort((a, b) => b.score - a.score)
      .filter((s) => {
        if (seen.has(s.target)) return false;
        seen.add(s.target);
        return true;
      })
      .slice(0, this.config.maxSuggestions);
  }
}
