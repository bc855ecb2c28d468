import { existsSync } from 'fs';
import { mkdir, readdir, rename } from 'fs/promises';
import { dirname, join, relative } from 'path';
import type { FileEvent } from '@vaultwatch/shared';
import type { OrganizerConfig } from '../config';
import { errorMessage, isNodeError } from '../errors';
import { getString } from '../notes/frontmatter';
import type { NoteRepository } from '../notes/repository';
import { failed, isMarkdown, skipped, succeeded, type FeatureHandler, type HandlerResult } from './types';

export interface PlannedMove {
  from: string;
  to: string;
  type: string;
}

export interface OrganizerPlan {
  moves: PlannedMove[];
  /** Destination already exists; never overwritten */
  conflicts: PlannedMove[];
}

export interface DirectoryOrganizerDeps {
  config: OrganizerConfig;
  vaultPath: string;
  repository: NoteRepository;
}

/**
 * Moves notes that reached a filing status out of the source directory
 * into the directory for their `type`. Runs on a timer only.
 */
export class DirectoryOrganizer implements FeatureHandler {
  readonly name = 'directory-organizer';
  readonly scheduleIntervalMs: number;

  private config: OrganizerConfig;
  private vaultPath: string;
  private repository: NoteRepository;

  constructor(deps: DirectoryOrganizerDeps) {
    this.config = deps.config;
    this.vaultPath = deps.vaultPath;
    this.repository = deps.repository;
    this.scheduleIntervalMs = Math.round(deps.config.intervalMinutes * 60_000);
  }

  async canHandle(_event: FileEvent): Promise<boolean> {
    return false;
  }

  async handle(_event: FileEvent): Promise<HandlerResult> {
    return skipped('runs on a schedule only');
  }

  async plan(): Promise<OrganizerPlan> {
    const sourceDir = join(this.vaultPath, this.config.sourceDir);
    let names: string[];
    try {
      names = (await readdir(sourceDir, { withFileTypes: true }))
        .filter((e) => e.isFile() && isMarkdown(e.name) && !e.name.startsWith('.'))
        .map((e) => e.name)
        .sort();
    } catch (err) {
      if (isNodeError(err) && err.code === 'ENOENT') return { moves: [], conflicts: [] };
      throw err;
    }

    const plan: OrganizerPlan = { moves: [], conflicts: [] };
    for (const name of names) {
      const from = join(sourceDir, name);
      let type: string | undefined;
      try {
        const note = await this.repository.load(from);
        if (!note) continue;
        const status = getString(note.frontmatter, 'status');
        if (!status || status === 'processing' || !this.config.statuses.includes(status)) continue;
        type = getString(note.frontmatter, 'type');
      } catch (err) {
        console.warn(`[handler:${this.name}] Skipping unreadable note ${from}:`, errorMessage(err));
        continue;
      }

      const targetDir = type === undefined ? undefined : this.config.targets[type];
      if (type === undefined || targetDir === undefined) continue;
      const move = { from, to: join(this.vaultPath, targetDir, name), type };
      if (existsSync(move.to)) plan.conflicts.push(move);
      else plan.moves.push(move);
    }
    return plan;
  }

  async runScheduled(): Promise<HandlerResult> {
    const plan = await this.plan();
    for (const conflict of plan.conflicts) {
      console.warn(`[handler:${this.name}] Not moving ${this.rel(conflict.from)}: ${this.rel(conflict.to)} exists`);
    }

    const delta = {
      notes_planned: plan.moves.length,
      notes_conflicted: plan.conflicts.length,
      notes_moved: 0,
    };

    if (this.config.dryRun) {
      for (const move of plan.moves) {
        console.log(`[handler:${this.name}] Would move ${this.rel(move.from)} -> ${this.rel(move.to)}`);
      }
      return succeeded(`Dry run: ${plan.moves.length} move(s) planned, ${plan.conflicts.length} conflict(s)`, delta);
    }

    const errors: string[] = [];
    for (const move of plan.moves) {
      try {
        // Re-check right before the rename; a file may have appeared since planning
        if (existsSync(move.to)) {
          delta.notes_conflicted++;
          continue;
        }
        await mkdir(dirname(move.to), { recursive: true });
        await rename(move.from, move.to);
        delta.notes_moved++;
        console.log(`[handler:${this.name}] Moved ${this.rel(move.from)} -> ${this.rel(move.to)}`);
      } catch (err) {
        errors.push(`${this.rel(move.from)}: ${errorMessage(err)}`);
      }
    }

    if (errors.length > 0) {
      return failed(`Moved ${delta.notes_moved}, ${errors.length} failed: ${errors.join('; ')}`, delta);
    }
    return succeeded(`Moved ${delta.notes_moved} note(s), ${delta.notes_conflicted} conflict(s)`, delta);
  }

  private rel(filePath: string): string {
    return relative(this.vaultPath, filePath);
  }
}
