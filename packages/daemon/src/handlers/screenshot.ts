import { existsSync } from 'fs';
import { basename, extname, join, relative, sep } from 'path';
import type { FileEvent } from '@vaultwatch/shared';
import type { ScreenshotConfig } from '../config';
import { CooldownStore } from '../cooldown';
import { errorMessage, isCollaboratorError } from '../errors';
import { serializeNote } from '../notes/frontmatter';
import { writeFileAtomic } from '../notes/repository';
import { withTimeout } from '../collaborators/timeout';
import type { OcrResult, OcrService } from '../collaborators/types';
import { failed, skipped, succeeded, type FeatureHandler, type HandlerResult } from './types';

const IMAGE_EXTENSIONS = new Set(['.png', '.jpg', '.jpeg']);
const SCREENSHOT_PREFIX = /^screenshot_/i;

export interface ScreenshotHandlerDeps {
  config: ScreenshotConfig;
  vaultPath: string;
  ocr: OcrService;
  cooldowns?: CooldownStore;
  now?: () => number;
}

export function isScreenshot(filePath: string): boolean {
  const name = basename(filePath);
  return SCREENSHOT_PREFIX.test(name) && IMAGE_EXTENSIONS.has(extname(name).toLowerCase());
}

/** Imports new screenshots as fleeting capture notes with their OCR text. */
export class ScreenshotHandler implements FeatureHandler {
  readonly name = 'screenshot';

  private config: ScreenshotConfig;
  private vaultPath: string;
  private ocr: OcrService;
  private cooldowns: CooldownStore;
  private now: () => number;

  constructor(deps: ScreenshotHandlerDeps) {
    this.config = deps.config;
    this.vaultPath = deps.vaultPath;
    this.ocr = deps.ocr;
    this.now = deps.now ?? Date.now;
    this.cooldowns = deps.cooldowns ?? new CooldownStore(this.now);
  }

  capturePath(imagePath: string): string {
    const stem = basename(imagePath, extname(imagePath));
    return join(this.vaultPath, this.config.capturesDir, `capture-${stem}.md`);
  }

  async canHandle(event: FileEvent): Promise<boolean> {
    if (event.kind !== 'created' || !isScreenshot(event.path)) return false;
    if (existsSync(this.capturePath(event.path))) {
      console.debug(`[handler:${this.name}] Capture note already exists for ${event.path}`);
      return false;
    }
    return !this.cooldowns.isCoolingDown(event.path, this.config.cooldownSeconds);
  }

  async handle(event: FileEvent): Promise<HandlerResult> {
    const imagePath = event.path;
    this.cooldowns.recordAttempt(imagePath);

    const capturePath = this.capturePath(imagePath);
    if (!existsSync(imagePath)) return skipped('screenshot no longer exists');
    if (existsSync(capturePath)) return skipped('capture note already exists');

    let result: OcrResult;
    try {
      result = await withTimeout('ocr-service', this.config.timeoutSeconds * 1000, (signal) =>
        this.ocr.recognize(imagePath, signal)
      );
    } catch (err) {
      const delta: Record<string, number> = {};
      if (isCollaboratorError(err)) delta[`collaborator_${err.kind}`] = 1;
      return failed(`OCR failed: ${errorMessage(err)}`, delta);
    }

    await writeFileAtomic(capturePath, this.renderCapture(imagePath, result));
    return succeeded(`Created ${relative(this.vaultPath, capturePath)}`, {
      captures_created: 1,
      ocr_characters: result.text.length,
    });
  }

  private renderCapture(imagePath: string, ocr: OcrResult): string {
    // Wikilinks use forward slashes on every platform
    const imageRef = relative(this.vaultPath, imagePath).split(sep).join('/');
    const stem = basename(imagePath, extname(imagePath));
    const sections = [`# ${stem}`, `![[${imageRef}]]`];
    if (ocr.description?.trim()) sections.push(`## Description\n\n${ocr.description.trim()}`);
    sections.push(`## Extracted Text\n\n${ocr.text.trim() || '_No text detected._'}`);

    return serializeNote({
      frontmatter: {
        type: 'fleeting',
        status: 'inbox',
        source: 'screenshot',
        screenshot: imageRef,
        ocr_processed: true,
        created: new Date(this.now()).toISOString(),
      },
      body: `${sections.join('\n\n')}\n`,
    });
  }
}
