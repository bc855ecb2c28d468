import { randomBytes } from 'crypto';
import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { NoteFormatError, errorMessage } from '../errors';
import { parseNote, serializeNote, type NoteRecord } from './frontmatter';

/**
 * Write to a temporary sibling, then rename over the target. A reader sees
 * either the old file or the new one, never a partial write. The temp name
 * starts with a dot and ends in .tmp so the watcher ignores it.
 */
export async function writeFileAtomic(filePath: string, content: string): Promise<void> {
  const dir = dirname(filePath);
  await mkdir(dir, { recursive: true });
  const tmpPath = join(dir, `.${basename(filePath)}.${process.pid}.${randomBytes(4).toString('hex')}.tmp`);
  try {
    await writeFile(tmpPath, content, 'utf-8');
    await rename(tmpPath, filePath);
  } catch (err) {
    await rm(tmpPath, { force: true });
    throw err;
  }
}

/**
 * Every read-modify-write of a note goes through this interface, so the
 * atomic-save discipline lives in one place.
 */
export interface NoteRepository {
  /** Null when the note has no frontmatter. Throws NoteFormatError on bad YAML. */
  load(filePath: string): Promise<NoteRecord | null>;
  save(filePath: string, record: NoteRecord): Promise<void>;
  /** Read the raw text, for notes the daemon only inspects */
  readText(filePath: string): Promise<string>;
}

export class FileNoteRepository implements NoteRepository {
  async load(filePath: string): Promise<NoteRecord | null> {
    const text = await readFile(filePath, 'utf-8');
    try {
      return parseNote(text);
    } catch (err) {
      throw new NoteFormatError(filePath, errorMessage(err));
    }
  }

  async save(filePath: string, record: NoteRecord): Promise<void> {
    await writeFileAtomic(filePath, serializeNote(record));
  }

  readText(filePath: string): Promise<string> {
    return readFile(filePath, 'utf-8');
  }
}
