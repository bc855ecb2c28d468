import { parse, stringify } from 'yaml';

/** A markdown note split into its YAML frontmatter and body. */
export interface NoteRecord {
  frontmatter: Record<string, unknown>;
  body: string;
}

const FRONTMATTER_RE = /^---\r?\n(?:([\s\S]*?)\r?\n)?---[ \t]*(?:\r?\n|$)/;

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Split a note into frontmatter and body. Returns null when the note has no
 * frontmatter block; throws when the block is not a YAML mapping.
 */
export function parseNote(text: string): NoteRecord | null {
  const match = FRONTMATTER_RE.exec(text);
  if (!match) return null;

  const yamlText = match[1] ?? '';
  const data: unknown = yamlText.trim() === '' ? {} : parse(yamlText);
  if (!isPlainObject(data)) {
    throw new Error('frontmatter is not a mapping');
  }
  return { frontmatter: data, body: text.slice(match[0].length) };
}

export function serializeNote(record: NoteRecord): string {
  const keys = Object.keys(record.frontmatter);
  const yamlText = keys.length === 0 ? '' : stringify(record.frontmatter, { lineWidth: 0 });
  return `---\n${yamlText}---\n${record.body}`;
}

export function getString(frontmatter: Record<string, unknown>, key: string): string | undefined {
  const value = frontmatter[key];
  return typeof value === 'string' ? value : undefined;
}

/** Replace (or append) a `## <heading>` section, up to the next level-2 heading. */
export function replaceSection(body: string, heading: string, content: string): string {
  const lines = body.split('\n');
  const title = `## ${heading}`;
  const start = lines.findIndex((line) => line.trim() === title);
  const section = [title, '', ...content.replace(/\n+$/, '').split('\n'), ''];

  if (start === -1) {
    const trimmed = body.replace(/\n+$/, '');
    return `${trimmed}${trimmed ? '\n\n' : ''}${section.join('\n')}`;
  }

  let end = lines.findIndex((line, i) => i > start && line.startsWith('## '));
  if (end === -1) end = lines.length;
  const after = lines.slice(end);
  return [...lines.slice(0, start), ...section, ...after].join('\n').replace(/\n+$/, '\n');
}
