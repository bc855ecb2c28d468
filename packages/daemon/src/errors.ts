/** Lifecycle errors: already running, PID lock held, invalid configuration. */
export class DaemonError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'DaemonError';
  }
}

export type CollaboratorFailureKind = 'timeout' | 'rate_limited' | 'unavailable' | 'invalid_response';

/**
 * Typed failure of an external collaborator (transcript service, extractor,
 * OCR, link suggester). Handlers branch on `kind`, never on the message.
 */
export class CollaboratorError extends Error {
  readonly kind: CollaboratorFailureKind;
  readonly collaborator: string;

  constructor(collaborator: string, kind: CollaboratorFailureKind, message: string) {
    super(`${collaborator}: ${message}`);
    this.name = 'CollaboratorError';
    this.kind = kind;
    this.collaborator = collaborator;
  }
}

export function isCollaboratorError(err: unknown): err is CollaboratorError {
  return err instanceof CollaboratorError;
}

interface NodeError extends Error {
  code: string;
}

export function isNodeError(err: unknown): err is NodeError {
  return err instanceof Error && 'code' in err;
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** A note whose frontmatter cannot be parsed into a mapping. */
export class NoteFormatError extends Error {
  constructor(filePath: string, reason: string) {
    super(`${filePath}: ${reason}`);
    this.name = 'NoteFormatError';
  }
}
