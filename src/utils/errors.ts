import type { CleanerErrorKind } from '../types.js';

export class CleanerError extends Error {
  readonly kind: CleanerErrorKind;
  readonly path?: string;

  constructor(kind: CleanerErrorKind, message: string, path?: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CleanerError';
    this.kind = kind;
    this.path = path;
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    const { code } = error;
    return typeof code === 'string' ? code : undefined;
  }
  return undefined;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** Maps a Node fs error onto the cleaner's error taxonomy. */
export function kindFromError(error: unknown, fallback: CleanerErrorKind = 'PermissionDenied'): CleanerErrorKind {
  if (error instanceof CleanerError) return error.kind;
  switch (errnoCode(error)) {
    case 'ENOENT':
    case 'ENOTDIR':
      return 'NotFound';
    case 'EACCES':
    case 'EPERM':
      return 'PermissionDenied';
    default:
      return fallback;
  }
}
