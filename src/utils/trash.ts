import { exec } from 'child_process';
import { mkdir, rename } from 'fs/promises';
import { homedir, platform } from 'os';
import { basename, extname, join } from 'path';
import { promisify } from 'util';
import type { CleanerErrorKind } from '../types.js';
import { errorMessage, kindFromError } from './errors.js';
import { exists } from './fs.js';
import { normalizePath } from './path-validator.js';

const execAsync = promisify(exec);

export type TrashOutcome =
  | { ok: true; destination: string }
  | { ok: false; kind: CleanerErrorKind; reason: string };

/**
 * The only deletion primitive the cleaner uses. Implementations move items
 * somewhere the user can restore them from; nothing is erased.
 */
export interface TrashService {
  moveToTrash(path: string): Promise<TrashOutcome>;
}

async function freeDestination(trashDir: string, fileName: string): Promise<string> {
  let destination = join(trashDir, fileName);
  const ext = extname(fileName);
  const base = ext ? fileName.slice(0, -ext.length) : fileName;
  let counter = 1;
  while (await exists(destination)) {
    destination = join(trashDir, `${base}_${counter}${ext}`);
    counter++;
  }
  return destination;
}

/** Moves items into `trashDir` by rename, suffixing names that already exist there. */
export function createDirectoryTrash(trashDir: string): TrashService {
  const root = normalizePath(trashDir);

  return {
    async moveToTrash(path: string): Promise<TrashOutcome> {
      const source = normalizePath(path);
      if (source === root || source.startsWith(`${root}/`)) {
        return { ok: false, kind: 'PolicyViolation', reason: 'Item is already in the Trash; empty the Trash to reclaim it' };
      }

      try {
        await mkdir(root, { recursive: true });
        const destination = await freeDestination(root, basename(source));
        await rename(source, destination);
        console.log(`[Trash] Moved: ${source} → ${destination}`);
        return { ok: true, destination };
      } catch (error) {
        console.error(`[Trash] Failed to move ${source}:`, errorMessage(error));
        return { ok: false, kind: kindFromError(error), reason: errorMessage(error) };
      }
    },
  };
}

export function userTrashDir(): string {
  return join(homedir(), '.Trash');
}

/** The current user's macOS Trash; refuses on other platforms. */
export function createSystemTrash(): TrashService {
  if (platform() !== 'darwin') {
    return {
      async moveToTrash(): Promise<TrashOutcome> {
        return { ok: false, kind: 'PermissionDenied', reason: 'Move to trash is only supported on macOS' };
      },
    };
  }
  return createDirectoryTrash(userTrashDir());
}

/** Permanently empties the Trash through Finder. Only ever run on explicit request. */
export async function emptyTrash(): Promise<{ success: boolean; error?: string }> {
  if (platform() !== 'darwin') {
    return { success: false, error: 'Empty trash is only supported on macOS' };
  }

  try {
    await execAsync(`osascript -e 'tell application "Finder" to empty trash'`);
    return { success: true };
  } catch (error) {
    return { success: false, error: errorMessage(error) };
  }
}
