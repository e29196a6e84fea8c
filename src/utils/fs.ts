import { lstat, readdir } from 'fs/promises';
import type { Dirent } from 'fs';
import { basename, join } from 'path';
import { CleanerError, errorMessage, kindFromError } from './errors.js';

export interface ItemInfo {
  path: string;
  name: string;
  size: number;
  isDirectory: boolean;
  modifiedAt: Date;
}

export async function exists(path: string): Promise<boolean> {
  try {
    await lstat(path);
    return true;
  } catch {
    return false;
  }
}

/**
 * Size in bytes of a file, or of every regular file below a directory.
 *
 * Symbolic links are never followed and count as zero bytes, both at the top
 * level and during traversal. Throws `NotFound`/`PermissionDenied` when the path
 * itself cannot be stat'ed and `EnumerationFailure` when a directory cannot be
 * listed.
 */
export async function getSize(path: string): Promise<number> {
  let stats;
  try {
    stats = await lstat(path);
  } catch (error) {
    throw new CleanerError(kindFromError(error), `Cannot stat ${path}: ${errorMessage(error)}`, path, { cause: error });
  }

  if (stats.isSymbolicLink()) return 0;
  if (stats.isDirectory()) return getDirectorySize(path);
  return stats.size;
}

export async function getDirectorySize(dirPath: string): Promise<number> {
  let entries: Dirent[];
  try {
    entries = await readdir(dirPath, { withFileTypes: true });
  } catch (error) {
    throw new CleanerError(
      'EnumerationFailure',
      `Cannot enumerate ${dirPath}: ${errorMessage(error)}`,
      dirPath,
      { cause: error }
    );
  }

  let total = 0;
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name);

    if (entry.isDirectory()) {
      try {
        total += await getDirectorySize(fullPath);
      } catch (error) {
        // Nested unreadable folders are skipped; only the root listing is fatal.
        console.warn(`[Size] Skipping ${fullPath}: ${errorMessage(error)}`);
      }
    } else if (entry.isFile()) {
      try {
        total += (await lstat(fullPath)).size;
      } catch (error) {
        console.warn(`[Size] Skipping ${fullPath}: ${errorMessage(error)}`);
      }
    }
  }

  return total;
}

export async function getItemInfo(path: string): Promise<ItemInfo> {
  let stats;
  try {
    stats = await lstat(path);
  } catch (error) {
    throw new CleanerError(kindFromError(error), `Cannot stat ${path}: ${errorMessage(error)}`, path, { cause: error });
  }

  const isDirectory = stats.isDirectory();
  const size = isDirectory ? await getDirectorySize(path) : stats.isSymbolicLink() ? 0 : stats.size;

  return {
    path,
    name: basename(path),
    size,
    isDirectory,
    modifiedAt: stats.mtime,
  };
}
