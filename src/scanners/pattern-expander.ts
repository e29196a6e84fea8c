import { readdir } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import { exists } from '../utils/fs.js';

export const HOME_TOKEN = '~';
export const WILDCARD = '*';

export interface ExpandOptions {
  homeDir?: string;
}

export function expandHome(pattern: string, home = homedir()): string {
  if (pattern === HOME_TOKEN) return home;
  if (pattern.startsWith(`${HOME_TOKEN}/`)) return join(home, pattern.slice(2));
  return pattern;
}

/** True when the pattern's wildcard sits in its final path segment. */
export function hasTerminalWildcard(pattern: string): boolean {
  const index = pattern.indexOf(WILDCARD);
  return index !== -1 && !pattern.slice(index + 1).includes('/');
}

/** Directory whose children a wildcard pattern lists, or the path itself. */
export function patternRoot(pattern: string, home = homedir()): string {
  const expanded = expandHome(pattern, home);
  const index = expanded.indexOf(WILDCARD);
  if (index === -1) return expanded;

  const prefix = expanded.slice(0, index);
  return prefix.length > 1 && prefix.endsWith('/') ? prefix.slice(0, -1) : prefix;
}

/**
 * Expands a cleanup pattern into paths that exist right now.
 *
 * Without a wildcard the pattern is returned as-is when it exists. With one,
 * only the immediate children of the fixed prefix before `*` are listed and
 * returned verbatim; segments after the wildcard are NOT matched, so the
 * sandboxed-cache pattern yields every folder of `~/Library/Containers`.
 * Unreadable prefixes give `[]`;
 * permission problems are reported by the permission probe, not here.
 */
export async function expandPattern(pattern: string, options: ExpandOptions = {}): Promise<string[]> {
  const home = options.homeDir ?? homedir();
  const expanded = expandHome(pattern, home);

  if (!expanded.includes(WILDCARD)) {
    return (await exists(expanded)) ? [expanded] : [];
  }

  const base = patternRoot(expanded, home);
  try {
    const entries = await readdir(base);
    return entries.sort().map((entry) => join(base, entry));
  } catch {
    return [];
  }
}
