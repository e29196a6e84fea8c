import type { CleanupCategoryId, CleanupPathDefinition } from '../types.js';

function define(
  pattern: string,
  category: CleanupCategoryId,
  description: string,
  flags: { requiresRoot?: boolean; safeToClean?: boolean } = {}
): CleanupPathDefinition {
  const definition: CleanupPathDefinition = {
    pattern,
    category,
    description,
    requiresRoot: flags.requiresRoot ?? false,
    safeToClean: flags.safeToClean ?? true,
  };
  return Object.freeze(definition);
}

// Patterns whose `*` is not the last segment only expand one level (see
// expandPattern); scanners skip them unless explicitly enabled.
export const CLEANUP_PATHS: readonly CleanupPathDefinition[] = Object.freeze([
  // Caches
  define('~/Library/Caches/*', 'user-caches', 'User application caches'),
  define('/Library/Caches/*', 'system-caches', 'System-wide caches', { requiresRoot: true }),
  define('~/.cache/*', 'user-caches', 'XDG cache directory'),
  define('~/Library/Containers/*/Data/Library/Caches/*', 'user-caches', 'Sandboxed app caches'),

  // Logs
  define('~/Library/Logs/*', 'logs', 'User application logs'),
  define('/Library/Logs/*', 'logs', 'System logs', { requiresRoot: true }),
  define('/private/var/log/*', 'logs', 'System log files', { requiresRoot: true, safeToClean: false }),

  // Xcode
  define('~/Library/Developer/Xcode/DerivedData/*', 'xcode-derived-data', 'Xcode build artifacts and indexes'),
  define('~/Library/Developer/Xcode/Archives/*', 'xcode-archives', 'Xcode app archives', { safeToClean: false }),
  define('~/Library/Developer/Xcode/iOS DeviceSupport/*', 'xcode-device-support', 'iOS device debug symbols'),
  define('~/Library/Developer/CoreSimulator/Devices/*/data/Caches/*', 'xcode-derived-data', 'Simulator caches'),
  define('~/Library/Developer/CoreSimulator/Caches/*', 'xcode-derived-data', 'CoreSimulator caches'),

  // Package managers
  define('~/Library/Caches/Homebrew/*', 'homebrew', 'Homebrew downloaded packages'),
  define('/opt/homebrew/Caskroom/*/.metadata', 'homebrew', 'Homebrew Cask metadata'),
  define('/usr/local/Caskroom/*/.metadata', 'homebrew', 'Homebrew Cask metadata (Intel)'),
  define('~/.npm/_cacache/*', 'npm', 'npm package cache'),
  define('~/.npm/_logs/*', 'npm', 'npm log files'),
  define('~/Library/Caches/pip/*', 'pip', 'Python pip cache'),

  // Trash
  define('~/.Trash/*', 'trash', 'User Trash'),
  define('/Volumes/*/.Trashes/*', 'trash', 'External drive trash', { requiresRoot: true }),
]);

export function pathsForCategory(category: CleanupCategoryId): CleanupPathDefinition[] {
  return CLEANUP_PATHS.filter((d) => d.category === category);
}

export function safeToCleanPaths(): CleanupPathDefinition[] {
  return CLEANUP_PATHS.filter((d) => d.safeToClean);
}
