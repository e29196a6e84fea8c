import type { Category, CleanupCategoryId } from '../types.js';

export const CATEGORIES: Record<CleanupCategoryId, Category> = {
  'system-caches': {
    id: 'system-caches',
    name: 'System Caches',
    group: 'System Junk',
    description: 'System-wide caches under /Library/Caches',
    safetyLevel: 'moderate',
    safetyNote: 'Needs administrator rights; macOS rebuilds these on demand',
  },
  'user-caches': {
    id: 'user-caches',
    name: 'User Caches',
    group: 'System Junk',
    description: 'Application caches in your home folder',
    safetyLevel: 'safe',
  },
  'logs': {
    id: 'logs',
    name: 'Logs',
    group: 'System Junk',
    description: 'Application and system log files',
    safetyLevel: 'safe',
  },
  'trash': {
    id: 'trash',
    name: 'Trash',
    group: 'Trash',
    description: 'Items already in the Trash',
    safetyLevel: 'safe',
    safetyNote: 'Already in the Trash; run empty-trash to reclaim this space',
    reportOnly: true,
  },
  'xcode-derived-data': {
    id: 'xcode-derived-data',
    name: 'Xcode Derived Data',
    group: 'Development',
    description: 'Xcode build products, indexes and simulator caches',
    safetyLevel: 'safe',
  },
  'xcode-archives': {
    id: 'xcode-archives',
    name: 'Xcode Archives',
    group: 'Development',
    description: 'Archived app builds',
    safetyLevel: 'risky',
    safetyNote: 'Archives hold the dSYMs needed to symbolicate shipped builds',
  },
  'xcode-device-support': {
    id: 'xcode-device-support',
    name: 'Xcode Device Support',
    group: 'Development',
    description: 'Debug symbols for connected iOS devices',
    safetyLevel: 'safe',
  },
  'homebrew': {
    id: 'homebrew',
    name: 'Homebrew Cache',
    group: 'Package Managers',
    description: 'Downloaded Homebrew bottles and cask metadata',
    safetyLevel: 'safe',
  },
  'npm': {
    id: 'npm',
    name: 'npm Cache',
    group: 'Package Managers',
    description: 'npm package cache and logs',
    safetyLevel: 'safe',
  },
  'pip': {
    id: 'pip',
    name: 'pip Cache',
    group: 'Package Managers',
    description: 'Python pip download cache',
    safetyLevel: 'safe',
  },
};

export const CATEGORY_IDS: CleanupCategoryId[] = Object.values(CATEGORIES).map((c) => c.id);

export function isCategoryId(value: string): value is CleanupCategoryId {
  return Object.prototype.hasOwnProperty.call(CATEGORIES, value);
}
