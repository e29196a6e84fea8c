import { randomUUID } from 'crypto';
import { homedir } from 'os';
import type { FolderAccessInfo, PermissionCategoryState, PermissionCategoryType } from '../types.js';
import { expandHome } from '../scanners/pattern-expander.js';

interface FolderSpec {
  path: string;
  displayName: string;
  requiresElevatedAccess?: boolean;
  canTriggerConsentDialog?: boolean;
}

export const PERMISSION_CATEGORY_TYPES: readonly PermissionCategoryType[] = [
  'fullDiskAccess',
  'userFolders',
  'systemFolders',
  'applicationData',
  'startupPaths',
];

const CATEGORY_NAMES: Record<PermissionCategoryType, string> = {
  fullDiskAccess: 'Full Disk Access',
  userFolders: 'User Folders',
  systemFolders: 'System Folders',
  applicationData: 'Application Data',
  startupPaths: 'Startup Paths',
};

const FOLDERS: Record<PermissionCategoryType, FolderSpec[]> = {
  fullDiskAccess: [
    { path: '~/Library/Application Support/com.apple.TCC/TCC.db', displayName: 'TCC Database', requiresElevatedAccess: true },
    { path: '~/Library/Safari/Bookmarks.plist', displayName: 'Safari Bookmarks', requiresElevatedAccess: true },
    { path: '~/Library/Mail', displayName: 'Mail Library', requiresElevatedAccess: true },
    {
      path: '~/Library/Containers/com.apple.mail/Data/Library/Mail Downloads',
      displayName: 'Mail Attachments',
      requiresElevatedAccess: true,
    },
  ],
  // Listing any of these for the first time makes macOS show a consent prompt.
  userFolders: [
    { path: '~/Downloads', displayName: 'Downloads', canTriggerConsentDialog: true },
    { path: '~/Documents', displayName: 'Documents', canTriggerConsentDialog: true },
    { path: '~/Desktop', displayName: 'Desktop', canTriggerConsentDialog: true },
  ],
  systemFolders: [
    { path: '/Library/Caches', displayName: 'System Caches', requiresElevatedAccess: true },
    { path: '/Library/Logs', displayName: 'System Logs', requiresElevatedAccess: true },
    { path: '/Library/LaunchAgents', displayName: 'System Launch Agents' },
    { path: '/Library/LaunchDaemons', displayName: 'System Launch Daemons' },
  ],
  applicationData: [
    { path: '~/Library/Caches', displayName: 'User Caches' },
    { path: '~/Library/Logs', displayName: 'User Logs' },
    { path: '~/Library/Caches/com.apple.Safari', displayName: 'Safari Cache' },
    { path: '~/Library/Caches/Google/Chrome', displayName: 'Chrome Cache' },
    { path: '~/Library/Developer/Xcode/DerivedData', displayName: 'Xcode DerivedData' },
    { path: '~/.Trash', displayName: 'Trash' },
  ],
  startupPaths: [
    { path: '~/Library/LaunchAgents', displayName: 'User Launch Agents' },
    { path: '/System/Library/LaunchAgents', displayName: 'Apple Launch Agents' },
    { path: '/System/Library/LaunchDaemons', displayName: 'Apple Launch Daemons' },
  ],
};

export function createFolder(spec: FolderSpec, home = homedir()): FolderAccessInfo {
  const folder: FolderAccessInfo = {
    id: randomUUID(),
    path: expandHome(spec.path, home),
    displayName: spec.displayName,
    requiresElevatedAccess: spec.requiresElevatedAccess ?? false,
    canTriggerConsentDialog: spec.canTriggerConsentDialog ?? false,
    status: 'unchecked',
  };
  return Object.freeze(folder);
}

/** Builds a fresh catalog; every folder starts `unchecked`. */
export function buildPermissionCatalog(home = homedir()): PermissionCategoryState[] {
  return PERMISSION_CATEGORY_TYPES.map((type) => ({
    type,
    name: CATEGORY_NAMES[type],
    folders: FOLDERS[type].map((spec) => createFolder(spec, home)),
  }));
}
