import { join } from 'path';
import { homedir } from 'os';
import type { LeftoverSearchRoot } from '../types.js';

export function userLibraryRoots(home = homedir()): LeftoverSearchRoot[] {
  const lib = join(home, 'Library');
  return [
    { path: join(lib, 'Application Support'), category: 'applicationSupport' },
    { path: join(lib, 'Preferences'), category: 'preferences' },
    { path: join(lib, 'Caches'), category: 'cache' },
    { path: join(lib, 'Containers'), category: 'container' },
    { path: join(lib, 'Logs'), category: 'logs' },
    { path: join(lib, 'Saved Application State'), category: 'savedState' },
    { path: join(lib, 'Cookies'), category: 'cookies' },
    { path: join(lib, 'WebKit'), category: 'webkit' },
    { path: join(lib, 'HTTPStorages'), category: 'cache' },
    { path: join(lib, 'Group Containers'), category: 'container' },
    { path: join(lib, 'Application Scripts'), category: 'other' },
  ];
}

// Only folders the deletion policy allows, so every reported leftover can be trashed.
export function systemLibraryRoots(): LeftoverSearchRoot[] {
  return [
    { path: '/Library/Application Support', category: 'applicationSupport' },
    { path: '/Library/Caches', category: 'cache' },
    { path: '/Library/LaunchAgents', category: 'launchItem' },
    { path: '/Library/LaunchDaemons', category: 'launchItem' },
    { path: '/Library/Logs/DiagnosticReports', category: 'crashReports' },
  ];
}

/** User roots first, then system roots. */
export function allLeftoverRoots(home = homedir()): LeftoverSearchRoot[] {
  return [...userLibraryRoots(home), ...systemLibraryRoots()];
}
