import { execFile } from 'child_process';
import { readdir } from 'fs/promises';
import { randomUUID } from 'crypto';
import { homedir } from 'os';
import { basename, join } from 'path';
import { promisify } from 'util';
import type { InstalledApp } from '../types.js';
import { errorMessage } from './errors.js';
import { getSize } from './fs.js';

const execFileAsync = promisify(execFile);

const PLIST_BUDDY = '/usr/libexec/PlistBuddy';

export interface InstalledAppRegistry {
  list(): Promise<InstalledApp[]>;
}

export interface BundleInfo {
  bundleIdentifier: string;
  version?: string;
}

/** Registry over a fixed list, deduplicated by bundle identifier. */
export class StaticAppRegistry implements InstalledAppRegistry {
  private readonly apps: InstalledApp[];

  constructor(apps: InstalledApp[]) {
    this.apps = dedupeApps(apps);
  }

  async list(): Promise<InstalledApp[]> {
    return [...this.apps];
  }
}

export function dedupeApps(apps: readonly InstalledApp[]): InstalledApp[] {
  const byId = new Map<string, InstalledApp>();
  for (const app of apps) {
    if (!byId.has(app.bundleIdentifier)) byId.set(app.bundleIdentifier, app);
  }
  return [...byId.values()];
}

async function readPlistKey(plistPath: string, key: string): Promise<string | undefined> {
  try {
    const { stdout } = await execFileAsync(PLIST_BUDDY, ['-c', `Print :${key}`, plistPath]);
    const value = stdout.trim();
    return value.length > 0 ? value : undefined;
  } catch {
    // Key missing or plist unreadable
    return undefined;
  }
}

export async function readBundleInfo(appPath: string): Promise<BundleInfo | null> {
  const plist = join(appPath, 'Contents', 'Info.plist');
  const bundleIdentifier = await readPlistKey(plist, 'CFBundleIdentifier');
  if (!bundleIdentifier) return null;
  const version = await readPlistKey(plist, 'CFBundleShortVersionString');
  return { bundleIdentifier, version };
}

export interface ApplicationsRegistryOptions {
  roots?: string[];
  readInfo?: (appPath: string) => Promise<BundleInfo | null>;
  /** Measure bundle sizes; off by default because it walks every bundle. */
  measureSize?: boolean;
}

/** Enumerates `*.app` bundles in the standard application folders. */
export function createApplicationsRegistry(options: ApplicationsRegistryOptions = {}): InstalledAppRegistry {
  const roots = options.roots ?? ['/Applications', join(homedir(), 'Applications')];
  const readInfo = options.readInfo ?? readBundleInfo;

  return {
    async list(): Promise<InstalledApp[]> {
      const apps: InstalledApp[] = [];

      for (const root of roots) {
        let entries: string[];
        try {
          entries = await readdir(root);
        } catch (error) {
          console.warn(`[Apps] Cannot list ${root}: ${errorMessage(error)}`);
          continue;
        }

        for (const entry of entries) {
          if (!entry.endsWith('.app') || entry.startsWith('.')) continue;

          const appPath = join(root, entry);
          const info = await readInfo(appPath);
          if (!info) continue;

          let size = 0;
          if (options.measureSize) {
            try {
              size = await getSize(appPath);
            } catch (error) {
              console.warn(`[Apps] Cannot size ${appPath}: ${errorMessage(error)}`);
            }
          }

          apps.push({
            id: randomUUID(),
            name: basename(entry, '.app'),
            bundleIdentifier: info.bundleIdentifier,
            path: appPath,
            version: info.version,
            size,
          });
        }
      }

      console.log(`[Apps] Found ${apps.length} installed applications`);
      return dedupeApps(apps);
    },
  };
}
