import { readdir, readFile, stat } from 'fs/promises';
import { homedir } from 'os';
import { join } from 'path';
import open from 'open';
import type {
  FolderAccessInfo,
  FolderAccessStatus,
  PermissionCategoryState,
  ProbeOutcome,
  ProbePhase,
} from '../types.js';
import { buildPermissionCatalog } from '../catalog/permission-folders.js';
import { runWithConcurrency } from './concurrency.js';
import { errnoCode, errorMessage } from './errors.js';

/**
 * Capability that answers "can I read this right now?" by trying to.
 * Mode bits say nothing about consent-gated folders, so implementations must
 * attempt a real read.
 */
export interface AccessProbe {
  probe(path: string): Promise<ProbeOutcome>;
}

/** Lists directories and reads files in full. */
export const fsAccessProbe: AccessProbe = {
  async probe(path: string): Promise<ProbeOutcome> {
    let stats;
    try {
      stats = await stat(path);
    } catch (error) {
      const code = errnoCode(error);
      return code === 'ENOENT' || code === 'ENOTDIR' ? 'notExists' : 'denied';
    }

    try {
      if (stats.isDirectory()) {
        await readdir(path);
      } else {
        await readFile(path);
      }
      return 'accessible';
    } catch {
      return 'denied';
    }
  },
};

/**
 * `checking` wins over everything; otherwise the collection is accessible only
 * when every entry is.
 */
export function rollupStatus(folders: readonly FolderAccessInfo[]): FolderAccessStatus {
  if (folders.some((f) => f.status === 'checking')) return 'checking';
  if (folders.every((f) => f.status === 'accessible')) return 'accessible';
  return 'denied';
}

export function summarizeCategory(category: PermissionCategoryState): {
  status: FolderAccessStatus;
  accessible: number;
  existing: number;
  total: number;
} {
  const { folders } = category;
  return {
    status: rollupStatus(folders),
    accessible: folders.filter((f) => f.status === 'accessible').length,
    existing: folders.filter((f) => f.status !== 'notExists' && f.status !== 'unchecked').length,
    total: folders.length,
  };
}

export interface PassOptions {
  signal?: AbortSignal;
  concurrency?: number;
}

export type CatalogListener = (snapshot: readonly PermissionCategoryState[]) => void;

/**
 * Sole owner of the folder status catalog. Probes run concurrently, but only
 * this object writes statuses; readers get frozen snapshots.
 */
export class PermissionCatalog {
  private categories: readonly PermissionCategoryState[];
  private readonly listeners = new Set<CatalogListener>();
  private activePasses = 0;
  lastChecked: Date | null = null;

  constructor(categories: PermissionCategoryState[] = buildPermissionCatalog()) {
    this.categories = Object.freeze(categories.map((c) => Object.freeze({ ...c, folders: Object.freeze([...c.folders]) })));
  }

  get isChecking(): boolean {
    return this.activePasses > 0;
  }

  snapshot(): readonly PermissionCategoryState[] {
    return this.categories;
  }

  folders(): FolderAccessInfo[] {
    return this.categories.flatMap((c) => c.folders);
  }

  findFolder(id: string): FolderAccessInfo | undefined {
    return this.folders().find((f) => f.id === id);
  }

  subscribe(listener: CatalogListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  /**
   * `startup` leaves consent-triggering folders untouched so opening the app
   * never pops an OS prompt; `full` probes everything.
   */
  async runPass(
    phase: ProbePhase,
    probe: AccessProbe = fsAccessProbe,
    options: PassOptions = {}
  ): Promise<readonly PermissionCategoryState[]> {
    const targets = this.folders().filter((f) => phase === 'full' || !f.canTriggerConsentDialog);
    const skipped = this.folders().length - targets.length;
    console.log(`[Permissions] ${phase} pass: probing ${targets.length} folders (${skipped} deferred)`);

    this.activePasses++;
    try {
      const tasks = targets.map((folder) => async () => {
        if (options.signal?.aborted) return;

        this.setStatus(folder.id, 'checking');
        let outcome: ProbeOutcome;
        try {
          outcome = await probe.probe(folder.path);
        } catch (error) {
          console.error(`[Permissions] Probe failed for ${folder.path}:`, errorMessage(error));
          outcome = 'denied';
        }
        this.setStatus(folder.id, outcome);
      });

      await runWithConcurrency(tasks, options.concurrency ?? 4);
      this.lastChecked = new Date();
    } finally {
      this.activePasses--;
    }

    return this.categories;
  }

  private setStatus(folderId: string, status: FolderAccessStatus): void {
    this.categories = Object.freeze(
      this.categories.map((category) => {
        if (!category.folders.some((f) => f.id === folderId)) return category;
        return Object.freeze({
          ...category,
          folders: Object.freeze(
            category.folders.map((f) => (f.id === folderId ? Object.freeze({ ...f, status }) : f))
          ),
        });
      })
    );

    for (const listener of this.listeners) {
      listener(this.categories);
    }
  }
}

/**
 * Full Disk Access is inferred from whether the Mail library (or Safari
 * history when Mail was never set up) can be read.
 */
export async function hasFullDiskAccess(probe: AccessProbe = fsAccessProbe, home = homedir()): Promise<boolean> {
  const mail = await probe.probe(join(home, 'Library', 'Mail'));
  if (mail !== 'notExists') return mail === 'accessible';
  return (await probe.probe(join(home, 'Library', 'Safari', 'History.db'))) === 'accessible';
}

export const SETTINGS_PANES = {
  fullDiskAccess: 'x-apple.systempreferences:com.apple.preference.security?Privacy_AllFiles',
  filesAndFolders: 'x-apple.systempreferences:com.apple.preference.security?Privacy_FilesAndFolders',
  privacy: 'x-apple.systempreferences:com.apple.preference.security',
} as const;

/** macOS has no API to revoke access, so point the user at the right pane. */
export function settingsPaneFor(folder: FolderAccessInfo): string {
  if (folder.requiresElevatedAccess) return SETTINGS_PANES.fullDiskAccess;
  if (folder.canTriggerConsentDialog) return SETTINGS_PANES.filesAndFolders;
  return SETTINGS_PANES.privacy;
}

export async function openSettingsPane(url: string = SETTINGS_PANES.fullDiskAccess): Promise<void> {
  await open(url);
}
