import { randomUUID } from 'crypto';
import { homedir } from 'os';
import type {
  CleanupCategoryId,
  CleanupGroup,
  DeletionCandidate,
  DeletionResult,
  InstalledApp,
  LeftoverCategory,
  LeftoverFile,
  LeftoverSearchRoot,
  PermissionCategoryState,
  ProbePhase,
  ScanResult,
  ScanSummary,
  Scanner,
} from '../types.js';
import { allLeftoverRoots } from '../catalog/leftover-paths.js';
import { runAllScans, runScans } from '../scanners/index.js';
import { groupByCategory, scanOrphans, type OrphanScanResult } from '../scanners/orphans.js';
import { createApplicationsRegistry, type InstalledAppRegistry } from '../utils/app-registry.js';
import { loadConfig, type Config } from '../utils/config.js';
import { errorMessage } from '../utils/errors.js';
import { getHistory, getKnownIdentifiers, rememberIdentifiers, saveHistory, type CleanupLog } from '../utils/history.js';
import { createSafetyPolicy, type SafetyPolicy } from '../utils/path-validator.js';
import { PermissionCatalog, fsAccessProbe, type AccessProbe } from '../utils/permissions.js';
import { createSystemTrash, type TrashService } from '../utils/trash.js';
import { buildPermissionCatalog } from '../catalog/permission-folders.js';
import { deletedPaths, executeDeletion } from './deletion-executor.js';
import { selectedItems, setGroupSelection, toCandidates, toGroups, toggleItem, withoutPaths } from './groups.js';

export interface CleanupSessionOptions {
  homeDir?: string;
  registry?: InstalledAppRegistry;
  trash?: TrashService;
  policy?: SafetyPolicy;
  probe?: AccessProbe;
  permissions?: PermissionCatalog;
  leftoverRoots?: readonly LeftoverSearchRoot[];
  /** Skips reading the config file. */
  config?: Config;
  historyFile?: string;
  knownAppsFile?: string;
  recordHistory?: boolean;
}

export interface SessionScanOptions {
  onProgress?: (completed: number, total: number, scanner: Scanner, result: ScanResult) => void;
  verbose?: boolean;
  includeUnsafe?: boolean;
  includeRoot?: boolean;
}

/**
 * Coordinates one cleaning session. The installed-app snapshot, the folder
 * status catalog, the last scan results and the cancellation controller live
 * here and nowhere else; scanners and probes hand back frozen results which
 * the session swaps in whole.
 */
export class CleanupSession {
  readonly permissions: PermissionCatalog;
  private readonly homeDir: string;
  private readonly registry: InstalledAppRegistry;
  private readonly trash: TrashService;
  readonly policy: SafetyPolicy;
  private readonly probe: AccessProbe;
  private controller = new AbortController();
  private apps: readonly InstalledApp[] = [];
  private appsLoaded = false;
  private cleanupGroups: readonly CleanupGroup[] = [];
  private lastSummary: ScanSummary | null = null;
  private orphanResult: OrphanScanResult | null = null;
  private deleting = false;

  constructor(private readonly options: CleanupSessionOptions = {}) {
    this.homeDir = options.homeDir ?? homedir();
    this.registry = options.registry ?? createApplicationsRegistry();
    this.trash = options.trash ?? createSystemTrash();
    this.policy = options.policy ?? createSafetyPolicy({ homeDir: this.homeDir });
    this.probe = options.probe ?? fsAccessProbe;
    this.permissions = options.permissions ?? new PermissionCatalog(buildPermissionCatalog(this.homeDir));
  }

  get cancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get isDeleting(): boolean {
    return this.deleting;
  }

  /** Stops running scans at their next root or category. A running batch still finishes. */
  cancel(): void {
    if (this.cancelled) return;
    console.log('[Session] Cancelled');
    this.controller.abort();
  }

  reset(): void {
    this.controller = new AbortController();
  }

  private async config(): Promise<Config> {
    return this.options.config ?? loadConfig();
  }

  // Installed apps

  async refreshApps(): Promise<readonly InstalledApp[]> {
    this.apps = Object.freeze(await this.registry.list());
    this.appsLoaded = true;
    return this.apps;
  }

  installedApps(): readonly InstalledApp[] {
    return this.apps;
  }

  // Cleanable items

  async scanCleanable(categoryIds?: CleanupCategoryId[], options: SessionScanOptions = {}): Promise<ScanSummary> {
    const scanOptions = {
      config: await this.config(),
      homeDir: this.homeDir,
      signal: this.controller.signal,
      verbose: options.verbose,
      includeUnsafe: options.includeUnsafe,
      includeRoot: options.includeRoot,
      onProgress: options.onProgress,
    };
    const summary =
      categoryIds && categoryIds.length > 0 ? await runScans(categoryIds, scanOptions) : await runAllScans(scanOptions);

    this.lastSummary = summary;
    this.cleanupGroups = Object.freeze(toGroups(summary.results));
    return summary;
  }

  lastScan(): ScanSummary | null {
    return this.lastSummary;
  }

  groups(): readonly CleanupGroup[] {
    return this.cleanupGroups;
  }

  toggleItem(itemId: string): readonly CleanupGroup[] {
    this.cleanupGroups = Object.freeze(toggleItem(this.cleanupGroups, itemId));
    return this.cleanupGroups;
  }

  setCategorySelection(categoryId: CleanupCategoryId, selected: boolean): readonly CleanupGroup[] {
    this.cleanupGroups = Object.freeze(setGroupSelection(this.cleanupGroups, categoryId, selected));
    return this.cleanupGroups;
  }

  selectedCandidates(): DeletionCandidate[] {
    return toCandidates(selectedItems(this.cleanupGroups));
  }

  // Orphans

  async scanOrphans(onCategory?: (root: LeftoverSearchRoot, files: readonly LeftoverFile[]) => void): Promise<OrphanScanResult> {
    const installed = this.appsLoaded ? this.apps : await this.refreshApps();
    const known = await this.knownIdentifiers();
    const config = await this.config();

    const result = await scanOrphans(
      {
        installedApps: installed,
        knownIdentifiers: known,
        roots: this.options.leftoverRoots ?? allLeftoverRoots(this.homeDir),
      },
      { signal: this.controller.signal, concurrency: config.concurrency, onCategory }
    );

    this.orphanResult = result;

    try {
      await rememberIdentifiers(
        installed.map((app) => app.bundleIdentifier),
        this.options.knownAppsFile
      );
    } catch (error) {
      console.warn(`[Session] Could not remember installed apps: ${errorMessage(error)}`);
    }

    return result;
  }

  private async knownIdentifiers(): Promise<string[]> {
    try {
      return await getKnownIdentifiers(this.options.knownAppsFile);
    } catch (error) {
      console.warn(`[Session] Ignoring unreadable known-apps file: ${errorMessage(error)}`);
      return [];
    }
  }

  orphans(): readonly LeftoverFile[] {
    return this.orphanResult?.files ?? [];
  }

  orphanGroups(): Map<LeftoverCategory, LeftoverFile[]> {
    return groupByCategory(this.orphans());
  }

  // Permissions

  async checkPermissions(phase: ProbePhase = 'startup'): Promise<readonly PermissionCategoryState[]> {
    return this.permissions.runPass(phase, this.probe, { signal: this.controller.signal });
  }

  // Deletion

  /**
   * Runs one deletion batch. Returns null without touching anything when the
   * session was cancelled or another batch is still running.
   */
  async clean(
    candidates: readonly DeletionCandidate[],
    source: CleanupLog['source'] = 'cleaner',
    onProgress?: (completed: number, total: number, candidate: DeletionCandidate) => void
  ): Promise<DeletionResult | null> {
    if (this.cancelled) {
      console.warn('[Session] Session cancelled, not starting a deletion batch');
      return null;
    }
    if (this.deleting) {
      console.warn('[Session] A deletion batch is already running');
      return null;
    }

    this.deleting = true;
    let result: DeletionResult;
    try {
      result = await executeDeletion(candidates, { trash: this.trash, policy: this.policy, onProgress });
    } finally {
      this.deleting = false;
    }

    const removed = deletedPaths(candidates, result);
    this.cleanupGroups = Object.freeze(withoutPaths(this.cleanupGroups, removed));
    if (this.orphanResult) {
      this.orphanResult = {
        ...this.orphanResult,
        files: Object.freeze(this.orphanResult.files.filter((file) => !removed.has(file.path))),
      };
    }

    await this.record(result, source, candidates);
    return result;
  }

  async history(): Promise<CleanupLog[]> {
    return getHistory(this.options.historyFile);
  }

  async cleanSelected(
    onProgress?: (completed: number, total: number, candidate: DeletionCandidate) => void
  ): Promise<DeletionResult | null> {
    return this.clean(this.selectedCandidates(), 'cleaner', onProgress);
  }

  private async record(
    result: DeletionResult,
    source: CleanupLog['source'],
    candidates: readonly DeletionCandidate[]
  ): Promise<void> {
    if (this.options.recordHistory === false || candidates.length === 0) return;

    const touched = new Set(candidates.map((c) => c.path));
    const categoriesTouched = (this.lastSummary?.results ?? [])
      .filter((r) => r.items.some((item) => touched.has(item.path)))
      .map((r) => r.category.id);

    const log: CleanupLog = {
      id: randomUUID(),
      timestamp: new Date().toISOString(),
      totalFreed: result.freedBytes,
      itemsCount: result.successCount,
      failedCount: result.failedCount,
      source,
      categories: categoriesTouched.length > 0 ? categoriesTouched : undefined,
    };

    try {
      const config = await this.config();
      await saveHistory(log, { file: this.options.historyFile, limit: config.historyLimit });
    } catch (error) {
      console.warn(`[Session] Could not record history: ${errorMessage(error)}`);
    }
  }
}
