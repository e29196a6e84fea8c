export type CleanupCategoryId =
  | 'system-caches'
  | 'user-caches'
  | 'logs'
  | 'trash'
  | 'xcode-derived-data'
  | 'xcode-archives'
  | 'xcode-device-support'
  | 'homebrew'
  | 'npm'
  | 'pip';

export type CategoryGroup = 'System Junk' | 'Development' | 'Package Managers' | 'Trash';
export type SafetyLevel = 'safe' | 'moderate' | 'risky';

export interface Category {
  id: CleanupCategoryId;
  name: string;
  group: CategoryGroup;
  description: string;
  safetyLevel: SafetyLevel;
  safetyNote?: string;
  /** Scanned for its size only. Its items are never selected; `empty-trash` reclaims them. */
  reportOnly?: boolean;
}

/**
 * Static cleanup configuration entry. `pattern` may start with `~` and may
 * contain a single `*` wildcard.
 */
export interface CleanupPathDefinition {
  readonly pattern: string;
  readonly category: CleanupCategoryId;
  readonly description: string;
  readonly requiresRoot: boolean;
  readonly safeToClean: boolean;
}

export interface CleanableItem {
  id: string;
  path: string;
  name: string;
  size: number;
  category: CleanupCategoryId;
  isSelected: boolean;
  isDirectory: boolean;
  modifiedAt?: Date;
}

export interface ScanIssue {
  path: string;
  kind: CleanerErrorKind;
  reason: string;
}

export interface ScanResult {
  category: Category;
  items: CleanableItem[];
  totalSize: number;
  errors: ScanIssue[];
}

export interface ScanSummary {
  results: ScanResult[];
  totalSize: number;
  totalItems: number;
  cancelled: boolean;
}

export interface ScannerOptions {
  verbose?: boolean;
  signal?: AbortSignal;
  homeDir?: string;
  /** Include definitions flagged `safeToClean: false`. */
  includeUnsafe?: boolean;
  /** Include definitions that need root to list. */
  includeRoot?: boolean;
  expandNonTerminalPatterns?: boolean;
}

export interface Scanner {
  category: Category;
  scan(options?: ScannerOptions): Promise<ScanResult>;
}

// Leftovers

export type LeftoverCategory =
  | 'cache'
  | 'preferences'
  | 'applicationSupport'
  | 'container'
  | 'logs'
  | 'launchItem'
  | 'cookies'
  | 'savedState'
  | 'webkit'
  | 'crashReports'
  | 'other';

export type LeftoverConfidence = 'low' | 'medium' | 'high';

export interface LeftoverFile {
  readonly id: string;
  readonly path: string;
  readonly name: string;
  readonly size: number;
  readonly category: LeftoverCategory;
  readonly confidence: LeftoverConfidence;
  readonly relatedBundleId?: string;
  readonly modifiedAt?: Date;
  readonly daysSinceModified?: number;
}

export interface LeftoverSearchRoot {
  readonly path: string;
  readonly category: LeftoverCategory;
}

export interface InstalledApp {
  id: string;
  name: string;
  /** Unique key: two apps with the same bundle identifier are the same app. */
  bundleIdentifier: string;
  path: string;
  version?: string;
  size: number;
}

// Permissions

export type FolderAccessStatus = 'unchecked' | 'notExists' | 'denied' | 'accessible' | 'checking';
export type ProbeOutcome = 'accessible' | 'denied' | 'notExists';

export type PermissionCategoryType =
  | 'fullDiskAccess'
  | 'userFolders'
  | 'systemFolders'
  | 'applicationData'
  | 'startupPaths';

export interface FolderAccessInfo {
  readonly id: string;
  readonly path: string;
  readonly displayName: string;
  readonly requiresElevatedAccess: boolean;
  readonly canTriggerConsentDialog: boolean;
  readonly status: FolderAccessStatus;
}

export interface PermissionCategoryState {
  readonly type: PermissionCategoryType;
  readonly name: string;
  readonly folders: readonly FolderAccessInfo[];
}

export type ProbePhase = 'startup' | 'full';

// Validation and deletion

export type ValidationResult =
  | { kind: 'safe' }
  | { kind: 'protectedPath'; path: string }
  | { kind: 'outsideAllowedPaths' }
  | { kind: 'symlinkToProtected'; target: string }
  | { kind: 'pathTraversal' }
  | { kind: 'doesNotExist' }
  | { kind: 'invalidPath' };

export type CleanerErrorKind =
  | 'InvalidInput'
  | 'PolicyViolation'
  | 'NotFound'
  | 'PermissionDenied'
  | 'EnumerationFailure';

export interface DeletionCandidate {
  path: string;
  /** Size measured at scan time; credited to freedBytes on success. */
  size: number;
}

export interface DeletionError {
  path: string;
  kind: CleanerErrorKind;
  reason: string;
}

export interface DeletionResult {
  successCount: number;
  failedCount: number;
  errors: DeletionError[];
  freedBytes: number;
}

// Review groups

/** Items of one category as presented for review; totals follow the selection. */
export interface CleanupGroup {
  readonly category: Category;
  readonly items: readonly CleanableItem[];
  readonly totalSize: number;
  readonly selectedSize: number;
  readonly selectedCount: number;
}
