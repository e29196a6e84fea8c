export * from './types.js';
export * from './utils/index.js';
export { CATEGORIES, CATEGORY_IDS, isCategoryId } from './catalog/categories.js';
export { CLEANUP_PATHS, pathsForCategory, safeToCleanPaths } from './catalog/cleanup-paths.js';
export { allLeftoverRoots, systemLibraryRoots, userLibraryRoots } from './catalog/leftover-paths.js';
export { buildPermissionCatalog, PERMISSION_CATEGORY_TYPES } from './catalog/permission-folders.js';
export {
  ALL_SCANNERS,
  getScanner,
  getAllScanners,
  getAvailableScanners,
  filterIgnoredItems,
  runAllScans,
  runScans,
  type ParallelScanOptions,
} from './scanners/index.js';
export { PatternScanner } from './scanners/pattern-scanner.js';
export { expandHome, expandPattern, hasTerminalWildcard, patternRoot } from './scanners/pattern-expander.js';
export * from './scanners/orphans.js';
export * from './cleaner/groups.js';
export { executeDeletion, deletedPaths, type DeletionOptions } from './cleaner/deletion-executor.js';
export { CleanupSession, type CleanupSessionOptions, type SessionScanOptions } from './cleaner/session.js';
