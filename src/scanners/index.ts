import type { Scanner, CleanupCategoryId, ScanResult, ScannerOptions, ScanSummary } from '../types.js';
import { loadConfig, type Config } from '../utils/config.js';
import { runWithConcurrency } from '../utils/concurrency.js';
import { PatternScanner } from './pattern-scanner.js';

export const ALL_SCANNERS: Record<CleanupCategoryId, Scanner> = {
  'user-caches': new PatternScanner('user-caches'),
  'system-caches': new PatternScanner('system-caches'),
  'logs': new PatternScanner('logs'),
  'trash': new PatternScanner('trash'),
  'xcode-derived-data': new PatternScanner('xcode-derived-data'),
  'xcode-archives': new PatternScanner('xcode-archives'),
  'xcode-device-support': new PatternScanner('xcode-device-support'),
  'homebrew': new PatternScanner('homebrew'),
  'npm': new PatternScanner('npm'),
  'pip': new PatternScanner('pip'),
};

export function getScanner(categoryId: CleanupCategoryId): Scanner {
  return ALL_SCANNERS[categoryId];
}

export function getAllScanners(): Scanner[] {
  return Object.values(ALL_SCANNERS);
}

export function getAvailableScanners(): { id: string; name: string; group: string; safetyLevel: string }[] {
  return getAllScanners().map((s) => ({
    id: s.category.id,
    name: s.category.name,
    group: s.category.group,
    safetyLevel: s.category.safetyLevel,
  }));
}

export interface ParallelScanOptions extends ScannerOptions {
  parallel?: boolean;
  concurrency?: number;
  /** Overrides the config file, mostly for tests. */
  config?: Config;
  onProgress?: (completed: number, total: number, scanner: Scanner, result: ScanResult) => void;
}

export function filterIgnoredItems(results: ScanResult[], config: Config): ScanResult[] {
  const ignoredPaths = new Set(config.ignoredPaths ?? []);
  const ignoredFolders = config.ignoredFolders ?? [];
  const ignoredCategories = new Set(config.ignoredCategories ?? []);

  const isUnderIgnoredFolder = (itemPath: string): boolean =>
    ignoredFolders.some((folder) => itemPath === folder || itemPath.startsWith(folder + '/'));

  return results
    // First: filter out entire ignored categories
    .filter((result) => !ignoredCategories.has(result.category.id))
    // Then: filter items within each category
    .map((result) => {
      const items = result.items.filter((item) => !ignoredPaths.has(item.path) && !isUnderIgnoredFolder(item.path));
      return {
        ...result,
        items,
        totalSize: items.reduce((sum, item) => sum + item.size, 0),
      };
    });
}

async function runScanners(scanners: Scanner[], options: ParallelScanOptions = {}): Promise<ScanSummary> {
  const config = options.config ?? (await loadConfig());
  const parallel = options.parallel ?? config.parallelScans ?? true;
  const concurrency = parallel ? options.concurrency ?? config.concurrency ?? 4 : 1;
  const scannerOptions: ScannerOptions = {
    ...options,
    includeUnsafe: options.includeUnsafe ?? config.includeUnsafeDefinitions,
    includeRoot: options.includeRoot ?? config.includeRootDefinitions,
    expandNonTerminalPatterns: options.expandNonTerminalPatterns ?? config.expandNonTerminalPatterns,
  };

  let completed = 0;
  const total = scanners.length;

  const tasks = scanners.map((scanner) => async (): Promise<ScanResult | null> => {
    // Cancellation is checked per category, never inside one.
    if (options.signal?.aborted) return null;

    let result: ScanResult;
    try {
      result = await scanner.scan(scannerOptions);
    } catch (error) {
      console.error(`[Scanner] ${scanner.category.name} failed:`, error);
      result = {
        category: scanner.category,
        items: [],
        totalSize: 0,
        errors: [{ path: '', kind: 'EnumerationFailure', reason: String(error) }],
      };
    }
    completed++;
    options.onProgress?.(completed, total, scanner, result);
    return result;
  });

  const scanned = await runWithConcurrency(tasks, concurrency);
  const finished = scanned.filter((r): r is ScanResult => r !== null);
  const results = filterIgnoredItems(finished, config);

  const totalSize = results.reduce((sum, r) => sum + r.totalSize, 0);
  const totalItems = results.reduce((sum, r) => sum + r.items.length, 0);

  return { results, totalSize, totalItems, cancelled: finished.length < scanners.length };
}

export async function runAllScans(options?: ParallelScanOptions): Promise<ScanSummary> {
  return runScanners(getAllScanners(), options);
}

export async function runScans(categoryIds: CleanupCategoryId[], options?: ParallelScanOptions): Promise<ScanSummary> {
  return runScanners(categoryIds.map((id) => getScanner(id)), options);
}

export { PatternScanner };
export { expandPattern, expandHome, hasTerminalWildcard } from './pattern-expander.js';
export { scanOrphans, classifyEntry, compareConfidence, groupByCategory } from './orphans.js';
