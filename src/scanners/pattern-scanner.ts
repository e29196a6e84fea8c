import { randomUUID } from 'crypto';
import { homedir } from 'os';
import type {
  Category,
  CleanableItem,
  CleanupCategoryId,
  CleanupPathDefinition,
  ScanIssue,
  ScanResult,
  ScannerOptions,
} from '../types.js';
import { CATEGORIES } from '../catalog/categories.js';
import { CLEANUP_PATHS } from '../catalog/cleanup-paths.js';
import { errorMessage, kindFromError } from '../utils/errors.js';
import { getItemInfo } from '../utils/fs.js';
import { createSafetyPolicy, describeValidation, isSafe, validate } from '../utils/path-validator.js';
import { BaseScanner } from './base-scanner.js';
import { WILDCARD, expandPattern, hasTerminalWildcard, patternRoot } from './pattern-expander.js';

/**
 * Turns the catalog definitions of one cleanup category into CleanableItems.
 * Every item has passed the safety validator before it is returned.
 */
export class PatternScanner extends BaseScanner {
  category: Category;
  private readonly definitions: readonly CleanupPathDefinition[];
  private readonly foreignDefinitions: readonly CleanupPathDefinition[];

  constructor(categoryId: CleanupCategoryId, catalog: readonly CleanupPathDefinition[] = CLEANUP_PATHS) {
    super();
    this.category = CATEGORIES[categoryId];
    this.definitions = catalog.filter((d) => d.category === categoryId);
    this.foreignDefinitions = catalog.filter((d) => d.category !== categoryId && hasTerminalWildcard(d.pattern));
  }

  get paths(): readonly CleanupPathDefinition[] {
    return this.definitions;
  }

  async scan(options: ScannerOptions = {}): Promise<ScanResult> {
    const home = options.homeDir ?? homedir();
    const policy = createSafetyPolicy({ homeDir: home });
    // Folders another category lists item by item (e.g. ~/Library/Caches/Homebrew).
    const claimed = new Set(this.foreignDefinitions.map((d) => patternRoot(d.pattern, home)));
    const seen = new Set<string>();
    const items: CleanableItem[] = [];
    const errors: ScanIssue[] = [];

    for (const definition of this.definitions) {
      if (options.signal?.aborted) break;
      if (!this.shouldExpand(definition, options)) continue;

      const paths = await expandPattern(definition.pattern, { homeDir: home });

      for (const path of paths) {
        if (claimed.has(path) || seen.has(path)) continue;
        seen.add(path);

        const validation = validate(path, policy);
        if (!isSafe(validation)) {
          if (options.verbose) {
            console.log(`[Scanner] ${this.category.name}: skipping ${path} (${describeValidation(validation)})`);
          }
          continue;
        }

        try {
          const info = await getItemInfo(path);
          items.push({
            id: randomUUID(),
            path,
            name: info.name,
            size: info.size,
            category: this.category.id,
            isSelected: !this.category.reportOnly,
            isDirectory: info.isDirectory,
            modifiedAt: info.modifiedAt,
          });
        } catch (error) {
          errors.push({ path, kind: kindFromError(error), reason: errorMessage(error) });
        }
      }
    }

    items.sort((a, b) => b.size - a.size);
    return this.createResult(items, errors);
  }

  private shouldExpand(definition: CleanupPathDefinition, options: ScannerOptions): boolean {
    if (!definition.safeToClean && !options.includeUnsafe) return false;
    if (definition.requiresRoot && !options.includeRoot) return false;

    if (definition.pattern.includes(WILDCARD) && !hasTerminalWildcard(definition.pattern)) {
      if (!options.expandNonTerminalPatterns) {
        if (options.verbose) {
          console.warn(`[Scanner] ${this.category.name}: ${definition.pattern} only expands one level, skipped`);
        }
        return false;
      }
    }
    return true;
  }
}
