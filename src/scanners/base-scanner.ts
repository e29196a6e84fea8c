import type { Scanner, Category, ScanResult, CleanableItem, ScanIssue, ScannerOptions } from '../types.js';

export abstract class BaseScanner implements Scanner {
  abstract category: Category;
  abstract scan(options?: ScannerOptions): Promise<ScanResult>;

  protected createResult(items: CleanableItem[], errors: ScanIssue[] = []): ScanResult {
    return {
      category: this.category,
      items,
      totalSize: items.reduce((sum, item) => sum + item.size, 0),
      errors,
    };
  }
}
