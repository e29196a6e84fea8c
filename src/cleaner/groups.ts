import type { CleanableItem, CleanupCategoryId, CleanupGroup, DeletionCandidate, ScanResult } from '../types.js';

function buildGroup(result: Pick<ScanResult, 'category' | 'items'>): CleanupGroup {
  const items = result.category.reportOnly
    ? result.items.map((item): CleanableItem => (item.isSelected ? { ...item, isSelected: false } : item))
    : result.items;
  const selected = items.filter((item) => item.isSelected);
  return Object.freeze({
    category: result.category,
    items: Object.freeze([...items]),
    totalSize: items.reduce((sum, item) => sum + item.size, 0),
    selectedSize: selected.reduce((sum, item) => sum + item.size, 0),
    selectedCount: selected.length,
  });
}

/** Non-empty scan results as review groups, largest first. */
export function toGroups(results: readonly ScanResult[]): CleanupGroup[] {
  return results
    .filter((result) => result.items.length > 0)
    .map(buildGroup)
    .sort((a, b) => b.totalSize - a.totalSize);
}

/**
 * Flips one item's selection. Groups are never mutated; unknown ids are a
 * no-op, and items of report-only categories stay unselected.
 */
export function toggleItem(groups: readonly CleanupGroup[], itemId: string): CleanupGroup[] {
  return groups.map((group) => {
    if (!group.items.some((item) => item.id === itemId)) return group;
    const items = group.items.map((item): CleanableItem =>
      item.id === itemId ? { ...item, isSelected: !item.isSelected } : item
    );
    return buildGroup({ category: group.category, items });
  });
}

export function setGroupSelection(
  groups: readonly CleanupGroup[],
  categoryId: CleanupCategoryId,
  selected: boolean
): CleanupGroup[] {
  return groups.map((group) => {
    if (group.category.id !== categoryId) return group;
    const items = group.items.map((item): CleanableItem => ({ ...item, isSelected: selected }));
    return buildGroup({ category: group.category, items });
  });
}

export function selectedItems(groups: readonly CleanupGroup[]): CleanableItem[] {
  return groups.flatMap((group) => group.items.filter((item) => item.isSelected));
}

export function toCandidates(items: readonly Pick<CleanableItem, 'path' | 'size'>[]): DeletionCandidate[] {
  return items.map((item) => ({ path: item.path, size: item.size }));
}

/** Drops items whose paths were removed, recomputing totals. Empty groups disappear. */
export function withoutPaths(groups: readonly CleanupGroup[], removed: ReadonlySet<string>): CleanupGroup[] {
  return groups
    .map((group) =>
      group.items.some((item) => removed.has(item.path))
        ? buildGroup({ category: group.category, items: group.items.filter((item) => !removed.has(item.path)) })
        : group
    )
    .filter((group) => group.items.length > 0);
}
