import { describe, it, expect } from 'vitest';
import type { CleanableItem, CleanupCategoryId, ScanResult } from '../types.js';
import { CATEGORIES } from '../catalog/categories.js';
import { selectedItems, setGroupSelection, toCandidates, toGroups, toggleItem, withoutPaths } from './groups.js';

function item(id: string, category: CleanupCategoryId, size: number): CleanableItem {
  return { id, path: `/Users/test/Library/Caches/${id}`, name: id, size, category, isSelected: true, isDirectory: true };
}

function result(category: CleanupCategoryId, items: CleanableItem[]): ScanResult {
  return {
    category: CATEGORIES[category],
    items,
    totalSize: items.reduce((sum, i) => sum + i.size, 0),
    errors: [],
  };
}

const RESULTS = [
  result('logs', [item('l1', 'logs', 10)]),
  result('user-caches', [item('c1', 'user-caches', 100), item('c2', 'user-caches', 50)]),
  result('npm', []),
];

describe('toGroups', () => {
  it('should drop empty categories and sort by size', () => {
    const groups = toGroups(RESULTS);

    expect(groups.map((g) => [g.category.id, g.totalSize, g.selectedSize, g.selectedCount])).toEqual([
      ['user-caches', 150, 150, 2],
      ['logs', 10, 10, 1],
    ]);
  });
});

describe('toggleItem', () => {
  it('should flip one item and recompute selected totals', () => {
    const groups = toGroups(RESULTS);
    const toggled = toggleItem(groups, 'c1');

    expect(toggled[0].selectedSize).toBe(50);
    expect(toggled[0].selectedCount).toBe(1);
    expect(toggled[0].totalSize).toBe(150);
    expect(toggled[1]).toBe(groups[1]);
    expect(groups[0].selectedSize).toBe(150);
  });

  it('should ignore unknown ids', () => {
    const groups = toGroups(RESULTS);

    expect(toggleItem(groups, 'nope')).toEqual(groups);
  });
});

describe('setGroupSelection', () => {
  it('should select or clear a whole category', () => {
    const cleared = setGroupSelection(toGroups(RESULTS), 'user-caches', false);

    expect(cleared[0].selectedCount).toBe(0);
    expect(selectedItems(cleared).map((i) => i.id)).toEqual(['l1']);
    expect(selectedItems(setGroupSelection(cleared, 'user-caches', true)).map((i) => i.id)).toEqual(['c1', 'c2', 'l1']);
  });
});

describe('report-only categories', () => {
  it('should never select Trash items', () => {
    const groups = toGroups([result('trash', [item('t1', 'trash', 70)]), ...RESULTS]);
    const trashed = setGroupSelection(toggleItem(groups, 't1'), 'trash', true);

    expect(trashed.map((g) => [g.category.id, g.totalSize, g.selectedCount])).toEqual([
      ['user-caches', 150, 2],
      ['trash', 70, 0],
      ['logs', 10, 1],
    ]);
    expect(selectedItems(trashed).map((i) => i.id)).toEqual(['c1', 'c2', 'l1']);
  });
});

describe('toCandidates', () => {
  it('should carry path and measured size', () => {
    expect(toCandidates([item('c1', 'user-caches', 100)])).toEqual([
      { path: '/Users/test/Library/Caches/c1', size: 100 },
    ]);
  });
});

describe('withoutPaths', () => {
  it('should remove deleted items and empty groups', () => {
    const groups = withoutPaths(
      toGroups(RESULTS),
      new Set(['/Users/test/Library/Caches/c1', '/Users/test/Library/Caches/l1'])
    );

    expect(groups.map((g) => [g.category.id, g.items.map((i) => i.id), g.totalSize])).toEqual([
      ['user-caches', ['c2'], 50],
    ]);
  });
});
