import chalk from 'chalk';
import confirm from '@inquirer/confirm';
import checkbox from '@inquirer/checkbox';
import type { CleanupCategoryId, CleanupGroup, DeletionResult } from '../types.js';
import { CleanupSession } from '../cleaner/session.js';
import { getAllScanners } from '../scanners/index.js';
import { createCleanProgress, createScanProgress } from '../utils/progress.js';
import { formatSize } from '../utils/size.js';
import { SAFETY_ICONS, printDeletionResult } from './output.js';

export interface CleanCommandOptions {
  all?: boolean;
  yes?: boolean;
  dryRun?: boolean;
  category?: CleanupCategoryId;
  unsafe?: boolean;
  noProgress?: boolean;
}

export async function cleanCommand(
  options: CleanCommandOptions = {},
  session = new CleanupSession()
): Promise<DeletionResult | null> {
  const showProgress = !options.noProgress && process.stdout.isTTY;
  const total = options.category ? 1 : getAllScanners().length;
  const scanProgress = showProgress ? createScanProgress(total) : null;

  const summary = await session.scanCleanable(options.category ? [options.category] : undefined, {
    includeUnsafe: options.unsafe,
    onProgress: (completed, _total, scanner) => {
      scanProgress?.update(completed, `Scanning ${scanner.category.name}...`);
    },
  });

  scanProgress?.finish();

  const reportOnly = session.groups().filter((g) => g.category.reportOnly);
  for (const group of reportOnly) {
    console.log(chalk.dim(`\n${group.category.name}: ${formatSize(group.totalSize)} (${group.category.safetyNote ?? 'not cleaned here'})`));
  }

  if (summary.totalSize === 0 || reportOnly.length === session.groups().length) {
    console.log(chalk.green('\n✓ Nothing to clean!\n'));
    return null;
  }

  const riskyGroups = session.groups().filter((g) => g.category.safetyLevel === 'risky');

  if (!options.unsafe && riskyGroups.length > 0) {
    const riskySize = riskyGroups.reduce((sum, g) => sum + g.totalSize, 0);
    console.log();
    console.log(chalk.yellow('⚠ Skipping risky categories (use --unsafe to include):'));
    for (const group of riskyGroups) {
      session.setCategorySelection(group.category.id, false);
      console.log(chalk.dim(`  ${SAFETY_ICONS.risky} ${group.category.name}: ${formatSize(group.totalSize)}`));
      if (group.category.safetyNote) {
        console.log(chalk.dim.italic(`     ${group.category.safetyNote}`));
      }
    }
    console.log(chalk.dim(`  Total skipped: ${formatSize(riskySize)}`));
  }

  const reviewable = session
    .groups()
    .filter((g) => !g.category.reportOnly && (options.unsafe || g.category.safetyLevel !== 'risky'));

  if (reviewable.length === 0) {
    console.log(chalk.green('\n✓ Nothing safe to clean!\n'));
    return null;
  }

  if (!options.all) {
    await selectInteractively(session, reviewable);
  }

  const candidates = session.selectedCandidates();
  if (candidates.length === 0) {
    console.log(chalk.yellow('\nNo items selected for cleaning.\n'));
    return null;
  }

  const totalToClean = candidates.reduce((sum, c) => sum + c.size, 0);

  if (options.dryRun) {
    console.log(chalk.cyan('\n[DRY RUN] Would move the following to the Trash:'));
    for (const group of session.groups()) {
      if (group.selectedCount === 0) continue;
      console.log(`  ${group.category.name}: ${group.selectedCount} items (${formatSize(group.selectedSize)})`);
    }
    console.log(chalk.cyan(`\n[DRY RUN] Would free ${formatSize(totalToClean)}\n`));
    return null;
  }

  if (!options.yes) {
    const proceed = await confirm({
      message: `Move ${candidates.length} items (${formatSize(totalToClean)}) to the Trash?`,
      default: false,
    });

    if (!proceed) {
      console.log(chalk.yellow('\nCleaning cancelled.\n'));
      return null;
    }
  }

  const cleanProgress = showProgress ? createCleanProgress(candidates.length) : null;
  const result = await session.cleanSelected((completed) => {
    cleanProgress?.update(completed);
  });
  cleanProgress?.finish();

  if (result) {
    printDeletionResult(result);
  }
  return result;
}

async function selectInteractively(session: CleanupSession, groups: readonly CleanupGroup[]): Promise<void> {
  console.log();
  console.log(chalk.bold('Select categories to clean:'));
  console.log();

  const selectedCategories = await checkbox<CleanupCategoryId>({
    message: 'Categories',
    choices: groups.map((g) => ({
      name: `${SAFETY_ICONS[g.category.safetyLevel]} ${g.category.name.padEnd(28)} ${chalk.yellow(formatSize(g.totalSize).padStart(10))} ${chalk.dim(`(${g.items.length} items)`)}`,
      value: g.category.id,
      checked: false,
    })),
    pageSize: 15,
  });

  for (const group of groups) {
    const chosen = selectedCategories.includes(group.category.id);
    session.setCategorySelection(group.category.id, chosen);
    if (!chosen || group.category.safetyLevel !== 'risky') continue;

    // Risky categories are picked item by item.
    if (group.category.safetyNote) {
      console.log();
      console.log(chalk.red(`⚠ WARNING: ${group.category.safetyNote}`));
    }

    const selectedIds = await checkbox<string>({
      message: `Select items from ${group.category.name}:`,
      choices: group.items.map((item) => ({
        name: `${item.name.substring(0, 40).padEnd(40)} ${chalk.yellow(formatSize(item.size).padStart(10))}`,
        value: item.id,
        checked: false,
      })),
      pageSize: 10,
    });

    session.setCategorySelection(group.category.id, false);
    for (const id of selectedIds) {
      session.toggleItem(id);
    }
  }
}
