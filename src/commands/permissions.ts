import chalk from 'chalk';
import ora from 'ora';
import type { FolderAccessStatus, PermissionCategoryState } from '../types.js';
import { CleanupSession } from '../cleaner/session.js';
import { hasFullDiskAccess, openSettingsPane, summarizeCategory } from '../utils/permissions.js';

export interface PermissionsCommandOptions {
  full?: boolean;
  openSettings?: boolean;
}

const STATUS_LABELS: Record<FolderAccessStatus, string> = {
  accessible: chalk.green('✓ accessible'),
  denied: chalk.red('✗ denied'),
  notExists: chalk.dim('– not found'),
  checking: chalk.cyan('… checking'),
  unchecked: chalk.dim('? not checked'),
};

export async function permissionsCommand(
  options: PermissionsCommandOptions = {},
  session = new CleanupSession()
): Promise<readonly PermissionCategoryState[]> {
  const phase = options.full ? 'full' : 'startup';
  const spinner = ora(`Checking folder access (${phase})...`).start();
  const categories = await session.checkPermissions(phase);
  spinner.stop();

  console.log();
  for (const category of categories) {
    const summary = summarizeCategory(category);
    console.log(
      `${chalk.bold(category.name.padEnd(28))} ${STATUS_LABELS[summary.status]} ${chalk.dim(`(${summary.accessible}/${summary.existing} readable)`)}`
    );
    for (const folder of category.folders) {
      console.log(`  ${folder.displayName.padEnd(26)} ${STATUS_LABELS[folder.status]}`);
    }
  }
  console.log();

  if (!options.full) {
    console.log(chalk.dim('Folders that would trigger a consent prompt were not checked. Use --full to check them.'));
  }

  const fullDiskAccess = await hasFullDiskAccess();
  if (!fullDiskAccess) {
    console.log(chalk.yellow('⚠ Full Disk Access is not granted; some leftovers and caches cannot be read.'));
    if (options.openSettings) {
      await openSettingsPane();
      console.log(chalk.dim('Opened System Settings → Privacy & Security → Full Disk Access.'));
    } else {
      console.log(chalk.dim('Run with --open-settings to open the Full Disk Access pane.'));
    }
  } else {
    console.log(chalk.green('✓ Full Disk Access is granted'));
  }
  console.log();

  return categories;
}
