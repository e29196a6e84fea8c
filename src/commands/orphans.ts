import chalk from 'chalk';
import ora from 'ora';
import confirm from '@inquirer/confirm';
import checkbox from '@inquirer/checkbox';
import type { DeletionResult, LeftoverConfidence, LeftoverFile } from '../types.js';
import { CleanupSession } from '../cleaner/session.js';
import { LEFTOVER_CONFIDENCE_ORDER, compareConfidence, groupByCategory } from '../scanners/orphans.js';
import { createCleanProgress } from '../utils/progress.js';
import { formatSize } from '../utils/size.js';
import { CONFIDENCE_LABELS, printDeletionResult } from './output.js';

export interface OrphansCommandOptions {
  clean?: boolean;
  yes?: boolean;
  minConfidence?: LeftoverConfidence;
  noProgress?: boolean;
}

export function isConfidence(value: string): value is LeftoverConfidence {
  return LEFTOVER_CONFIDENCE_ORDER.some((level) => level === value);
}

export async function orphansCommand(
  options: OrphansCommandOptions = {},
  session = new CleanupSession()
): Promise<DeletionResult | null> {
  const spinner = options.noProgress ? null : ora('Reading installed applications...').start();

  const apps = await session.refreshApps();
  if (spinner) spinner.text = `Searching leftovers of apps no longer among ${apps.length} installed...`;

  const result = await session.scanOrphans();
  spinner?.succeed(`Found ${result.files.length} leftover items`);

  const minimum = options.minConfidence ?? 'low';
  const files = result.files.filter((f) => compareConfidence(f.confidence, minimum) >= 0);

  if (files.length === 0) {
    console.log(chalk.green('\n✓ No leftovers of removed apps found.\n'));
    return null;
  }

  printOrphanGroups(files);

  for (const issue of result.errors) {
    console.log(chalk.dim(`  ⚠ ${issue.path}: ${issue.reason}`));
  }

  if (!options.clean) {
    console.log(chalk.dim('Run with --clean to move selected leftovers to the Trash.\n'));
    return null;
  }

  const selectedIds = options.yes
    ? files.map((f) => f.id)
    : await checkbox<string>({
        message: 'Select leftovers to move to the Trash:',
        choices: files.map((f) => ({
          name: `${f.name.substring(0, 40).padEnd(40)} ${chalk.yellow(formatSize(f.size).padStart(10))} ${CONFIDENCE_LABELS[f.confidence]}`,
          value: f.id,
          checked: f.confidence !== 'low',
        })),
        pageSize: 15,
      });

  const chosen = files.filter((f) => selectedIds.includes(f.id));
  if (chosen.length === 0) {
    console.log(chalk.yellow('\nNo items selected.\n'));
    return null;
  }

  const totalSize = chosen.reduce((sum, f) => sum + f.size, 0);
  if (!options.yes) {
    const proceed = await confirm({
      message: `Move ${chosen.length} items (${formatSize(totalSize)}) to the Trash?`,
      default: false,
    });
    if (!proceed) {
      console.log(chalk.yellow('\nCancelled.\n'));
      return null;
    }
  }

  const progress = options.noProgress ? null : createCleanProgress(chosen.length);
  const deletion = await session.clean(
    chosen.map((f) => ({ path: f.path, size: f.size })),
    'orphans',
    (completed) => progress?.update(completed)
  );
  progress?.finish();

  if (deletion) printDeletionResult(deletion);
  return deletion;
}

function printOrphanGroups(files: readonly LeftoverFile[]): void {
  console.log();
  for (const [category, group] of groupByCategory(files)) {
    const size = group.reduce((sum, f) => sum + f.size, 0);
    console.log(chalk.bold(`${category} ${chalk.dim(`(${group.length} items, ${formatSize(size)})`)}`));
    for (const file of group) {
      const age = file.daysSinceModified !== undefined ? chalk.dim(` ${file.daysSinceModified}d old`) : '';
      console.log(
        `  ${file.name.substring(0, 44).padEnd(44)} ${chalk.yellow(formatSize(file.size).padStart(10))} ${CONFIDENCE_LABELS[file.confidence]}${age}`
      );
    }
  }
  console.log();
}
