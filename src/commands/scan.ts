import chalk from 'chalk';
import type { CleanupCategoryId, ScanSummary } from '../types.js';
import { CleanupSession } from '../cleaner/session.js';
import { getAllScanners } from '../scanners/index.js';
import { createScanProgress } from '../utils/progress.js';
import { formatSize } from '../utils/size.js';
import { SAFETY_ICONS } from './output.js';

export interface ScanCommandOptions {
  category?: CleanupCategoryId;
  verbose?: boolean;
  unsafe?: boolean;
  noProgress?: boolean;
}

export async function scanCommand(
  options: ScanCommandOptions = {},
  session = new CleanupSession()
): Promise<ScanSummary> {
  const showProgress = !options.noProgress && process.stdout.isTTY;
  const total = options.category ? 1 : getAllScanners().length;
  const progress = showProgress ? createScanProgress(total) : null;

  const summary = await session.scanCleanable(options.category ? [options.category] : undefined, {
    verbose: options.verbose,
    includeUnsafe: options.unsafe,
    onProgress: (completed, _total, scanner) => {
      progress?.update(completed, `Scanning ${scanner.category.name}...`);
    },
  });

  progress?.finish();

  console.log();
  console.log(chalk.bold('Scan Results'));
  console.log(chalk.dim('─'.repeat(60)));

  const sorted = [...summary.results].sort((a, b) => b.totalSize - a.totalSize);
  for (const result of sorted) {
    const icon = SAFETY_ICONS[result.category.safetyLevel];
    const size = result.totalSize > 0 ? chalk.yellow(formatSize(result.totalSize)) : chalk.dim('0 B');
    console.log(
      `${icon} ${result.category.name.padEnd(30)} ${size.padStart(20)} ${chalk.dim(`(${result.items.length} items)`)}`
    );

    if (options.verbose) {
      for (const item of result.items.slice(0, 5)) {
        console.log(chalk.dim(`     ${item.path} ${formatSize(item.size)}`));
      }
      for (const issue of result.errors) {
        console.log(chalk.red(`     ✗ ${issue.path}: ${issue.reason}`));
      }
    }
  }

  console.log(chalk.dim('─'.repeat(60)));
  console.log(chalk.bold(`Total: ${chalk.green(formatSize(summary.totalSize))} in ${summary.totalItems} items`));
  if (summary.cancelled) {
    console.log(chalk.yellow('Scan was cancelled; results are partial.'));
  }
  console.log();

  return summary;
}
