import chalk from 'chalk';
import type { DeletionResult, LeftoverConfidence, SafetyLevel } from '../types.js';
import { formatSize } from '../utils/size.js';

export const SAFETY_ICONS: Record<SafetyLevel, string> = {
  safe: chalk.green('●'),
  moderate: chalk.yellow('●'),
  risky: chalk.red('●'),
};

export const CONFIDENCE_LABELS: Record<LeftoverConfidence, string> = {
  high: chalk.red('high'),
  medium: chalk.yellow('medium'),
  low: chalk.dim('low'),
};

export function printDeletionResult(result: DeletionResult): void {
  console.log();
  console.log(chalk.bold.green('✓ Cleaning Complete'));
  console.log(chalk.dim('─'.repeat(50)));

  for (const error of result.errors) {
    console.log(`  ${chalk.red('✗')} ${error.path}`);
    console.log(chalk.dim(`     ${error.kind}: ${error.reason}`));
  }

  console.log();
  console.log(chalk.bold(`Freed: ${chalk.green(formatSize(result.freedBytes))}`));
  console.log(chalk.dim(`Moved ${result.successCount} items to the Trash`));

  if (result.failedCount > 0) {
    console.log(chalk.red(`Failed: ${result.failedCount}`));
  }

  console.log(chalk.dim('Items stay in the Trash until you run `diskwarden empty-trash`.'));
  console.log();
}
