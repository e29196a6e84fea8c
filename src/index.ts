#!/usr/bin/env node
import { Command, InvalidArgumentError } from 'commander';
import chalk from 'chalk';
import type { CleanupCategoryId, LeftoverConfidence } from './types.js';
import { isCategoryId } from './catalog/categories.js';
import { cleanCommand } from './commands/clean.js';
import { configCommand } from './commands/config.js';
import { emptyTrashCommand } from './commands/empty-trash.js';
import { isConfidence, orphansCommand } from './commands/orphans.js';
import { permissionsCommand } from './commands/permissions.js';
import { scanCommand } from './commands/scan.js';
import { serveCommand } from './commands/serve.js';
import { errorMessage } from './utils/errors.js';

function parseCategory(value: string): CleanupCategoryId {
  if (!isCategoryId(value)) throw new InvalidArgumentError(`Unknown category: ${value}`);
  return value;
}

function parseConfidence(value: string): LeftoverConfidence {
  if (!isConfidence(value)) throw new InvalidArgumentError('Expected low, medium or high');
  return value;
}

const program = new Command();

program
  .name('diskwarden')
  .description('Find and safely remove caches, logs and leftovers of uninstalled apps')
  .version('1.0.0');

program
  .command('scan')
  .description('Scan for cleanable files without removing anything')
  .option('-c, --category <id>', 'Only scan one category', parseCategory)
  .option('-v, --verbose', 'List items and errors per category')
  .option('--unsafe', 'Include definitions that are not safe to clean by default')
  .option('--no-progress', 'Hide the progress bar')
  .action(async (opts: { category?: CleanupCategoryId; verbose?: boolean; unsafe?: boolean; progress: boolean }) => {
    await scanCommand({ ...opts, noProgress: !opts.progress });
  });

program
  .command('clean')
  .description('Move selected caches and logs to the Trash')
  .option('-a, --all', 'Select every safe category without prompting')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .option('-d, --dry-run', 'Show what would be removed')
  .option('-c, --category <id>', 'Only clean one category', parseCategory)
  .option('--unsafe', 'Include risky categories')
  .option('--no-progress', 'Hide the progress bar')
  .action(
    async (opts: { all?: boolean; yes?: boolean; dryRun?: boolean; category?: CleanupCategoryId; unsafe?: boolean; progress: boolean }) => {
      await cleanCommand({ ...opts, noProgress: !opts.progress });
    }
  );

program
  .command('orphans')
  .description('Find files left behind by applications that are no longer installed')
  .option('--clean', 'Select leftovers to move to the Trash')
  .option('-y, --yes', 'Move every listed leftover without prompting')
  .option('--min-confidence <level>', 'Hide matches below this confidence', parseConfidence)
  .option('--no-progress', 'Hide the spinner')
  .action(async (opts: { clean?: boolean; yes?: boolean; minConfidence?: LeftoverConfidence; progress: boolean }) => {
    await orphansCommand({ ...opts, noProgress: !opts.progress });
  });

program
  .command('permissions')
  .description('Show which protected folders are readable')
  .option('--full', 'Also check folders that trigger a consent prompt')
  .option('--open-settings', 'Open the Full Disk Access settings pane when access is missing')
  .action(async (opts: { full?: boolean; openSettings?: boolean }) => {
    await permissionsCommand(opts);
  });

program
  .command('serve')
  .description('Start the local HTTP API')
  .option('-p, --port <port>', 'Port to listen on', '3000')
  .option('--open', 'Open the API in the browser')
  .action(async (opts: { port?: string; open?: boolean }) => {
    await serveCommand(opts);
  });

program
  .command('empty-trash')
  .description('Permanently empty the Trash')
  .option('-y, --yes', 'Skip the confirmation prompt')
  .action(async (opts: { yes?: boolean }) => {
    await emptyTrashCommand(opts);
  });

program
  .command('config')
  .description('Show the active configuration')
  .option('--init', 'Write a default config file')
  .option('--path <file>', 'Use this config file instead of the default locations')
  .action(async (opts: { init?: boolean; path?: string }) => {
    await configCommand(opts);
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error(chalk.red(`Error: ${errorMessage(error)}`));
  process.exit(1);
});
