import chalk from 'chalk';
import confirm from '@inquirer/confirm';
import { emptyTrash } from '../utils/trash.js';

export async function emptyTrashCommand(options: { yes?: boolean } = {}): Promise<boolean> {
  if (!options.yes) {
    const proceed = await confirm({
      message: 'Empty the Trash now? This permanently deletes everything in it.',
      default: false,
    });
    if (!proceed) {
      console.log(chalk.yellow('ℹ Items are safe in your Trash.'));
      return false;
    }
  }

  console.log(chalk.cyan('\nEmptying Trash...'));
  const result = await emptyTrash();
  if (result.success) {
    console.log(chalk.green('✓ Trash emptied successfully!'));
  } else {
    console.log(chalk.red(`✗ Failed to empty trash: ${result.error}`));
  }
  return result.success;
}
