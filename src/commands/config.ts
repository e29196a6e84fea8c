import chalk from 'chalk';
import { configExists, getConfigPaths, initConfig, loadConfig } from '../utils/config.js';

export async function configCommand(options: { init?: boolean; path?: string } = {}): Promise<void> {
  if (options.init) {
    if (!options.path && (await configExists())) {
      console.log(chalk.yellow('A config file already exists; leaving it untouched.'));
      return;
    }
    const path = await initConfig(options.path);
    console.log(chalk.green(`✓ Wrote default config to ${path}`));
    return;
  }

  const config = await loadConfig(options.path);
  console.log(chalk.bold('Config files (first found wins):'));
  for (const path of options.path ? [options.path] : getConfigPaths()) {
    console.log(chalk.dim(`  ${path}`));
  }
  console.log();
  console.log(JSON.stringify(config, null, 2));
}
