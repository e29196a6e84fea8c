import open from 'open';
import chalk from 'chalk';
import { startServer } from '../server/index.js';

export async function serveCommand(options: { port?: string; open?: boolean }): Promise<void> {
    const port = options.port ? parseInt(options.port, 10) : 3000;
    if (!Number.isInteger(port) || port <= 0 || port > 65535) {
        throw new Error(`Invalid port: ${options.port}`);
    }

    console.log(chalk.cyan('Starting local API...'));
    console.log(chalk.dim('Press Ctrl+C to stop the server.'));

    const url = startServer(port);

    console.log(chalk.green(`\nAPI available at: ${chalk.underline(`${url}/api/categories`)}\n`));

    if (options.open) {
        await open(`${url}/api/categories`);
    }
}
