import { Command } from 'commander';
import path from 'node:path';
import chalk from 'chalk';
import {
    createDefaultEnv,
    markBootstrapComplete,
    resolveRuntimeSettings,
} from '../../config/settings.js';
import { EnvFileStore } from '../../config/store.js';

export function createInitCommand(): Command {
    return new Command('init')
        .description('Create the .env configuration file in the current directory')
        .action(() => {
            console.log(chalk.bold.cyan('\n▶ Initializing Mentat\n'));

            const settings = resolveRuntimeSettings();
            const envPath = path.resolve(process.cwd(), settings.envFile);
            const relative = path.relative(process.cwd(), envPath);

            if (createDefaultEnv(envPath)) {
                console.log(chalk.green('  ✓ Created ') + chalk.dim(relative));
            } else {
                console.log(chalk.dim(`  ${relative} already exists, leaving it as is`));
            }

            markBootstrapComplete(new EnvFileStore(envPath));

            console.log(chalk.bold('\nNext steps:'));
            console.log(`  ${chalk.white('mentat setup')}                       ${chalk.dim('Choose an LLM provider and model')}`);
            console.log(`  ${chalk.white('mentat workflows configure twitter')}  ${chalk.dim('Enter Twitter credentials')}`);
            console.log(`  ${chalk.white('mentat')}                             ${chalk.dim('Start the assistant')}`);
            console.log();
        });
}
