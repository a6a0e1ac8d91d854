import { Command } from 'commander';
import chalk from 'chalk';
import { catalogNames } from '../../workflows/catalog.js';
import { openSession } from '../session.js';
import { renderWorkflows } from '../ui/render.js';

export function createWorkflowsCommand(): Command {
    const cmd = new Command('workflows')
        .description('Inspect and configure workflows');

    // ─── List workflows ───
    cmd.command('list')
        .description('List workflows and whether they are configured')
        .action(() => {
            const { assistant, terminal } = openSession();
            try {
                const ready = assistant.discover();
                renderWorkflows(ready);

                const pending = catalogNames().filter((name) => !assistant.registry.has(name));
                if (pending.length > 0) {
                    console.log(chalk.dim(`  Not configured: ${pending.join(', ')}`));
                    console.log(chalk.dim(`  Set one up with ${chalk.white('mentat workflows configure <name>')}\n`));
                }
            } finally {
                terminal.close();
            }
        });

    // ─── Configure a workflow ───
    cmd.command('configure')
        .description("Interactively enter a workflow's credentials")
        .argument('<name>', 'Workflow name')
        .action(async (name: string) => {
            const { assistant, terminal } = openSession();
            try {
                const workflow = assistant.createWorkflow(name.toLowerCase());
                if (!workflow) {
                    console.log(chalk.red(`Unknown workflow: ${name}`));
                    console.log(chalk.dim(`Available: ${catalogNames().join(', ')}`));
                    process.exitCode = 1;
                    return;
                }
                if (!workflow.configure) {
                    console.log(chalk.dim(`Workflow '${workflow.name}' has nothing to configure.`));
                    return;
                }

                if (await workflow.configure()) {
                    console.log(chalk.green(`\n✓ ${workflow.name} configured`));
                } else {
                    console.log(chalk.yellow(`\n${workflow.name} is not fully configured yet.`));
                    process.exitCode = 1;
                }
            } finally {
                terminal.close();
            }
        });

    return cmd;
}
