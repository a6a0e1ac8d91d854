import { Command } from 'commander';
import { createInitCommand } from './commands/init.js';
import { createRunCommand } from './commands/run.js';
import { createSetupCommand } from './commands/setup.js';
import { createWorkflowsCommand } from './commands/workflows.js';

export const VERSION = '0.3.0';

export function createCLI(): Command {
    const program = new Command('mentat')
        .description('Conversational assistant that runs workflows from plain-language commands')
        .version(VERSION);

    program.addCommand(createInitCommand());
    program.addCommand(createSetupCommand());
    program.addCommand(createWorkflowsCommand());
    program.addCommand(createRunCommand());

    return program;
}
