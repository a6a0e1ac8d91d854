import {
    EnvironmentNotConfiguredError,
    UserInputError,
    WorkflowNotFoundError,
    errorMessage,
} from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import type { CommandParser } from '../parser/parser.js';
import type { WorkflowRegistry } from '../workflows/registry.js';
import type { Terminal } from './terminal.js';
import type { TroubleshootingSession } from './troubleshoot.js';

export const CONFIGURATION_HINT = 'Please ensure all required environment variables are set.';

export const BUILTIN_COMMANDS: ReadonlyArray<[string, string]> = [
    ['help', 'Show this help message'],
    ['troubleshoot', 'Start interactive troubleshooting'],
    ['resume', 'Continue a paused troubleshooting session'],
    ['workflows', 'List configured workflows'],
    ['clear', 'Clear the screen'],
    ['exit', 'Exit the application'],
];

export interface DispatcherOptions {
    registry: WorkflowRegistry;
    parser: CommandParser;
    troubleshooting: TroubleshootingSession;
    terminal: Terminal;
    logger?: Logger;
}

/**
 * Dispatcher — single entry point for user commands
 *
 * Routes text through the parser to the registry and is the one place
 * errors are turned into user-facing output; nothing thrown below it
 * escapes `execute`.
 */
export class Dispatcher {
    private readonly registry: WorkflowRegistry;
    private readonly parser: CommandParser;
    private readonly troubleshooting: TroubleshootingSession;
    private readonly terminal: Terminal;
    private readonly logger: Logger;

    constructor(options: DispatcherOptions) {
        this.registry = options.registry;
        this.parser = options.parser;
        this.troubleshooting = options.troubleshooting;
        this.terminal = options.terminal;
        this.logger = options.logger ?? silentLogger();
    }

    async execute(command: string): Promise<string | null> {
        try {
            return await this.route(command);
        } catch (err) {
            return this.handleFailure(err);
        }
    }

    helpText(): string {
        const lines = ['Available Commands:'];
        for (const [name, description] of BUILTIN_COMMANDS) {
            lines.push(`- ${name}: ${description}`);
        }

        const workflows = this.registry.workflows();
        if (workflows.length > 0) {
            lines.push('', 'Available Workflows:');
            for (const w of workflows) {
                lines.push(`- ${w.name}: ${w.description}`);
            }

            lines.push('', 'Example Commands:');
            for (const w of workflows) {
                for (const example of w.getExampleCommands()) {
                    lines.push(`- ${example}`);
                }
            }
        }
        return lines.join('\n');
    }

    private async route(command: string): Promise<string | null> {
        const literal = command.trim().toLowerCase();
        if (literal === 'help') {
            return this.helpText();
        }
        if (literal === 'troubleshoot') {
            return this.troubleshooting.run();
        }

        if (this.registry.size === 0) {
            this.terminal.say(
                "I don't see any configured workflows. Run `mentat workflows configure <name>` to set one up."
            );
            return null;
        }

        const parsed = this.parser.parse(command);
        this.logger.debug(`Parsed: ${parsed.workflow}/${parsed.command}`, parsed.params);

        if (!this.registry.has(parsed.workflow)) {
            throw new WorkflowNotFoundError(parsed.workflow);
        }
        return this.registry.execute(parsed.workflow, parsed.command, parsed.params);
    }

    private async handleFailure(err: unknown): Promise<string | null> {
        if (err instanceof UserInputError) {
            this.terminal.print(`Error: ${err.message}`);
            this.terminal.print();
            this.terminal.print(`Hint: ${this.parser.getCommandHelp()}`);
            return null;
        }

        if (err instanceof EnvironmentNotConfiguredError) {
            this.terminal.print(`Configuration Error: ${err.message}`);
            this.terminal.print(CONFIGURATION_HINT);
            return null;
        }

        const message = errorMessage(err);
        this.logger.debug('Command failed', { error: message, stack: err instanceof Error ? err.stack : undefined });
        this.terminal.say(`I encountered an issue: ${message}`);

        try {
            if (await this.terminal.confirm('Would you like help troubleshooting?', false)) {
                return await this.troubleshooting.run(message);
            }
        } catch (troubleshootError) {
            this.logger.error(`Troubleshooting failed: ${errorMessage(troubleshootError)}`);
            return null;
        }

        this.terminal.print("Let me know if you need help later - just type 'troubleshoot'");
        return null;
    }
}
