import type { Assistant } from '../app.js';
import type { ReadlineTerminal } from './readline-terminal.js';
import { renderResult, renderWorkflows } from './ui/render.js';

export interface ReplCommandContext {
    assistant: Assistant;
    terminal: ReadlineTerminal;
    /** Leave the REPL after the current command */
    stop(): void;
}

interface ReplCommand {
    name: string;
    description: string;
    execute: (ctx: ReplCommandContext) => Promise<void>;
}

/**
 * REPL built-ins handled before the dispatcher sees the input
 *
 * `help` and `troubleshoot` are not here: the dispatcher owns them so
 * one-shot `mentat run` behaves the same.
 */
export class ReplCommandRegistry {
    private commands: Map<string, ReplCommand> = new Map();

    constructor() {
        this.registerBuiltins();
    }

    private registerBuiltins(): void {
        this.register({
            name: 'workflows',
            description: 'List configured workflows',
            execute: async (ctx) => {
                renderWorkflows(ctx.assistant.registry.list());
            },
        });

        this.register({
            name: 'resume',
            description: 'Continue a paused troubleshooting session',
            execute: async (ctx) => {
                const result = await ctx.assistant.troubleshooting.resume();
                if (result) renderResult(result);
            },
        });

        this.register({
            name: 'clear',
            description: 'Clear screen',
            execute: async (ctx) => {
                ctx.terminal.clear();
            },
        });

        for (const name of ['exit', 'quit']) {
            this.register({
                name,
                description: 'Exit interactive mode',
                execute: async (ctx) => {
                    ctx.stop();
                },
            });
        }
    }

    register(cmd: ReplCommand): void {
        this.commands.set(cmd.name, cmd);
    }

    get(name: string): ReplCommand | undefined {
        return this.commands.get(name);
    }
}
