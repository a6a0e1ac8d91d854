import chalk from 'chalk';
import { isBootstrapComplete } from '../config/settings.js';
import { errorMessage } from '../errors.js';
import { ReplCommandRegistry, type ReplCommandContext } from './repl-commands.js';
import { openSession } from './session.js';
import { renderBanner, renderError, renderResult } from './ui/render.js';

/**
 * Interactive REPL
 *
 * Launched when the user types `mentat` with no arguments. Built-ins are
 * handled here; everything else goes to the dispatcher.
 */
export async function startREPL(version: string): Promise<void> {
    const { assistant, terminal } = openSession();
    const { llm, config, settings } = assistant;

    if (!isBootstrapComplete(config)) {
        terminal.print(chalk.dim('  First run? `mentat init` writes a .env template to fill in.'));
    }

    const workflows = assistant.discover();

    renderBanner({
        version,
        assistantName: settings.assistantName,
        workflowCount: workflows.length,
        model: llm.isConfigured() ? `${llm.currentProvider}/${llm.currentModel}` : undefined,
    });

    if (!llm.isConfigured()) {
        terminal.print(chalk.dim('  LLM not configured. Run `mentat setup` to enable replies and troubleshooting.'));
        terminal.print();
    }

    const commands = new ReplCommandRegistry();
    let running = true;
    const ctx: ReplCommandContext = {
        assistant,
        terminal,
        stop: () => {
            running = false;
        },
    };

    // ─── REPL Loop ───
    while (running) {
        const input = await terminal.ask(chalk.cyan('  > '));
        if (input === null) break;

        const trimmed = input.trim();
        if (!trimmed) continue;

        try {
            const builtin = commands.get(trimmed.toLowerCase());
            if (builtin) {
                await builtin.execute(ctx);
                continue;
            }

            const result = await assistant.dispatcher.execute(trimmed);
            if (result) renderResult(result);
        } catch (err) {
            renderError(errorMessage(err));
        }
    }

    terminal.close();
    console.log(chalk.dim('\n  👋 Goodbye!\n'));
}
