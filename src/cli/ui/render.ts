import chalk from 'chalk';
import type { WorkflowSummary } from '../../workflows/types.js';

/**
 * Render the welcome banner for interactive mode
 */
export function renderBanner(meta: {
    version: string;
    assistantName: string;
    workflowCount: number;
    model?: string;
}): void {
    const width = 48;
    const top = `╭${'─'.repeat(width)}╮`;
    const bottom = `╰${'─'.repeat(width)}╯`;

    const pad = (text: string, rawLen: number) => {
        const padding = width - rawLen;
        return `│ ${text}${' '.repeat(Math.max(0, padding - 1))}│`;
    };

    const title = `Mentat · ${meta.assistantName}`;
    console.log();
    console.log(chalk.cyan(top));
    console.log(chalk.cyan(pad(
        `${chalk.bold(title)} ${chalk.dim(`v${meta.version}`)}`,
        `${title} v${meta.version}`.length
    )));

    const infoLine = `  Model: ${meta.model ?? 'not configured'} │ ${meta.workflowCount} workflows`;
    console.log(chalk.cyan(pad(chalk.dim(infoLine), infoLine.length)));

    console.log(chalk.cyan(bottom));
    console.log();
    console.log(chalk.dim("  Type a command, or 'help' for help."));
    console.log();
}

/**
 * Render a line spoken by the assistant
 */
export function renderReply(assistantName: string, text: string): void {
    console.log();
    console.log(`${chalk.cyan.bold(`${assistantName}:`)} ${text}`);
}

/**
 * Render a command's result, indented
 */
export function renderResult(text: string): void {
    console.log();
    console.log('  ' + text.split('\n').join('\n  '));
    console.log();
}

export function renderWorkflows(workflows: readonly WorkflowSummary[]): void {
    if (workflows.length === 0) {
        console.log(chalk.dim('\n  No workflows configured.\n'));
        return;
    }
    console.log(chalk.bold(`\n  Workflows (${workflows.length})\n`));
    for (const w of workflows) {
        console.log(`    ${chalk.green('●')} ${chalk.white(w.name)} ${chalk.dim(`- ${w.description}`)}`);
    }
    console.log();
}

/**
 * Render a section separator
 */
export function renderSeparator(): void {
    console.log(chalk.dim('  ' + '─'.repeat(56)));
}

/**
 * Render an error result
 */
export function renderError(message: string): void {
    renderSeparator();
    console.log(chalk.red.bold(`  ✗ ${message}`));
    console.log();
}
