import ora, { type Ora } from 'ora';
import chalk from 'chalk';

/**
 * Spinner wrapper for consistent UX across the CLI
 */
export class Spinner {
    private spinner: Ora;

    constructor() {
        this.spinner = ora({
            color: 'cyan',
            spinner: 'dots',
        });
    }

    start(message: string): void {
        this.spinner.start(chalk.dim(`  ${message}`));
    }

    success(message: string): void {
        this.spinner.succeed(chalk.green(`  ${message}`));
    }

    fail(message: string): void {
        this.spinner.fail(chalk.red(`  ${message}`));
    }

    /**
     * Stop the spinner (no status icon)
     */
    stop(): void {
        this.spinner.stop();
    }

    /**
     * Spin while the task runs; always stopped afterwards
     */
    async during<T>(message: string, task: () => Promise<T>): Promise<T> {
        this.start(message);
        try {
            return await task();
        } finally {
            this.stop();
        }
    }
}
