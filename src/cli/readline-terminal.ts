import { createInterface, type Interface } from 'node:readline';
import { parseYesNo, type Terminal } from '../core/terminal.js';
import { renderReply } from './ui/render.js';
import { Spinner } from './ui/spinner.js';

/**
 * Terminal over stdin/stdout
 *
 * Questions are asked one at a time; once input closes (Ctrl+D, end of a
 * pipe) every pending and future question answers null.
 */
export class ReadlineTerminal implements Terminal {
    private readonly rl: Interface;
    private readonly assistantName: string;
    private readonly spinner = new Spinner();
    private readonly pending: Set<(answer: string | null) => void> = new Set();
    private closed = false;

    constructor(assistantName: string, input: NodeJS.ReadableStream = process.stdin, output: NodeJS.WritableStream = process.stdout) {
        this.assistantName = assistantName;
        this.rl = createInterface({ input, output, terminal: Boolean(process.stdout.isTTY) });
        this.rl.on('close', () => {
            this.closed = true;
            for (const resolve of this.pending) resolve(null);
            this.pending.clear();
        });
    }

    print(text = ''): void {
        console.log(text);
    }

    say(text: string): void {
        renderReply(this.assistantName, text);
    }

    ask(question: string): Promise<string | null> {
        if (this.closed) return Promise.resolve(null);

        return new Promise((resolve) => {
            this.pending.add(resolve);
            this.rl.question(question, (answer) => {
                this.pending.delete(resolve);
                resolve(answer);
            });
        });
    }

    async confirm(question: string, defaultValue = false): Promise<boolean> {
        const hint = defaultValue ? '(Y/n)' : '(y/N)';
        return parseYesNo(await this.ask(`${question} ${hint} `), defaultValue);
    }

    busy<T>(message: string, task: () => Promise<T>): Promise<T> {
        return this.spinner.during(message, task);
    }

    clear(): void {
        console.clear();
    }

    close(): void {
        this.rl.close();
    }
}
