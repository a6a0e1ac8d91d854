import { existsSync, readFileSync, writeFileSync } from 'node:fs';
import dotenv from 'dotenv';
import { InvalidSettingsError } from '../errors.js';

/**
 * Configuration access shared by every component
 *
 * Components receive a store through their constructor instead of
 * reaching for process.env or the .env file directly.
 */
export interface ConfigStore {
    get(name: string): string | undefined;
    set(name: string, value: string): void;
    unset(name: string): void;
}

/**
 * In-memory store (tests, one-off runs without a .env file)
 */
export class MemoryConfigStore implements ConfigStore {
    private values: Map<string, string>;

    constructor(initial: Record<string, string> = {}) {
        this.values = new Map(Object.entries(initial));
    }

    get(name: string): string | undefined {
        const value = this.values.get(name);
        return value ? value : undefined;
    }

    set(name: string, value: string): void {
        this.values.set(name, value);
    }

    unset(name: string): void {
        this.values.delete(name);
    }

    entries(): Record<string, string> {
        return Object.fromEntries(this.values);
    }
}

/**
 * Store backed by a `KEY=value` file, mirrored into the process environment
 *
 * On load, variables already present in the environment win over the file.
 * `set` overwrites an existing line in place or appends a new one; `unset`
 * removes the line. Empty values read as unset.
 */
export class EnvFileStore implements ConfigStore {
    readonly filePath: string;
    private env: NodeJS.ProcessEnv;

    constructor(filePath: string, env: NodeJS.ProcessEnv = process.env) {
        this.filePath = filePath;
        this.env = env;
        this.load();
    }

    /**
     * Read the file into the environment without clobbering existing values
     */
    load(): void {
        if (!existsSync(this.filePath)) return;

        const parsed = dotenv.parse(readFileSync(this.filePath, 'utf-8'));
        for (const [key, value] of Object.entries(parsed)) {
            if (this.env[key] === undefined) {
                this.env[key] = value;
            }
        }
    }

    get(name: string): string | undefined {
        const value = this.env[name];
        return value ? value : undefined;
    }

    set(name: string, value: string): void {
        const entry = `${name}=${formatEnvValue(value)}`;
        this.env[name] = value;

        const lines = this.readLines();
        let updated = false;

        const next = lines.map((line) => {
            if (matchesKey(line, name)) {
                updated = true;
                return entry;
            }
            return line;
        });
        if (!updated) next.push(entry);

        this.writeLines(next);
    }

    unset(name: string): void {
        delete this.env[name];

        const lines = this.readLines();
        const next = lines.filter((line) => !matchesKey(line, name));
        if (next.length !== lines.length) {
            this.writeLines(next);
        }
    }

    private readLines(): string[] {
        if (!existsSync(this.filePath)) return [];
        const content = readFileSync(this.filePath, 'utf-8');
        const lines = content.split(/\r?\n/);
        if (lines[lines.length - 1] === '') lines.pop();
        return lines;
    }

    private writeLines(lines: string[]): void {
        writeFileSync(this.filePath, lines.length > 0 ? `${lines.join('\n')}\n` : '', 'utf-8');
    }
}

function matchesKey(line: string, name: string): boolean {
    const escaped = name.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
    return new RegExp(`^\\s*(?:export\\s+)?${escaped}\\s*=`).test(line);
}

/**
 * Quote a value when dotenv would otherwise misread it
 *
 * dotenv has no escape for a quote inside quotes, so a value using all three
 * quote characters is written bare, and rejected when it cannot be read back bare.
 */
export function formatEnvValue(value: string): string {
    if (/^[A-Za-z0-9_./:@+,-]*$/.test(value)) return value;
    for (const quote of ["'", '"', '`']) {
        if (!value.includes(quote)) return `${quote}${value}${quote}`;
    }
    if (/^['"`\s]|\s$|[#\r\n]/.test(value)) {
        throw new InvalidSettingsError('Value cannot be written to the .env file: it mixes every quote character');
    }
    return value;
}
