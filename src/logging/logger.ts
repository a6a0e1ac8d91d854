import chalk from 'chalk';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error', 'silent'] as const;

export type LogLevel = typeof LOG_LEVELS[number];

const levelWeight: Record<LogLevel, number> = {
    debug: 10,
    info: 20,
    warn: 30,
    error: 40,
    silent: 100,
};

/**
 * Where formatted log lines end up. Defaults to the console.
 */
export interface LogSink {
    write(level: Exclude<LogLevel, 'silent'>, line: string): void;
}

export const consoleSink: LogSink = {
    write(level, line) {
        switch (level) {
            case 'debug':
                console.error(chalk.dim(line));
                break;
            case 'info':
                console.error(line);
                break;
            case 'warn':
                console.error(chalk.yellow(line));
                break;
            case 'error':
                console.error(chalk.red(line));
                break;
        }
    },
};

/**
 * Levelled diagnostic logger
 *
 * User-facing conversation goes through the Terminal; this is for
 * status and diagnostics (stderr), filtered by MENTAT_LOG_LEVEL.
 */
export class Logger {
    private readonly minLevel: LogLevel;
    private readonly sink: LogSink;
    private readonly scope?: string;

    constructor(level: LogLevel = 'info', sink: LogSink = consoleSink, scope?: string) {
        this.minLevel = level;
        this.sink = sink;
        this.scope = scope;
    }

    debug(message: string, meta?: Record<string, unknown>): void {
        this.write('debug', message, meta);
    }

    info(message: string, meta?: Record<string, unknown>): void {
        this.write('info', message, meta);
    }

    warn(message: string, meta?: Record<string, unknown>): void {
        this.write('warn', message, meta);
    }

    error(message: string, meta?: Record<string, unknown>): void {
        this.write('error', message, meta);
    }

    /**
     * Logger tagged with a component name, sharing level and sink
     */
    child(scope: string): Logger {
        return new Logger(this.minLevel, this.sink, this.scope ? `${this.scope}:${scope}` : scope);
    }

    get level(): LogLevel {
        return this.minLevel;
    }

    private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>): void {
        if (levelWeight[level] < levelWeight[this.minLevel]) {
            return;
        }
        const prefix = this.scope ? `[${this.scope}] ` : '';
        const line = meta ? `${prefix}${message} ${JSON.stringify(meta)}` : `${prefix}${message}`;
        this.sink.write(level, line);
    }
}

/**
 * A logger that discards everything
 */
export function silentLogger(): Logger {
    return new Logger('silent');
}
