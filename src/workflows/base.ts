import type { z } from 'zod';
import {
    InvalidParametersError,
    UnknownCommandError,
    UserInputError,
    WorkflowExecutionFailedError,
    errorMessage,
} from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import type { CommandMap, CommandParams, Workflow } from './types.js';

/** Reconfigure-and-retry budget per command execution */
export const MAX_RECONFIGURE_ATTEMPTS = 1;

/**
 * `TwitterWorkflow` → `twitter`
 */
export function deriveWorkflowName(className: string): string {
    return className.toLowerCase().replace('workflow', '');
}

/**
 * Base class for workflows backed by a live connection to a service
 *
 * The connection is opened on first use. When opening it or running a
 * command fails in a way the workflow deems recoverable (bad or
 * insufficient credentials), the connection is dropped, the service's
 * reconfiguration flow runs, and the command is retried once.
 */
export abstract class BaseWorkflow<TConnection> implements Workflow {
    readonly name: string;
    abstract readonly description: string;
    protected readonly logger: Logger;
    private readonly commands: CommandMap;
    private connection?: TConnection;

    protected constructor(logger: Logger = silentLogger()) {
        this.name = deriveWorkflowName(new.target.name);
        this.logger = logger.child(this.name);
        this.commands = Object.freeze({ ...this.registerCommands() });
    }

    /**
     * Command name → description; called once during construction
     */
    protected abstract registerCommands(): Record<string, string>;

    abstract validateEnvironment(): boolean;

    abstract getExampleCommands(): readonly string[];

    /**
     * Open and verify a connection; throw on failure
     */
    protected abstract connect(): Promise<TConnection>;

    protected abstract runCommand(connection: TConnection, command: string, params: CommandParams): Promise<string>;

    /**
     * Whether a failure may be fixed by reconfiguring
     */
    protected isRecoverable(_error: unknown): boolean {
        return false;
    }

    /**
     * Service-specific repair flow; true when the retry is worth attempting
     */
    protected async reconfigure(_cause: unknown): Promise<boolean> {
        return false;
    }

    getCommands(): CommandMap {
        return this.commands;
    }

    async executeCommand(command: string, params: CommandParams = {}): Promise<string> {
        if (!Object.hasOwn(this.commands, command)) {
            throw new UnknownCommandError(this.name, command);
        }

        let attempts = 0;
        for (;;) {
            try {
                const connection = await this.ensureConnection();
                return await this.runCommand(connection, command, params);
            } catch (err) {
                if (err instanceof UserInputError) throw err;
                if (!this.isRecoverable(err) || attempts >= MAX_RECONFIGURE_ATTEMPTS) {
                    throw this.failure(command, err, attempts > 0);
                }

                attempts++;
                this.connection = undefined;
                this.logger.warn(`${errorMessage(err)}; reconfiguring ${this.name}`);

                let repaired: boolean;
                try {
                    repaired = await this.reconfigure(err);
                } catch (reconfigureError) {
                    throw this.failure(command, reconfigureError, true);
                }
                if (!repaired) {
                    throw new WorkflowExecutionFailedError(
                        this.name,
                        command,
                        `Failed to configure ${this.name} access. Please try again later.`,
                        err
                    );
                }
            }
        }
    }

    /**
     * Validate a command's parameters against its schema
     */
    protected parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, command: string, params: CommandParams): T {
        const result = schema.safeParse(params);
        if (!result.success) {
            const detail = result.error.issues
                .map((i) => (i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message))
                .join('; ');
            throw new InvalidParametersError(this.name, command, detail);
        }
        return result.data;
    }

    private async ensureConnection(): Promise<TConnection> {
        if (this.connection === undefined) {
            this.connection = await this.connect();
        }
        return this.connection;
    }

    private failure(command: string, err: unknown, afterReconfigure: boolean): WorkflowExecutionFailedError {
        if (err instanceof WorkflowExecutionFailedError) return err;
        const message = afterReconfigure
            ? `Still unable to run '${command}' on ${this.name} after reconfiguration: ${errorMessage(err)}`
            : `Failed to run '${command}' on ${this.name}: ${errorMessage(err)}`;
        return new WorkflowExecutionFailedError(this.name, command, message, err);
    }
}
