/**
 * Error taxonomy
 *
 * Every error raised by the assistant carries a stable `code` so the
 * dispatcher (the single error boundary) can decide how to present it.
 */
export class MentatError extends Error {
    readonly code: string;

    constructor(code: string, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Errors the user can fix by rephrasing or picking another command
 */
export class UserInputError extends MentatError {}

export class CommandNotRecognizedError extends UserInputError {
    constructor(message = 'Command not recognized. Please try again.') {
        super('COMMAND_NOT_RECOGNIZED', message);
    }
}

export class ContentNotExtractedError extends UserInputError {
    constructor(message = 'Could not extract content from command. Please use quotes around your message.') {
        super('CONTENT_NOT_EXTRACTED', message);
    }
}

export class UnknownCommandError extends UserInputError {
    constructor(workflow: string, command: string) {
        super('UNKNOWN_COMMAND', `Unknown command for workflow '${workflow}': ${command}`);
    }
}

export class InvalidParametersError extends UserInputError {
    constructor(workflow: string, command: string, detail: string) {
        super('INVALID_PARAMETERS', `Invalid parameters for ${workflow} ${command}: ${detail}`);
    }
}

export class WorkflowNotFoundError extends UserInputError {
    constructor(name: string) {
        super('WORKFLOW_NOT_FOUND', `Workflow '${name}' not found or not properly configured`);
    }
}

export class DuplicateWorkflowError extends MentatError {
    constructor(name: string) {
        super('DUPLICATE_WORKFLOW', `Workflow '${name}' is already registered`);
    }
}

export class EnvironmentNotConfiguredError extends MentatError {
    readonly workflow: string;

    constructor(workflow: string) {
        super('ENVIRONMENT_NOT_CONFIGURED', `Environment not properly configured for workflow '${workflow}'`);
        this.workflow = workflow;
    }
}

export class WorkflowExecutionFailedError extends MentatError {
    readonly workflow: string;
    readonly command: string;

    constructor(workflow: string, command: string, message: string, cause?: unknown) {
        super('WORKFLOW_EXECUTION_FAILED', message, { cause });
        this.workflow = workflow;
        this.command = command;
    }
}

export class LLMUnavailableError extends MentatError {
    constructor(message = 'LLM not configured. Run `mentat setup` first.') {
        super('LLM_UNAVAILABLE', message);
    }
}

export class InvalidSettingsError extends MentatError {
    constructor(message: string) {
        super('INVALID_SETTINGS', message);
    }
}

/**
 * Extract a printable message from anything that was thrown
 */
export function errorMessage(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
