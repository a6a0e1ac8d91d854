import { createAssistant, type Assistant } from '../app.js';
import { resolveRuntimeSettings } from '../config/settings.js';
import { ReadlineTerminal } from './readline-terminal.js';

export interface CliSession {
    assistant: Assistant;
    terminal: ReadlineTerminal;
}

/**
 * Assistant bound to the process's stdin/stdout; close the terminal when done
 */
export function openSession(): CliSession {
    const settings = resolveRuntimeSettings();
    const terminal = new ReadlineTerminal(settings.assistantName);
    return { assistant: createAssistant({ terminal, settings }), terminal };
}
