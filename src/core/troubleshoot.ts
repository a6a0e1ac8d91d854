import type { LLMBackend } from '../llm/backend.js';
import type { WorkflowRegistry } from '../workflows/registry.js';
import type { Terminal } from './terminal.js';

export const TROUBLESHOOT_UNAVAILABLE = 'Sorry, I need LLM configuration to help with troubleshooting.';
export const TROUBLESHOOT_RESOLVED = 'Glad I could help! Let me know if you need anything else.';
export const NOTHING_TO_RESUME = 'There is no conversation to resume.';

const EXIT_WORDS = new Set(['exit', 'quit', 'done']);

export interface TroubleshootingOptions {
    llm: LLMBackend;
    registry: WorkflowRegistry;
    terminal: Terminal;
}

/**
 * LLM-assisted question/answer loop for when something went wrong
 *
 * Resolving the issue ends the conversation; leaving early only pauses
 * it, so `resume()` can pick it up again.
 */
export class TroubleshootingSession {
    private readonly llm: LLMBackend;
    private readonly registry: WorkflowRegistry;
    private readonly terminal: Terminal;

    constructor(options: TroubleshootingOptions) {
        this.llm = options.llm;
        this.registry = options.registry;
        this.terminal = options.terminal;
    }

    async run(error?: string): Promise<string | null> {
        if (!this.llm.isConfigured()) {
            return TROUBLESHOOT_UNAVAILABLE;
        }

        this.llm.startConversation('troubleshooting', {
            workflows: this.registry.list(),
            error: error ?? null,
            system_status: {
                llm_configured: true,
                workflows_loaded: this.registry.size > 0,
            },
        });

        this.terminal.say("I'll help you troubleshoot. What seems to be the problem?");
        return this.loop();
    }

    async resume(): Promise<string | null> {
        if (!this.llm.isConfigured()) {
            return TROUBLESHOOT_UNAVAILABLE;
        }
        if (this.llm.getConversationState().status === 'idle') {
            return NOTHING_TO_RESUME;
        }

        const recap = await this.terminal.busy('Thinking...', () => this.llm.resumeConversation());
        if (recap) {
            this.terminal.say(recap);
        }
        return this.loop();
    }

    private async loop(): Promise<string | null> {
        for (;;) {
            const line = await this.terminal.ask('> ');
            if (line === null) return this.leave();

            const input = line.trim();
            if (!input) continue;
            if (EXIT_WORDS.has(input.toLowerCase())) {
                this.terminal.say('Alright, let me know if you need anything else!');
                return this.leave();
            }

            const response = await this.terminal.busy('Thinking...', () => this.llm.getCompletion(input));
            if (!response) {
                this.terminal.print("I'm having trouble generating a response. Please try rephrasing or type 'exit' to quit.");
                continue;
            }
            this.terminal.say(response);

            const answer = (await this.terminal.ask('Did that solve your issue? (y/N/exit) '))?.trim().toLowerCase();
            if (answer === 'y' || answer === 'yes') {
                this.llm.endConversation();
                return TROUBLESHOOT_RESOLVED;
            }
            if (answer === undefined || EXIT_WORDS.has(answer)) {
                return this.leave();
            }
        }
    }

    private leave(): null {
        this.llm.pauseConversation();
        return null;
    }
}
