import { describe, it, expect } from 'vitest';
import { MemoryConfigStore } from '../config/store.js';
import { CommandParser } from '../parser/parser.js';
import type { WorkflowVocabulary } from '../parser/types.js';
import { FakeProvider, ScriptedTerminal, configuredStore, fakeBackend } from '../testing/fakes.js';
import { twitterVocabulary } from '../workflows/twitter/vocabulary.js';
import { WorkflowRegistry } from '../workflows/registry.js';
import type { CommandMap, CommandParams, Workflow } from '../workflows/types.js';
import { CONFIGURATION_HINT, Dispatcher } from './dispatcher.js';
import { TROUBLESHOOT_RESOLVED, TROUBLESHOOT_UNAVAILABLE, TroubleshootingSession } from './troubleshoot.js';

const weatherVocabulary: WorkflowVocabulary = {
    workflow: 'weather',
    keywords: ['weather'],
    commands: [{ command: 'forecast', phrases: ['forecast'] }],
    examples: ['Weather forecast for tomorrow'],
};

class FakeTwitter implements Workflow {
    readonly name = 'twitter';
    readonly description = 'Post and manage tweets';
    ready = true;
    failure?: Error;

    getCommands(): CommandMap {
        return { post: 'Post a new tweet' };
    }

    validateEnvironment(): boolean {
        return this.ready;
    }

    async executeCommand(command: string, params: CommandParams = {}): Promise<string> {
        if (this.failure) throw this.failure;
        return `${command}: ${String(params['content'])}`;
    }

    getExampleCommands(): readonly string[] {
        return ["Post a tweet saying 'Hello, World!'"];
    }
}

interface SetupOptions {
    answers?: (string | null)[];
    llmScript?: (string | Error)[];
    config?: MemoryConfigStore;
    register?: boolean;
}

function setup(options: SetupOptions = {}) {
    const terminal = new ScriptedTerminal(options.answers ?? []);
    const provider = new FakeProvider(options.llmScript ?? []);
    const llm = fakeBackend(provider, options.config ?? configuredStore());
    const registry = new WorkflowRegistry();
    const workflow = new FakeTwitter();
    if (options.register !== false) registry.register(workflow);

    const dispatcher = new Dispatcher({
        registry,
        parser: new CommandParser([twitterVocabulary, weatherVocabulary]),
        troubleshooting: new TroubleshootingSession({ llm, registry, terminal }),
        terminal,
    });
    return { dispatcher, terminal, provider, workflow, llm };
}

describe('core/Dispatcher', () => {

    it('routes parsed commands to the workflow', async (): Promise<void> => {
        const { dispatcher } = setup();
        await expect(dispatcher.execute("post a tweet saying 'hi'")).resolves.toBe('post: hi');
    });

    it('answers help without parsing, listing workflows and examples', async (): Promise<void> => {
        const { dispatcher } = setup();
        const lines = (await dispatcher.execute('  HELP ')) ?? '';

        expect(lines.split('\n')).toEqual([
            'Available Commands:',
            '- help: Show this help message',
            '- troubleshoot: Start interactive troubleshooting',
            '- resume: Continue a paused troubleshooting session',
            '- workflows: List configured workflows',
            '- clear: Clear the screen',
            '- exit: Exit the application',
            '',
            'Available Workflows:',
            '- twitter: Post and manage tweets',
            '',
            'Example Commands:',
            "- Post a tweet saying 'Hello, World!'",
        ]);
    });

    it('prompts for setup when no workflow is registered', async (): Promise<void> => {
        const { dispatcher, terminal } = setup({ register: false });

        await expect(dispatcher.execute("post a tweet saying 'hi'")).resolves.toBeNull();
        expect(terminal.spoken).toEqual([
            "I don't see any configured workflows. Run `mentat workflows configure <name>` to set one up.",
        ]);
    });

    it('prints the error and formatting help for unrecognised commands', async (): Promise<void> => {
        const { dispatcher, terminal } = setup();

        await expect(dispatcher.execute('order me a pizza')).resolves.toBeNull();
        expect(terminal.printed[0]).toBe('Error: Command not recognized. Please try again.');
        expect(terminal.printed[1]).toBe('');
        expect(terminal.printed[2].startsWith('Hint: Available Commands:')).toBe(true);
        expect(terminal.questions).toEqual([]);
    });

    it('treats a parsed but unregistered workflow as a user error', async (): Promise<void> => {
        const { dispatcher, terminal } = setup();

        await expect(dispatcher.execute('weather forecast please')).resolves.toBeNull();
        expect(terminal.printed[0]).toBe("Error: Workflow 'weather' not found or not properly configured");
    });

    it('prints the configuration hint for environment errors', async (): Promise<void> => {
        const { dispatcher, terminal, workflow } = setup();
        workflow.ready = false;

        await expect(dispatcher.execute("tweet 'hi'")).resolves.toBeNull();
        expect(terminal.printed).toEqual([
            "Configuration Error: Environment not properly configured for workflow 'twitter'",
            CONFIGURATION_HINT,
        ]);
    });

    it('offers troubleshooting for other failures and respects a decline', async (): Promise<void> => {
        const { dispatcher, terminal, workflow, provider } = setup({ answers: ['n'] });
        workflow.failure = new Error('kaboom');

        await expect(dispatcher.execute("tweet 'hi'")).resolves.toBeNull();
        expect(terminal.spoken).toEqual(['I encountered an issue: kaboom']);
        expect(terminal.questions).toEqual(['Would you like help troubleshooting?']);
        expect(terminal.printed).toEqual(["Let me know if you need help later - just type 'troubleshoot'"]);
        expect(provider.requests).toHaveLength(0);
    });

    it('starts troubleshooting seeded with the error when accepted', async (): Promise<void> => {
        const { dispatcher, workflow, provider } = setup({
            answers: ['y', 'what happened?', 'y'],
            llmScript: ['The service is down, try again later.'],
        });
        workflow.failure = new Error('kaboom');

        await expect(dispatcher.execute("tweet 'hi'")).resolves.toBe(TROUBLESHOOT_RESOLVED);
        expect(provider.requests[0].messages[0].content).toContain('"error": "kaboom"');
        expect(provider.requests[0].messages[1]).toEqual({ role: 'user', content: 'what happened?' });
    });

    it('runs troubleshooting on request, apologising without an LLM', async (): Promise<void> => {
        const { dispatcher } = setup({ config: new MemoryConfigStore(), register: false });
        await expect(dispatcher.execute('troubleshoot')).resolves.toBe(TROUBLESHOOT_UNAVAILABLE);
    });
});
