import { describe, it, expect } from 'vitest';
import { MemoryConfigStore } from '../config/store.js';
import {
    FakeProvider,
    TEST_OPENAI_KEY,
    captureLogger,
    configuredStore,
    fakeBackend,
} from '../testing/fakes.js';
import { LLMBackend, describeCompletionFailure } from './backend.js';
import { CompletionError } from './types.js';

describe('llm/LLMBackend configuration', () => {

    it('is configured only with provider, model and a well-formed key', (): void => {
        const provider = new FakeProvider();
        expect(fakeBackend(provider, new MemoryConfigStore()).isConfigured()).toBe(false);
        expect(fakeBackend(provider, configuredStore({ OPENAI_API_KEY: 'test-secret' })).isConfigured()).toBe(false);
        expect(fakeBackend(provider, configuredStore()).isConfigured()).toBe(true);
        expect(fakeBackend(provider, new MemoryConfigStore({
            LLM_PROVIDER: 'anthropic',
            LLM_MODEL: 'claude-3-opus-20240229',
            ANTHROPIC_API_KEY: 'sk-ant-test-secret',
        })).isConfigured()).toBe(true);
    });

    it('returns null and warns when not configured', async (): Promise<void> => {
        const provider = new FakeProvider(['unused']);
        const { logger, lines } = captureLogger();
        const llm = fakeBackend(provider, new MemoryConfigStore(), logger);

        await expect(llm.getCompletion('hello')).resolves.toBeNull();
        expect(provider.requests).toHaveLength(0);
        expect(lines).toEqual([{ level: 'warn', line: 'LLM not configured. Run `mentat setup` first.' }]);
    });

    it('tests and saves a new configuration, clearing other provider keys', async (): Promise<void> => {
        const provider = new FakeProvider(['ok']);
        const store = new MemoryConfigStore({ ANTHROPIC_API_KEY: 'sk-ant-old-secret' });
        const llm = fakeBackend(provider, store);

        const result = await llm.configure('openai', 'gpt-4o-mini', TEST_OPENAI_KEY);

        expect(result).toEqual({ ok: true, message: 'Configuration test successful' });
        expect(provider.requests).toEqual([
            { model: 'gpt-4o-mini', messages: [{ role: 'user', content: 'test' }], maxTokens: 5 },
        ]);
        expect(store.entries()).toEqual({
            OPENAI_API_KEY: TEST_OPENAI_KEY,
            LLM_PROVIDER: 'openai',
            LLM_MODEL: 'gpt-4o-mini',
        });
        expect(llm.currentModel).toBe('gpt-4o-mini');
    });

    it('rejects a malformed key before calling the provider', async (): Promise<void> => {
        const provider = new FakeProvider();
        const llm = fakeBackend(provider, new MemoryConfigStore());

        await expect(llm.configure('openai', 'gpt-4o', 'test-secret')).resolves.toEqual({
            ok: false,
            message: "Invalid API key: OpenAI API keys should start with 'sk-'",
        });
        expect(provider.requests).toHaveLength(0);
    });

    it('keeps the stored settings when the configuration test fails', async (): Promise<void> => {
        const provider = new FakeProvider([new CompletionError('authentication', 'bad key', 401)]);
        const store = new MemoryConfigStore();
        const llm = fakeBackend(provider, store);

        await expect(llm.configure('openai', 'gpt-4o', TEST_OPENAI_KEY)).resolves.toEqual({
            ok: false,
            message: 'Authentication failed. Please check your API key.',
        });
        expect(store.entries()).toEqual({});
    });
});

describe('llm/LLMBackend conversation', () => {

    it('sends a bare prompt and records nothing while idle', async (): Promise<void> => {
        const provider = new FakeProvider(['hi there']);
        const llm = fakeBackend(provider);

        await expect(llm.getCompletion('hello')).resolves.toBe('hi there');
        expect(provider.requests[0].messages).toEqual([{ role: 'user', content: 'hello' }]);
        expect(llm.getConversationState()).toEqual({ status: 'idle' });
    });

    it('records each exchange in order while active', async (): Promise<void> => {
        const provider = new FakeProvider(['r1', 'r2']);
        const llm = fakeBackend(provider);
        llm.startConversation('troubleshooting', { error: 'boom' });

        await llm.getCompletion('p1');
        await llm.getCompletion('p2');

        const state = llm.getConversationState();
        expect(state.status).toBe('active');
        if (state.status !== 'active') return;
        expect(state.history).toEqual([
            { role: 'user', content: 'p1' },
            { role: 'assistant', content: 'r1' },
            { role: 'user', content: 'p2' },
            { role: 'assistant', content: 'r2' },
        ]);

        const second = provider.requests[1].messages;
        expect(second.map((m) => m.role)).toEqual(['system', 'user', 'assistant', 'user']);
        expect(second[0].content).toContain('"error": "boom"');
        expect(second[0].content).toContain('"task": "troubleshooting"');
        expect(second[3]).toEqual({ role: 'user', content: 'p2' });
    });

    it('merges the system snapshot into the context', (): void => {
        const llm = fakeBackend(new FakeProvider());
        llm.startConversation('troubleshooting', { error: null });

        const state = llm.getConversationState();
        if (state.status !== 'active') throw new Error('expected an active conversation');
        expect(state.context).toMatchObject({
            error: null,
            task: 'troubleshooting',
            system: { workflows_available: ['twitter'], assistant_name: 'Thufir' },
        });
    });

    it('uses the setup template for twitter_setup tasks', async (): Promise<void> => {
        const provider = new FakeProvider(['step one']);
        const llm = fakeBackend(provider);
        llm.startConversation('twitter_setup');

        await llm.getCompletion('Guide user for Twitter Access Token');
        expect(provider.requests[0].messages[0].content).toContain(
            'You are an expert at configuring Twitter API access and OAuth permissions.'
        );
    });

    it('leaves history untouched when the provider fails', async (): Promise<void> => {
        const provider = new FakeProvider(['r1', new CompletionError('rate_limit', 'slow down', 429)]);
        const { logger, lines } = captureLogger();
        const llm = fakeBackend(provider, configuredStore(), logger);
        llm.startConversation('troubleshooting');

        await llm.getCompletion('p1');
        await expect(llm.getCompletion('p2')).resolves.toBeNull();

        const state = llm.getConversationState();
        if (state.status !== 'active') throw new Error('expected an active conversation');
        expect(state.history).toHaveLength(2);
        expect(lines).toContainEqual({
            level: 'error',
            line: 'Error getting completion: Rate limit exceeded. Please try again later.',
        });
    });

    it('pauses without truncating and ends back to idle', async (): Promise<void> => {
        const llm = fakeBackend(new FakeProvider(['r1']));
        llm.startConversation('troubleshooting');
        await llm.getCompletion('p1');

        llm.pauseConversation();
        expect(llm.getConversationState()).toMatchObject({ status: 'active', pausedAt: 2 });

        llm.endConversation();
        expect(llm.getConversationState()).toEqual({ status: 'idle' });
    });

    it('resets history when a conversation starts again', async (): Promise<void> => {
        const llm = fakeBackend(new FakeProvider(['r1']));
        llm.startConversation('troubleshooting');
        await llm.getCompletion('p1');

        llm.startConversation('troubleshooting', { error: 'new' });
        expect(llm.getConversationState()).toMatchObject({ status: 'active', history: [] });
    });

    it('completes one-off prompts outside the conversation', async (): Promise<void> => {
        const provider = new FakeProvider(['r1', 'reply text']);
        const llm = fakeBackend(provider);
        llm.startConversation('troubleshooting');
        await llm.getCompletion('p1');

        await expect(llm.complete('write a reply')).resolves.toBe('reply text');
        expect(provider.requests[1].messages).toEqual([{ role: 'user', content: 'write a reply' }]);

        const state = llm.getConversationState();
        if (state.status !== 'active') throw new Error('expected an active conversation');
        expect(state.history).toHaveLength(2);
    });

    it('resumes with a recap of the last exchange', async (): Promise<void> => {
        const provider = new FakeProvider(['r1', 'welcome back']);
        const llm = fakeBackend(provider);

        await expect(llm.resumeConversation()).resolves.toBeNull();
        expect(provider.requests).toHaveLength(0);

        llm.startConversation('troubleshooting');
        await llm.getCompletion('p1');
        llm.pauseConversation();

        await expect(llm.resumeConversation()).resolves.toBe('welcome back');
        const recap = provider.requests[1].messages[3].content;
        expect(recap).toContain('Resuming our previous conversation about troubleshooting.');
        expect(recap).toContain('Previous interaction: assistant: r1');
    });

    it('builds a new client when the stored key changes', async (): Promise<void> => {
        const keys: string[] = [];
        const store = configuredStore();
        const provider = new FakeProvider(['a', 'b']);
        const llm = new LLMBackend({
            config: store,
            providerFactory: (_name, apiKey) => {
                keys.push(apiKey);
                return provider;
            },
        });

        await llm.getCompletion('one');
        store.set('OPENAI_API_KEY', 'sk-rotated-secret');
        await llm.getCompletion('two');

        expect(keys).toEqual([TEST_OPENAI_KEY, 'sk-rotated-secret']);
    });
});

describe('llm/describeCompletionFailure', () => {

    it('explains each failure kind', (): void => {
        expect(describeCompletionFailure(new CompletionError('insufficient_quota', 'quota', 429), 'anthropic')).toBe(
            'Your Anthropic account has insufficient credits. Please check your billing details.'
        );
        expect(describeCompletionFailure(new CompletionError('invalid_request', 'no such model', 404), 'openai')).toBe(
            'Invalid request: no such model'
        );
        expect(describeCompletionFailure(new CompletionError('unexpected', 'socket hang up'), 'openai')).toBe(
            'Unexpected error: socket hang up'
        );
        expect(describeCompletionFailure(new Error('weird'), 'openai')).toBe('Unexpected error: weird');
    });
});
