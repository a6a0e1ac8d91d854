import type { ConfigStore } from '../config/store.js';
import { CONFIG_KEYS, readLLMSettings } from '../config/settings.js';
import { errorMessage } from '../errors.js';
import { Logger, silentLogger } from '../logging/logger.js';
import { Conversation } from './conversation.js';
import {
    PROVIDER_NAMES,
    apiKeyVariable,
    providerLabel,
    validateApiKey,
    type ProviderName,
} from './models.js';
import { buildSystemContext, resumePrompt, systemPromptFor } from './prompts.js';
import { createProvider } from './providers/index.js';
import {
    CompletionError,
    type ChatRole,
    type CompletionProvider,
    type ConversationContext,
    type ConversationState,
    type LLMMessage,
    type ProviderFactory,
} from './types.js';

export interface LLMBackendOptions {
    config: ConfigStore;
    logger?: Logger;
    providerFactory?: ProviderFactory;
    assistantName?: string;
    /** Names of the workflows the assistant can discover, for the system snapshot */
    workflowNames?: () => string[];
}

export interface ConfigurationResult {
    ok: boolean;
    message: string;
}

interface CompletionTarget {
    provider: CompletionProvider;
    model: string;
}

/**
 * LLM Backend — provider configuration, conversation state and completions
 *
 * Completion failures never reach the caller: they are logged and turned
 * into a null result.
 */
export class LLMBackend {
    private readonly config: ConfigStore;
    private readonly logger: Logger;
    private readonly providerFactory: ProviderFactory;
    private readonly assistantName: string;
    private readonly workflowNames: () => string[];
    private readonly conversation = new Conversation();

    private provider?: ProviderName;
    private model?: string;
    private client?: { provider: ProviderName; apiKey: string; instance: CompletionProvider };

    constructor(options: LLMBackendOptions) {
        this.config = options.config;
        this.logger = options.logger ?? silentLogger();
        this.providerFactory = options.providerFactory ?? createProvider;
        this.assistantName = options.assistantName ?? 'Thufir';
        this.workflowNames = options.workflowNames ?? (() => []);
    }

    // ─── Configuration ───

    /**
     * Provider, model and a well-formed key are all present in the store
     */
    isConfigured(): boolean {
        const { provider, model } = readLLMSettings(this.config);
        if (!provider || !model) return false;

        const apiKey = this.config.get(apiKeyVariable(provider));
        if (!apiKey) return false;

        return validateApiKey(provider, apiKey).valid;
    }

    get currentProvider(): ProviderName | undefined {
        return this.provider ?? readLLMSettings(this.config).provider;
    }

    get currentModel(): string | undefined {
        return this.model ?? readLLMSettings(this.config).model;
    }

    /**
     * Send a tiny completion to prove the credentials work
     */
    async testConfiguration(provider: ProviderName, model: string, apiKey: string): Promise<ConfigurationResult> {
        try {
            await this.providerFactory(provider, apiKey).complete({
                model,
                messages: [{ role: 'user', content: 'test' }],
                maxTokens: 5,
            });
            return { ok: true, message: 'Configuration test successful' };
        } catch (err) {
            return { ok: false, message: describeCompletionFailure(err, provider) };
        }
    }

    /**
     * Validate, test and persist a provider/model/key triple
     */
    async configure(provider: ProviderName, model: string, apiKey: string): Promise<ConfigurationResult> {
        const keyCheck = validateApiKey(provider, apiKey);
        if (!keyCheck.valid) {
            return { ok: false, message: `Invalid API key: ${keyCheck.message}` };
        }

        const result = await this.testConfiguration(provider, model, apiKey);
        if (!result.ok) return result;

        for (const name of PROVIDER_NAMES) {
            this.config.unset(apiKeyVariable(name));
        }
        this.config.set(apiKeyVariable(provider), apiKey);
        this.config.set(CONFIG_KEYS.provider, provider);
        this.config.set(CONFIG_KEYS.model, model);

        this.provider = provider;
        this.model = model;
        this.client = undefined;
        this.logger.info(`LLM configured: ${provider}/${model}`);
        return result;
    }

    // ─── Conversation ───

    startConversation(task: string, context: ConversationContext = {}): void {
        this.conversation.start(task, {
            ...context,
            system: buildSystemContext({
                assistantName: this.assistantName,
                workflows: this.workflowNames(),
            }),
            task,
        });
        this.logger.debug(`Conversation started: ${task}`);
    }

    pauseConversation(): void {
        this.conversation.pause();
    }

    endConversation(): void {
        if (this.conversation.isActive) {
            this.logger.debug('Conversation ended');
        }
        this.conversation.end();
    }

    getConversationState(): ConversationState {
        return this.conversation.snapshot();
    }

    /**
     * Recap the paused conversation and continue it; null while idle
     */
    async resumeConversation(): Promise<string | null> {
        const active = this.conversation.active;
        if (!active) return null;

        const last = active.history[active.history.length - 1];
        return this.getCompletion(resumePrompt(active.task, active.context, last));
    }

    // ─── Completions ───

    /**
     * Completion within the current conversation (or a bare prompt while idle)
     *
     * While active, the request is the task's system prompt, the full history
     * and the new prompt; the exchange is recorded only after a response.
     */
    async getCompletion(prompt: string, role: ChatRole = 'user'): Promise<string | null> {
        const target = this.resolveTarget();
        if (!target) {
            this.logger.warn('LLM not configured. Run `mentat setup` first.');
            return null;
        }

        const active = this.conversation.active;
        const messages: LLMMessage[] = active
            ? [
                { role: 'system', content: systemPromptFor(active.task, active.context, this.assistantName) },
                ...active.history,
                { role, content: prompt },
            ]
            : [{ role, content: prompt }];

        try {
            const response = await target.provider.complete({ model: target.model, messages });
            this.conversation.add(role, prompt);
            this.conversation.add('assistant', response.content);
            return response.content;
        } catch (err) {
            this.logger.error(`Error getting completion: ${describeCompletionFailure(err, target.provider.name)}`);
            return null;
        }
    }

    /**
     * One-off completion that never touches the conversation
     */
    async complete(prompt: string): Promise<string | null> {
        const target = this.resolveTarget();
        if (!target) {
            this.logger.warn('LLM not configured. Run `mentat setup` first.');
            return null;
        }

        try {
            const response = await target.provider.complete({
                model: target.model,
                messages: [{ role: 'user', content: prompt }],
            });
            return response.content;
        } catch (err) {
            this.logger.error(`Error getting completion: ${describeCompletionFailure(err, target.provider.name)}`);
            return null;
        }
    }

    private resolveTarget(): CompletionTarget | undefined {
        if (!this.provider || !this.model) {
            const settings = readLLMSettings(this.config);
            this.provider = settings.provider;
            this.model = settings.model;
        }
        if (!this.provider || !this.model) return undefined;

        const apiKey = this.config.get(apiKeyVariable(this.provider));
        if (!apiKey) return undefined;

        if (!this.client || this.client.provider !== this.provider || this.client.apiKey !== apiKey) {
            this.client = {
                provider: this.provider,
                apiKey,
                instance: this.providerFactory(this.provider, apiKey),
            };
        }
        return { provider: this.client.instance, model: this.model };
    }
}

/**
 * Human-readable explanation of a failed completion
 */
export function describeCompletionFailure(err: unknown, provider: ProviderName): string {
    if (!(err instanceof CompletionError)) {
        return `Unexpected error: ${errorMessage(err)}`;
    }
    switch (err.kind) {
        case 'insufficient_quota':
            return `Your ${providerLabel(provider)} account has insufficient credits. Please check your billing details.`;
        case 'rate_limit':
            return 'Rate limit exceeded. Please try again later.';
        case 'invalid_request':
            return `Invalid request: ${err.message}`;
        case 'authentication':
            return 'Authentication failed. Please check your API key.';
        case 'unexpected':
            return `Unexpected error: ${err.message}`;
    }
}
