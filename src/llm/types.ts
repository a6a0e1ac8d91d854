import { MentatError } from '../errors.js';
import type { ProviderName } from './models.js';

export type ChatRole = 'system' | 'user' | 'assistant';

export interface LLMMessage {
    role: ChatRole;
    content: string;
}

export interface CompletionRequest {
    model: string;
    messages: LLMMessage[];
    maxTokens?: number;
}

/**
 * Generic completion call; providers translate to their own wire format
 */
export interface CompletionProvider {
    readonly name: ProviderName;
    complete(request: CompletionRequest): Promise<LLMMessage>;
}

export type ProviderFactory = (provider: ProviderName, apiKey: string) => CompletionProvider;

// ─── Provider failures ───

export type CompletionErrorKind =
    | 'authentication'
    | 'rate_limit'
    | 'insufficient_quota'
    | 'invalid_request'
    | 'unexpected';

export class CompletionError extends MentatError {
    readonly kind: CompletionErrorKind;
    readonly status?: number;

    constructor(kind: CompletionErrorKind, message: string, status?: number, cause?: unknown) {
        super('COMPLETION_FAILED', message, { cause });
        this.kind = kind;
        this.status = status;
    }
}

/**
 * Map an HTTP status (and the provider's message) to a failure kind
 */
export function completionErrorKind(status: number | undefined, message: string): CompletionErrorKind {
    if (status === 401 || status === 403) return 'authentication';
    if (status === 429) {
        return message.includes('insufficient_quota') ? 'insufficient_quota' : 'rate_limit';
    }
    if (status === 400 || status === 404 || status === 422) return 'invalid_request';
    return 'unexpected';
}

// ─── Conversation state ───

export type ConversationContext = Record<string, unknown>;

export interface IdleConversation {
    status: 'idle';
}

export interface ActiveConversation {
    status: 'active';
    task: string;
    context: ConversationContext;
    history: LLMMessage[];
    /** History length when the conversation was last paused */
    pausedAt?: number;
}

export type ConversationState = IdleConversation | ActiveConversation;
