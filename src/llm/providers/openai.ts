import OpenAI from 'openai';
import { errorMessage } from '../../errors.js';
import {
    CompletionError,
    completionErrorKind,
    type CompletionProvider,
    type CompletionRequest,
    type LLMMessage,
} from '../types.js';

/**
 * OpenAI chat completions
 */
export class OpenAIProvider implements CompletionProvider {
    readonly name = 'openai' as const;
    private client: OpenAI;

    constructor(apiKey: string) {
        this.client = new OpenAI({ apiKey });
    }

    async complete(request: CompletionRequest): Promise<LLMMessage> {
        try {
            const response = await this.client.chat.completions.create({
                model: request.model,
                messages: request.messages.map(toOpenAIMessage),
                max_tokens: request.maxTokens,
            });
            return { role: 'assistant', content: response.choices[0]?.message.content ?? '' };
        } catch (err) {
            throw toCompletionError(err);
        }
    }
}

function toOpenAIMessage(message: LLMMessage) {
    switch (message.role) {
        case 'system':
            return { role: 'system' as const, content: message.content };
        case 'user':
            return { role: 'user' as const, content: message.content };
        case 'assistant':
            return { role: 'assistant' as const, content: message.content };
    }
}

function toCompletionError(err: unknown): CompletionError {
    if (err instanceof OpenAI.APIError) {
        return new CompletionError(completionErrorKind(err.status, err.message), err.message, err.status, err);
    }
    return new CompletionError('unexpected', errorMessage(err), undefined, err);
}
