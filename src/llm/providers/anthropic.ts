import Anthropic from '@anthropic-ai/sdk';
import { errorMessage } from '../../errors.js';
import {
    CompletionError,
    completionErrorKind,
    type CompletionProvider,
    type CompletionRequest,
    type LLMMessage,
} from '../types.js';

const DEFAULT_MAX_TOKENS = 1024;

/**
 * Anthropic messages API
 *
 * System messages are folded into the top-level `system` parameter;
 * the remaining turns keep their order.
 */
export class AnthropicProvider implements CompletionProvider {
    readonly name = 'anthropic' as const;
    private client: Anthropic;

    constructor(apiKey: string) {
        this.client = new Anthropic({ apiKey });
    }

    async complete(request: CompletionRequest): Promise<LLMMessage> {
        const system = request.messages
            .filter((m) => m.role === 'system')
            .map((m) => m.content)
            .join('\n\n');
        const turns = request.messages
            .filter((m) => m.role !== 'system')
            .map((m) => ({
                role: m.role === 'assistant' ? 'assistant' as const : 'user' as const,
                content: m.content,
            }));

        try {
            const response = await this.client.messages.create({
                model: request.model,
                max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
                system: system || undefined,
                messages: turns,
            });

            const parts: string[] = [];
            for (const block of response.content) {
                if (block.type === 'text') parts.push(block.text);
            }
            return { role: 'assistant', content: parts.join('') };
        } catch (err) {
            throw toCompletionError(err);
        }
    }
}

function toCompletionError(err: unknown): CompletionError {
    if (err instanceof Anthropic.APIError) {
        return new CompletionError(completionErrorKind(err.status, err.message), err.message, err.status, err);
    }
    return new CompletionError('unexpected', errorMessage(err), undefined, err);
}
