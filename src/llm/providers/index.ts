import type { ProviderFactory } from '../types.js';
import { OpenAIProvider } from './openai.js';
import { AnthropicProvider } from './anthropic.js';

export const createProvider: ProviderFactory = (provider, apiKey) => {
    switch (provider) {
        case 'openai':
            return new OpenAIProvider(apiKey);
        case 'anthropic':
            return new AnthropicProvider(apiKey);
    }
};

export { OpenAIProvider, AnthropicProvider };
