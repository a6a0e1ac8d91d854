import { z } from 'zod';

export const PROVIDER_NAMES = ['openai', 'anthropic'] as const;

export const providerNameSchema = z.enum(PROVIDER_NAMES);

export type ProviderName = z.infer<typeof providerNameSchema>;

export const SUPPORTED_MODELS: Record<ProviderName, readonly string[]> = {
    openai: ['gpt-4o', 'gpt-4o-mini', 'gpt-4', 'gpt-3.5-turbo'],
    anthropic: [
        'claude-3-5-sonnet-20241022',
        'claude-3-opus-20240229',
        'claude-3-sonnet-20240229',
    ],
};

/** Shorthand names accepted during setup */
export const MODEL_ALIASES: Record<ProviderName, Readonly<Record<string, string>>> = {
    openai: {
        '4o': 'gpt-4o',
        'mini': 'gpt-4o-mini',
        'gpt4': 'gpt-4',
        'gpt3': 'gpt-3.5-turbo',
        '4': 'gpt-4',
        '3.5': 'gpt-3.5-turbo',
    },
    anthropic: {
        'sonnet': 'claude-3-5-sonnet-20241022',
        'opus': 'claude-3-opus-20240229',
        'claude-opus': 'claude-3-opus-20240229',
        'claude-sonnet': 'claude-3-sonnet-20240229',
    },
};

const API_KEY_PREFIXES: Record<ProviderName, string> = {
    openai: 'sk-',
    anthropic: 'sk-ant-',
};

const PROVIDER_LABELS: Record<ProviderName, string> = {
    openai: 'OpenAI',
    anthropic: 'Anthropic',
};

export function isProviderName(value: string): value is ProviderName {
    return providerNameSchema.safeParse(value).success;
}

/**
 * Name of the setting holding a provider's API key (e.g. OPENAI_API_KEY)
 */
export function apiKeyVariable(provider: ProviderName): string {
    return `${provider.toUpperCase()}_API_KEY`;
}

export function providerLabel(provider: ProviderName): string {
    return PROVIDER_LABELS[provider];
}

/**
 * Models whose full name or alias contains the input, without duplicates
 */
export function findMatchingModels(provider: ProviderName, input: string): string[] {
    const needle = input.toLowerCase().trim();
    if (!needle) return [];

    const matches = new Set<string>();
    for (const model of SUPPORTED_MODELS[provider]) {
        if (model.toLowerCase().includes(needle)) matches.add(model);
    }
    for (const [alias, model] of Object.entries(MODEL_ALIASES[provider])) {
        if (alias.toLowerCase().includes(needle)) matches.add(model);
    }
    return Array.from(matches);
}

export interface KeyCheck {
    valid: boolean;
    message: string;
}

/**
 * Format-only check of an API key; no network call
 */
export function validateApiKey(provider: ProviderName, apiKey: string): KeyCheck {
    if (!apiKey) {
        return { valid: false, message: 'API key cannot be empty' };
    }
    const prefix = API_KEY_PREFIXES[provider];
    if (!apiKey.startsWith(prefix)) {
        return { valid: false, message: `${providerLabel(provider)} API keys should start with '${prefix}'` };
    }
    return { valid: true, message: 'API key format is valid' };
}

/**
 * Candidate models for what the user typed: an exact name or alias
 * resolves to one model, anything else falls back to substring matching
 */
export function resolveModelInput(provider: ProviderName, input: string): string[] {
    const needle = input.toLowerCase().trim();
    const exact = SUPPORTED_MODELS[provider].find((model) => model.toLowerCase() === needle);
    if (exact) return [exact];

    const aliases = MODEL_ALIASES[provider];
    if (Object.hasOwn(aliases, needle)) return [aliases[needle]];

    return findMatchingModels(provider, needle);
}
