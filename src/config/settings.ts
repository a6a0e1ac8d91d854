import { existsSync, writeFileSync } from 'node:fs';
import { z } from 'zod';
import { LOG_LEVELS } from '../logging/logger.js';
import { isProviderName, type ProviderName } from '../llm/models.js';
import { InvalidSettingsError } from '../errors.js';
import type { ConfigStore } from './store.js';

export const CONFIG_KEYS = {
    provider: 'LLM_PROVIDER',
    model: 'LLM_MODEL',
    bootstrapComplete: 'BOOTSTRAP_COMPLETE',
    logLevel: 'MENTAT_LOG_LEVEL',
    envFile: 'MENTAT_ENV_FILE',
    assistantName: 'MENTAT_ASSISTANT_NAME',
} as const;

// ─── Runtime settings (process environment) ───

const runtimeSettingsSchema = z.object({
    logLevel: z.enum(LOG_LEVELS).default('info'),
    envFile: z.string().min(1).default('.env'),
    assistantName: z.string().min(1).default('Thufir'),
});

export type RuntimeSettings = z.infer<typeof runtimeSettingsSchema>;

/**
 * Resolve settings that must be known before the .env file is read
 */
export function resolveRuntimeSettings(env: NodeJS.ProcessEnv = process.env): RuntimeSettings {
    const result = runtimeSettingsSchema.safeParse({
        logLevel: nonEmpty(env[CONFIG_KEYS.logLevel])?.toLowerCase(),
        envFile: nonEmpty(env[CONFIG_KEYS.envFile]),
        assistantName: nonEmpty(env[CONFIG_KEYS.assistantName]),
    });

    if (!result.success) {
        const issues = result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`);
        throw new InvalidSettingsError(`Invalid settings: ${issues.join('; ')}`);
    }
    return result.data;
}

// ─── LLM settings (configuration store) ───

export interface LLMSettings {
    provider?: ProviderName;
    model?: string;
}

/**
 * Provider and model as persisted; an unknown provider reads as unset
 */
export function readLLMSettings(store: ConfigStore): LLMSettings {
    const provider = store.get(CONFIG_KEYS.provider)?.toLowerCase();
    return {
        provider: provider !== undefined && isProviderName(provider) ? provider : undefined,
        model: store.get(CONFIG_KEYS.model),
    };
}

// ─── Bootstrap ───

export const DEFAULT_ENV_TEMPLATE = `# LLM Configuration
LLM_PROVIDER=
LLM_MODEL=

# Provider API Keys
OPENAI_API_KEY=
ANTHROPIC_API_KEY=

# Twitter Workflow
TWITTER_API_KEY=
TWITTER_API_SECRET=
TWITTER_ACCESS_TOKEN=
TWITTER_ACCESS_TOKEN_SECRET=

# System Configuration
BOOTSTRAP_COMPLETE=false
`;

/**
 * Write the default .env template unless the file already exists
 */
export function createDefaultEnv(filePath: string): boolean {
    if (existsSync(filePath)) return false;
    writeFileSync(filePath, DEFAULT_ENV_TEMPLATE, 'utf-8');
    return true;
}

export function isBootstrapComplete(store: ConfigStore): boolean {
    return store.get(CONFIG_KEYS.bootstrapComplete)?.toLowerCase() === 'true';
}

export function markBootstrapComplete(store: ConfigStore): void {
    store.set(CONFIG_KEYS.bootstrapComplete, 'true');
}

function nonEmpty(value: string | undefined): string | undefined {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
}
