import { Command } from 'commander';
import path from 'node:path';
import chalk from 'chalk';
import { readLLMSettings, resolveRuntimeSettings } from '../../config/settings.js';
import { EnvFileStore } from '../../config/store.js';
import { LLMBackend, type ConfigurationResult } from '../../llm/backend.js';
import {
    PROVIDER_NAMES,
    SUPPORTED_MODELS,
    providerLabel,
    resolveModelInput,
    validateApiKey,
    type ProviderName,
} from '../../llm/models.js';
import { Logger } from '../../logging/logger.js';
import { Spinner } from '../ui/spinner.js';

export function createSetupCommand(): Command {
    return new Command('setup')
        .description('Configure the LLM provider, model and API key')
        .action(async () => {
            const settings = resolveRuntimeSettings();
            const store = new EnvFileStore(path.resolve(process.cwd(), settings.envFile));
            const llm = new LLMBackend({
                config: store,
                logger: new Logger(settings.logLevel).child('llm'),
                assistantName: settings.assistantName,
            });
            const current = readLLMSettings(store);

            console.log(chalk.bold.cyan('\n▶ LLM Setup\n'));

            const { default: inquirer } = await import('inquirer');
            const { provider } = await inquirer.prompt<{ provider: ProviderName }>([
                {
                    type: 'list',
                    name: 'provider',
                    message: 'Select your LLM provider:',
                    choices: PROVIDER_NAMES.map((name) => ({ name: providerLabel(name), value: name })),
                    default: current.provider ?? 'openai',
                },
            ]);

            const { modelInput } = await inquirer.prompt<{ modelInput: string }>([
                {
                    type: 'input',
                    name: 'modelInput',
                    message: `Model (${SUPPORTED_MODELS[provider].join(', ')}):`,
                    default: current.provider === provider && current.model ? current.model : SUPPORTED_MODELS[provider][0],
                },
            ]);

            const candidates = resolveModelInput(provider, modelInput);
            let model: string;
            if (candidates.length === 1) {
                model = candidates[0];
            } else if (candidates.length > 1) {
                const answer = await inquirer.prompt<{ model: string }>([
                    {
                        type: 'list',
                        name: 'model',
                        message: `Several models match '${modelInput}':`,
                        choices: candidates,
                    },
                ]);
                model = answer.model;
            } else {
                model = modelInput.trim();
                console.log(chalk.yellow(`  '${model}' is not a known ${providerLabel(provider)} model; using it as given.`));
            }

            const result = await configureWithRetry(llm, provider, model, new Spinner(), {
                apiKey: async () => {
                    const { apiKey } = await inquirer.prompt<{ apiKey: string }>([
                        {
                            type: 'password',
                            name: 'apiKey',
                            message: `${providerLabel(provider)} API key:`,
                            mask: '*',
                            validate: (value: string) => {
                                const check = validateApiKey(provider, value.trim());
                                return check.valid || check.message;
                            },
                        },
                    ]);
                    return apiKey;
                },
                retry: async () => {
                    const { again } = await inquirer.prompt<{ again: boolean }>([
                        { type: 'confirm', name: 'again', message: 'Would you like to try again?', default: true },
                    ]);
                    return again;
                },
            });
            if (!result.ok) {
                process.exitCode = 1;
            }
        });
}

export interface SetupPrompts {
    apiKey(): Promise<string>;
    retry(): Promise<boolean>;
}

/** Progress display for the configuration test; Spinner fits */
export interface SetupProgress {
    start(message: string): void;
    success(message: string): void;
    fail(message: string): void;
}

/**
 * Ask for a key and test it, asking again for as long as the user wants to retry
 */
export async function configureWithRetry(
    llm: LLMBackend,
    provider: ProviderName,
    model: string,
    progress: SetupProgress,
    prompts: SetupPrompts
): Promise<ConfigurationResult> {
    for (;;) {
        const apiKey = await prompts.apiKey();
        progress.start('Testing configuration...');
        const result = await llm.configure(provider, model, apiKey.trim());
        if (result.ok) {
            progress.success(`Configured ${providerLabel(provider)} / ${model}`);
            return result;
        }
        progress.fail(result.message);
        if (!(await prompts.retry())) return result;
    }
}
