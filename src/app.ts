import path from 'node:path';
import { resolveRuntimeSettings, type RuntimeSettings } from './config/settings.js';
import { EnvFileStore, type ConfigStore } from './config/store.js';
import { Dispatcher } from './core/dispatcher.js';
import type { Terminal } from './core/terminal.js';
import { TroubleshootingSession } from './core/troubleshoot.js';
import { LLMBackend } from './llm/backend.js';
import type { ProviderFactory } from './llm/types.js';
import { Logger } from './logging/logger.js';
import { CommandParser } from './parser/parser.js';
import { WORKFLOW_CATALOG, catalogNames, discoverWorkflows } from './workflows/catalog.js';
import { WorkflowRegistry } from './workflows/registry.js';
import type { Workflow, WorkflowDefinition, WorkflowDeps, WorkflowSummary } from './workflows/types.js';

export interface AssistantOptions {
    terminal: Terminal;
    env?: NodeJS.ProcessEnv;
    /** Resolved from `env` when omitted */
    settings?: RuntimeSettings;
    cwd?: string;
    /** Defaults to the .env file named by MENTAT_ENV_FILE */
    config?: ConfigStore;
    logger?: Logger;
    catalog?: readonly WorkflowDefinition[];
    providerFactory?: ProviderFactory;
}

/**
 * Every long-lived component, wired together
 */
export interface Assistant {
    settings: RuntimeSettings;
    config: ConfigStore;
    logger: Logger;
    terminal: Terminal;
    llm: LLMBackend;
    registry: WorkflowRegistry;
    parser: CommandParser;
    troubleshooting: TroubleshootingSession;
    dispatcher: Dispatcher;
    /** Register every catalog workflow whose environment is ready */
    discover(): WorkflowSummary[];
    /** The registered workflow, or a fresh one from the catalog regardless of its environment */
    createWorkflow(name: string): Workflow | undefined;
}

export function createAssistant(options: AssistantOptions): Assistant {
    const env = options.env ?? process.env;
    const settings = options.settings ?? resolveRuntimeSettings(env);
    const logger = options.logger ?? new Logger(settings.logLevel);
    const config = options.config ?? new EnvFileStore(path.resolve(options.cwd ?? process.cwd(), settings.envFile), env);
    const catalog = options.catalog ?? WORKFLOW_CATALOG;
    const terminal = options.terminal;

    const llm = new LLMBackend({
        config,
        logger: logger.child('llm'),
        providerFactory: options.providerFactory,
        assistantName: settings.assistantName,
        workflowNames: () => catalogNames(catalog),
    });

    const registry = new WorkflowRegistry();
    const parser = new CommandParser(catalog.map((definition) => definition.vocabulary));
    const troubleshooting = new TroubleshootingSession({ llm, registry, terminal });
    const dispatcher = new Dispatcher({
        registry,
        parser,
        troubleshooting,
        terminal,
        logger: logger.child('dispatcher'),
    });

    const deps: WorkflowDeps = { config, llm, terminal, logger };

    return {
        settings,
        config,
        logger,
        terminal,
        llm,
        registry,
        parser,
        troubleshooting,
        dispatcher,
        discover: () => discoverWorkflows(registry, catalog, deps, logger.child('workflows')),
        createWorkflow: (name) =>
            registry.get(name) ?? catalog.find((definition) => definition.name === name)?.create(deps),
    };
}
