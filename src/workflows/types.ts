/**
 * Workflow System — Types
 *
 * A workflow is an integration with one external service exposing a
 * fixed set of commands. Concrete workflows extend BaseWorkflow and are
 * listed in the catalog; nothing discovers them by scanning the disk.
 */
import type { ConfigStore } from '../config/store.js';
import type { Terminal } from '../core/terminal.js';
import type { LLMBackend } from '../llm/backend.js';
import type { Logger } from '../logging/logger.js';
import type { WorkflowVocabulary } from '../parser/types.js';

export type CommandParams = Record<string, unknown>;

/** Command name → one-line description */
export type CommandMap = Readonly<Record<string, string>>;

export interface WorkflowSummary {
    name: string;
    description: string;
}

export interface Workflow {
    /** Lowercase name, unique within a registry */
    readonly name: string;
    readonly description: string;
    getCommands(): CommandMap;
    /** Cheap existence check of the required configuration; no network */
    validateEnvironment(): boolean;
    executeCommand(command: string, params?: CommandParams): Promise<string>;
    getExampleCommands(): readonly string[];
    /** Interactive credential setup, where the workflow supports it */
    configure?(): Promise<boolean>;
}

/**
 * Collaborators handed to every workflow factory
 */
export interface WorkflowDeps {
    config: ConfigStore;
    llm: LLMBackend;
    terminal: Terminal;
    logger: Logger;
}

/**
 * Catalog entry: how to build a workflow and how to talk about it
 */
export interface WorkflowDefinition {
    name: string;
    vocabulary: WorkflowVocabulary;
    create(deps: WorkflowDeps): Workflow;
}
