// Mentat — Public API Surface
export { createCLI } from './cli/index.js';
export { createAssistant } from './app.js';
export { Dispatcher } from './core/dispatcher.js';
export { TroubleshootingSession } from './core/troubleshoot.js';
export { CommandParser, extractContent } from './parser/parser.js';
export { WorkflowRegistry } from './workflows/registry.js';
export { BaseWorkflow, MAX_RECONFIGURE_ATTEMPTS } from './workflows/base.js';
export { WORKFLOW_CATALOG, discoverWorkflows } from './workflows/catalog.js';
export { TwitterWorkflow } from './workflows/twitter/workflow.js';
export { LLMBackend } from './llm/backend.js';
export { createProvider } from './llm/providers/index.js';
export { EnvFileStore, MemoryConfigStore } from './config/store.js';
export { Logger } from './logging/logger.js';
export * from './errors.js';

// Types
export type { Assistant, AssistantOptions } from './app.js';
export type { ConfigStore } from './config/store.js';
export type { Terminal } from './core/terminal.js';
export type { ParsedCommand, WorkflowVocabulary, CommandMatcher } from './parser/types.js';
export type { Workflow, WorkflowDefinition, WorkflowDeps, CommandParams } from './workflows/types.js';
export type { ConversationState, CompletionProvider, LLMMessage } from './llm/types.js';
export type { TwitterClient, TwitterCredentials } from './workflows/twitter/client.js';
