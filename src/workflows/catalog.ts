import { errorMessage } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import type { WorkflowRegistry } from './registry.js';
import { TwitterWorkflow } from './twitter/workflow.js';
import { twitterVocabulary } from './twitter/vocabulary.js';
import type { WorkflowDefinition, WorkflowDeps, WorkflowSummary } from './types.js';

/**
 * Every workflow the assistant ships with
 */
export const WORKFLOW_CATALOG: readonly WorkflowDefinition[] = [
    {
        name: 'twitter',
        vocabulary: twitterVocabulary,
        create: (deps) => new TwitterWorkflow(deps),
    },
];

export function catalogNames(catalog: readonly WorkflowDefinition[] = WORKFLOW_CATALOG): string[] {
    return catalog.map((definition) => definition.name);
}

/**
 * Construct each catalog entry and register the ones whose environment is ready
 *
 * Construction failures and duplicate names are logged and skipped.
 */
export function discoverWorkflows(
    registry: WorkflowRegistry,
    catalog: readonly WorkflowDefinition[],
    deps: WorkflowDeps,
    logger: Logger
): WorkflowSummary[] {
    for (const definition of catalog) {
        try {
            const workflow = definition.create(deps);
            if (!workflow.validateEnvironment()) {
                logger.debug(`Skipping workflow '${workflow.name}': environment not configured`);
                continue;
            }
            registry.register(workflow);
            logger.debug(`Registered workflow '${workflow.name}'`);
        } catch (err) {
            logger.warn(`Failed to load workflow '${definition.name}': ${errorMessage(err)}`);
        }
    }
    return registry.list();
}
