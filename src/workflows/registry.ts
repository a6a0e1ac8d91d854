import {
    DuplicateWorkflowError,
    EnvironmentNotConfiguredError,
    WorkflowNotFoundError,
} from '../errors.js';
import type { CommandParams, Workflow, WorkflowSummary } from './types.js';

/**
 * Workflow Registry — the only component that knows which workflows exist
 *
 * Every execution re-validates the workflow's environment first, since
 * credentials may have been edited or revoked since the last command.
 */
export class WorkflowRegistry {
    private workflowsByName: Map<string, Workflow> = new Map();

    /**
     * Register a workflow; a repeated name is rejected and the first kept
     */
    register(workflow: Workflow): void {
        if (this.workflowsByName.has(workflow.name)) {
            throw new DuplicateWorkflowError(workflow.name);
        }
        this.workflowsByName.set(workflow.name, workflow);
    }

    get(name: string): Workflow | undefined {
        return this.workflowsByName.get(name);
    }

    has(name: string): boolean {
        return this.workflowsByName.has(name);
    }

    /**
     * Name and description of every registered workflow
     */
    list(): WorkflowSummary[] {
        return Array.from(this.workflowsByName.values()).map((w) => ({
            name: w.name,
            description: w.description,
        }));
    }

    workflows(): Workflow[] {
        return Array.from(this.workflowsByName.values());
    }

    /**
     * Validate the workflow's environment, then run the command
     */
    async execute(name: string, command: string, params: CommandParams = {}): Promise<string> {
        const workflow = this.workflowsByName.get(name);
        if (!workflow) {
            throw new WorkflowNotFoundError(name);
        }

        if (!workflow.validateEnvironment()) {
            throw new EnvironmentNotConfiguredError(name);
        }

        return workflow.executeCommand(command, params);
    }

    get size(): number {
        return this.workflowsByName.size;
    }
}
