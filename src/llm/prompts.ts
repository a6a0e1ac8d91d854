import os from 'node:os';
import type { ConversationContext, LLMMessage } from './types.js';

export function personaText(assistantName: string): string {
    return [
        `You are ${assistantName}, a thoughtful and knowledgeable assistant who helps users with technical tasks.`,
        'You have a calm, methodical approach and always explain what you are doing.',
        'You present options clearly and let users make informed choices.',
    ].join('\n');
}

export interface SystemContextOptions {
    assistantName: string;
    workflows: string[];
    env?: NodeJS.ProcessEnv;
    cwd?: string;
}

/**
 * Snapshot of the host the assistant runs on, injected into every conversation
 */
export function buildSystemContext(options: SystemContextOptions): ConversationContext {
    const env = options.env ?? process.env;
    return {
        os: os.type(),
        terminal: env['TERM'] ?? 'unknown',
        project_root: options.cwd ?? process.cwd(),
        workflows_available: options.workflows,
        assistant_name: options.assistantName,
        personality: personaText(options.assistantName),
    };
}

/**
 * System prompt for a conversation task, with the context embedded as JSON
 */
export function systemPromptFor(task: string, context: ConversationContext, assistantName: string): string {
    const rendered = JSON.stringify(context, null, 2);

    if (task.includes('twitter_setup')) {
        return `You are an expert at configuring Twitter API access and OAuth permissions.
Focus on helping the user fix OAuth write permissions issues.
Current context: ${rendered}

Guidelines:
1. Be specific about Twitter Developer Portal locations
2. Mention exact UI elements and settings
3. Give one clear step at a time
4. Focus on write permissions configuration`;
    }

    return `You are ${assistantName}, a technical assistant helping users with workflow automation.
Always introduce yourself when starting a new conversation.
Present available workflows and let users choose.
Be conversational but concise.
Current context: ${rendered}`;
}

/**
 * Recap prompt used to pick a paused conversation back up
 */
export function resumePrompt(task: string, context: ConversationContext, last: LLMMessage | undefined): string {
    const previous = last ? `${last.role}: ${last.content}` : 'Starting fresh';
    return `Resuming our previous conversation about ${task}.
Context: ${JSON.stringify(context)}
Previous interaction: ${previous}

Please continue where we left off.`;
}
