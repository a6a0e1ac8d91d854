import type {
    ActiveConversation,
    ChatRole,
    ConversationContext,
    ConversationState,
    LLMMessage,
} from './types.js';

/**
 * Conversation state machine — Idle or Active{task, context, history}
 *
 * History exists only while active. Starting again resets history and
 * replaces the context; pausing only marks the current history length.
 */
export class Conversation {
    private state: ConversationState = { status: 'idle' };

    /**
     * Begin a new conversation, discarding any previous one
     */
    start(task: string, context: ConversationContext): void {
        this.state = {
            status: 'active',
            task,
            context: { ...context },
            history: [],
        };
    }

    /**
     * Mark where the conversation was paused; stays active
     */
    pause(): void {
        if (this.state.status !== 'active') return;
        this.state = { ...this.state, pausedAt: this.state.history.length };
    }

    /**
     * Return to idle, dropping task, context and history
     */
    end(): void {
        this.state = { status: 'idle' };
    }

    /**
     * Append a turn; ignored while idle
     */
    add(role: ChatRole, content: string): void {
        if (this.state.status !== 'active') return;
        this.state.history.push({ role, content });
    }

    get isActive(): boolean {
        return this.state.status === 'active';
    }

    /**
     * The active conversation, or undefined while idle
     */
    get active(): Readonly<ActiveConversation> | undefined {
        return this.state.status === 'active' ? this.state : undefined;
    }

    /**
     * Copy of the current state
     */
    snapshot(): ConversationState {
        if (this.state.status === 'idle') return { status: 'idle' };
        return {
            ...this.state,
            context: { ...this.state.context },
            history: this.state.history.map((m) => ({ ...m })),
        };
    }

    get history(): LLMMessage[] {
        return this.state.status === 'active' ? [...this.state.history] : [];
    }
}
