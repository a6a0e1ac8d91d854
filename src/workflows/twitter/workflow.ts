import { z } from 'zod';
import type { Terminal } from '../../core/terminal.js';
import { LLMUnavailableError } from '../../errors.js';
import type { LLMBackend } from '../../llm/backend.js';
import { BaseWorkflow } from '../base.js';
import type { CommandParams, WorkflowDeps } from '../types.js';
import {
    TwitterServiceError,
    createTwitterClient,
    type Tweet,
    type TwitterClient,
    type TwitterClientFactory,
    type TwitterUser,
} from './client.js';
import { TwitterEnvironment } from './environment.js';

export const TWEET_LIMIT = 280;
const MENTIONS_PAGE = 10;

const postParams = z.object({
    content: z.string().trim().min(1, 'cannot be empty'),
});

const replyParams = z.object({
    mention_id: z.string().trim().min(1).optional(),
});

interface TwitterSession {
    client: TwitterClient;
    user: TwitterUser;
}

/**
 * Fit text into a single tweet, counting code points so emoji are never split
 */
export function truncateTweet(text: string): string {
    const chars = Array.from(text);
    return chars.length > TWEET_LIMIT ? `${chars.slice(0, TWEET_LIMIT - 3).join('')}...` : text;
}

export function formatMentions(mentions: readonly Tweet[]): string {
    const lines = ['Recent mentions:'];
    for (const mention of mentions) {
        lines.push('', `ID: ${mention.id}`, `Text: ${mention.text}`, `Time: ${mention.createdAt ?? 'unknown'}`, '-'.repeat(40));
    }
    return lines.join('\n');
}

function replyPrompt(text: string): string {
    return [
        'Generate a friendly and professional response to this tweet:',
        `Tweet: ${text}`,
        '',
        'Requirements:',
        `- Keep it under ${TWEET_LIMIT} characters`,
        '- Be helpful and positive',
        '- Maintain professional tone',
        '- Include relevant emojis if appropriate',
        "- Don't include quotes in the response",
    ].join('\n');
}

/**
 * Twitter/X — post tweets, read mentions, reply with generated text
 */
export class TwitterWorkflow extends BaseWorkflow<TwitterSession> {
    readonly description = 'Post and manage tweets';
    readonly env: TwitterEnvironment;
    private readonly llm: LLMBackend;
    private readonly terminal: Terminal;
    private readonly clientFactory: TwitterClientFactory;

    constructor(deps: WorkflowDeps, clientFactory: TwitterClientFactory = createTwitterClient) {
        super(deps.logger);
        this.llm = deps.llm;
        this.terminal = deps.terminal;
        this.clientFactory = clientFactory;
        this.env = new TwitterEnvironment({
            config: deps.config,
            llm: deps.llm,
            terminal: deps.terminal,
            logger: this.logger,
            clientFactory,
        });
    }

    protected registerCommands(): Record<string, string> {
        return {
            post: 'Post a new tweet',
            mentions: 'View recent mentions of your account',
            reply: 'Generate and post an AI response to a mention',
        };
    }

    getExampleCommands(): readonly string[] {
        return [
            "Post a tweet saying 'Hello, World!'",
            'Check my recent mentions',
            'Reply to latest mention',
            'Reply to mention id 1234567890',
        ];
    }

    validateEnvironment(): boolean {
        return this.env.checkConfigurationExists();
    }

    async configure(): Promise<boolean> {
        return this.env.configure();
    }

    // ─── Connection ───

    protected async connect(): Promise<TwitterSession> {
        const credentials = this.env.getCredentials();
        if (!credentials) {
            const { missing } = this.env.getCredentialStatus();
            throw new TwitterServiceError('unauthenticated', `Missing credentials: ${missing.join(', ')}`);
        }

        const client = this.clientFactory(credentials);
        const user = await client.getMe();
        this.logger.info(`Authenticated as @${user.username}`);
        return { client, user };
    }

    protected isRecoverable(error: unknown): boolean {
        return error instanceof TwitterServiceError && error.kind !== 'failure';
    }

    protected async reconfigure(cause: unknown): Promise<boolean> {
        if (cause instanceof TwitterServiceError && cause.kind === 'forbidden') {
            this.terminal.print("The app doesn't have sufficient permissions.");
            return this.env.fixWritePermissions();
        }
        this.terminal.print("Twitter authentication failed. Let's reconfigure your credentials.");
        return this.env.fixConfiguration();
    }

    // ─── Commands ───

    protected async runCommand(session: TwitterSession, command: string, params: CommandParams): Promise<string> {
        switch (command) {
            case 'post': {
                const { content } = this.parseParams(postParams, command, params);
                await session.client.createTweet(content);
                return `Successfully posted tweet: '${content}'`;
            }
            case 'mentions': {
                const mentions = await session.client.getMentions(session.user.id, MENTIONS_PAGE);
                if (mentions.length === 0) return 'No recent mentions found.';
                return formatMentions(mentions);
            }
            case 'reply': {
                const { mention_id } = this.parseParams(replyParams, command, params);
                return this.reply(session, mention_id);
            }
            default:
                throw new TwitterServiceError('failure', `Unhandled command: ${command}`);
        }
    }

    private async reply(session: TwitterSession, mentionId?: string): Promise<string> {
        let target: Tweet;
        if (mentionId) {
            const tweet = await session.client.getTweet(mentionId);
            if (!tweet) return `Could not find tweet with ID: ${mentionId}`;
            target = tweet;
        } else {
            const [latest] = await session.client.getMentions(session.user.id, 1);
            if (!latest) return 'No mentions found to reply to.';
            target = latest;
        }

        const text = await this.generateReply(target.text);
        await session.client.createTweet(text, target.id);
        return `Posted reply: '${text}'`;
    }

    private async generateReply(mentionText: string): Promise<string> {
        if (!this.llm.isConfigured()) {
            throw new LLMUnavailableError('LLM not configured. Cannot generate response.');
        }

        const response = await this.llm.complete(replyPrompt(mentionText));
        const text = response?.trim();
        if (!text) {
            throw new LLMUnavailableError('Failed to generate response');
        }
        return truncateTweet(text);
    }
}
