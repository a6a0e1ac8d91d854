import { ApiResponseError, TwitterApi } from 'twitter-api-v2';
import { MentatError, errorMessage } from '../../errors.js';

export interface TwitterCredentials {
    apiKey: string;
    apiSecret: string;
    accessToken: string;
    accessTokenSecret: string;
}

export interface TwitterUser {
    id: string;
    username: string;
    name: string;
}

export interface Tweet {
    id: string;
    text: string;
    createdAt?: string;
}

/**
 * The slice of the X/Twitter API the workflow uses
 */
export interface TwitterClient {
    getMe(): Promise<TwitterUser>;
    createTweet(text: string, inReplyTo?: string): Promise<Tweet>;
    deleteTweet(id: string): Promise<void>;
    /** Most recent first */
    getMentions(userId: string, maxResults: number): Promise<Tweet[]>;
    /** null when the tweet does not exist */
    getTweet(id: string): Promise<Tweet | null>;
}

export type TwitterClientFactory = (credentials: TwitterCredentials) => TwitterClient;

export type TwitterErrorKind = 'unauthenticated' | 'forbidden' | 'failure';

export class TwitterServiceError extends MentatError {
    readonly kind: TwitterErrorKind;
    readonly status?: number;

    constructor(kind: TwitterErrorKind, message: string, status?: number, cause?: unknown) {
        super('TWITTER_SERVICE_ERROR', message, { cause });
        this.kind = kind;
        this.status = status;
    }
}

export function classifyStatus(status: number | undefined): TwitterErrorKind {
    if (status === 401) return 'unauthenticated';
    if (status === 403) return 'forbidden';
    return 'failure';
}

// The mention timeline endpoint rejects max_results outside 5..100
const MIN_PAGE = 5;
const MAX_PAGE = 100;

/**
 * TwitterClient backed by twitter-api-v2 (OAuth 1.0a user context)
 */
export class TwitterApiClient implements TwitterClient {
    private readonly api: TwitterApi;

    constructor(credentials: TwitterCredentials) {
        this.api = new TwitterApi({
            appKey: credentials.apiKey,
            appSecret: credentials.apiSecret,
            accessToken: credentials.accessToken,
            accessSecret: credentials.accessTokenSecret,
        });
    }

    async getMe(): Promise<TwitterUser> {
        return this.call(async () => {
            const { data } = await this.api.v2.me();
            return { id: data.id, username: data.username, name: data.name };
        });
    }

    async createTweet(text: string, inReplyTo?: string): Promise<Tweet> {
        return this.call(async () => {
            const { data } = inReplyTo
                ? await this.api.v2.tweet(text, { reply: { in_reply_to_tweet_id: inReplyTo } })
                : await this.api.v2.tweet(text);
            return { id: data.id, text: data.text };
        });
    }

    async deleteTweet(id: string): Promise<void> {
        await this.call(() => this.api.v2.deleteTweet(id));
    }

    async getMentions(userId: string, maxResults: number): Promise<Tweet[]> {
        return this.call(async () => {
            const timeline = await this.api.v2.userMentionTimeline(userId, {
                max_results: Math.min(Math.max(maxResults, MIN_PAGE), MAX_PAGE),
                'tweet.fields': ['created_at', 'author_id', 'text'],
            });
            return timeline.tweets.slice(0, maxResults).map((t) => ({
                id: t.id,
                text: t.text,
                createdAt: t.created_at,
            }));
        });
    }

    async getTweet(id: string): Promise<Tweet | null> {
        try {
            const result = await this.api.v2.singleTweet(id, { 'tweet.fields': ['created_at'] });
            if (!result.data) return null;
            return { id: result.data.id, text: result.data.text, createdAt: result.data.created_at };
        } catch (err) {
            if (err instanceof ApiResponseError && err.code === 404) return null;
            throw toServiceError(err);
        }
    }

    private async call<T>(request: () => Promise<T>): Promise<T> {
        try {
            return await request();
        } catch (err) {
            throw toServiceError(err);
        }
    }
}

export const createTwitterClient: TwitterClientFactory = (credentials) => new TwitterApiClient(credentials);

function toServiceError(err: unknown): TwitterServiceError {
    if (err instanceof TwitterServiceError) return err;
    if (err instanceof ApiResponseError) {
        return new TwitterServiceError(classifyStatus(err.code), err.message, err.code, err);
    }
    return new TwitterServiceError('failure', errorMessage(err), undefined, err);
}
