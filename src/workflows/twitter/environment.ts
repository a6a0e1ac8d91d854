import type { ConfigStore } from '../../config/store.js';
import type { Terminal } from '../../core/terminal.js';
import { errorMessage } from '../../errors.js';
import type { LLMBackend } from '../../llm/backend.js';
import type { Logger } from '../../logging/logger.js';
import type { TwitterClient, TwitterClientFactory, TwitterCredentials } from './client.js';

/** Variable name → what the user should paste */
export const REQUIRED_VARS = {
    TWITTER_API_KEY: 'Twitter API Key (Consumer Key)',
    TWITTER_API_SECRET: 'Twitter API Secret (Consumer Secret)',
    TWITTER_ACCESS_TOKEN: 'Twitter Access Token',
    TWITTER_ACCESS_TOKEN_SECRET: 'Twitter Access Token Secret',
} as const;

export type TwitterVariable = keyof typeof REQUIRED_VARS;

const VARIABLE_NAMES = Object.keys(REQUIRED_VARS).filter(
    (name): name is TwitterVariable => name in REQUIRED_VARS
);

export interface OAuthSetupStep {
    title: string;
    instructions: string;
    verification: string;
}

export const OAUTH_SETUP_STEPS: readonly OAuthSetupStep[] = [
    {
        title: 'Access Developer Portal',
        instructions: '1. Go to https://developer.twitter.com/portal/projects',
        verification: 'Are you on the developer portal?',
    },
    {
        title: 'Configure OAuth Settings',
        instructions: [
            '1. Select your app',
            "2. Go to 'Settings' > 'User authentication settings'",
            "3. Enable 'OAuth 1.0a'",
            "4. Set App permissions to 'Read and Write'",
            '5. Save changes',
        ].join('\n'),
        verification: 'Have you updated the OAuth settings?',
    },
    {
        title: 'Generate Tokens',
        instructions: [
            "1. Go to 'Keys and tokens' tab",
            '2. Generate new access tokens if needed',
            '3. Copy your tokens',
        ].join('\n'),
        verification: 'Do you have your tokens ready?',
    },
];

export interface CredentialStatus {
    complete: boolean;
    missing: TwitterVariable[];
    configured: TwitterVariable[];
}

export interface TwitterEnvironmentOptions {
    config: ConfigStore;
    llm: LLMBackend;
    terminal: Terminal;
    logger: Logger;
    clientFactory: TwitterClientFactory;
}

const PROBE_TWEET = 'Testing write permissions...';

/**
 * Twitter credentials: status, interactive entry and verification
 */
export class TwitterEnvironment {
    private readonly config: ConfigStore;
    private readonly llm: LLMBackend;
    private readonly terminal: Terminal;
    private readonly logger: Logger;
    private readonly clientFactory: TwitterClientFactory;

    constructor(options: TwitterEnvironmentOptions) {
        this.config = options.config;
        this.llm = options.llm;
        this.terminal = options.terminal;
        this.logger = options.logger;
        this.clientFactory = options.clientFactory;
    }

    // ─── Status ───

    getCredentialStatus(): CredentialStatus {
        const missing: TwitterVariable[] = [];
        const configured: TwitterVariable[] = [];
        for (const name of VARIABLE_NAMES) {
            if (this.config.get(name)) {
                configured.push(name);
            } else {
                missing.push(name);
            }
        }
        return { complete: missing.length === 0, missing, configured };
    }

    checkConfigurationExists(): boolean {
        return VARIABLE_NAMES.every((name) => Boolean(this.config.get(name)));
    }

    /**
     * The full credential set, or undefined while any part is missing
     */
    getCredentials(): TwitterCredentials | undefined {
        const apiKey = this.config.get('TWITTER_API_KEY');
        const apiSecret = this.config.get('TWITTER_API_SECRET');
        const accessToken = this.config.get('TWITTER_ACCESS_TOKEN');
        const accessTokenSecret = this.config.get('TWITTER_ACCESS_TOKEN_SECRET');
        if (!apiKey || !apiSecret || !accessToken || !accessTokenSecret) return undefined;
        return { apiKey, apiSecret, accessToken, accessTokenSecret };
    }

    // ─── Configuration ───

    /**
     * Walk the user through entering credentials, LLM-guided when possible
     */
    async configure(): Promise<boolean> {
        if (this.llm.isConfigured()) {
            return this.configureWithLLM();
        }
        return this.configureStandard();
    }

    /**
     * Prompt for one credential, showing a masked current value.
     * An empty answer keeps the current value; true when a new value was saved.
     */
    async handleCredential(name: TwitterVariable, description: string): Promise<boolean> {
        const current = this.config.get(name);
        const question = current ? `${description} [current: ${current.slice(0, 4)}...]: ` : `${description}: `;

        for (;;) {
            const answer = await this.terminal.ask(question);
            if (answer === null) return false;

            const value = answer.trim();
            if (value) {
                this.config.set(name, value);
                return true;
            }
            if (current) return false;
            this.terminal.print(`${description} cannot be empty. Please try again.`);
        }
    }

    private async configureWithLLM(): Promise<boolean> {
        this.llm.startConversation('twitter_setup', {
            status: this.getCredentialStatus(),
            oauth_steps: OAUTH_SETUP_STEPS,
        });

        let updated = false;
        try {
            for (const name of VARIABLE_NAMES) {
                const description = REQUIRED_VARS[name];
                const guidance = await this.llm.getCompletion(`Guide user for ${description}`);
                if (guidance) {
                    this.terminal.say(guidance);
                }
                if (await this.handleCredential(name, description)) {
                    updated = true;
                }
            }
        } finally {
            this.llm.endConversation();
        }

        return updated && this.verifyCredentials();
    }

    private async configureStandard(): Promise<boolean> {
        this.terminal.print('Configuring Twitter credentials:');
        for (const step of OAUTH_SETUP_STEPS) {
            this.terminal.print();
            this.terminal.print(step.title);
            this.terminal.print(step.instructions);
            if (!(await this.terminal.confirm(step.verification, true))) {
                return false;
            }
        }

        let updated = false;
        for (const name of VARIABLE_NAMES) {
            if (await this.handleCredential(name, REQUIRED_VARS[name])) {
                updated = true;
            }
        }

        return updated && this.verifyCredentials();
    }

    // ─── Verification ───

    /**
     * Authenticate, then prove the app can write; offers the permission fix on failure
     */
    async verifyCredentials(): Promise<boolean> {
        const client = await this.createClient();
        if (!client) {
            this.terminal.print('Failed to authenticate with Twitter.');
            return false;
        }
        this.terminal.print('✓ Basic authentication successful');

        if (await this.verifyPermissions(client)) {
            this.terminal.print('✓ Write permissions verified');
            return true;
        }

        this.terminal.print('Write permissions test failed.');
        if (await this.terminal.confirm('Would you like to fix OAuth settings?', true)) {
            return this.fixWritePermissions();
        }
        return false;
    }

    /**
     * Identity check, plus a probe tweet that is deleted again when `testWrite`
     */
    async verifyPermissions(client: TwitterClient, testWrite = true): Promise<boolean> {
        try {
            await client.getMe();
            if (!testWrite) return true;

            const probe = await client.createTweet(PROBE_TWEET);
            await client.deleteTweet(probe.id);
            return true;
        } catch (err) {
            this.logger.debug(`Permission check failed: ${errorMessage(err)}`);
            return false;
        }
    }

    /**
     * Re-check the stored credentials and repair whatever is wrong
     */
    async fixConfiguration(): Promise<boolean> {
        const client = await this.createClient();
        if (!client) {
            this.terminal.print("Credentials are invalid. Let's reconfigure.");
            return this.configure();
        }

        if (!(await this.verifyPermissions(client))) {
            this.terminal.print('Write permissions need to be configured.');
            return this.fixWritePermissions();
        }
        return true;
    }

    async fixWritePermissions(): Promise<boolean> {
        const oauthStep = OAUTH_SETUP_STEPS.find((step) => step.title === 'Configure OAuth Settings');
        if (oauthStep) {
            this.terminal.print(oauthStep.instructions);
        }

        if (await this.terminal.confirm('Would you like to generate new access tokens?', false)) {
            return this.configureStandard();
        }
        return this.verifyCredentials();
    }

    /**
     * A client for the stored credentials that has answered getMe, or null
     */
    private async createClient(): Promise<TwitterClient | null> {
        const credentials = this.getCredentials();
        if (!credentials) return null;

        try {
            const client = this.clientFactory(credentials);
            await client.getMe();
            return client;
        } catch (err) {
            this.logger.debug(`Twitter authentication failed: ${errorMessage(err)}`);
            return null;
        }
    }
}
