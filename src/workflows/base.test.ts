import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
    InvalidParametersError,
    UnknownCommandError,
    WorkflowExecutionFailedError,
} from '../errors.js';
import { BaseWorkflow, deriveWorkflowName } from './base.js';
import type { CommandParams } from './types.js';

class ExpiredCredentials extends Error {}

class ProbeWorkflow extends BaseWorkflow<string> {
    readonly description = 'Probe service';
    connectCalls = 0;
    reconfigureCalls = 0;
    connectScript: (string | Error)[] = [];
    runScript: (string | Error)[] = [];
    reconfigureOutcome: boolean | Error = true;

    constructor() {
        super();
    }

    protected registerCommands(): Record<string, string> {
        return { ping: 'Ping the service', echo: 'Echo text back' };
    }

    validateEnvironment(): boolean {
        return true;
    }

    getExampleCommands(): readonly string[] {
        return ['ping'];
    }

    protected async connect(): Promise<string> {
        this.connectCalls++;
        const next = this.connectScript.shift() ?? `conn-${this.connectCalls}`;
        if (next instanceof Error) throw next;
        return next;
    }

    protected isRecoverable(error: unknown): boolean {
        return error instanceof ExpiredCredentials;
    }

    protected async reconfigure(): Promise<boolean> {
        this.reconfigureCalls++;
        if (this.reconfigureOutcome instanceof Error) throw this.reconfigureOutcome;
        return this.reconfigureOutcome;
    }

    protected async runCommand(connection: string, command: string, params: CommandParams): Promise<string> {
        if (command === 'echo') {
            const { text } = this.parseParams(z.object({ text: z.string() }), command, params);
            return text;
        }
        const next = this.runScript.shift() ?? 'pong';
        if (next instanceof Error) throw next;
        return `${next} via ${connection}`;
    }
}

async function rejection(promise: Promise<unknown>): Promise<unknown> {
    try {
        await promise;
    } catch (err) {
        return err;
    }
    throw new Error('expected the promise to reject');
}

describe('workflows/BaseWorkflow', () => {

    it('derives its name from the class name', (): void => {
        expect(deriveWorkflowName('TwitterWorkflow')).toBe('twitter');
        expect(new ProbeWorkflow().name).toBe('probe');
    });

    it('registers a frozen command map once', (): void => {
        const workflow = new ProbeWorkflow();
        expect(workflow.getCommands()).toEqual({ ping: 'Ping the service', echo: 'Echo text back' });
        expect(Object.isFrozen(workflow.getCommands())).toBe(true);
    });

    it('rejects unknown commands without connecting', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        await expect(workflow.executeCommand('dance')).rejects.toBeInstanceOf(UnknownCommandError);
        expect(workflow.connectCalls).toBe(0);
    });

    it('connects lazily and reuses the connection', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        expect(workflow.connectCalls).toBe(0);

        await expect(workflow.executeCommand('ping')).resolves.toBe('pong via conn-1');
        await expect(workflow.executeCommand('ping')).resolves.toBe('pong via conn-1');
        expect(workflow.connectCalls).toBe(1);
    });

    it('reconfigures once and retries after a recoverable connect failure', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        workflow.connectScript = [new ExpiredCredentials('token expired')];

        await expect(workflow.executeCommand('ping')).resolves.toBe('pong via conn-2');
        expect(workflow.reconfigureCalls).toBe(1);
        expect(workflow.connectCalls).toBe(2);
    });

    it('gives up after a second failure, having connected exactly twice', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        const second = new ExpiredCredentials('still expired');
        workflow.connectScript = [new ExpiredCredentials('token expired'), second];

        const err = await rejection(workflow.executeCommand('ping'));
        expect(err).toBeInstanceOf(WorkflowExecutionFailedError);
        expect(err).toMatchObject({
            message: "Still unable to run 'ping' on probe after reconfiguration: still expired",
            workflow: 'probe',
            command: 'ping',
            cause: second,
        });
        expect(workflow.connectCalls).toBe(2);
        expect(workflow.reconfigureCalls).toBe(1);
    });

    it('drops the connection when a command fails recoverably', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        workflow.runScript = [new ExpiredCredentials('revoked')];

        await expect(workflow.executeCommand('ping')).resolves.toBe('pong via conn-2');
        expect(workflow.connectCalls).toBe(2);
    });

    it('does not retry non-recoverable failures', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        const boom = new Error('boom');
        workflow.connectScript = [boom];

        const err = await rejection(workflow.executeCommand('ping'));
        expect(err).toMatchObject({ message: "Failed to run 'ping' on probe: boom", cause: boom });
        expect(workflow.reconfigureCalls).toBe(0);
    });

    it('fails when reconfiguration does not complete', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        workflow.connectScript = [new ExpiredCredentials('token expired')];
        workflow.reconfigureOutcome = false;

        await expect(workflow.executeCommand('ping')).rejects.toThrow(
            'Failed to configure probe access. Please try again later.'
        );
        expect(workflow.connectCalls).toBe(1);
    });

    it('wraps an error thrown while reconfiguring', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();
        workflow.connectScript = [new ExpiredCredentials('token expired')];
        workflow.reconfigureOutcome = new Error('input closed');

        await expect(workflow.executeCommand('ping')).rejects.toThrow(
            "Still unable to run 'ping' on probe after reconfiguration: input closed"
        );
    });

    it('validates parameters and surfaces them as user errors', async (): Promise<void> => {
        const workflow = new ProbeWorkflow();

        await expect(workflow.executeCommand('echo', { text: 'hi' })).resolves.toBe('hi');

        const err = await rejection(workflow.executeCommand('echo', {}));
        expect(err).toBeInstanceOf(InvalidParametersError);
        expect(err).toMatchObject({ message: 'Invalid parameters for probe echo: text: Required' });
        expect(workflow.reconfigureCalls).toBe(0);
    });
});
