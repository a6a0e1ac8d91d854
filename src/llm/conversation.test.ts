import { describe, it, expect } from 'vitest';
import { Conversation } from './conversation.js';

describe('llm/Conversation', () => {

    it('starts idle and ignores turns until started', (): void => {
        const conversation = new Conversation();
        conversation.add('user', 'hello?');

        expect(conversation.isActive).toBe(false);
        expect(conversation.snapshot()).toEqual({ status: 'idle' });
        expect(conversation.history).toEqual([]);
    });

    it('records turns while active', (): void => {
        const conversation = new Conversation();
        conversation.start('troubleshooting', { error: 'boom' });
        conversation.add('user', 'help');
        conversation.add('assistant', 'sure');

        expect(conversation.snapshot()).toEqual({
            status: 'active',
            task: 'troubleshooting',
            context: { error: 'boom' },
            history: [
                { role: 'user', content: 'help' },
                { role: 'assistant', content: 'sure' },
            ],
        });
    });

    it('resets history and context when started again', (): void => {
        const conversation = new Conversation();
        conversation.start('first', { a: 1 });
        conversation.add('user', 'one');
        conversation.start('second', { b: 2 });

        expect(conversation.active?.task).toBe('second');
        expect(conversation.active?.context).toEqual({ b: 2 });
        expect(conversation.history).toEqual([]);
    });

    it('pauses without dropping anything', (): void => {
        const conversation = new Conversation();
        conversation.start('troubleshooting', {});
        conversation.add('user', 'one');
        conversation.pause();

        expect(conversation.isActive).toBe(true);
        expect(conversation.active?.pausedAt).toBe(1);
        expect(conversation.history).toHaveLength(1);
    });

    it('ends back to idle', (): void => {
        const conversation = new Conversation();
        conversation.start('troubleshooting', {});
        conversation.add('user', 'one');
        conversation.end();
        conversation.pause();

        expect(conversation.snapshot()).toEqual({ status: 'idle' });
    });

    it('hands out copies', (): void => {
        const conversation = new Conversation();
        conversation.start('troubleshooting', {});
        conversation.add('user', 'one');

        const snapshot = conversation.snapshot();
        if (snapshot.status === 'active') snapshot.history.push({ role: 'user', content: 'two' });
        conversation.history.push({ role: 'user', content: 'three' });

        expect(conversation.history).toEqual([{ role: 'user', content: 'one' }]);
    });
});
