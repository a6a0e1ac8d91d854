import { describe, it, expect } from 'vitest';
import { TwitterServiceError, classifyStatus } from './client.js';

describe('workflows/twitter/client', () => {

    it('classifies HTTP statuses', (): void => {
        expect(classifyStatus(401)).toBe('unauthenticated');
        expect(classifyStatus(403)).toBe('forbidden');
        expect(classifyStatus(429)).toBe('failure');
        expect(classifyStatus(503)).toBe('failure');
        expect(classifyStatus(undefined)).toBe('failure');
    });

    it('carries kind and status on service errors', (): void => {
        const err = new TwitterServiceError('forbidden', 'Forbidden', 403);
        expect(err).toMatchObject({ kind: 'forbidden', status: 403, code: 'TWITTER_SERVICE_ERROR', name: 'TwitterServiceError' });
    });
});
