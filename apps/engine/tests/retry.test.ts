/**
 * Tests for retry.ts
 */

import { AuthError, BestEffortError, TerminalError, TransientError, ValidationError } from '../src/errors';
import { RetryPolicy } from '../src/pipeline/retry';
import { recordingSleep } from './helpers';

function failing(times: number, error: () => unknown) {
    let calls = 0;
    const operation = async (): Promise<string> => {
        calls++;
        if (calls <= times) {
            throw error();
        }
        return 'ok';
    };
    return { operation, calls: () => calls };
}

describe('RetryPolicy', () => {
    it('should retry transient failures on the 60s/300s schedule', async () => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(2, () => new Error('socket hang up'));

        await expect(policy.execute('test call', op.operation)).resolves.toBe('ok');
        expect(op.calls()).toBe(3);
        expect(delays).toEqual([60_000, 300_000]);
    });

    it('should raise the final error after 3 attempts', async () => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(5, () => new Error('upstream unavailable'));

        await expect(policy.execute('test call', op.operation)).rejects.toBeInstanceOf(TransientError);
        expect(op.calls()).toBe(3);
        expect(delays).toEqual([60_000, 300_000]);
    });

    it('should not retry an HTTP 401', async () => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(1, () => Object.assign(new Error('Unauthorized'), { status: 401 }));

        await expect(policy.execute('test call', op.operation)).rejects.toBeInstanceOf(AuthError);
        expect(op.calls()).toBe(1);
        expect(delays).toEqual([]);
    });

    it('should not retry an invalid API key message', async () => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(1, () => new Error('Invalid API key provided'));

        await expect(policy.execute('test call', op.operation)).rejects.toBeInstanceOf(AuthError);
        expect(delays).toEqual([]);
    });

    it('should not retry validation errors', async () => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(1, () => new ValidationError('malformed', ['Invalid JSON']));

        await expect(policy.execute('test call', op.operation)).rejects.toBeInstanceOf(ValidationError);
        expect(op.calls()).toBe(1);
        expect(delays).toEqual([]);
    });

    it('should honour a Retry-After hint on 429', async () => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(1, () => Object.assign(new Error('Too Many Requests'), {
            status: 429,
            headers: { 'retry-after': '7' },
        }));

        await expect(policy.execute('test call', op.operation)).resolves.toBe('ok');
        expect(delays).toEqual([7_000]);
    });

    it('should fall back to the schedule on 429 without a hint', async () => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(1, () => ({ response: { status: 429, headers: {} }, message: 'rate limited' }));

        await expect(policy.execute('test call', op.operation)).resolves.toBe('ok');
        expect(delays).toEqual([60_000]);
    });

    it('should repeat the last delay when attempts outrun the schedule', () => {
        const policy = new RetryPolicy({ maxAttempts: 5, delaysMs: [10, 20] });

        expect(policy.delayAfter(1)).toBe(10);
        expect(policy.delayAfter(2)).toBe(20);
        expect(policy.delayAfter(4)).toBe(20);
    });

    it.each([
        ['terminal', () => new TerminalError('post rejected')],
        ['best_effort', () => new BestEffortError('no image')],
    ])('should not retry %s errors', async (kind, error) => {
        const { delays, sleep } = recordingSleep();
        const policy = new RetryPolicy({ sleep });
        const op = failing(1, error);

        await expect(policy.execute('test call', op.operation)).rejects.toMatchObject({ kind });
        expect(op.calls()).toBe(1);
        expect(delays).toEqual([]);
    });
});
