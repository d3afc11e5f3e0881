/**
 * Retry Policy
 *
 * Wraps calls to generative, image and publishing APIs. Delays escalate in
 * fixed steps of 1, 5 and 10 minutes; a Retry-After hint takes precedence.
 * Auth, validation and configuration failures are raised on the first attempt.
 */

import { EngineError, TransientError, classifyError } from '../errors';
import { createLogger } from '../logger';

const logger = createLogger('retry');

export type Sleep = (ms: number) => Promise<void>;

export const DEFAULT_DELAYS_MS: readonly number[] = [60_000, 300_000, 600_000];

export const realSleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms));

export interface RetryOptions {
    maxAttempts?: number;
    delaysMs?: readonly number[];
    sleep?: Sleep;
}

function isRetryable(error: EngineError): boolean {
    return error.kind === 'transient';
}

export class RetryPolicy {
    readonly maxAttempts: number;
    readonly delaysMs: readonly number[];
    private readonly sleep: Sleep;

    constructor(options: RetryOptions = {}) {
        this.maxAttempts = options.maxAttempts ?? 3;
        this.delaysMs = options.delaysMs ?? DEFAULT_DELAYS_MS;
        this.sleep = options.sleep ?? realSleep;
    }

    /**
     * Delay before attempt `attempt + 1`; the last step repeats if the schedule is short
     */
    delayAfter(attempt: number): number {
        const index = Math.min(attempt - 1, this.delaysMs.length - 1);
        return this.delaysMs[index] ?? 0;
    }

    /**
     * Run an operation, retrying transient failures on the delay schedule
     */
    async execute<T>(label: string, operation: () => Promise<T>): Promise<T> {
        for (let attempt = 1; ; attempt++) {
            try {
                return await operation();
            } catch (raw) {
                const error = classifyError(raw, label);

                if (!isRetryable(error)) {
                    logger.error('Non-retryable failure', { label, kind: error.kind, error: error.message });
                    throw error;
                }

                if (attempt >= this.maxAttempts) {
                    logger.error('Retries exhausted', { label, attempts: attempt, error: error.message });
                    throw error;
                }

                const delay = error instanceof TransientError && error.retryAfterMs !== undefined
                    ? error.retryAfterMs
                    : this.delayAfter(attempt);

                logger.warn('Call failed, retrying', {
                    label,
                    attempt,
                    maxAttempts: this.maxAttempts,
                    delayMs: delay,
                    error: error.message,
                });
                await this.sleep(delay);
            }
        }
    }
}

export default RetryPolicy;
