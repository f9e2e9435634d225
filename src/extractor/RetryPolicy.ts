import { HttpStatusError, InvalidResponseError } from '../source/OpenMeteoSource.ts';

export interface RetryPolicyOptions {
    maxAttempts: number;
    baseDelayMs: number;
    maxDelayMs: number;
    jitterRatio: number;
    maxTotalWaitMs: number;
    timeoutMs: number;
}

const RETRYABLE_STATUSES = new Set([408, 429]);

/**
 * Exponential backoff with additive jitter, bounded by attempt count and total wait.
 */
export class RetryPolicy {
    readonly options: Readonly<RetryPolicyOptions>;
    private random: () => number;

    constructor(options: RetryPolicyOptions, random: () => number = Math.random) {
        this.options = Object.freeze({ ...options });
        this.random = random;
    }

    get timeoutMs(): number {
        return this.options.timeoutMs;
    }

    /**
     * Delay to wait after the given number of failed attempts.
     */
    backoffDelay(failedAttempts: number): number {
        const { baseDelayMs, maxDelayMs, jitterRatio } = this.options;
        const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** Math.max(0, failedAttempts - 1));
        const jitter = exponential * jitterRatio * this.random();
        return Math.round(Math.min(maxDelayMs, exponential + jitter));
    }

    isRetryable(err: unknown): boolean {
        if (err instanceof HttpStatusError) {
            return RETRYABLE_STATUSES.has(err.status) || err.status >= 500;
        }
        if (err instanceof InvalidResponseError) {
            return false;
        }
        // network failures and timeouts
        return true;
    }

    /**
     * Returns the delay before the next attempt, or null when the caller should give up.
     */
    nextDelay(failedAttempts: number, waitedMs: number, err: unknown): number | null {
        if (failedAttempts >= this.options.maxAttempts) return null;
        if (!this.isRetryable(err)) return null;

        const delay = this.backoffDelay(failedAttempts);
        if (waitedMs + delay > this.options.maxTotalWaitMs) return null;
        return delay;
    }
}
