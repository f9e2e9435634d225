import { describe, test, expect } from 'vitest';

import { RetryPolicy } from '../RetryPolicy.ts';
import { HttpStatusError, InvalidResponseError, RequestTimeoutError } from '../../source/OpenMeteoSource.ts';

const OPTIONS = {
    maxAttempts: 3,
    baseDelayMs: 1_000,
    maxDelayMs: 30_000,
    jitterRatio: 0.2,
    maxTotalWaitMs: 60_000,
    timeoutMs: 15_000,
};

describe('RetryPolicy', () => {
    test('backoff doubles per attempt and adds jitter', () => {
        const policy = new RetryPolicy(OPTIONS, () => 0.5);
        expect(policy.backoffDelay(1)).toBe(1_100);
        expect(policy.backoffDelay(2)).toBe(2_200);
        expect(policy.backoffDelay(3)).toBe(4_400);
    });

    test('backoff never exceeds maxDelayMs', () => {
        const policy = new RetryPolicy({ ...OPTIONS, maxDelayMs: 3_000 }, () => 0.5);
        expect(policy.backoffDelay(3)).toBe(3_000);
        expect(policy.backoffDelay(10)).toBe(3_000);
    });

    test('classifies errors', () => {
        const policy = new RetryPolicy(OPTIONS);
        expect(policy.isRetryable(new HttpStatusError(503, 'Service Unavailable', ''))).toBe(true);
        expect(policy.isRetryable(new HttpStatusError(429, 'Too Many Requests', ''))).toBe(true);
        expect(policy.isRetryable(new HttpStatusError(408, 'Request Timeout', ''))).toBe(true);
        expect(policy.isRetryable(new HttpStatusError(404, 'Not Found', ''))).toBe(false);
        expect(policy.isRetryable(new HttpStatusError(400, 'Bad Request', ''))).toBe(false);
        expect(policy.isRetryable(new InvalidResponseError('not json'))).toBe(false);
        expect(policy.isRetryable(new RequestTimeoutError(15_000))).toBe(true);
        expect(policy.isRetryable(new TypeError('fetch failed'))).toBe(true);
    });

    test('nextDelay gives up when attempts, retryability or total wait run out', () => {
        const policy = new RetryPolicy(OPTIONS, () => 0.5);
        const timeout = new RequestTimeoutError(15_000);

        expect(policy.nextDelay(1, 0, timeout)).toBe(1_100);
        expect(policy.nextDelay(3, 0, timeout)).toBeNull();
        expect(policy.nextDelay(1, 0, new HttpStatusError(404, 'Not Found', ''))).toBeNull();
        expect(policy.nextDelay(2, 59_000, timeout)).toBeNull();
    });
});
