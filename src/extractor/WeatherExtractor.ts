import { setTimeout as delay } from 'node:timers/promises';

import { AcquisitionError, describeError } from '../errors/PipelineErrors.ts';
import { HttpStatusError } from '../source/OpenMeteoSource.ts';
import { isRecord } from '../utils/Guards.ts';
import { createLogger } from '../utils/Logger.ts';
import { parseUtcTimestamp } from '../utils/Time.ts';
import { mapWithConcurrency } from '../utils/WorkerPool.ts';
import { computeExtractionId } from './ExtractionId.ts';
import { RetryPolicy } from './RetryPolicy.ts';

import type { Extraction, Location, RawPayload } from '../model/Models.ts';
import type { WeatherSource } from '../source/OpenMeteoSource.ts';
import type { Logger } from 'pino';

export type AcquisitionOutcome =
    | { ok: true; extraction: Extraction; payload: RawPayload }
    | { ok: false; extraction: Extraction; error: AcquisitionError };

export interface ExtractionResult {
    payloads: RawPayload[];
    failures: AcquisitionError[];
    extractions: Extraction[];
}

export interface ExtractorOptions {
    concurrency: number;
    timeBucketMinutes: number;
}

export interface ExtractorDeps {
    now?: () => Date;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

const defaultSleep = (ms: number, signal?: AbortSignal): Promise<void> => delay(ms, undefined, { signal });

/**
 * Reads `current.time` from an API body, if present and parseable.
 */
export function readObservationTime(body: unknown): Date | null {
    if (!isRecord(body) || !isRecord(body.current)) return null;
    return parseUtcTimestamp(body.current.time);
}

/**
 * Acquires one observation per location, with retries and per-location isolation.
 */
export class WeatherExtractor {
    private logger: Logger;
    private source: WeatherSource;
    private policy: RetryPolicy;
    private options: ExtractorOptions;
    private now: () => Date;
    private sleep: (ms: number, signal?: AbortSignal) => Promise<void>;

    constructor(
        source: WeatherSource,
        policy: RetryPolicy,
        options: ExtractorOptions,
        deps: ExtractorDeps = {}
    ) {
        this.logger = createLogger('WeatherExtractor');
        this.source = source;
        this.policy = policy;
        this.options = options;
        this.now = deps.now ?? (() => new Date());
        this.sleep = deps.sleep ?? defaultSleep;
    }

    /**
     * Fetches every location through a bounded pool. Never throws for a single
     * location; failures are collected next to the payloads.
     */
    async extractAll(locations: readonly Location[], signal?: AbortSignal): Promise<ExtractionResult> {
        this.logger.info(`Extracting ${locations.length} locations (concurrency ${this.options.concurrency})`);

        const outcomes = await mapWithConcurrency(locations, this.options.concurrency, (location) =>
            this.fetch(location, signal)
        );

        const result: ExtractionResult = { payloads: [], failures: [], extractions: [] };
        for (const outcome of outcomes) {
            result.extractions.push(outcome.extraction);
            if (outcome.ok) {
                result.payloads.push(outcome.payload);
            } else {
                result.failures.push(outcome.error);
            }
        }

        this.logger.info(
            `Extraction complete: ${result.payloads.length} succeeded, ${result.failures.length} failed`
        );
        return result;
    }

    async fetch(location: Location, signal?: AbortSignal): Promise<AcquisitionOutcome> {
        const extraction: Extraction = {
            extractionId: null,
            locationId: location.id,
            requestedAt: this.now().toISOString(),
            attemptCount: 0,
            status: 'pending',
        };
        let waitedMs = 0;

        while (true) {
            if (signal?.aborted) {
                return this.fail(extraction, 'Extraction aborted before completion', false);
            }

            extraction.attemptCount++;
            let lastError: unknown;
            try {
                const body = await this.source.fetchCurrent(location, { timeoutMs: this.policy.timeoutMs, signal });
                return this.succeed(extraction, location, body);
            } catch (err) {
                lastError = err;
            }

            const status = lastError instanceof HttpStatusError ? lastError.status : null;
            const nextDelay = signal?.aborted ? null : this.policy.nextDelay(extraction.attemptCount, waitedMs, lastError);
            if (nextDelay === null) {
                return this.fail(
                    extraction,
                    `Acquisition failed for ${location.id} after ${extraction.attemptCount} attempt(s): ${describeError(lastError)}`,
                    this.policy.isRetryable(lastError),
                    status,
                    lastError
                );
            }

            this.logger.warn(
                { locationId: location.id, attempt: extraction.attemptCount, delayMs: nextDelay, err: lastError },
                'Attempt failed, retrying'
            );
            try {
                await this.sleep(nextDelay, signal);
            } catch (err) {
                return this.fail(extraction, 'Extraction aborted during backoff', false, status, err);
            }
            waitedMs += nextDelay;
        }
    }

    private succeed(extraction: Extraction, location: Location, body: unknown): AcquisitionOutcome {
        const observedAt = readObservationTime(body) ?? new Date(extraction.requestedAt);
        const extractionId = computeExtractionId(location.id, observedAt, this.options.timeBucketMinutes);

        extraction.extractionId = extractionId;
        extraction.status = 'succeeded';
        this.logger.info({ locationId: location.id, extractionId, attempts: extraction.attemptCount }, 'Extraction succeeded');

        return {
            ok: true,
            extraction,
            payload: {
                extractionId,
                locationId: location.id,
                requestedAt: extraction.requestedAt,
                attemptCount: extraction.attemptCount,
                body,
            },
        };
    }

    private fail(
        extraction: Extraction,
        message: string,
        retryable: boolean,
        status: number | null = null,
        cause?: unknown
    ): AcquisitionOutcome {
        extraction.status = 'failed';
        const error = new AcquisitionError(
            message,
            { locationId: extraction.locationId, attempts: extraction.attemptCount, status, retryable },
            { cause }
        );
        this.logger.error({ locationId: extraction.locationId, attempts: extraction.attemptCount, err: cause }, message);
        return { ok: false, extraction, error };
    }
}
