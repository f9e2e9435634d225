import { randomUUID } from 'node:crypto';

import { WeatherExtractor } from '../extractor/WeatherExtractor.ts';
import { RetryPolicy } from '../extractor/RetryPolicy.ts';
import { QualityGate } from '../quality/QualityGate.ts';
import { OpenMeteoSource } from '../source/OpenMeteoSource.ts';
import { StoreWriter } from '../store/StoreWriter.ts';
import { WeatherTransformer } from '../transformer/WeatherTransformer.ts';
import { createLogger } from '../utils/Logger.ts';

import type { AppConfig } from '../config/Config.ts';
import type { WarehouseStore } from '../db/WarehouseClient.ts';
import type { AcquisitionError, TransformError } from '../errors/PipelineErrors.ts';
import type { Extraction, Location } from '../model/Models.ts';
import type { RejectedFact } from '../quality/QualityGate.ts';
import type { WeatherSource } from '../source/OpenMeteoSource.ts';
import type { StoreReport } from '../store/StoreWriter.ts';
import type { Logger } from 'pino';

export type RunStatus = 'succeeded' | 'no_new_data' | 'aborted' | 'failed';

export interface RunSummary {
    runId: string;
    startedAt: string;
    finishedAt: string;
    status: RunStatus;
    failureReasons: string[];
    locations: number;
    extractions: Extraction[];
    acquisitionFailures: AcquisitionError[];
    transformFailures: TransformError[];
    accepted: number;
    rejected: RejectedFact[];
    store: StoreReport | null;
}

export interface PipelineComponents {
    locations: readonly Location[];
    extractor: WeatherExtractor;
    transformer: WeatherTransformer;
    qualityGate: QualityGate;
    storeWriter: StoreWriter;
    now?: () => Date;
}

export interface PipelineOverrides {
    source?: WeatherSource;
    now?: () => Date;
    sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
    random?: () => number;
}

/**
 * One bounded run: extract → transform → quality gate → store.
 * Per-location and per-record problems end up in the summary; only a total
 * acquisition failure or a failed historical/warehouse load fails the run.
 */
export class WeatherPipeline {
    private components: PipelineComponents;
    private now: () => Date;
    private logger: Logger;

    constructor(components: PipelineComponents) {
        this.components = components;
        this.now = components.now ?? (() => new Date());
        this.logger = createLogger('WeatherPipeline');
    }

    static fromConfig(config: AppConfig, warehouse: WarehouseStore, overrides: PipelineOverrides = {}): WeatherPipeline {
        const source = overrides.source ?? new OpenMeteoSource(config.api.baseUrl, config.api.params);
        const policy = new RetryPolicy(config.retry, overrides.random);
        const extractor = new WeatherExtractor(
            source,
            policy,
            { concurrency: config.api.concurrency, timeBucketMinutes: config.api.timeBucketMinutes },
            { now: overrides.now, sleep: overrides.sleep }
        );

        return new WeatherPipeline({
            locations: config.locations,
            extractor,
            transformer: new WeatherTransformer(config.api.sourceVersion, overrides.now),
            qualityGate: new QualityGate(config.quality),
            storeWriter: StoreWriter.fromConfig(config.storage, warehouse),
            now: overrides.now,
        });
    }

    async run(signal?: AbortSignal): Promise<RunSummary> {
        const { locations, extractor, transformer, qualityGate, storeWriter } = this.components;
        const summary: RunSummary = {
            runId: randomUUID(),
            startedAt: this.now().toISOString(),
            finishedAt: '',
            status: 'succeeded',
            failureReasons: [],
            locations: locations.length,
            extractions: [],
            acquisitionFailures: [],
            transformFailures: [],
            accepted: 0,
            rejected: [],
            store: null,
        };
        this.logger.info({ runId: summary.runId, locations: locations.length }, 'Starting pipeline run');

        const extracted = await extractor.extractAll(locations, signal);
        summary.extractions = extracted.extractions;
        summary.acquisitionFailures = extracted.failures;

        if (signal?.aborted) {
            return this.finish(summary, 'aborted', ['Run aborted before storage']);
        }
        if (locations.length > 0 && extracted.payloads.length === 0) {
            return this.finish(summary, 'failed', [`Acquisition failed for all ${locations.length} locations`]);
        }

        const transformed = transformer.transformAll(extracted.payloads, locations);
        summary.transformFailures = transformed.failures;

        const quality = qualityGate.validate(transformed.facts);
        summary.accepted = quality.accepted.length;
        summary.rejected = quality.rejected;

        if (signal?.aborted) {
            return this.finish(summary, 'aborted', ['Run aborted before storage']);
        }

        // from here on the run is not cancellable
        const store = await storeWriter.write(extracted.payloads, quality.accepted);
        summary.store = store;

        const reasons: string[] = [];
        if (quality.accepted.length > 0) {
            for (const step of store.steps) {
                if ((step.step === 'historical' || step.step === 'warehouse') && step.status !== 'completed') {
                    reasons.push(step.error?.message ?? `Store step '${step.step}' ${step.status}`);
                }
            }
        }
        if (reasons.length > 0) {
            return this.finish(summary, 'failed', reasons);
        }
        return this.finish(summary, quality.accepted.length === 0 ? 'no_new_data' : 'succeeded', []);
    }

    private finish(summary: RunSummary, status: RunStatus, reasons: string[]): RunSummary {
        summary.status = status;
        summary.failureReasons = reasons;
        summary.finishedAt = this.now().toISOString();

        const counts = {
            runId: summary.runId,
            status,
            locations: summary.locations,
            acquisitionFailures: summary.acquisitionFailures.length,
            transformFailures: summary.transformFailures.length,
            accepted: summary.accepted,
            rejected: summary.rejected.length,
            steps: summary.store?.steps.map((s) => `${s.step}:${s.status}`) ?? [],
        };
        if (status === 'failed' || status === 'aborted') {
            this.logger.error({ ...counts, reasons }, 'Pipeline run did not complete');
        } else if (status === 'no_new_data') {
            this.logger.warn(counts, 'Pipeline run finished with nothing new to load');
        } else {
            this.logger.info(counts, 'Pipeline run finished');
        }
        return summary;
    }
}

/**
 * Short human-readable line for alerts.
 */
export function formatRunAlert(summary: RunSummary): string {
    const reasons = summary.failureReasons.join('; ') || 'unknown reason';
    return `weather-facts-etl run ${summary.runId} ${summary.status}: ${reasons} ` +
        `(acquisition failures ${summary.acquisitionFailures.length}/${summary.locations}, ` +
        `accepted ${summary.accepted}, rejected ${summary.rejected.length})`;
}
