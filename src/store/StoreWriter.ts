import { join } from 'node:path';

import { StorageError, describeError } from '../errors/PipelineErrors.ts';
import { createLogger } from '../utils/Logger.ts';
import { CsvCodec } from './codecs/CsvCodec.ts';
import { ParquetCodec } from './codecs/ParquetCodec.ts';
import { factsToTable } from './FactRows.ts';
import { FileLock } from './FileLock.ts';
import { HistoricalStore } from './HistoricalStore.ts';
import { PartitionStore } from './PartitionStore.ts';
import { RawStore } from './RawStore.ts';

import type { StorageConfig } from '../config/Config.ts';
import type { WarehouseStore } from '../db/WarehouseClient.ts';
import type { StoreStep } from '../errors/PipelineErrors.ts';
import type { OutputFormat, RawPayload, WeatherFact } from '../model/Models.ts';
import type { DatasetCodec } from './codecs/DatasetCodec.ts';
import type { Logger } from 'pino';

export type StepStatus = 'completed' | 'failed' | 'skipped';

export interface StepReport {
    step: StoreStep;
    status: StepStatus;
    rows: number;
    error?: StorageError;
}

export interface StoreReport {
    steps: StepReport[];
}

export function createCodecs(formats: readonly OutputFormat[]): DatasetCodec[] {
    return formats.map((format) => (format === 'parquet' ? new ParquetCodec() : new CsvCodec()));
}

export function stepFailed(report: StoreReport, step: StoreStep): boolean {
    return report.steps.some((s) => s.step === step && s.status === 'failed');
}

/**
 * Persists one run: raw → partitions → historical → warehouse.
 * Every step runs and reports on its own; a failed step never undoes an earlier one.
 */
export class StoreWriter {
    private raw: RawStore;
    private partitions: PartitionStore;
    private historical: HistoricalStore;
    private warehouse: WarehouseStore;
    private logger: Logger;

    constructor(raw: RawStore, partitions: PartitionStore, historical: HistoricalStore, warehouse: WarehouseStore) {
        this.raw = raw;
        this.partitions = partitions;
        this.historical = historical;
        this.warehouse = warehouse;
        this.logger = createLogger('StoreWriter');
    }

    static fromConfig(storage: Readonly<StorageConfig>, warehouse: WarehouseStore): StoreWriter {
        const codecs = createCodecs(storage.formats);
        const lock = new FileLock(join(storage.processedDir, `.${storage.historicalBasename}.lock`), {
            timeoutMs: storage.lockTimeoutMs,
            staleMs: storage.lockStaleMs,
        });
        return new StoreWriter(
            new RawStore(storage.rawDir),
            new PartitionStore(storage.processedDir, codecs),
            new HistoricalStore(storage.processedDir, storage.historicalBasename, codecs, lock),
            warehouse
        );
    }

    async write(payloads: readonly RawPayload[], accepted: readonly WeatherFact[]): Promise<StoreReport> {
        const report: StoreReport = { steps: [] };
        const table = factsToTable(accepted);
        const hasFacts = table.rows.length > 0;

        await this.runStep(report, 'raw', payloads.length > 0, () => this.raw.saveAll(payloads));
        await this.runStep(report, 'partitions', hasFacts, async () => (await this.partitions.write(table)).rows);
        await this.runStep(report, 'historical', hasFacts, async () => {
            await this.historical.merge(table);
            return table.rows.length;
        });
        await this.runStep(report, 'warehouse', hasFacts, () => this.warehouse.upsertFacts(table));

        return report;
    }

    private async runStep(
        report: StoreReport,
        step: StoreStep,
        hasWork: boolean,
        action: () => Promise<number>
    ): Promise<void> {
        if (!hasWork) {
            report.steps.push({ step, status: 'skipped', rows: 0 });
            return;
        }

        try {
            const rows = await action();
            report.steps.push({ step, status: 'completed', rows });
        } catch (err) {
            const error = new StorageError(step, `Store step '${step}' failed: ${describeError(err)}`, { cause: err });
            this.logger.error({ err }, error.message);
            report.steps.push({ step, status: 'failed', rows: 0, error });
        }
    }
}
