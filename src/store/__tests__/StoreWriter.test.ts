import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';

import { CsvCodec } from '../codecs/CsvCodec.ts';
import { factsToTable } from '../FactRows.ts';
import { FileLock } from '../FileLock.ts';
import { HistoricalStore } from '../HistoricalStore.ts';
import { PartitionStore } from '../PartitionStore.ts';
import { StoreWriter, stepFailed } from '../StoreWriter.ts';
import { StorageError } from '../../errors/PipelineErrors.ts';
import { InMemoryWarehouse, makeFact, makeTempDir, openMeteoBody, removeTempDir } from '../../__tests__/helpers.ts';
import type { StorageConfig } from '../../config/Config.ts';
import type { RawPayload, WeatherFact } from '../../model/Models.ts';

// ── Test helpers ──

function storage(dir: string): StorageConfig {
    return {
        rawDir: join(dir, 'raw'),
        processedDir: join(dir, 'processed'),
        formats: ['csv'],
        historicalBasename: 'weather_historical',
        lockTimeoutMs: 1_000,
        lockStaleMs: 60_000,
    };
}

function payloadFor(fact: WeatherFact): RawPayload {
    return {
        extractionId: fact.extractionId,
        locationId: fact.locationId,
        requestedAt: fact.requestedAt,
        attemptCount: 1,
        body: openMeteoBody(),
    };
}

const FACTS = [
    makeFact({ extractionId: 'aaaa000000000001' }),
    makeFact({ extractionId: 'aaaa000000000002', locationId: 'recife-pe', locationCity: 'Recife', locationState: 'PE' }),
    makeFact({
        extractionId: 'aaaa000000000003',
        eventDate: '2026-02-17',
        observedAt: '2026-02-17T00:15:00.000Z',
    }),
];

async function csvLines(filePath: string): Promise<string[]> {
    return (await readFile(filePath, 'utf-8')).trimEnd().split('\n');
}

// ── Tests ──

describe('PartitionStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    test('splits rows by event_date', async () => {
        const store = new PartitionStore(dir, [new CsvCodec()]);

        const result = await store.write(factsToTable(FACTS));

        expect(result).toEqual({ partitions: ['2026-02-16', '2026-02-17'], rows: 3 });
        expect((await readdir(dir)).sort()).toEqual(['event_date=2026-02-16', 'event_date=2026-02-17']);
        expect(await csvLines(join(dir, 'event_date=2026-02-16', 'weather_facts.csv'))).toHaveLength(3);
        expect(await csvLines(join(dir, 'event_date=2026-02-17', 'weather_facts.csv'))).toHaveLength(2);
    });

    test('refuses rows without an event date', async () => {
        const store = new PartitionStore(dir, [new CsvCodec()]);
        const table = factsToTable([makeFact({ extractionId: 'bad', eventDate: null })]);
        await expect(store.write(table)).rejects.toThrow('Row bad has no valid event_date');
    });
});

describe('HistoricalStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    test('merges runs and evolves the schema additively', async () => {
        const codec = new CsvCodec();
        const lock = new FileLock(join(dir, '.weather_historical.lock'), { timeoutMs: 1_000, staleMs: 60_000 });
        const store = new HistoricalStore(dir, 'weather_historical', [codec], lock);

        expect(await store.merge(factsToTable(FACTS.slice(0, 2)))).toEqual({ csv: 2 });

        const evolved = makeFact({
            extractionId: 'aaaa000000000004',
            metrics: { temperature_celsius: 25, precipitation_probability: 40 },
        });
        expect(await store.merge(factsToTable([evolved]))).toEqual({ csv: 3 });

        const table = await codec.read(store.pathFor(codec));
        expect(table?.columns.at(-1)).toEqual({ name: 'precipitation_probability', type: 'number' });
        expect(table?.rows.map((r) => r.precipitation_probability)).toEqual([null, null, 40]);
        expect(table?.rows.map((r) => r.relative_humidity)).toEqual([55, 55, null]);
    });
});

describe('StoreWriter', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    test('runs every step and stays idempotent on rerun', async () => {
        const warehouse = new InMemoryWarehouse();
        const writer = StoreWriter.fromConfig(storage(dir), warehouse);
        const payloads = FACTS.map(payloadFor);

        const first = await writer.write(payloads, FACTS);
        const second = await writer.write(payloads, FACTS);

        for (const report of [first, second]) {
            expect(report.steps.map((s) => [s.step, s.status, s.rows])).toEqual([
                ['raw', 'completed', 3],
                ['partitions', 'completed', 3],
                ['historical', 'completed', 3],
                ['warehouse', 'completed', 3],
            ]);
        }
        expect(await readdir(join(dir, 'raw'))).toHaveLength(3);
        expect(await csvLines(join(dir, 'processed', 'weather_historical.csv'))).toHaveLength(4);
        expect(await csvLines(join(dir, 'processed', 'event_date=2026-02-16', 'weather_facts.csv'))).toHaveLength(3);
        expect([...warehouse.rows.keys()]).toEqual(['aaaa000000000001', 'aaaa000000000002', 'aaaa000000000003']);
    });

    test('a failed warehouse load keeps the file stores and is reported', async () => {
        const warehouse = new InMemoryWarehouse();
        warehouse.failWith = new Error('connection refused');
        const writer = StoreWriter.fromConfig(storage(dir), warehouse);

        const report = await writer.write(FACTS.map(payloadFor), FACTS);

        expect(stepFailed(report, 'warehouse')).toBe(true);
        expect(stepFailed(report, 'historical')).toBe(false);
        const failed = report.steps[3];
        expect(failed.error).toBeInstanceOf(StorageError);
        expect(failed.error?.step).toBe('warehouse');
        expect(failed.error?.message).toBe("Store step 'warehouse' failed: connection refused");
        expect(await csvLines(join(dir, 'processed', 'weather_historical.csv'))).toHaveLength(4);
    });

    test('a failed raw step does not keep facts out of the other stores', async () => {
        // a regular file where the raw directory should be created
        await writeFile(join(dir, 'blocker'), '');
        const warehouse = new InMemoryWarehouse();
        const writer = StoreWriter.fromConfig({ ...storage(dir), rawDir: join(dir, 'blocker', 'raw') }, warehouse);

        const report = await writer.write(FACTS.map(payloadFor), FACTS);

        expect(report.steps.map((s) => [s.step, s.status])).toEqual([
            ['raw', 'failed'],
            ['partitions', 'completed'],
            ['historical', 'completed'],
            ['warehouse', 'completed'],
        ]);
        expect(report.steps[0].error?.step).toBe('raw');
        expect(warehouse.rows.size).toBe(3);
        expect(await csvLines(join(dir, 'processed', 'weather_historical.csv'))).toHaveLength(4);
    });

    test('a failed historical merge still loads the warehouse', async () => {
        const warehouse = new InMemoryWarehouse();
        const config = storage(dir);
        // a directory where the historical CSV file should be
        await mkdir(join(config.processedDir, 'weather_historical.csv'), { recursive: true });
        const writer = StoreWriter.fromConfig(config, warehouse);

        const report = await writer.write(FACTS.map(payloadFor), FACTS);

        expect(report.steps.map((s) => [s.step, s.status])).toEqual([
            ['raw', 'completed'],
            ['partitions', 'completed'],
            ['historical', 'failed'],
            ['warehouse', 'completed'],
        ]);
        expect(warehouse.rows.size).toBe(3);
    });

    test('without accepted facts only the raw payloads are written', async () => {
        const warehouse = new InMemoryWarehouse();
        const writer = StoreWriter.fromConfig(storage(dir), warehouse);

        const report = await writer.write(FACTS.map(payloadFor), []);

        expect(report.steps.map((s) => [s.step, s.status])).toEqual([
            ['raw', 'completed'],
            ['partitions', 'skipped'],
            ['historical', 'skipped'],
            ['warehouse', 'skipped'],
        ]);
        expect(await readdir(join(dir, 'raw'))).toHaveLength(3);
    });
});
