import { join } from 'node:path';

import { createLogger } from '../utils/Logger.ts';
import { mergeTables } from './FactRows.ts';

import type { FactRow, FactTable } from '../model/Models.ts';
import type { DatasetCodec } from './codecs/DatasetCodec.ts';
import type { Logger } from 'pino';

export const PARTITION_BASENAME = 'weather_facts';

export interface PartitionWriteResult {
    partitions: string[];
    rows: number;
}

/**
 * Day partitions under `event_date=YYYY-MM-DD/`. Each partition file is
 * merged by extraction_id and replaced atomically, so reruns never duplicate.
 */
export class PartitionStore {
    private processedDir: string;
    private codecs: readonly DatasetCodec[];
    private logger: Logger;

    constructor(processedDir: string, codecs: readonly DatasetCodec[]) {
        this.processedDir = processedDir;
        this.codecs = codecs;
        this.logger = createLogger('PartitionStore');
    }

    pathFor(eventDate: string, codec: DatasetCodec): string {
        return join(this.processedDir, `event_date=${eventDate}`, `${PARTITION_BASENAME}.${codec.extension}`);
    }

    async write(table: FactTable): Promise<PartitionWriteResult> {
        const byDate = new Map<string, FactRow[]>();
        for (const row of table.rows) {
            const eventDate = row.event_date;
            if (typeof eventDate !== 'string' || !/^\d{4}-\d{2}-\d{2}$/.test(eventDate)) {
                throw new Error(`Row ${String(row.extraction_id)} has no valid event_date`);
            }
            const rows = byDate.get(eventDate) ?? [];
            rows.push(row);
            byDate.set(eventDate, rows);
        }

        for (const [eventDate, rows] of byDate) {
            for (const codec of this.codecs) {
                const filePath = this.pathFor(eventDate, codec);
                const existing = await codec.read(filePath);
                const merged = mergeTables(existing, { columns: table.columns, rows });
                await codec.write(filePath, merged);
                this.logger.info(`Partition ${eventDate} (${codec.format}) now has ${merged.rows.length} rows`);
            }
        }

        return { partitions: [...byDate.keys()], rows: table.rows.length };
    }
}
