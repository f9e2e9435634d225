import { join } from 'node:path';

import { createLogger } from '../utils/Logger.ts';
import { mergeTables } from './FactRows.ts';

import type { FactTable, OutputFormat } from '../model/Models.ts';
import type { DatasetCodec } from './codecs/DatasetCodec.ts';
import type { FileLock } from './FileLock.ts';
import type { Logger } from 'pino';

/**
 * Cumulative deduplicated dataset, one file per format.
 * Merges run under the advisory lock and replace the file atomically.
 */
export class HistoricalStore {
    private processedDir: string;
    private basename: string;
    private codecs: readonly DatasetCodec[];
    private lock: FileLock;
    private logger: Logger;

    constructor(processedDir: string, basename: string, codecs: readonly DatasetCodec[], lock: FileLock) {
        this.processedDir = processedDir;
        this.basename = basename;
        this.codecs = codecs;
        this.lock = lock;
        this.logger = createLogger('HistoricalStore');
    }

    pathFor(codec: DatasetCodec): string {
        return join(this.processedDir, `${this.basename}.${codec.extension}`);
    }

    /**
     * @returns row count of the historical dataset per format after the merge
     */
    async merge(incoming: FactTable): Promise<Partial<Record<OutputFormat, number>>> {
        return this.lock.withLock(async () => {
            const counts: Partial<Record<OutputFormat, number>> = {};
            for (const codec of this.codecs) {
                const filePath = this.pathFor(codec);
                const existing = await codec.read(filePath);
                const merged = mergeTables(existing, incoming);
                await codec.write(filePath, merged);

                counts[codec.format] = merged.rows.length;
                const added = merged.columns.length - (existing?.columns.length ?? merged.columns.length);
                this.logger.info(
                    { file: filePath, rows: merged.rows.length, addedColumns: added },
                    `Historical ${codec.format} updated`
                );
            }
            return counts;
        });
    }
}
