import { join } from 'node:path';

import { createLogger } from '../utils/Logger.ts';
import { writeFileAtomically } from './AtomicFile.ts';

import type { RawPayload } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * One immutable JSON artifact per extraction, named by extraction id.
 * Saving the same id again rewrites the same file.
 */
export class RawStore {
    private rawDir: string;
    private logger: Logger;

    constructor(rawDir: string) {
        this.rawDir = rawDir;
        this.logger = createLogger('RawStore');
    }

    pathFor(extractionId: string): string {
        return join(this.rawDir, `weather_raw_${extractionId}.json`);
    }

    async save(payload: RawPayload): Promise<string> {
        const filePath = this.pathFor(payload.extractionId);
        const document = {
            extraction_id: payload.extractionId,
            location_id: payload.locationId,
            requested_at: payload.requestedAt,
            attempt_count: payload.attemptCount,
            payload: payload.body,
        };
        await writeFileAtomically(filePath, JSON.stringify(document, null, 2) + '\n');
        this.logger.debug(`Raw payload saved at ${filePath}`);
        return filePath;
    }

    async saveAll(payloads: readonly RawPayload[]): Promise<number> {
        for (const payload of payloads) {
            await this.save(payload);
        }
        this.logger.info(`Saved ${payloads.length} raw payloads to ${this.rawDir}`);
        return payloads.length;
    }
}
