import { readFile, readdir } from 'node:fs/promises';
import { afterEach, beforeEach, describe, test, expect } from 'vitest';

import { RawStore } from '../RawStore.ts';
import { makeTempDir, openMeteoBody, removeTempDir } from '../../__tests__/helpers.ts';
import type { RawPayload } from '../../model/Models.ts';

describe('RawStore', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await makeTempDir();
    });

    afterEach(async () => {
        await removeTempDir(dir);
    });

    test('one file per extraction id, rewritten on rerun', async () => {
        const store = new RawStore(dir);
        const payload: RawPayload = {
            extractionId: 'a1b2c3d4e5f60718',
            locationId: 'sao-paulo-sp',
            requestedAt: '2026-02-16T14:07:00.000Z',
            attemptCount: 2,
            body: openMeteoBody(),
        };

        expect(await store.saveAll([payload])).toBe(1);
        await store.saveAll([payload]);

        expect(await readdir(dir)).toEqual(['weather_raw_a1b2c3d4e5f60718.json']);
        const saved = JSON.parse(await readFile(store.pathFor(payload.extractionId), 'utf-8'));
        expect(saved).toEqual({
            extraction_id: 'a1b2c3d4e5f60718',
            location_id: 'sao-paulo-sp',
            requested_at: '2026-02-16T14:07:00.000Z',
            attempt_count: 2,
            payload: openMeteoBody(),
        });
    });
});
