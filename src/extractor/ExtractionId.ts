import { createHash } from 'node:crypto';

/**
 * Floors a timestamp to the start of its UTC bucket.
 */
export function floorToBucket(date: Date | string, bucketMinutes: number): Date {
    if (!Number.isFinite(bucketMinutes) || bucketMinutes <= 0) {
        throw new RangeError(`bucketMinutes must be a positive number, got ${bucketMinutes}`);
    }
    const d = typeof date === 'string' ? new Date(date) : date;
    const ms = d.getTime();
    if (Number.isNaN(ms)) {
        throw new RangeError(`Invalid timestamp: ${String(date)}`);
    }
    const bucketMs = bucketMinutes * 60_000;
    return new Date(Math.floor(ms / bucketMs) * bucketMs);
}

/**
 * Deterministic extraction id for (location, time bucket).
 * Same location and same bucket always give the same 16-char hex id,
 * which makes reruns and overlapping batches safe to merge.
 */
export function computeExtractionId(
    locationId: string,
    timestamp: Date | string,
    bucketMinutes: number
): string {
    const bucket = floorToBucket(timestamp, bucketMinutes).toISOString();
    return createHash('sha1').update(`${locationId}:${bucket}`, 'utf8').digest('hex').slice(0, 16);
}
