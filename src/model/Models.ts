/**
 * A configured observation point. Owned by configuration, read-only to the pipeline.
 */
export interface Location {
    id: string;
    city: string;
    state: string;          // Region / state code, e.g. 'SP'
    country: string;
    latitude: number;
    longitude: number;
}

export type ExtractionStatus = 'pending' | 'succeeded' | 'failed';

/**
 * One attempt to acquire an observation for a location.
 * extractionId stays null until a response is accepted.
 */
export interface Extraction {
    extractionId: string | null;
    locationId: string;
    requestedAt: string;
    attemptCount: number;
    status: ExtractionStatus;
}

/**
 * API response body as received, tagged with its identity.
 */
export interface RawPayload {
    extractionId: string;
    locationId: string;
    requestedAt: string;
    attemptCount: number;
    body: unknown;
}

// ── Transformer output models ──

/**
 * Typed, enriched observation. extractionId is the idempotency key for every store.
 */
export interface WeatherFact {
    extractionId: string;
    locationId: string;
    locationCity: string;
    locationState: string;
    latitude: number;
    longitude: number;
    eventDate: string | null;      // 'YYYY-MM-DD' (UTC), partition key
    observedAt: string | null;     // ISO-8601 UTC
    requestedAt: string;
    weatherCode: number | null;
    weatherDescription: string;
    metrics: Record<string, number | null>;
    sourceVersion: string;
    processedAt: string;
}

// ── Storage models ──

export type CellValue = string | number | null;

export type FactRow = Record<string, CellValue>;

export type ColumnType = 'string' | 'number';

export interface ColumnSpec {
    name: string;
    type: ColumnType;
}

/**
 * Column-ordered table of fact rows, as held by the file stores and the warehouse.
 */
export interface FactTable {
    columns: ColumnSpec[];
    rows: FactRow[];
}

export type OutputFormat = 'parquet' | 'csv';
