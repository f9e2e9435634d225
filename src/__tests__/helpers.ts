import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import type { WarehouseStore } from '../db/WarehouseClient.ts';
import type { FactRow, FactTable, Location, WeatherFact } from '../model/Models.ts';
import type { FetchOptions, WeatherSource } from '../source/OpenMeteoSource.ts';

// ── Shared test fixtures ──

export const LOCATIONS: readonly Location[] = [
    { id: 'sao-paulo-sp', city: 'Sao Paulo', state: 'SP', country: 'BR', latitude: -23.5505, longitude: -46.6333 },
    { id: 'rio-de-janeiro-rj', city: 'Rio de Janeiro', state: 'RJ', country: 'BR', latitude: -22.9068, longitude: -43.1729 },
    { id: 'belo-horizonte-mg', city: 'Belo Horizonte', state: 'MG', country: 'BR', latitude: -19.9167, longitude: -43.9345 },
    { id: 'curitiba-pr', city: 'Curitiba', state: 'PR', country: 'BR', latitude: -25.4284, longitude: -49.2733 },
    { id: 'porto-alegre-rs', city: 'Porto Alegre', state: 'RS', country: 'BR', latitude: -30.0346, longitude: -51.2177 },
    { id: 'salvador-ba', city: 'Salvador', state: 'BA', country: 'BR', latitude: -12.9777, longitude: -38.5016 },
    { id: 'recife-pe', city: 'Recife', state: 'PE', country: 'BR', latitude: -8.0476, longitude: -34.877 },
    { id: 'manaus-am', city: 'Manaus', state: 'AM', country: 'BR', latitude: -3.119, longitude: -60.0217 },
];

export interface CurrentValues {
    time?: string | null;
    temperature?: number | string | null;
    humidity?: number | null;
    precipitation?: number | null;
    windSpeed?: number | null;
    weatherCode?: number | null;
    extra?: Record<string, unknown>;
}

/**
 * Open-Meteo style body with metric units.
 */
export function openMeteoBody(values: CurrentValues = {}): Record<string, unknown> {
    const current: Record<string, unknown> = {
        interval: 900,
        temperature_2m: values.temperature === undefined ? 27.4 : values.temperature,
        relative_humidity_2m: values.humidity === undefined ? 55 : values.humidity,
        precipitation: values.precipitation === undefined ? 0 : values.precipitation,
        weather_code: values.weatherCode === undefined ? 61 : values.weatherCode,
        wind_speed_10m: values.windSpeed === undefined ? 12.5 : values.windSpeed,
        ...values.extra,
    };
    if (values.time !== null) {
        current.time = values.time ?? '2026-02-16T14:00';
    }
    return {
        latitude: -23.5,
        longitude: -46.625,
        current_units: {
            time: 'iso8601',
            interval: 'seconds',
            temperature_2m: '°C',
            relative_humidity_2m: '%',
            precipitation: 'mm',
            weather_code: 'wmo code',
            wind_speed_10m: 'km/h',
        },
        current,
    };
}

export function makeFact(overrides: Partial<WeatherFact> = {}): WeatherFact {
    return {
        extractionId: 'a1b2c3d4e5f60718',
        locationId: 'sao-paulo-sp',
        locationCity: 'Sao Paulo',
        locationState: 'SP',
        latitude: -23.5505,
        longitude: -46.6333,
        eventDate: '2026-02-16',
        observedAt: '2026-02-16T14:00:00.000Z',
        requestedAt: '2026-02-16T14:07:00.000Z',
        weatherCode: 61,
        weatherDescription: 'Slight rain',
        metrics: {
            temperature_celsius: 27.4,
            relative_humidity: 55,
            precipitation_mm: 0,
            wind_speed_kmh: 12.5,
        },
        sourceVersion: 'open-meteo/v1',
        processedAt: '2026-02-16T14:07:05.000Z',
        ...overrides,
    };
}

/**
 * Scripted source: each location answers with its queued responses in order
 * (the last one repeats). An Error in the queue is thrown instead of returned.
 */
export class FakeWeatherSource implements WeatherSource {
    readonly name = 'fake';
    readonly calls: string[] = [];
    private scripts = new Map<string, unknown[]>();
    private fallback: (location: Location) => unknown;

    constructor(fallback: (location: Location) => unknown = () => openMeteoBody()) {
        this.fallback = fallback;
    }

    script(locationId: string, ...responses: unknown[]): this {
        this.scripts.set(locationId, responses);
        return this;
    }

    async fetchCurrent(location: Location, _options: FetchOptions): Promise<unknown> {
        this.calls.push(location.id);
        const queue = this.scripts.get(location.id);
        let response: unknown;
        if (queue && queue.length > 0) {
            response = queue.length > 1 ? queue.shift() : queue[0];
        } else {
            response = this.fallback(location);
        }
        if (response instanceof Error) throw response;
        return response;
    }
}

/**
 * In-process stand-in for the Postgres warehouse table.
 */
export class InMemoryWarehouse implements WarehouseStore {
    readonly rows = new Map<string, FactRow>();
    readonly columns: string[] = [];
    failWith: Error | null = null;
    upserts = 0;
    closed = false;

    async upsertFacts(table: FactTable): Promise<number> {
        this.upserts++;
        if (this.failWith) throw this.failWith;

        for (const column of table.columns) {
            if (!this.columns.includes(column.name)) this.columns.push(column.name);
        }
        for (const row of table.rows) {
            const id = String(row.extraction_id);
            this.rows.delete(id);
            this.rows.set(id, { ...row });
        }
        return table.rows.length;
    }

    async close(): Promise<void> {
        this.closed = true;
    }
}

export async function makeTempDir(): Promise<string> {
    return mkdtemp(join(tmpdir(), 'weather-facts-'));
}

export async function removeTempDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}
