import { TransformError } from '../errors/PipelineErrors.ts';
import { isRecord } from '../utils/Guards.ts';
import { createLogger } from '../utils/Logger.ts';
import { parseUtcTimestamp, toUtcDateString } from '../utils/Time.ts';
import { METRIC_MAPPINGS, describeWeatherCode } from './WeatherCodes.ts';

import type { Location, RawPayload, WeatherFact } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Keys of the `current` object that are never metrics.
 */
const NON_METRIC_KEYS = new Set(['time', 'interval', 'weather_code']);

export interface TransformResult {
    facts: WeatherFact[];
    failures: TransformError[];
}

/**
 * Maps raw Open-Meteo payloads onto typed WeatherFacts.
 *
 * Known variables are renamed and converted to canonical units
 * (see METRIC_MAPPINGS); any other numeric `current.*` variable is kept
 * under its API name so new parameters flow through as new columns.
 */
export class WeatherTransformer {
    private logger: Logger;
    private sourceVersion: string;
    private now: () => Date;

    constructor(sourceVersion: string, now: () => Date = () => new Date()) {
        this.logger = createLogger('WeatherTransformer');
        this.sourceVersion = sourceVersion;
        this.now = now;
    }

    /**
     * Transforms every payload; a bad payload is reported and skipped.
     */
    transformAll(payloads: readonly RawPayload[], locations: readonly Location[]): TransformResult {
        this.logger.info(`Starting transformation of ${payloads.length} payloads...`);
        const byId = new Map(locations.map((location) => [location.id, location]));

        const facts: WeatherFact[] = [];
        const failures: TransformError[] = [];

        for (const payload of payloads) {
            try {
                const location = byId.get(payload.locationId);
                if (!location) {
                    throw this.error(payload, `Unknown location '${payload.locationId}'`);
                }
                facts.push(this.transform(payload, location));
            } catch (err) {
                if (!(err instanceof TransformError)) throw err;
                this.logger.warn({ extractionId: payload.extractionId, locationId: payload.locationId }, err.message);
                failures.push(err);
            }
        }

        this.logger.info(
            `Transformation complete: ${facts.length} facts, ${failures.length} failed`
        );
        return { facts, failures };
    }

    transform(payload: RawPayload, location: Location): WeatherFact {
        const body = payload.body;
        if (!isRecord(body) || !isRecord(body.current)) {
            throw this.error(payload, 'Invalid payload: missing current weather object');
        }
        const current = body.current;
        const units: Record<string, unknown> = isRecord(body.current_units) ? body.current_units : {};

        let observedAt: string | null = null;
        let eventDate: string | null = null;
        if (current.time !== undefined && current.time !== null) {
            const parsed = parseUtcTimestamp(current.time);
            if (!parsed) {
                throw this.error(payload, `Invalid observation time: ${String(current.time)}`);
            }
            observedAt = parsed.toISOString();
            eventDate = toUtcDateString(parsed);
        }

        const metrics: Record<string, number | null> = {};
        const mappedApiNames = new Set<string>();

        for (const mapping of METRIC_MAPPINGS) {
            mappedApiNames.add(mapping.apiName);
            if (!(mapping.apiName in current)) continue;

            const value = this.readNumber(payload, mapping.apiName, current[mapping.apiName]);
            const unit = units[mapping.apiName];
            if (value === null || typeof unit !== 'string') {
                metrics[mapping.column] = value;
                continue;
            }
            const convert = mapping.conversions[unit];
            if (!convert) {
                throw this.error(payload, `Unsupported unit '${unit}' for ${mapping.apiName}`);
            }
            metrics[mapping.column] = convert(value);
        }

        for (const [key, raw] of Object.entries(current)) {
            if (NON_METRIC_KEYS.has(key) || mappedApiNames.has(key)) continue;
            metrics[key] = this.readNumber(payload, key, raw);
        }

        const code = this.readNumber(payload, 'weather_code', current.weather_code);
        const weatherCode = code === null ? null : Math.round(code);

        return {
            extractionId: payload.extractionId,
            locationId: location.id,
            locationCity: location.city,
            locationState: location.state,
            latitude: location.latitude,
            longitude: location.longitude,
            eventDate,
            observedAt,
            requestedAt: payload.requestedAt,
            weatherCode,
            weatherDescription: describeWeatherCode(weatherCode),
            metrics,
            sourceVersion: this.sourceVersion,
            processedAt: this.now().toISOString(),
        };
    }

    /**
     * Numbers pass, numeric strings are converted, null/undefined mean "not reported".
     */
    private readNumber(payload: RawPayload, field: string, raw: unknown): number | null {
        if (raw === undefined || raw === null) return null;
        if (typeof raw === 'number' && Number.isFinite(raw)) return raw;
        if (typeof raw === 'string' && raw.trim() !== '') {
            const parsed = Number(raw);
            if (Number.isFinite(parsed)) return parsed;
        }
        throw this.error(payload, `Non-numeric value for ${field}: ${JSON.stringify(raw)}`);
    }

    private error(payload: RawPayload, message: string): TransformError {
        return new TransformError(message, {
            locationId: payload.locationId,
            extractionId: payload.extractionId,
        });
    }
}
