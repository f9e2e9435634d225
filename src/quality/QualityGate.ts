import { QualityViolation } from '../errors/PipelineErrors.ts';
import { createLogger } from '../utils/Logger.ts';

import type { QualityConfig } from '../config/Config.ts';
import type { WeatherFact } from '../model/Models.ts';
import type { Logger } from 'pino';

export interface RangeRule {
    column: string;
    min?: number;
    max?: number;
}

export interface RejectedFact {
    fact: WeatherFact;
    violations: QualityViolation[];
}

export interface QualityReport {
    accepted: WeatherFact[];
    rejected: RejectedFact[];
}

export function buildRangeRules(config: Readonly<QualityConfig>): RangeRule[] {
    return [
        { column: 'temperature_celsius', min: config.temperatureMinC, max: config.temperatureMaxC },
        { column: 'relative_humidity', min: config.humidityMinPct, max: config.humidityMaxPct },
        { column: 'precipitation_mm', min: config.precipitationMinMm },
        { column: 'wind_speed_kmh', min: config.windSpeedMinKmh },
    ];
}

function isBlank(value: string | null): boolean {
    return value === null || value.trim() === '';
}

/**
 * Classifies a batch into accepted and rejected facts. Never mutates a fact
 * and keeps batch order in both outputs.
 */
export class QualityGate {
    private logger: Logger;
    private rangeRules: RangeRule[];
    private requiredMetrics: readonly string[];

    constructor(config: Readonly<QualityConfig>) {
        this.logger = createLogger('QualityGate');
        this.rangeRules = buildRangeRules(config);
        this.requiredMetrics = config.requiredMetrics;
    }

    validate(batch: readonly WeatherFact[]): QualityReport {
        const idCounts = new Map<string, number>();
        for (const fact of batch) {
            idCounts.set(fact.extractionId, (idCounts.get(fact.extractionId) ?? 0) + 1);
        }

        const accepted: WeatherFact[] = [];
        const rejected: RejectedFact[] = [];

        for (const fact of batch) {
            const violations = [
                ...this.checkRequired(fact),
                ...this.checkRanges(fact),
                ...this.checkDuplicate(fact, idCounts),
            ];
            if (violations.length === 0) {
                accepted.push(fact);
            } else {
                rejected.push({ fact, violations });
            }
        }

        if (rejected.length > 0) {
            this.logger.warn(
                {
                    rejected: rejected.map((r) => ({
                        extractionId: r.fact.extractionId,
                        violations: r.violations.map((v) => v.message),
                    })),
                },
                `Data quality: ${rejected.length} of ${batch.length} records rejected`
            );
        }
        if (accepted.length === 0) {
            this.logger.warn(`Data quality: no records accepted out of ${batch.length}`);
        } else {
            this.logger.info(`Data quality: ${accepted.length} of ${batch.length} records accepted`);
        }

        return { accepted, rejected };
    }

    private checkRequired(fact: WeatherFact): QualityViolation[] {
        const violations: QualityViolation[] = [];
        const required = (field: string, missing: boolean) => {
            if (missing) {
                violations.push(
                    new QualityViolation('required', field, fact.extractionId, `Required field ${field} is missing`)
                );
            }
        };

        required('extraction_id', isBlank(fact.extractionId));
        required('location_id', isBlank(fact.locationId));
        required('location_city', isBlank(fact.locationCity));
        required('observed_at', isBlank(fact.observedAt));
        required('event_date', isBlank(fact.eventDate));
        required('latitude', !Number.isFinite(fact.latitude));
        required('longitude', !Number.isFinite(fact.longitude));

        const reported = Object.values(fact.metrics).filter((value) => value !== null);
        required('metrics', reported.length === 0);

        for (const metric of this.requiredMetrics) {
            required(metric, fact.metrics[metric] === undefined || fact.metrics[metric] === null);
        }
        return violations;
    }

    private checkRanges(fact: WeatherFact): QualityViolation[] {
        const violations: QualityViolation[] = [];
        for (const rule of this.rangeRules) {
            const value = fact.metrics[rule.column];
            if (value === undefined || value === null) continue;

            const belowMin = rule.min !== undefined && value < rule.min;
            const aboveMax = rule.max !== undefined && value > rule.max;
            if (belowMin || aboveMax) {
                const bounds = `[${rule.min ?? '-inf'}, ${rule.max ?? '+inf'}]`;
                violations.push(
                    new QualityViolation(
                        'range',
                        rule.column,
                        fact.extractionId,
                        `${rule.column}=${value} outside ${bounds}`
                    )
                );
            }
        }
        return violations;
    }

    private checkDuplicate(fact: WeatherFact, idCounts: Map<string, number>): QualityViolation[] {
        const count = idCounts.get(fact.extractionId) ?? 0;
        if (count < 2) return [];
        return [
            new QualityViolation(
                'duplicate',
                'extraction_id',
                fact.extractionId,
                `extraction_id ${fact.extractionId} appears ${count} times in batch`
            ),
        ];
    }
}
