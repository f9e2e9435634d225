export type PipelineErrorCode =
    | 'ACQUISITION_FAILED'
    | 'TRANSFORM_FAILED'
    | 'QUALITY_VIOLATION'
    | 'STORAGE_FAILED'
    | 'CONFIG_INVALID';

/**
 * Base class for every error the pipeline reports.
 */
export class PipelineError extends Error {
    readonly code: PipelineErrorCode;

    constructor(code: PipelineErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * Network or API failure for one location, after retries.
 */
export class AcquisitionError extends PipelineError {
    readonly locationId: string;
    readonly attempts: number;
    readonly status: number | null;
    readonly retryable: boolean;

    constructor(
        message: string,
        details: { locationId: string; attempts: number; status?: number | null; retryable: boolean },
        options?: { cause?: unknown }
    ) {
        super('ACQUISITION_FAILED', message, options);
        this.locationId = details.locationId;
        this.attempts = details.attempts;
        this.status = details.status ?? null;
        this.retryable = details.retryable;
    }
}

/**
 * Payload that cannot be mapped onto a WeatherFact.
 */
export class TransformError extends PipelineError {
    readonly locationId: string;
    readonly extractionId: string;

    constructor(message: string, details: { locationId: string; extractionId: string }) {
        super('TRANSFORM_FAILED', message);
        this.locationId = details.locationId;
        this.extractionId = details.extractionId;
    }
}

export type QualityRule = 'required' | 'range' | 'duplicate';

export class QualityViolation extends PipelineError {
    readonly rule: QualityRule;
    readonly field: string;
    readonly extractionId: string;

    constructor(rule: QualityRule, field: string, extractionId: string, message: string) {
        super('QUALITY_VIOLATION', message);
        this.rule = rule;
        this.field = field;
        this.extractionId = extractionId;
    }
}

export type StoreStep = 'raw' | 'partitions' | 'historical' | 'warehouse';

/**
 * I/O or lock failure inside one Store Writer step.
 */
export class StorageError extends PipelineError {
    readonly step: StoreStep;

    constructor(step: StoreStep, message: string, options?: { cause?: unknown }) {
        super('STORAGE_FAILED', message, options);
        this.step = step;
    }
}

export class ConfigError extends PipelineError {
    readonly issues: string[];

    constructor(message: string, issues: string[] = []) {
        super('CONFIG_INVALID', issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
        this.issues = issues;
    }
}

export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    return String(err);
}
