import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { ConfigError } from '../errors/PipelineErrors.ts';
import type { Location } from '../model/Models.ts';

export const DEFAULT_CONFIG_PATH = 'config/config.yaml';

const DEFAULT_PARAMS = [
    'temperature_2m',
    'relative_humidity_2m',
    'precipitation',
    'weather_code',
    'wind_speed_10m',
];

const locationSchema = z.object({
    id: z.string().trim().min(1).optional(),
    city: z.string().trim().min(1),
    state: z.string().trim().default(''),
    country: z.string().trim().default(''),
    latitude: z.number().min(-90).max(90),
    longitude: z.number().min(-180).max(180),
});

const apiSchema = z.object({
    baseUrl: z.string().url().default('https://api.open-meteo.com/v1/forecast'),
    params: z.array(z.string().min(1)).min(1).default(DEFAULT_PARAMS),
    concurrency: z.number().int().min(1).max(32).default(4),
    timeBucketMinutes: z.number().int().positive().default(15),
    sourceVersion: z.string().min(1).default('open-meteo/v1'),
});

const retrySchema = z.object({
    maxAttempts: z.number().int().min(1).default(3),
    baseDelayMs: z.number().int().nonnegative().default(1_000),
    maxDelayMs: z.number().int().nonnegative().default(30_000),
    jitterRatio: z.number().min(0).max(1).default(0.2),
    maxTotalWaitMs: z.number().int().nonnegative().default(60_000),
    timeoutMs: z.number().int().positive().default(15_000),
});

const qualitySchema = z.object({
    temperatureMinC: z.number().default(-90),
    temperatureMaxC: z.number().default(60),
    humidityMinPct: z.number().default(0),
    humidityMaxPct: z.number().default(100),
    precipitationMinMm: z.number().default(0),
    windSpeedMinKmh: z.number().default(0),
    requiredMetrics: z.array(z.string().min(1)).default([]),
});

const storageSchema = z.object({
    rawDir: z.string().min(1).default('data/raw'),
    processedDir: z.string().min(1).default('data/processed'),
    formats: z.array(z.enum(['parquet', 'csv'])).min(1).default(['parquet', 'csv']),
    historicalBasename: z.string().min(1).default('weather_historical'),
    lockTimeoutMs: z.number().int().nonnegative().default(30_000),
    lockStaleMs: z.number().int().positive().default(600_000),
});

const warehouseSchema = z.object({
    databaseUrl: z.string().min(1).optional(),
    table: z
        .string()
        .regex(/^[A-Za-z_][A-Za-z0-9_]*\.[A-Za-z_][A-Za-z0-9_]*$/, 'must be <schema>.<table>')
        .default('analytics.weather_facts'),
});

const alertsSchema = z.object({
    webhookUrl: z.string().default(''),
});

const configSchema = z
    .object({
        api: apiSchema.default({}),
        retry: retrySchema.default({}),
        locations: z.array(locationSchema).min(1),
        quality: qualitySchema.default({}),
        storage: storageSchema.default({}),
        warehouse: warehouseSchema.default({}),
        alerts: alertsSchema.default({}),
    })
    .superRefine((cfg, ctx) => {
        if (cfg.retry.maxDelayMs < cfg.retry.baseDelayMs) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['retry', 'maxDelayMs'],
                message: 'must be >= retry.baseDelayMs',
            });
        }
        if (cfg.quality.temperatureMinC > cfg.quality.temperatureMaxC) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                path: ['quality', 'temperatureMinC'],
                message: 'must be <= quality.temperatureMaxC',
            });
        }
    });

type ParsedConfig = z.infer<typeof configSchema>;

export type ApiConfig = ParsedConfig['api'];
export type RetryConfig = ParsedConfig['retry'];
export type QualityConfig = ParsedConfig['quality'];
export type StorageConfig = ParsedConfig['storage'];
export type WarehouseConfig = ParsedConfig['warehouse'];
export type AlertConfig = ParsedConfig['alerts'];

export interface AppConfig {
    readonly api: Readonly<ApiConfig>;
    readonly retry: Readonly<RetryConfig>;
    readonly locations: readonly Location[];
    readonly quality: Readonly<QualityConfig>;
    readonly storage: Readonly<StorageConfig>;
    readonly warehouse: Readonly<WarehouseConfig>;
    readonly alerts: Readonly<AlertConfig>;
}

type Env = Record<string, string | undefined>;

/**
 * 'São Paulo', 'SP' → 'sao-paulo-sp'
 */
export function slugifyLocation(city: string, state: string): string {
    return [city, state]
        .filter((part) => part.length > 0)
        .join(' ')
        .normalize('NFD')
        .replace(/[\u0300-\u036f]/g, '')
        .toLowerCase()
        .replace(/[^a-z0-9]+/g, '-')
        .replace(/^-+|-+$/g, '');
}

function deepFreeze<T>(value: T): T {
    if (value && typeof value === 'object' && !Object.isFrozen(value)) {
        Object.freeze(value);
        for (const child of Object.values(value)) {
            deepFreeze(child);
        }
    }
    return value;
}

/**
 * Validates an already-parsed config document and applies environment overrides.
 */
export function buildConfig(document: unknown, env: Env = process.env): AppConfig {
    const result = configSchema.safeParse(document ?? {});
    if (!result.success) {
        const issues = result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
        throw new ConfigError('Invalid configuration', issues);
    }
    const parsed = result.data;

    const locations: Location[] = parsed.locations.map((loc) => ({
        id: loc.id ?? slugifyLocation(loc.city, loc.state),
        city: loc.city,
        state: loc.state,
        country: loc.country,
        latitude: loc.latitude,
        longitude: loc.longitude,
    }));

    const seen = new Set<string>();
    for (const loc of locations) {
        if (seen.has(loc.id)) {
            throw new ConfigError('Invalid configuration', [`locations: duplicate location id '${loc.id}'`]);
        }
        seen.add(loc.id);
    }

    const config: AppConfig = {
        api: parsed.api,
        retry: parsed.retry,
        locations,
        quality: parsed.quality,
        storage: parsed.storage,
        warehouse: {
            ...parsed.warehouse,
            databaseUrl: env.DATABASE_URL || parsed.warehouse.databaseUrl,
        },
        alerts: {
            webhookUrl: env.ALERT_WEBHOOK_URL ?? parsed.alerts.webhookUrl,
        },
    };

    return deepFreeze(config);
}

export function parseConfig(yamlText: string, env: Env = process.env): AppConfig {
    let document: unknown;
    try {
        document = parseYaml(yamlText);
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigError('Configuration is not valid YAML', [message]);
    }
    return buildConfig(document, env);
}

export async function loadConfig(
    configPath: string = process.env.CONFIG_PATH ?? DEFAULT_CONFIG_PATH,
    env: Env = process.env
): Promise<AppConfig> {
    let text: string;
    try {
        text = await readFile(configPath, 'utf-8');
    } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        throw new ConfigError(`Cannot read configuration file ${configPath}`, [message]);
    }
    return parseConfig(text, env);
}
