import { Command, InvalidArgumentError } from 'commander';
import postgres from 'postgres';

import { describeError } from './errors/PipelineErrors.ts';
import { WeatherQueries } from './query/queries.ts';
import { printTable } from './query/printTable.ts';
import { createLogger } from './utils/Logger.ts';

import type { TableRow } from './query/printTable.ts';

const logger = createLogger('query');

function parseLimit(value: string): number {
    const limit = Number.parseInt(value, 10);
    if (!Number.isInteger(limit) || limit <= 0) {
        throw new InvalidArgumentError('must be a positive integer');
    }
    return limit;
}

function parseDate(value: string): string {
    if (!/^\d{4}-\d{2}-\d{2}$/.test(value) || Number.isNaN(Date.parse(`${value}T00:00:00Z`))) {
        throw new InvalidArgumentError('must be a date in YYYY-MM-DD format');
    }
    return value;
}

async function withQueries(table: string, run: (queries: WeatherQueries) => Promise<TableRow[]>): Promise<void> {
    const url = process.env.DATABASE_URL;
    if (!url) {
        throw new Error('DATABASE_URL not set');
    }
    const sql = postgres(url, { onnotice: () => undefined });
    try {
        printTable(await run(new WeatherQueries(sql, table)));
    } finally {
        await sql.end();
    }
}

const program = new Command();

program
    .name('weather-query')
    .description('Query the weather facts warehouse table')
    .option('-t, --table <name>', 'schema-qualified warehouse table', 'analytics.weather_facts');

const tableName = (): string => program.opts<{ table: string }>().table;

program
    .command('latest')
    .description('Most recent observations')
    .option('-l, --limit <n>', 'number of rows', parseLimit, 20)
    .action(async (options: { limit: number }) => {
        await withQueries(tableName(), (q) => q.latest(options.limit));
    });

program
    .command('avg-temp')
    .description('Average temperature per city over a date range')
    .requiredOption('--from <date>', 'first event date (YYYY-MM-DD)', parseDate)
    .requiredOption('--to <date>', 'last event date (YYYY-MM-DD)', parseDate)
    .action(async (options: { from: string; to: string }) => {
        await withQueries(tableName(), (q) => q.averageTemperature(options));
    });

program
    .command('rain')
    .description('Total and average precipitation per city over a date range')
    .requiredOption('--from <date>', 'first event date (YYYY-MM-DD)', parseDate)
    .requiredOption('--to <date>', 'last event date (YYYY-MM-DD)', parseDate)
    .action(async (options: { from: string; to: string }) => {
        await withQueries(tableName(), (q) => q.rainfall(options));
    });

program
    .command('city')
    .description('Latest observations for one city')
    .requiredOption('-n, --name <city>', 'city name (case-insensitive)')
    .option('-l, --limit <n>', 'number of rows', parseLimit, 10)
    .action(async (options: { name: string; limit: number }) => {
        await withQueries(tableName(), (q) => q.city(options.name, options.limit));
    });

program
    .command('sql')
    .description('Run an arbitrary SQL query')
    .requiredOption('-q, --query <sql>', 'SQL text')
    .action(async (options: { query: string }) => {
        await withQueries(tableName(), (q) => q.raw(options.query));
    });

try {
    await program.parseAsync(process.argv);
} catch (err) {
    logger.error({ err }, `Query failed: ${describeError(err)}`);
    process.exitCode = 1;
}
