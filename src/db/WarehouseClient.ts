import postgres from 'postgres';
import { createLogger } from '../utils/Logger.ts';
import type { ColumnSpec, FactTable } from '../model/Models.ts';
import type { Logger } from 'pino';

/**
 * Queryable projection of the accepted facts, keyed by extraction_id.
 */
export interface WarehouseStore {
    /**
     * Inserts rows whose extraction_id is new and replaces rows whose id exists.
     * Columns the table lacks are added as nullable first.
     * @returns Number of rows written
     */
    upsertFacts(table: FactTable): Promise<number>;
    close(): Promise<void>;
}

// arbitrary constant shared by every writer of the table
const UPSERT_LOCK_KEY = 872_341_001;
const BATCH_SIZE = 500;

/**
 * Postgres-backed warehouse table (default `analytics.weather_facts`).
 * Uses the 'postgres' (porsager/postgres) driver.
 */
export class WarehouseClient implements WarehouseStore {
    private sql: postgres.Sql;
    private logger: Logger;
    readonly table: string;
    private schemaName: string;

    constructor(table: string = 'analytics.weather_facts', connectionUrl?: string) {
        this.logger = createLogger('WarehouseClient');
        const url = connectionUrl ?? process.env.DATABASE_URL;
        if (!url) {
            throw new Error(
                'DATABASE_URL not set. Provide it as env var or constructor arg.'
            );
        }
        const [schemaName] = table.split('.');
        this.table = table;
        this.schemaName = schemaName;
        this.sql = postgres(url, { onnotice: () => undefined });
    }

    async upsertFacts(table: FactTable): Promise<number> {
        if (table.rows.length === 0) return 0;

        this.logger.info(`Upserting ${table.rows.length} rows into ${this.table}...`);
        const columnNames = table.columns.map((c) => c.name);
        const ids = table.rows.map((row) => String(row.extraction_id));

        await this.sql.begin(async (tx) => {
            // one writer at a time across runs
            await tx`SELECT pg_advisory_xact_lock(${UPSERT_LOCK_KEY})`;
            await this.ensureTable(tx);
            await this.ensureColumns(tx, table.columns);

            await tx`
                DELETE FROM ${tx(this.table)}
                WHERE extraction_id IN ${tx(ids)}
            `;

            for (let i = 0; i < table.rows.length; i += BATCH_SIZE) {
                const batch = table.rows.slice(i, i + BATCH_SIZE);
                await tx`
                    INSERT INTO ${tx(this.table)} ${tx(batch, columnNames)}
                `;
                this.logger.info(
                    `Inserted batch ${Math.floor(i / BATCH_SIZE) + 1}: ${Math.min(i + BATCH_SIZE, table.rows.length)}/${table.rows.length}`
                );
            }
        });

        this.logger.info(`Upsert complete: ${table.rows.length} rows`);
        return table.rows.length;
    }

    private async ensureTable(tx: postgres.TransactionSql): Promise<void> {
        await tx`CREATE SCHEMA IF NOT EXISTS ${tx(this.schemaName)}`;
        await tx`
            CREATE TABLE IF NOT EXISTS ${tx(this.table)} (
                extraction_id TEXT PRIMARY KEY,
                location_id TEXT NOT NULL,
                location_city TEXT,
                location_state TEXT,
                latitude DOUBLE PRECISION,
                longitude DOUBLE PRECISION,
                event_date DATE,
                observed_at TIMESTAMPTZ,
                requested_at TIMESTAMPTZ,
                processed_at TIMESTAMPTZ,
                source_version TEXT,
                weather_code INTEGER,
                weather_description TEXT
            )
        `;
    }

    /**
     * Additive schema evolution: missing columns are added as nullable.
     */
    private async ensureColumns(tx: postgres.TransactionSql, columns: readonly ColumnSpec[]): Promise<void> {
        const relationName = this.table.slice(this.schemaName.length + 1);
        const existing = await tx<{ column_name: string }[]>`
            SELECT column_name
            FROM information_schema.columns
            WHERE table_schema = ${this.schemaName} AND table_name = ${relationName}
        `;
        const known = new Set(existing.map((r) => r.column_name));

        for (const column of columns) {
            if (known.has(column.name)) continue;
            const columnType = column.type === 'number' ? tx`DOUBLE PRECISION` : tx`TEXT`;
            await tx`
                ALTER TABLE ${tx(this.table)}
                ADD COLUMN IF NOT EXISTS ${tx(column.name)} ${columnType}
            `;
            this.logger.info(`Added column ${column.name} (${column.type}) to ${this.table}`);
        }
    }

    /**
     * Close the database connection pool.
     */
    async close(): Promise<void> {
        await this.sql.end();
        this.logger.info('Database connection closed');
    }
}
