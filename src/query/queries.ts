import type postgres from 'postgres';

import type { TableRow } from './printTable.ts';

export interface DateRange {
    from: string;
    to: string;
}

/**
 * Analytic queries over the warehouse table. `table` is a schema-qualified
 * identifier and is always passed through sql() for escaping.
 */
export class WeatherQueries {
    private sql: postgres.Sql;
    private table: string;

    constructor(sql: postgres.Sql, table: string) {
        this.sql = sql;
        this.table = table;
    }

    async latest(limit: number = 20): Promise<TableRow[]> {
        const sql = this.sql;
        return await sql<TableRow[]>`
            SELECT
                location_city,
                location_state,
                observed_at,
                temperature_celsius,
                relative_humidity,
                precipitation_mm,
                wind_speed_kmh,
                weather_description
            FROM ${sql(this.table)}
            ORDER BY observed_at DESC NULLS LAST
            LIMIT ${limit}
        `;
    }

    async averageTemperature(range: DateRange): Promise<TableRow[]> {
        const sql = this.sql;
        return await sql<TableRow[]>`
            SELECT
                COALESCE(NULLIF(location_city, ''), 'Unknown') AS city,
                COALESCE(NULLIF(location_state, ''), 'NA') AS state,
                ROUND(AVG(temperature_celsius)::numeric, 2) AS avg_temperature_celsius,
                COUNT(*) AS observations
            FROM ${sql(this.table)}
            WHERE event_date BETWEEN ${range.from} AND ${range.to}
              AND COALESCE(NULLIF(location_city, ''), 'Unknown') <> 'Unknown'
            GROUP BY 1, 2
            ORDER BY avg_temperature_celsius DESC NULLS LAST
        `;
    }

    async rainfall(range: DateRange): Promise<TableRow[]> {
        const sql = this.sql;
        return await sql<TableRow[]>`
            SELECT
                COALESCE(NULLIF(location_city, ''), 'Unknown') AS city,
                COALESCE(NULLIF(location_state, ''), 'NA') AS state,
                ROUND(SUM(precipitation_mm)::numeric, 2) AS total_precipitation_mm,
                ROUND(AVG(precipitation_mm)::numeric, 2) AS avg_precipitation_mm,
                COUNT(*) AS records,
                COUNT(*) FILTER (WHERE precipitation_mm > 0) AS rainy_records
            FROM ${sql(this.table)}
            WHERE event_date BETWEEN ${range.from} AND ${range.to}
              AND COALESCE(NULLIF(location_city, ''), 'Unknown') <> 'Unknown'
            GROUP BY 1, 2
            ORDER BY total_precipitation_mm DESC NULLS LAST
        `;
    }

    async city(name: string, limit: number = 10): Promise<TableRow[]> {
        const sql = this.sql;
        return await sql<TableRow[]>`
            SELECT
                observed_at,
                temperature_celsius,
                relative_humidity,
                precipitation_mm,
                wind_speed_kmh,
                weather_description
            FROM ${sql(this.table)}
            WHERE lower(location_city) = lower(${name})
            ORDER BY observed_at DESC NULLS LAST
            LIMIT ${limit}
        `;
    }

    async raw(query: string): Promise<TableRow[]> {
        return await this.sql.unsafe<TableRow[]>(query);
    }
}
