import type { CellValue, ColumnSpec, ColumnType, FactRow, FactTable, WeatherFact } from '../model/Models.ts';

/**
 * Fixed leading columns of every fact table; metric columns follow.
 */
export const BASE_COLUMNS: readonly ColumnSpec[] = [
    { name: 'extraction_id', type: 'string' },
    { name: 'location_id', type: 'string' },
    { name: 'location_city', type: 'string' },
    { name: 'location_state', type: 'string' },
    { name: 'latitude', type: 'number' },
    { name: 'longitude', type: 'number' },
    { name: 'event_date', type: 'string' },
    { name: 'observed_at', type: 'string' },
    { name: 'requested_at', type: 'string' },
    { name: 'processed_at', type: 'string' },
    { name: 'source_version', type: 'string' },
    { name: 'weather_code', type: 'number' },
    { name: 'weather_description', type: 'string' },
];

const STRING_COLUMNS = new Set(BASE_COLUMNS.filter((c) => c.type === 'string').map((c) => c.name));

/**
 * Type of a column known only by name (CSV headers, evolved columns).
 */
export function columnTypeFor(name: string): ColumnType {
    return STRING_COLUMNS.has(name) ? 'string' : 'number';
}

export function factToRow(fact: WeatherFact): FactRow {
    const row: FactRow = {
        extraction_id: fact.extractionId,
        location_id: fact.locationId,
        location_city: fact.locationCity,
        location_state: fact.locationState,
        latitude: fact.latitude,
        longitude: fact.longitude,
        event_date: fact.eventDate,
        observed_at: fact.observedAt,
        requested_at: fact.requestedAt,
        processed_at: fact.processedAt,
        source_version: fact.sourceVersion,
        weather_code: fact.weatherCode,
        weather_description: fact.weatherDescription,
    };
    for (const [column, value] of Object.entries(fact.metrics)) {
        row[column] = value;
    }
    return row;
}

export function factsToTable(facts: readonly WeatherFact[]): FactTable {
    const columns: ColumnSpec[] = [...BASE_COLUMNS];
    const known = new Set(columns.map((c) => c.name));

    for (const fact of facts) {
        for (const metric of Object.keys(fact.metrics)) {
            if (!known.has(metric)) {
                known.add(metric);
                columns.push({ name: metric, type: 'number' });
            }
        }
    }

    return normalizeTable({ columns, rows: facts.map(factToRow) });
}

/**
 * Existing columns keep their position and type; columns only the other side
 * has are appended. Schema evolution is additive only.
 */
export function unionColumns(existing: readonly ColumnSpec[], incoming: readonly ColumnSpec[]): ColumnSpec[] {
    const columns = [...existing];
    const known = new Set(existing.map((c) => c.name));
    for (const column of incoming) {
        if (!known.has(column.name)) {
            known.add(column.name);
            columns.push(column);
        }
    }
    return columns;
}

/**
 * Gives every row every column, backfilling null.
 */
export function normalizeTable(table: FactTable): FactTable {
    return {
        columns: table.columns,
        rows: table.rows.map((row) => {
            const normalized: FactRow = {};
            for (const column of table.columns) {
                const value: CellValue | undefined = row[column.name];
                normalized[column.name] = value === undefined ? null : value;
            }
            return normalized;
        }),
    };
}

function processedAt(row: FactRow): string {
    const value = row.processed_at;
    return typeof value === 'string' ? value : '';
}

/**
 * Merges incoming rows into an existing table keyed by extraction_id.
 * A key present on both sides keeps the row with the later processed_at;
 * on a tie the incoming row wins. Existing rows keep their order, new keys
 * are appended in incoming order.
 */
export function mergeTables(existing: FactTable | null, incoming: FactTable): FactTable {
    const columns = unionColumns(existing?.columns ?? [], incoming.columns);
    const rows: FactRow[] = [];
    const positions = new Map<string, number>();

    const upsert = (row: FactRow, preferNewer: boolean) => {
        const key = row.extraction_id;
        if (typeof key !== 'string' || key === '') {
            throw new Error('Fact row without extraction_id cannot be merged');
        }
        const position = positions.get(key);
        if (position === undefined) {
            positions.set(key, rows.length);
            rows.push(row);
            return;
        }
        const current = rows[position];
        const replace = preferNewer
            ? processedAt(row) >= processedAt(current)
            : processedAt(row) > processedAt(current);
        if (replace) {
            rows[position] = row;
        }
    };

    for (const row of existing?.rows ?? []) upsert(row, false);
    for (const row of incoming.rows) upsert(row, true);

    return normalizeTable({ columns, rows });
}
