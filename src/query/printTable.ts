export type TableRow = Record<string, unknown>;

function formatValue(value: unknown): string {
    if (value === null || value === undefined) return '';
    if (value instanceof Date) return value.toISOString();
    if (typeof value === 'object') return JSON.stringify(value);
    return String(value);
}

/**
 * Renders rows as a padded text table. Columns default to the keys of the first row.
 */
export function formatTable(rows: readonly TableRow[], columns?: readonly string[]): string {
    if (rows.length === 0) return 'No rows found.';

    const names = columns ?? Object.keys(rows[0]);
    const cells = rows.map((row) => names.map((name) => formatValue(row[name])));
    const widths = names.map((name, i) =>
        Math.max(name.length, ...cells.map((row) => row[i].length))
    );

    const lines = [
        names.map((name, i) => name.padEnd(widths[i])).join(' | '),
        widths.map((w) => '-'.repeat(w)).join('-+-'),
        ...cells.map((row) => row.map((value, i) => value.padEnd(widths[i])).join(' | ')),
    ];
    return lines.join('\n');
}

export function printTable(rows: readonly TableRow[], columns?: readonly string[]): void {
    console.log(formatTable(rows, columns));
}
