import { readFile } from 'node:fs/promises';

import { writeFileAtomically } from '../AtomicFile.ts';
import { columnTypeFor } from '../FactRows.ts';
import { isMissingFile } from './DatasetCodec.ts';

import type { CellValue, ColumnSpec, FactRow, FactTable } from '../../model/Models.ts';
import type { DatasetCodec } from './DatasetCodec.ts';

interface CsvCell {
    text: string;
    quoted: boolean;
}

const NEEDS_QUOTES = /[",\r\n]/;

/**
 * null is an empty unquoted cell, '' is an empty quoted cell.
 */
export function formatCell(value: CellValue): string {
    if (value === null) return '';
    if (typeof value === 'number') return String(value);
    if (value === '' || NEEDS_QUOTES.test(value) || value.trim() !== value) {
        return `"${value.replace(/"/g, '""')}"`;
    }
    return value;
}

export function stringifyCsv(table: FactTable): string {
    const lines = [table.columns.map((c) => formatCell(c.name)).join(',')];
    for (const row of table.rows) {
        lines.push(table.columns.map((c) => formatCell(row[c.name] ?? null)).join(','));
    }
    return lines.join('\n') + '\n';
}

/**
 * RFC 4180 tokenizer. Keeps whether each cell was quoted so empty strings
 * and nulls survive a round trip.
 */
export function tokenizeCsv(text: string): CsvCell[][] {
    const records: CsvCell[][] = [];
    let record: CsvCell[] = [];
    let cell = '';
    let quoted = false;
    let inQuotes = false;
    let i = 0;

    const endCell = () => {
        record.push({ text: cell, quoted });
        cell = '';
        quoted = false;
    };
    const endRecord = () => {
        endCell();
        records.push(record);
        record = [];
    };

    while (i < text.length) {
        const ch = text[i];
        if (inQuotes) {
            if (ch === '"') {
                if (text[i + 1] === '"') {
                    cell += '"';
                    i += 2;
                    continue;
                }
                inQuotes = false;
            } else {
                cell += ch;
            }
            i++;
            continue;
        }

        if (ch === '"' && cell === '') {
            inQuotes = true;
            quoted = true;
        } else if (ch === ',') {
            endCell();
        } else if (ch === '\n' || ch === '\r') {
            endRecord();
            if (ch === '\r' && text[i + 1] === '\n') i++;
        } else {
            cell += ch;
        }
        i++;
    }

    if (inQuotes) {
        throw new Error('Unterminated quoted field in CSV');
    }
    if (cell !== '' || quoted || record.length > 0) {
        endRecord();
    }
    return records;
}

function toCellValue(cell: CsvCell, column: ColumnSpec, line: number): CellValue {
    if (cell.text === '' && !cell.quoted) return null;
    if (column.type === 'string') return cell.text;

    const value = Number(cell.text);
    if (cell.text.trim() === '' || !Number.isFinite(value)) {
        throw new Error(`Invalid number '${cell.text}' in column ${column.name} at line ${line}`);
    }
    return value;
}

export function parseCsv(text: string): FactTable {
    const records = tokenizeCsv(text);
    if (records.length === 0) {
        return { columns: [], rows: [] };
    }

    const columns: ColumnSpec[] = records[0].map((cell) => ({ name: cell.text, type: columnTypeFor(cell.text) }));
    const rows: FactRow[] = [];

    for (let r = 1; r < records.length; r++) {
        const record = records[r];
        if (record.length === 1 && record[0].text === '' && !record[0].quoted) continue;
        if (record.length !== columns.length) {
            throw new Error(`CSV line ${r + 1} has ${record.length} cells, expected ${columns.length}`);
        }
        const row: FactRow = {};
        columns.forEach((column, c) => {
            row[column.name] = toCellValue(record[c], column, r + 1);
        });
        rows.push(row);
    }

    return { columns, rows };
}

export class CsvCodec implements DatasetCodec {
    readonly format = 'csv' as const;
    readonly extension = 'csv';

    async read(filePath: string): Promise<FactTable | null> {
        let text: string;
        try {
            text = await readFile(filePath, 'utf-8');
        } catch (err) {
            if (isMissingFile(err)) return null;
            throw err;
        }
        return parseCsv(text);
    }

    async write(filePath: string, table: FactTable): Promise<void> {
        await writeFileAtomically(filePath, stringifyCsv(table));
    }
}
