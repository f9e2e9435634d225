import { access } from 'node:fs/promises';
import parquet from 'parquetjs-lite';

import { replaceAtomically } from '../AtomicFile.ts';
import { isMissingFile } from './DatasetCodec.ts';

import type { CellValue, ColumnSpec, FactRow, FactTable } from '../../model/Models.ts';
import type { DatasetCodec } from './DatasetCodec.ts';

/**
 * Every column is optional: evolved columns are null in older rows.
 */
export function buildParquetSchema(columns: readonly ColumnSpec[]): parquet.ParquetSchema {
    const definition: parquet.ParquetSchemaDefinition = {};
    for (const column of columns) {
        definition[column.name] = {
            type: column.type === 'number' ? 'DOUBLE' : 'UTF8',
            optional: true,
        };
    }
    return new parquet.ParquetSchema(definition);
}

function toColumnSpec(field: parquet.ParquetFieldDefinition): ColumnSpec {
    const isString = field.originalType === 'UTF8' || field.primitiveType === 'BYTE_ARRAY';
    return { name: field.name, type: isString ? 'string' : 'number' };
}

function toCellValue(value: unknown): CellValue {
    if (value === undefined || value === null) return null;
    if (typeof value === 'string' || typeof value === 'number') return value;
    if (typeof value === 'bigint') return Number(value);
    if (Buffer.isBuffer(value)) return value.toString('utf-8');
    return String(value);
}

export class ParquetCodec implements DatasetCodec {
    readonly format = 'parquet' as const;
    readonly extension = 'parquet';

    async read(filePath: string): Promise<FactTable | null> {
        try {
            await access(filePath);
        } catch (err) {
            if (isMissingFile(err)) return null;
            throw err;
        }

        const reader = await parquet.ParquetReader.openFile(filePath);
        try {
            const columns = reader.getSchema().fieldList.map(toColumnSpec);
            const rows: FactRow[] = [];
            const cursor = reader.getCursor();
            let record = await cursor.next();
            while (record) {
                const row: FactRow = {};
                for (const column of columns) {
                    row[column.name] = toCellValue(record[column.name]);
                }
                rows.push(row);
                record = await cursor.next();
            }
            return { columns, rows };
        } finally {
            await reader.close();
        }
    }

    async write(filePath: string, table: FactTable): Promise<void> {
        const schema = buildParquetSchema(table.columns);
        await replaceAtomically(filePath, async (tempPath) => {
            const writer = await parquet.ParquetWriter.openFile(schema, tempPath);
            try {
                for (const row of table.rows) {
                    const record: parquet.ParquetRow = {};
                    for (const column of table.columns) {
                        const value = row[column.name];
                        // optional fields are written by omission
                        if (value !== null && value !== undefined) {
                            record[column.name] = value;
                        }
                    }
                    await writer.appendRow(record);
                }
            } finally {
                await writer.close();
            }
        });
    }
}
