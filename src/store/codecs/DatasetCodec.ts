import type { FactTable, OutputFormat } from '../../model/Models.ts';

/**
 * Reads and writes a whole fact table in one file format.
 */
export interface DatasetCodec {
    readonly format: OutputFormat;
    readonly extension: string;
    /** Returns null when the file does not exist. */
    read(filePath: string): Promise<FactTable | null>;
    write(filePath: string, table: FactTable): Promise<void>;
}

export function isMissingFile(err: unknown): boolean {
    return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
