declare module 'parquetjs-lite' {
  namespace parquet {
    type ParquetField = {
      type: string;
      optional?: boolean;
      repeated?: boolean;
      compression?: string;
    };

    type ParquetSchemaDefinition = Record<string, ParquetField>;

    type ParquetFieldDefinition = {
      name: string;
      primitiveType?: string;
      originalType?: string;
      repetitionType: string;
    };

    type ParquetRow = Record<string, unknown>;

    class ParquetSchema {
      constructor(schema: ParquetSchemaDefinition);
      fieldList: ParquetFieldDefinition[];
    }

    class ParquetWriter {
      static openFile(schema: ParquetSchema, filePath: string, options?: Record<string, unknown>): Promise<ParquetWriter>;
      appendRow(row: ParquetRow): Promise<void>;
      close(): Promise<void>;
    }

    class ParquetCursor {
      next(): Promise<ParquetRow | null>;
      rewind(): void;
    }

    class ParquetReader {
      static openFile(filePath: string): Promise<ParquetReader>;
      getCursor(columnList?: string[]): ParquetCursor;
      getSchema(): ParquetSchema;
      getRowCount(): number;
      close(): Promise<void>;
    }
  }

  export = parquet;
}
