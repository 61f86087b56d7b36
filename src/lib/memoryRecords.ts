import type { FieldSchema, RecordSink, RecordSource, SensorRecord } from '@/types';

/**
 * Record source over rows already in memory. Each row is copied as it is
 * handed out, so the caller's objects are never mutated by edits.
 */
export class MemoryRecordSource implements RecordSource {
    readonly fields: FieldSchema;
    private readonly data: SensorRecord[];
    private isClosed = false;

    constructor(fields: FieldSchema, rows: SensorRecord[]) {
        this.fields = new Map(fields);
        this.data = rows;
    }

    get closed(): boolean {
        return this.isClosed;
    }

    async *rows(): AsyncGenerator<SensorRecord> {
        for (const row of this.data) {
            yield { ...row };
        }
    }

    async close(): Promise<void> {
        this.isClosed = true;
    }
}

/** Collects what would have been written to a record file. */
export class MemoryRecordSink implements RecordSink {
    header: FieldSchema | null = null;
    readonly records: SensorRecord[] = [];
    private isClosed = false;

    get closed(): boolean {
        return this.isClosed;
    }

    async writeHeader(fields: FieldSchema): Promise<void> {
        if (this.header !== null) {
            throw new Error('Headers have already been written to this sink');
        }
        this.header = new Map(fields);
    }

    async writeRecord(record: SensorRecord): Promise<void> {
        if (this.header === null) {
            throw new Error('The header must be written before any record');
        }
        this.records.push({ ...record });
    }

    async close(): Promise<void> {
        this.isClosed = true;
    }
}
