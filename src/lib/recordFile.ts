import { open, readFile } from 'node:fs/promises';
import Papa from 'papaparse';
import { z } from 'zod';
import type { FieldSchema, FieldTypeTag, RecordSink, RecordSource, SensorRecord } from '@/types';
import { STAMP_FIELD, fieldKindOf } from '@/types';
import { SchemaError, RowParseError } from './errors';
import { formatStamp, parseStamp } from './timeFormat';

const FieldTypeTagSchema = z.enum(['f', 's', 'dt', 'float', 'string', 'datetime']);

const WRITE_BATCH_LINES = 256;

export interface RawRow {
    values: string[];
    line: number;
    error?: string;
}

const countNewlines = (text: string): number => {
    let count = 0;
    for (let i = 0; i < text.length; i++) {
        if (text.charCodeAt(i) === 10) count++;
    }
    return count;
};

const isEmptyRow = (values: string[]): boolean => values.length === 1 && values[0] === '';

/**
 * Splits file text into rows. `line` is the 1-based physical line a row starts
 * on; quoted values with embedded newlines push later rows down. Empty lines
 * are dropped.
 */
export const splitRows = (text: string): RawRow[] => {
    const parsed = Papa.parse<string[]>(text, { delimiter: ',' });

    const errors = new Map<number, string>();
    for (const error of parsed.errors) {
        if (error.row !== undefined && !errors.has(error.row)) {
            errors.set(error.row, error.message);
        }
    }

    const rows: RawRow[] = [];
    let line = 1;
    parsed.data.forEach((values, i) => {
        const start = line;
        line += 1 + values.reduce((sum, value) => sum + countNewlines(value), 0);
        const error = errors.get(i);
        if (error === undefined && isEmptyRow(values)) return;
        rows.push({ values, line: start, error });
    });
    return rows;
};

const unparseLine = (values: string[]): string => Papa.unparse([values], { delimiter: ',', newline: '\n' });

/**
 * Builds the ordered schema from the two header lines.
 */
export const parseFieldSchema = (names: string[], tags: string[]): FieldSchema => {
    if (names.length !== tags.length) {
        throw new SchemaError(`${names.length} field names were given, but ${tags.length} types`);
    }

    const fields: FieldSchema = new Map();
    names.forEach((rawName, i) => {
        const name = rawName.trim();
        if (name.length === 0) {
            throw new SchemaError(`Field ${i + 1} has an empty name`);
        }
        if (fields.has(name)) {
            throw new SchemaError(`Field '${name}' is declared more than once`);
        }
        const parsed = FieldTypeTagSchema.safeParse(tags[i].trim());
        if (!parsed.success) {
            throw new SchemaError(`The field type '${tags[i]}' for field '${name}' is unknown`);
        }
        fields.set(name, parsed.data);
    });

    const stampTag = fields.get(STAMP_FIELD);
    if (stampTag === undefined) {
        throw new SchemaError(`Required field '${STAMP_FIELD}' is missing`);
    }
    if (fieldKindOf(stampTag) !== 'datetime') {
        throw new SchemaError(`Field '${STAMP_FIELD}' must be a datetime, got '${stampTag}'`);
    }

    return fields;
};

const parseFloatValue = (text: string): number | undefined => {
    const trimmed = text.trim();
    if (trimmed.length === 0) return undefined;
    if (/^[+-]?inf(inity)?$/i.test(trimmed)) {
        return trimmed.startsWith('-') ? -Infinity : Infinity;
    }
    const value = Number(trimmed);
    if (Number.isNaN(value) && !/^[+-]?nan$/i.test(trimmed)) return undefined;
    return value;
};

/**
 * Converts raw values to a record using the schema. Empty values become null.
 */
export const parseRecord = (fields: FieldSchema, values: string[], line: number): SensorRecord => {
    if (values.length !== fields.size) {
        throw new RowParseError(line, `${values.length} values given, but there are ${fields.size} fields`);
    }

    const record: SensorRecord = {};
    let i = 0;
    for (const [name, tag] of fields) {
        const text = values[i++];
        if (text === '') {
            record[name] = null;
            continue;
        }

        const kind = fieldKindOf(tag);
        if (kind === 'float') {
            const value = parseFloatValue(text);
            if (value === undefined) {
                throw new RowParseError(line, `Field '${name}' is not a number: '${text}'`);
            }
            record[name] = value;
        } else if (kind === 'datetime') {
            const stamp = parseStamp(text);
            if (stamp === null) {
                throw new RowParseError(line, `Field '${name}' is not a datetime: '${text}'`);
            }
            record[name] = stamp;
        } else {
            record[name] = text;
        }
    }
    return record;
};

/**
 * Renders a record in schema order. Keys missing from the record are written empty.
 */
export const formatRecord = (fields: FieldSchema, record: SensorRecord): string => {
    const values: string[] = [];
    for (const [name, tag] of fields) {
        const value = record[name];
        if (value === undefined || value === null) {
            values.push('');
        } else if (fieldKindOf(tag) === 'datetime' && typeof value === 'number') {
            values.push(formatStamp(value));
        } else {
            values.push(String(value));
        }
    }
    return unparseLine(values);
};

const readFieldSchema = (rows: RawRow[], filePath: string): FieldSchema => {
    if (rows.length < 2) {
        throw new SchemaError(`${filePath} is missing its field name and type header lines`);
    }
    const [names, tags] = rows;
    const error = names.error ?? tags.error;
    if (error !== undefined) {
        throw new SchemaError(error);
    }
    return parseFieldSchema(names.values, tags.values);
};

/**
 * Reads a record file and its two header lines. Rows are converted lazily
 * through `rows()`, which may be iterated once.
 */
export const openRecordFile = async (filePath: string): Promise<RecordSource> => {
    const text = await readFile(filePath, 'utf8');
    let pending = splitRows(text);
    const fields = readFieldSchema(pending, filePath);
    pending = pending.slice(2);

    async function* rows(): AsyncGenerator<SensorRecord> {
        const remaining = pending;
        pending = [];
        for (const { values, line, error } of remaining) {
            if (error !== undefined) {
                throw new RowParseError(line, error);
            }
            yield parseRecord(fields, values, line);
        }
    }

    return {
        fields,
        rows,
        close: async () => {
            pending = [];
        }
    };
};

/**
 * Creates (or truncates) a record file for writing. Lines are buffered and
 * flushed in batches; `close()` flushes the remainder.
 */
export const openRecordFileSink = async (filePath: string): Promise<RecordSink> => {
    const handle = await open(filePath, 'w');
    let fields: FieldSchema | null = null;
    let pending: string[] = [];

    const flush = async () => {
        if (pending.length === 0) return;
        const chunk = pending.join('');
        pending = [];
        await handle.write(chunk);
    };

    return {
        async writeHeader(schema: FieldSchema) {
            if (fields !== null) {
                throw new Error('Headers have already been written to this file');
            }
            fields = schema;
            const tags: FieldTypeTag[] = [...schema.values()];
            pending.push(unparseLine([...schema.keys()]) + '\n', unparseLine(tags) + '\n');
        },

        async writeRecord(record: SensorRecord) {
            if (fields === null) {
                throw new Error('The header must be written before any record');
            }
            pending.push(formatRecord(fields, record) + '\n');
            if (pending.length >= WRITE_BATCH_LINES) {
                await flush();
            }
        },

        async close() {
            try {
                await flush();
            } finally {
                await handle.close();
            }
        }
    };
};
