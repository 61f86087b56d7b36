/**
 * Microseconds since the Unix epoch. Datetime fields are naive wall-clock
 * values, so no time zone is applied when converting.
 */
export type MicroEpoch = number;

/** Type tags accepted in the second header line. Short and long spellings are equivalent. */
export type FieldTypeTag = 'f' | 's' | 'dt' | 'float' | 'string' | 'datetime';

export type FieldKind = 'float' | 'string' | 'datetime';

export type FieldValue = number | string | null;

/**
 * Ordered field name → type tag mapping. Map iteration order is the
 * column order of the file.
 */
export type FieldSchema = Map<string, FieldTypeTag>;

export type SensorRecord = Record<string, FieldValue>;

export interface RecordSource {
    readonly fields: FieldSchema;
    rows(): AsyncIterable<SensorRecord>;
    close(): Promise<void>;
}

export interface RecordSink {
    writeHeader(fields: FieldSchema): Promise<void>;
    writeRecord(record: SensorRecord): Promise<void>;
    close(): Promise<void>;
}

export type OpenRecordSink = () => Promise<RecordSink>;

export interface ProgressCallbacks {
    onProgress?: (message: string) => void;
    onComplete?: () => void;
}

// Reserved field names
export const STAMP_FIELD = 'stamp';
export const LATITUDE_FIELD = 'latitude';
export const LONGITUDE_FIELD = 'longitude';
export const GPS_VALID_FIELD = 'is_gps_valid';
export const ACTIVITY_LABEL_FIELD = 'activity_label';
export const USER_ACTIVITY_LABEL_FIELD = 'user_activity_label';
export const NOTES_FIELD = 'notes';
export const BATTERY_STATE_FIELD = 'battery_state';

export const fieldKindOf = (tag: FieldTypeTag): FieldKind => {
    switch (tag) {
        case 'f':
        case 'float':
            return 'float';
        case 'dt':
        case 'datetime':
            return 'datetime';
        default:
            return 'string';
    }
};
