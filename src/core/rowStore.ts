import type {
    FieldSchema,
    OpenRecordSink,
    ProgressCallbacks,
    RecordSource,
    SensorRecord
} from '@/types';
import {
    ACTIVITY_LABEL_FIELD,
    BATTERY_STATE_FIELD,
    GPS_VALID_FIELD,
    LATITUDE_FIELD,
    LONGITUDE_FIELD,
    NOTES_FIELD,
    USER_ACTIVITY_LABEL_FIELD
} from '@/types';
import { debugLog } from '@/lib/debugLog';
import type {
    DataWindow,
    IndexRange,
    SchemaPresence,
    SummaryLine,
    SummaryOptions,
    TransitionEntry,
    WindowPolicyResult,
    WindowSettings
} from './types';
import { SensorWindowCursor } from './windowCursor';
import type { GpsRunIndex } from './gpsIndex';
import { LabelPalette } from './labelPalette';
import { formatSummaryLines, summarizeTransitions } from './textSummary';
import { gpsValidText, stampOf, stampText } from './recordFields';
import { loadingMessage, NOTHING_TO_SAVE, savingMessage } from './progress';
import { PLACEHOLDER_TEXT, VIEWER_DEFAULTS } from './viewerDefaults';
import { secondsToMicros } from '@/lib/timeFormat';

const NO_PRESENCE: SchemaPresence = {
    hasActivityLabel: false,
    hasUserActivityLabel: false,
    hasGpsValid: false,
    hasNotes: false,
    hasCoordinates: false,
    hasBatteryState: false
};

export const DEFAULT_SUMMARY_OPTIONS: SummaryOptions = {
    maxLines: VIEWER_DEFAULTS.labels.maxLines,
    horizonMicros: secondsToMicros(VIEWER_DEFAULTS.labels.searchHorizonSeconds)
};

const EMPTY_SUMMARY: SummaryLine[] = [['', PLACEHOLDER_TEXT, '']];

export const resolvePresence = (fields: FieldSchema): SchemaPresence => ({
    hasActivityLabel: fields.has(ACTIVITY_LABEL_FIELD),
    hasUserActivityLabel: fields.has(USER_ACTIVITY_LABEL_FIELD),
    hasGpsValid: fields.has(GPS_VALID_FIELD),
    hasNotes: fields.has(NOTES_FIELD),
    hasCoordinates: fields.has(LATITUDE_FIELD) && fields.has(LONGITUDE_FIELD),
    hasBatteryState: fields.has(BATTERY_STATE_FIELD)
});

type Anchor = number | DataWindow;

export interface LoadResult {
    rows: number;
    runs: number;
    /** How each cursor's settings had to be adjusted to fit the data. */
    sensors: WindowPolicyResult;
    gps: WindowPolicyResult;
}

/**
 * Owns every record of the loaded recording and the sensor window over it.
 */
export class RowStore {
    readonly cursor: SensorWindowCursor;
    readonly palette = new LabelPalette();
    private records: SensorRecord[] = [];
    private fields: FieldSchema = new Map();
    private presence: SchemaPresence = NO_PRESENCE;
    private summaryOptions: SummaryOptions;
    private dirty = false;

    constructor(settings: WindowSettings = VIEWER_DEFAULTS.sensors, summaryOptions: SummaryOptions = DEFAULT_SUMMARY_OPTIONS) {
        this.cursor = new SensorWindowCursor(settings);
        this.summaryOptions = { ...summaryOptions };
    }

    get hasData(): boolean {
        return this.records.length > 0;
    }

    get dataHasChanged(): boolean {
        return this.dirty;
    }

    get size(): number {
        return this.records.length;
    }

    get schema(): FieldSchema {
        return new Map(this.fields);
    }

    getPresence(): SchemaPresence {
        return { ...this.presence };
    }

    getRecords(): readonly SensorRecord[] {
        return this.records;
    }

    recordAt(index: number): SensorRecord | undefined {
        return this.records[index];
    }

    setSummaryOptions(options: SummaryOptions): void {
        this.summaryOptions = { ...options };
    }

    /**
     * Replaces the store's contents with `source`, feeding every row to
     * `gpsIndex` as it goes. Reserved fields the file lacks are added with
     * their defaults. If reading fails the store is left empty.
     */
    async load(source: RecordSource, gpsIndex: GpsRunIndex, callbacks: ProgressCallbacks = {}): Promise<LoadResult> {
        this.clear();
        gpsIndex.loadInit();

        const presence = resolvePresence(source.fields);
        const fields: FieldSchema = new Map(source.fields);
        if (!presence.hasActivityLabel) fields.set(ACTIVITY_LABEL_FIELD, 's');
        if (!presence.hasUserActivityLabel) fields.set(USER_ACTIVITY_LABEL_FIELD, 's');
        if (!presence.hasGpsValid) fields.set(GPS_VALID_FIELD, 's');
        if (!presence.hasNotes) fields.set(NOTES_FIELD, 's');
        const defaultValid = gpsValidText(VIEWER_DEFAULTS.gpsValidByDefault);

        const records: SensorRecord[] = [];
        let previousStamp: number | null = null;
        let outOfOrder = 0;

        try {
            for await (const row of source.rows()) {
                const index = records.length;
                const stamp = stampOf(row);
                if (index % VIEWER_DEFAULTS.progress.loadEveryRows === 0) {
                    callbacks.onProgress?.(loadingMessage(index, stampText(stamp)));
                }

                if (!presence.hasActivityLabel) row[ACTIVITY_LABEL_FIELD] = null;
                if (!presence.hasUserActivityLabel) row[USER_ACTIVITY_LABEL_FIELD] = null;
                if (!presence.hasGpsValid) row[GPS_VALID_FIELD] = defaultValid;
                if (!presence.hasNotes) row[NOTES_FIELD] = null;

                if (stamp !== null) {
                    if (previousStamp !== null && stamp < previousStamp) outOfOrder++;
                    previousStamp = stamp;
                }

                records.push(row);
                gpsIndex.extend(row, index);
            }
        } catch (error) {
            gpsIndex.abandonLoad();
            throw error;
        } finally {
            await source.close();
        }

        this.records = records;
        this.fields = fields;
        this.presence = presence;
        records.forEach(record => {
            const label = record[ACTIVITY_LABEL_FIELD];
            if (typeof label === 'string') this.palette.add(label);
        });

        const sensors = this.cursor.activate(records.length);
        const gps = gpsIndex.loadEnd();
        this.dirty = false;

        if (outOfOrder > 0) {
            debugLog.warn(`${outOfOrder} rows have a stamp earlier than the row before them`);
        }
        debugLog.log(`Loaded ${records.length} rows and ${gpsIndex.size} GPS runs`);
        return { rows: records.length, runs: gpsIndex.size, sensors, gps };
    }

    /** Sets the activity label on every record of the current window. */
    annotate(label: string): boolean {
        if (!this.cursor.isActive()) return false;
        return this.writeLabel(this.cursor.startIndex, this.cursor.lastIndex, label);
    }

    annotateWindow(dataWindow: DataWindow): boolean {
        return this.writeLabel(dataWindow.iStart, dataWindow.iLast, dataWindow.label);
    }

    removeAnnotation(): boolean {
        if (!this.cursor.isActive()) return false;
        return this.writeLabel(this.cursor.startIndex, this.cursor.lastIndex, null);
    }

    removeWindowAnnotation(dataWindow: DataWindow): boolean {
        return this.writeLabel(dataWindow.iStart, dataWindow.iLast, null);
    }

    /** Attaches `text` to the last record of the current window. */
    addNote(text: string): boolean {
        if (!this.cursor.isActive()) return false;
        this.records[this.cursor.lastIndex][NOTES_FIELD] = text.length > 0 ? text : null;
        this.dirty = true;
        return true;
    }

    /**
     * Writes GPS validity into the records `[firstRowIndex, lastRowIndex]`.
     * Does not touch the dirty flag; the merge marks the store changed once
     * every run is written.
     */
    setGpsValidity(firstRowIndex: number, lastRowIndex: number, valid: boolean): void {
        const text = gpsValidText(valid);
        const last = Math.min(lastRowIndex, this.records.length - 1);
        for (let i = Math.max(0, firstRowIndex); i <= last; i++) {
            this.records[i][GPS_VALID_FIELD] = text;
        }
    }

    markChanged(): void {
        this.dirty = true;
    }

    transitions(field: string, anchor?: Anchor): TransitionEntry[] {
        const index = this.resolveAnchor(anchor);
        if (index === null) return [];
        return summarizeTransitions(this.records, field, index, this.summaryOptions);
    }

    labelText(anchor?: Anchor): SummaryLine[] {
        const entries = this.transitions(ACTIVITY_LABEL_FIELD, anchor);
        return entries.length > 0 ? formatSummaryLines(entries) : EMPTY_SUMMARY.map(line => [...line]);
    }

    noteText(anchor?: Anchor): SummaryLine[] {
        const entries = this.transitions(NOTES_FIELD, anchor);
        return entries.length > 0 ? formatSummaryLines(entries) : EMPTY_SUMMARY.map(line => [...line]);
    }

    /**
     * Writes every record through the sink in schema order. Nothing is opened
     * when there are no unsaved edits.
     */
    async save(openSink: OpenRecordSink, callbacks: ProgressCallbacks = {}): Promise<boolean> {
        if (!this.dirty) {
            debugLog.log(NOTHING_TO_SAVE);
            callbacks.onProgress?.(NOTHING_TO_SAVE);
            return false;
        }

        const total = this.records.length;
        const sink = await openSink();
        try {
            await sink.writeHeader(new Map(this.fields));
            for (let i = 0; i < total; i++) {
                if (i % VIEWER_DEFAULTS.progress.saveEveryRows === 0) {
                    callbacks.onProgress?.(savingMessage(i, total));
                }
                await sink.writeRecord(this.records[i]);
            }
        } finally {
            await sink.close();
        }

        this.dirty = false;
        debugLog.log(`Saved ${total} rows`);
        return true;
    }

    /** Stamp at the end of the earliest possible window. */
    getFirstStamp(): string {
        if (!this.hasData) return PLACEHOLDER_TEXT;
        return stampText(stampOf(this.records[this.cursor.length - 1]));
    }

    getCurrentStamp(): string {
        if (!this.hasData) return PLACEHOLDER_TEXT;
        return stampText(stampOf(this.records[this.cursor.lastIndex]));
    }

    getLastStamp(): string {
        if (!this.hasData) return PLACEHOLDER_TEXT;
        return stampText(stampOf(this.records[this.records.length - 1]));
    }

    windowRange(): IndexRange | null {
        return this.cursor.isActive() ? this.cursor.range() : null;
    }

    /** Renderer range for an explicit window, or null when it falls outside the data. */
    rangeOf(dataWindow: DataWindow): IndexRange | null {
        const start = Math.min(dataWindow.iStart, dataWindow.iLast);
        const last = Math.max(dataWindow.iStart, dataWindow.iLast);
        if (start < 0 || last >= this.records.length) return null;
        return { start, end: last + 1 };
    }

    /** Numeric values of `field` over `range` (the current window by default); absent values are NaN. */
    series(field: string, range: IndexRange | null = this.windowRange()): number[] {
        if (range === null) return [];
        return this.records.slice(range.start, range.end).map(record => {
            const value = record[field];
            return typeof value === 'number' ? value : Number.NaN;
        });
    }

    /** Drops the recording and any unsaved edits. */
    clear(): void {
        this.records = [];
        this.fields = new Map();
        this.presence = NO_PRESENCE;
        this.dirty = false;
        this.palette.clear();
        this.cursor.reset();
    }

    private resolveAnchor(anchor: Anchor | undefined): number | null {
        if (!this.hasData) return null;
        if (anchor === undefined) return this.cursor.lastIndex;
        const index = typeof anchor === 'number' ? anchor : anchor.iLast;
        return index >= 0 && index < this.records.length ? index : null;
    }

    private writeLabel(iStart: number, iLast: number, label: string | null): boolean {
        const range = this.rangeOf({ iStart, iLast, label });
        if (range === null) return false;
        const value = label !== null && label.length > 0 ? label : null;
        for (let i = range.start; i < range.end; i++) {
            this.records[i][ACTIVITY_LABEL_FIELD] = value;
        }
        this.palette.add(value);
        this.dirty = true;
        return true;
    }
}
