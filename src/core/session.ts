import type { OpenRecordSink, ProgressCallbacks, RecordSource } from '@/types';
import { debugLog, type LogEntry, type LogListener } from '@/lib/debugLog';
import { openRecordFile, openRecordFileSink } from '@/lib/recordFile';
import {
    defaultViewerConfig,
    labelForKey,
    summaryOptionsOf,
    type ViewerConfig
} from '@/lib/viewerConfig';
import type { DataWindow, ReviewMode, SummaryLine, WindowPolicyResult } from './types';
import type { WindowCursor } from './windowCursor';
import { DataWindowList } from './dataWindows';
import { GpsRunIndex } from './gpsIndex';
import { RowStore, type LoadResult } from './rowStore';
import { mergeGpsEdits } from './merge';
import { PLACEHOLDER_TEXT } from './viewerDefaults';

const REVIEW_MODES: readonly ReviewMode[] = ['sensors', 'gps'];

const isReviewMode = (mode: string): mode is ReviewMode => {
    return REVIEW_MODES.some(known => known === mode);
};

const logAdjusted = (layer: ReviewMode, result: WindowPolicyResult) => {
    if (result.changed.length === 0) return;
    const details = result.changed.map(key => `${key}=${result.settings[key]}`).join(', ');
    debugLog.warn(`Adjusted ${layer} window to fit the data: ${details}`);
};

const cloneConfig = (config: ViewerConfig): ViewerConfig => ({
    sensors: { ...config.sensors },
    gps: { ...config.gps },
    labels: { ...config.labels, keys: { ...config.labels.keys } }
});

/**
 * One review of a recording: the row store, its GPS index and which of the
 * two windows navigation and edits currently act on.
 */
export class ReviewSession {
    readonly rowStore: RowStore;
    readonly gpsIndex: GpsRunIndex;
    /** Explicit windows annotated since the last load. */
    readonly labeledWindows = new DataWindowList();
    private mode: ReviewMode = 'sensors';
    private config: ViewerConfig;

    constructor(config: ViewerConfig = defaultViewerConfig()) {
        this.config = cloneConfig(config);
        this.rowStore = new RowStore(config.sensors, summaryOptionsOf(config));
        this.gpsIndex = new GpsRunIndex(config.gps);
    }

    getMode(): ReviewMode {
        return this.mode;
    }

    /** Switches the active window; anything but a known mode is ignored. */
    setMode(mode: string): boolean {
        if (!isReviewMode(mode)) return false;
        this.mode = mode;
        return true;
    }

    private get cursor(): WindowCursor {
        return this.mode === 'gps' ? this.gpsIndex.cursor : this.rowStore.cursor;
    }

    // Navigation

    stepForward(): boolean {
        return this.cursor.stepForward();
    }

    stepBackward(): boolean {
        return this.cursor.stepBackward();
    }

    growWindow(): boolean {
        return this.cursor.growWindow();
    }

    shrinkWindow(): boolean {
        return this.cursor.shrinkWindow();
    }

    gotoFraction(fraction: number): boolean {
        return this.cursor.gotoFraction(fraction);
    }

    index(): number {
        return this.cursor.startIndex;
    }

    windowLength(): number {
        return this.cursor.length;
    }

    /** Largest start index a scroll control should offer. */
    scrollRange(): number {
        return this.cursor.isActive() ? this.cursor.size - this.cursor.length : 0;
    }

    firstStamp(): string {
        return this.mode === 'gps' ? this.gpsIndex.getFirstStamp() : this.rowStore.getFirstStamp();
    }

    currentStamp(): string {
        return this.mode === 'gps' ? this.gpsIndex.getCurrentStamp() : this.rowStore.getCurrentStamp();
    }

    lastStamp(): string {
        return this.mode === 'gps' ? this.gpsIndex.getLastStamp() : this.rowStore.getLastStamp();
    }

    // GPS edits

    markWindowValid(): boolean {
        return this.mode === 'gps' && this.gpsIndex.markWindow(true);
    }

    markWindowInvalid(): boolean {
        return this.mode === 'gps' && this.gpsIndex.markWindow(false);
    }

    // Sensor edits

    annotateWindow(label: string): boolean {
        return this.mode === 'sensors' && this.rowStore.annotate(label);
    }

    removeWindowAnnotation(): boolean {
        return this.mode === 'sensors' && this.rowStore.removeAnnotation();
    }

    addNote(text: string): boolean {
        return this.mode === 'sensors' && this.rowStore.addNote(text);
    }

    annotateGivenWindow(dataWindow: DataWindow): boolean {
        if (!this.rowStore.annotateWindow(dataWindow)) return false;
        this.labeledWindows.add(dataWindow);
        return true;
    }

    /** Annotates every window in `windows` and returns how many applied. */
    annotateWindows(windows: DataWindowList): number {
        return windows.all().filter(dataWindow => this.annotateGivenWindow(dataWindow)).length;
    }

    removeGivenWindowAnnotation(dataWindow: DataWindow): boolean {
        return this.rowStore.removeWindowAnnotation(dataWindow);
    }

    /** Annotates the sensor window with the label bound to `key`, if any. */
    annotateWithKey(key: string): boolean {
        const label = labelForKey(this.config, key);
        if (label === null) return false;
        return this.annotateWindow(label);
    }

    labelText(): SummaryLine[] {
        if (this.mode !== 'sensors') return [['', PLACEHOLDER_TEXT, '']];
        return this.rowStore.labelText();
    }

    noteText(): SummaryLine[] {
        if (this.mode !== 'sensors') return [['', PLACEHOLDER_TEXT, '']];
        return this.rowStore.noteText();
    }

    // Persistence

    async load(source: RecordSource, callbacks: ProgressCallbacks = {}): Promise<LoadResult> {
        this.labeledWindows.clear();
        const result = await this.rowStore.load(source, this.gpsIndex, callbacks);
        logAdjusted('sensors', result.sensors);
        logAdjusted('gps', result.gps);
        callbacks.onComplete?.();
        return result;
    }

    async loadFile(filePath: string, callbacks: ProgressCallbacks = {}): Promise<LoadResult> {
        debugLog.log(`Opening ${filePath}`);
        this.rowStore.clear();
        this.gpsIndex.abandonLoad();
        this.labeledWindows.clear();
        const source = await openRecordFile(filePath);
        return this.load(source, callbacks);
    }

    /**
     * Merges pending GPS edits into the rows, then writes the rows if anything
     * changed. Resolves to whether the sink was written.
     */
    async save(openSink: OpenRecordSink, callbacks: ProgressCallbacks = {}): Promise<boolean> {
        mergeGpsEdits(this.rowStore, this.gpsIndex, callbacks.onProgress);
        const written = await this.rowStore.save(openSink, callbacks);
        callbacks.onComplete?.();
        return written;
    }

    async saveFile(filePath: string, callbacks: ProgressCallbacks = {}): Promise<boolean> {
        return this.save(() => openRecordFileSink(filePath), callbacks);
    }

    // Activity log

    /** Follows log entries from loads, merges and saves; returns an unsubscribe function. */
    onLog(listener: LogListener): () => void {
        return debugLog.subscribe(listener);
    }

    recentLogs(): LogEntry[] {
        return debugLog.getLogs();
    }

    // Configuration

    getConfig(): ViewerConfig {
        return cloneConfig(this.config);
    }

    /**
     * Takes new settings and returns them as actually applied, with window
     * sizes and steps clamped to the loaded data.
     */
    updateConfig(config: ViewerConfig): ViewerConfig {
        this.config = cloneConfig(config);
        this.rowStore.setSummaryOptions(summaryOptionsOf(config));
        const sensors = this.rowStore.cursor.configure(config.sensors);
        const gps = this.gpsIndex.cursor.configure(config.gps);
        logAdjusted('sensors', sensors);
        logAdjusted('gps', gps);

        const applied = cloneConfig(config);
        applied.sensors = { ...sensors.settings };
        applied.gps = { ...gps.settings };
        return applied;
    }

    hasData(): boolean {
        return this.mode === 'gps' ? this.gpsIndex.hasData : this.rowStore.hasData;
    }

    hasGpsData(): boolean {
        return this.gpsIndex.hasData;
    }

    hasSensorData(): boolean {
        return this.rowStore.hasData;
    }

    dataHasChanged(): boolean {
        return this.rowStore.dataHasChanged || this.gpsIndex.dataHasChanged;
    }
}

export const createSession = (config?: ViewerConfig): ReviewSession => {
    return new ReviewSession(config);
};
