import type { SensorRecord } from '@/types';
import type { GpsRun, GpsTrack, WindowPolicyResult, WindowSettings } from './types';
import { GpsWindowCursor } from './windowCursor';
import { coordinatesOf, isGpsValid, stampOf, stampText } from './recordFields';
import { PLACEHOLDER_TEXT, VIEWER_DEFAULTS } from './viewerDefaults';

const emptyTrack = (): GpsTrack => ({ longitudes: [], latitudes: [], valid: [] });

/**
 * Run-length view of the GPS fixes in a recording. Each run covers the rows
 * `[firstRowIndex, lastRowIndex]` of the row store; rows without a fix inside
 * that span belong to it as well.
 */
export class GpsRunIndex {
    readonly cursor: GpsWindowCursor;
    private runs: GpsRun[] = [];
    private pending: GpsRun[] | null = null;
    private projection: GpsTrack = emptyTrack();
    private dirty = false;

    constructor(settings: WindowSettings = VIEWER_DEFAULTS.gps) {
        this.cursor = new GpsWindowCursor(settings);
    }

    get hasData(): boolean {
        return this.runs.length > 0;
    }

    get dataHasChanged(): boolean {
        return this.dirty;
    }

    get size(): number {
        return this.runs.length;
    }

    loadInit(): void {
        this.runs = [];
        this.pending = [];
        this.projection = emptyTrack();
        this.dirty = false;
        this.cursor.reset();
    }

    /**
     * Feeds one row during a load. A row starts a new run when its
     * coordinates differ from the current run's; rows without coordinates
     * are skipped.
     */
    extend(record: SensorRecord, rowIndex: number): void {
        if (this.pending === null) {
            throw new Error('loadInit() must be called before extend()');
        }
        const coordinates = coordinatesOf(record);
        if (coordinates === null) return;

        const stamp = stampOf(record);
        const current = this.pending[this.pending.length - 1];
        if (
            current === undefined
            || current.latitude !== coordinates.latitude
            || current.longitude !== coordinates.longitude
        ) {
            this.pending.push({
                longitude: coordinates.longitude,
                latitude: coordinates.latitude,
                startStamp: stamp,
                lastStamp: stamp,
                count: 1,
                isValid: isGpsValid(record),
                firstRowIndex: rowIndex,
                lastRowIndex: rowIndex
            });
            return;
        }

        current.count += 1;
        current.lastStamp = stamp;
        current.lastRowIndex = rowIndex;
    }

    loadEnd(): WindowPolicyResult {
        this.runs = this.pending ?? [];
        this.pending = null;
        this.dirty = false;
        this.rebuildProjection();
        return this.cursor.activate(this.runs.length);
    }

    /** Drops a load that did not complete. */
    abandonLoad(): void {
        this.pending = null;
        this.runs = [];
        this.projection = emptyTrack();
        this.dirty = false;
        this.cursor.reset();
    }

    markWindow(valid: boolean): boolean {
        if (!this.cursor.isActive()) return false;
        const { start, end } = this.cursor.range();
        for (let i = start; i < end; i++) {
            this.runs[i].isValid = valid;
            this.projection.valid[i] = valid;
        }
        this.dirty = true;
        return true;
    }

    /** Called once the validity edits have been written into the row store. */
    markMerged(): void {
        this.dirty = false;
    }

    getRuns(): readonly GpsRun[] {
        return this.runs;
    }

    windowRuns(): GpsRun[] {
        if (!this.cursor.isActive()) return [];
        const { start, end } = this.cursor.range();
        return this.runs.slice(start, end);
    }

    track(): GpsTrack {
        return {
            longitudes: [...this.projection.longitudes],
            latitudes: [...this.projection.latitudes],
            valid: [...this.projection.valid]
        };
    }

    getFirstStamp(): string {
        if (!this.hasData) return PLACEHOLDER_TEXT;
        return stampText(this.runs[this.cursor.length - 1].startStamp);
    }

    getCurrentStamp(): string {
        if (!this.hasData) return PLACEHOLDER_TEXT;
        return stampText(this.runs[this.cursor.lastIndex].startStamp);
    }

    getLastStamp(): string {
        if (!this.hasData) return PLACEHOLDER_TEXT;
        return stampText(this.runs[this.runs.length - 1].lastStamp);
    }

    private rebuildProjection(): void {
        this.projection = {
            longitudes: this.runs.map(run => run.longitude),
            latitudes: this.runs.map(run => run.latitude),
            valid: this.runs.map(run => run.isValid)
        };
    }
}
