import type { FieldValue, MicroEpoch } from '@/types';

export type CursorState = 'EMPTY' | 'ACTIVE';

export type ReviewMode = 'gps' | 'sensors';

/** Tunable part of a window, taken from configuration. */
export interface WindowSettings {
    windowSize: number;
    resizeStep: number;
    navigateStep: number;
}

export interface WindowPolicyResult {
    settings: WindowSettings;
    changed: Array<keyof WindowSettings>;
}

export interface WindowSnapshot extends WindowSettings {
    state: CursorState;
    startIndex: number;
    size: number;
}

/** Half-open index range handed to the renderer. */
export interface IndexRange {
    start: number;
    end: number;
}

/**
 * Explicit window over the row store, inclusive of both ends.
 */
export interface DataWindow {
    iStart: number;
    iLast: number;
    label: string | null;
}

export interface GpsRun {
    longitude: number;
    latitude: number;
    startStamp: MicroEpoch | null;
    lastStamp: MicroEpoch | null;
    count: number;
    isValid: boolean;
    firstRowIndex: number;
    lastRowIndex: number;
}

export interface GpsTrack {
    longitudes: number[];
    latitudes: number[];
    valid: boolean[];
}

/** Which reserved fields the loaded file declared itself. */
export interface SchemaPresence {
    hasActivityLabel: boolean;
    hasUserActivityLabel: boolean;
    hasGpsValid: boolean;
    hasNotes: boolean;
    hasCoordinates: boolean;
    hasBatteryState: boolean;
}

export interface SummaryOptions {
    maxLines: number;
    horizonMicros: number;
}

export interface TransitionEntry {
    index: number;
    stamp: MicroEpoch | null;
    value: FieldValue;
    repeated: boolean;
    isAnchor: boolean;
}

/** [stamp, value, marker] as shown beside the chart. */
export type SummaryLine = [string, string, string];
