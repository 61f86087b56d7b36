export { ReviewSession, createSession } from './session';
export { RowStore, resolvePresence, DEFAULT_SUMMARY_OPTIONS } from './rowStore';
export type { LoadResult } from './rowStore';
export { GpsRunIndex } from './gpsIndex';
export { WindowCursor, SensorWindowCursor, GpsWindowCursor } from './windowCursor';
export { applyWindowSizePolicy } from './windowPolicy';
export { mergeGpsEdits } from './merge';
export { summarizeTransitions, formatSummaryLines } from './textSummary';
export { LabelPalette } from './labelPalette';
export { DataWindowList } from './dataWindows';
export type { LegendEntry } from './labelPalette';
export { VIEWER_DEFAULTS, PLACEHOLDER_TEXT } from './viewerDefaults';
export type * from './types';

export type * from '../types';
export {
    STAMP_FIELD,
    LATITUDE_FIELD,
    LONGITUDE_FIELD,
    GPS_VALID_FIELD,
    ACTIVITY_LABEL_FIELD,
    USER_ACTIVITY_LABEL_FIELD,
    NOTES_FIELD,
    BATTERY_STATE_FIELD
} from '../types';
export { openRecordFile, openRecordFileSink } from '../lib/recordFile';
export { MemoryRecordSource, MemoryRecordSink } from '../lib/memoryRecords';
export {
    ViewerConfigSchema,
    defaultViewerConfig,
    parseViewerConfig,
    loadViewerConfig,
    saveViewerConfig,
    labelForKey
} from '../lib/viewerConfig';
export type { ViewerConfig } from '../lib/viewerConfig';
export { SchemaError, RowParseError, ConfigError } from '../lib/errors';
export { debugLog } from '../lib/debugLog';
export type { LogEntry, LogLevel, LogListener } from '../lib/debugLog';
