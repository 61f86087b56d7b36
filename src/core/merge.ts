import { debugLog } from '@/lib/debugLog';
import type { GpsRunIndex } from './gpsIndex';
import type { RowStore } from './rowStore';
import { mergingMessage, NOTHING_TO_MERGE } from './progress';
import { stampText } from './recordFields';

/**
 * Writes the validity of every GPS run into the records it covers.
 *
 * Returns false (and only reports it) when no run has been edited since the
 * last merge. Otherwise the row store is marked changed and the index clean.
 */
export const mergeGpsEdits = (
    rowStore: RowStore,
    gpsIndex: GpsRunIndex,
    onProgress?: (message: string) => void
): boolean => {
    if (!gpsIndex.dataHasChanged) {
        debugLog.log(NOTHING_TO_MERGE);
        onProgress?.(NOTHING_TO_MERGE);
        return false;
    }

    const total = rowStore.size;
    const runs = gpsIndex.getRuns();
    let invalidRuns = 0;
    runs.forEach(run => {
        onProgress?.(mergingMessage(run.firstRowIndex, total, stampText(run.startStamp)));
        rowStore.setGpsValidity(run.firstRowIndex, run.lastRowIndex, run.isValid);
        if (!run.isValid) invalidRuns++;
    });

    rowStore.markChanged();
    gpsIndex.markMerged();
    debugLog.log(`Merged ${runs.length} GPS runs (${invalidRuns} invalid) into sensor data`);
    return true;
};
